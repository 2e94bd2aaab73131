import chalk from "chalk";

/**
 * User-facing progress output. Progress goes to stdout; errors go to stderr
 * behind a red "Error:" marker. Diagnostic detail belongs in the logger, not
 * here.
 */
export interface Reporter {
  /** Green title line, e.g. "=== GOG DOS Game Extractor ===" */
  banner(title: string): void;
  /** Yellow "[n/total] title" header */
  step(index: number, total: number, title: string): void;
  /** Plain indented or unindented progress line */
  info(line: string): void;
  /** Non-fatal condition */
  warn(line: string): void;
  /** Fatal error with optional detail lines and hint, to stderr */
  error(message: string, details?: readonly string[], hint?: string): void;
  /** Blank line */
  blank(): void;
}

export interface ReporterStreams {
  out: NodeJS.WritableStream;
  err: NodeJS.WritableStream;
}

export function createConsoleReporter(
  streams: ReporterStreams = { out: process.stdout, err: process.stderr }
): Reporter {
  const print = (line: string) => streams.out.write(`${line}\n`);
  const printErr = (line: string) => streams.err.write(`${line}\n`);

  return {
    banner: (title) => print(chalk.green(title)),
    step: (index, total, title) => print(chalk.yellow(`[${index}/${total}] ${title}`)),
    info: (line) => print(line),
    warn: (line) => print(chalk.yellow(line)),
    error: (message, details = [], hint) => {
      printErr(chalk.red(`Error: ${message}`));
      for (const line of details) printErr(line);
      if (hint) printErr(hint);
    },
    blank: () => print(""),
  };
}
