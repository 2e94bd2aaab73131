/**
 * Shared types for the extractor module.
 */

export interface ToolResult {
  /** Exit status, or null if the process was killed by a signal */
  status: number | null;
  /** Signal that killed the process, if any */
  signal?: NodeJS.Signals | null;
  /** stdout and stderr interleaved in arrival order */
  output: string;
}

/**
 * Runs an external command to completion. Rejects only when the process
 * could not be started at all (e.g. ENOENT); a non-zero exit resolves.
 */
export type ToolRunner = (command: string, args: readonly string[]) => Promise<ToolResult>;

export interface ToolInvocation {
  command: string;
  args: string[];
}
