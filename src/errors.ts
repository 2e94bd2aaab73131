/**
 * Typed errors for the setup pipeline.
 *
 * Every fatal condition the pipeline can hit is one of these. The CLI prints
 * `message`, then `details` (captured tool output, directory listings), then
 * `hint`, and exits 1.
 */

export type SetupErrorKind =
  | "usage"
  | "environment"
  | "extraction"
  | "structural"
  | "content";

/** Base class for all pipeline errors. */
export abstract class SetupError extends Error {
  abstract readonly kind: SetupErrorKind;

  constructor(
    message: string,
    public readonly details: readonly string[] = [],
    public readonly hint?: string,
  ) {
    super(message);
    this.name = "SetupError";
  }
}

/** Bad arguments or an input file we cannot handle. */
export class UsageError extends SetupError {
  readonly kind = "usage";

  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** A required external tool is not installed. */
export class EnvironmentError extends SetupError {
  readonly kind = "environment";

  constructor(
    public readonly tool: string,
    hint: string,
  ) {
    super(`${tool} is required for Windows installers`, [], hint);
    this.name = "EnvironmentError";
  }
}

/**
 * The extraction tool could not be started, was killed by a signal, or exited
 * with a status outside the accepted set.
 */
export class ExtractionError extends SetupError {
  readonly kind = "extraction";

  constructor(
    public readonly tool: string,
    public readonly status: number | null,
    output: string,
    public readonly signal: NodeJS.Signals | null = null,
  ) {
    super(
      signal !== null
        ? `${tool} was terminated by ${signal}`
        : status === null
          ? `${tool} could not be run`
          : `${tool} failed with status ${status}`,
      output.split("\n").filter((line) => line.length > 0),
    );
    this.name = "ExtractionError";
  }
}

/** The extracted tree does not have a layout we recognise. */
export class StructuralError extends SetupError {
  readonly kind = "structural";

  constructor(message: string, listing: readonly string[]) {
    super(message, ["Extracted contents:", ...listing]);
    this.name = "StructuralError";
  }
}

/** No configuration file carries launch instructions. */
export class ContentError extends SetupError {
  readonly kind = "content";

  constructor(
    public readonly configRoot: string,
    entries: readonly string[],
  ) {
    super("No DOSBox config with autoexec found", [
      `Looked in: ${configRoot}`,
      ...entries.map((e) => `  ${e}`),
    ]);
    this.name = "ContentError";
  }
}

export function isSetupError(err: unknown): err is SetupError {
  return err instanceof SetupError;
}
