import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { logger } from "../../logger.js";

const log = logger.child({ module: "scratch" });

const SIGNAL_EXIT_CODES: Readonly<Record<"SIGINT" | "SIGTERM", number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

/**
 * Creates a fresh temporary directory, runs `fn` with it, and deletes it
 * afterwards however `fn` ends: resolve, reject, or SIGINT/SIGTERM while it
 * is still running. The signal handlers are removed again once `fn` settles.
 */
export async function withScratchTree<T>(
  fn: (dir: string) => Promise<T>,
  prefix = "gog-dosbox-"
): Promise<T> {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  log.debug({ dir }, "Created scratch tree");

  const release = () => {
    rmSync(dir, { recursive: true, force: true });
    log.debug({ dir }, "Removed scratch tree");
  };

  const onSignal = (signal: NodeJS.Signals) => {
    release();
    process.exit(signal === "SIGTERM" ? SIGNAL_EXIT_CODES.SIGTERM : SIGNAL_EXIT_CODES.SIGINT);
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    return await fn(dir);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    release();
  }
}
