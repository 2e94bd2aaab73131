import { mkdirSync } from "fs";
import { basename, join } from "path";
import type { Installer, InstallerKind } from "../installer/index.js";
import type { Settings } from "../settings/index.js";
import type { ToolInvocation, ToolResult, ToolRunner } from "./types.js";
import { runTool } from "./runner.js";
import { ExtractionError } from "../../errors.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "extractor" });

/** Name of the extraction target inside the scratch tree. */
export const EXTRACT_DIR_NAME = "extracted";

/**
 * unzip exits 1 for "extracted with warnings", which is what the shell stub
 * in front of the ZIP payload produces ("extra bytes at beginning").
 * innoextract has no such middle ground.
 */
export function isAcceptedStatus(kind: InstallerKind, status: number | null): boolean {
  if (status === null) return false;
  return kind === "linuxArchive" ? status === 0 || status === 1 : status === 0;
}

/**
 * Builds the command line for the installer's extraction tool.
 *
 *   linuxArchive:   unzip -o <installer> -d <target>
 *   windowsPackage: innoextract -s <installer> -d <target>
 */
export function buildExtractCommand(
  installer: Installer,
  targetDir: string,
  settings: Settings
): ToolInvocation {
  if (installer.kind === "linuxArchive") {
    return {
      command: settings.unzipCommand,
      args: ["-o", installer.path, "-d", targetDir],
    };
  }
  return {
    command: settings.innoextractCommand,
    args: ["-s", installer.path, "-d", targetDir],
  };
}

/**
 * Extracts the installer into `<scratchDir>/extracted` and returns that path.
 *
 * Throws ExtractionError if the tool cannot be started or exits with a status
 * outside the accepted set; the captured output becomes the error details.
 */
export async function extractInstaller(
  installer: Installer,
  scratchDir: string,
  settings: Settings,
  run: ToolRunner = runTool
): Promise<string> {
  const targetDir = join(scratchDir, EXTRACT_DIR_NAME);
  mkdirSync(targetDir, { recursive: true });

  const { command, args } = buildExtractCommand(installer, targetDir, settings);
  const tool = basename(command);

  let result: ToolResult;
  try {
    result = await run(command, args);
  } catch (err) {
    throw new ExtractionError(tool, null, err instanceof Error ? err.message : String(err));
  }

  if (!isAcceptedStatus(installer.kind, result.status)) {
    log.debug({ tool, status: result.status, signal: result.signal }, "Extraction rejected");
    throw new ExtractionError(tool, result.status, result.output, result.signal ?? null);
  }

  log.debug({ tool, status: result.status, targetDir }, "Extraction finished");
  return targetDir;
}
