import { existsSync, realpathSync, statSync } from "fs";
import { basename, resolve } from "path";
import type { Installer, InstallerKind } from "./types.js";
import type { Settings } from "../settings/index.js";
import { findExecutable } from "../extractor/tools.js";
import { EnvironmentError, UsageError } from "../../errors.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "installer" });

/**
 * Maps a file name to an installer kind by its (case-sensitive) suffix.
 * Returns null for anything that is neither `.sh` nor `.exe`.
 */
export function detectInstallerKind(path: string): InstallerKind | null {
  if (path.endsWith(".sh")) return "linuxArchive";
  if (path.endsWith(".exe")) return "windowsPackage";
  return null;
}

/**
 * Validates the installer argument and classifies it.
 *
 * Throws:
 *   - UsageError        the file does not exist or has an unsupported suffix
 *   - EnvironmentError  a Windows package was given but the package tool is
 *                       not installed
 *
 * Runs before any scratch directory exists, so a failure here has no side
 * effects.
 */
export function classifyInstaller(input: string, settings: Settings): Installer {
  const absolute = resolve(input);
  if (!existsSync(absolute) || !statSync(absolute).isFile()) {
    throw new UsageError(`File not found: ${input}`);
  }

  const path = realpathSync(absolute);
  const kind = detectInstallerKind(path);
  if (!kind) {
    throw new UsageError("Unsupported installer type. Use .sh or .exe");
  }

  if (kind === "windowsPackage" && !findExecutable(settings.innoextractCommand)) {
    throw new EnvironmentError(
      settings.innoextractCommand,
      "Install with: sudo apt install innoextract"
    );
  }

  log.debug({ path, kind }, "Classified installer");
  return { path, kind, basename: basename(path) };
}
