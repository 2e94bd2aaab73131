import { readdirSync, rmSync, statSync } from "fs";
import { join } from "path";
import { INSTALLER_ARTIFACT_NAMES, GOG_METADATA_PREFIX } from "../materializer/index.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "cleanup" });

// ---------------------------------------------------------------------------
// Junk patterns
// ---------------------------------------------------------------------------

/**
 * Top-level files left behind by the game's own DOS installer and the
 * batch launchers GOG ships, which play.sh replaces.
 */
const JUNK_FILE_PATTERNS: ReadonlyArray<RegExp> = [
  /^TEMP.*\.\$\$\$$/,
  /^XMMHAND\.DAT$/,
  /^.*\.BAT$/,
  /^.*\.bat$/,
];

export function isJunkFile(name: string): boolean {
  return name.startsWith(GOG_METADATA_PREFIX) || JUNK_FILE_PATTERNS.some((p) => p.test(name));
}

export interface CleanupResult {
  /** Removed entries; directories carry a trailing "/" */
  removed: string[];
  /** Entries that matched but could not be removed */
  failed: { name: string; reason: string }[];
}

// ---------------------------------------------------------------------------
// Cleanup
// ---------------------------------------------------------------------------

/**
 * Removes junk files and installer artifact directories from the top level
 * of `outputDir`. Anything missing is simply not there to remove, and a
 * failed removal is reported back instead of thrown.
 */
export function cleanupOutput(outputDir: string): CleanupResult {
  const result: CleanupResult = { removed: [], failed: [] };

  let entries: string[];
  try {
    entries = readdirSync(outputDir).sort();
  } catch (err) {
    log.warn({ err, outputDir }, "Could not list output directory for cleanup");
    return result;
  }

  for (const entry of entries) {
    if (entry.startsWith(".")) continue;
    const path = join(outputDir, entry);

    let isDir: boolean;
    try {
      isDir = statSync(path).isDirectory();
    } catch {
      continue;
    }

    const matches = isDir ? INSTALLER_ARTIFACT_NAMES.has(entry) : isJunkFile(entry);
    if (!matches) continue;

    const label = isDir ? `${entry}/` : entry;
    try {
      rmSync(path, { recursive: isDir, force: true });
      result.removed.push(label);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn({ path, reason }, "Cleanup failed");
      result.failed.push({ name: label, reason });
    }
  }

  return result;
}
