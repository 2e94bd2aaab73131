import { cpSync, copyFileSync, readdirSync, statSync } from "fs";
import { join } from "path";
import type { InstallerKind } from "../installer/index.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "materializer" });

// ---------------------------------------------------------------------------
// Windows installer artifacts
// ---------------------------------------------------------------------------

/**
 * Top-level names in an innoextract tree that belong to the installer, not
 * the game. Matched by exact name, so a game folder that happens to be
 * called e.g. "tmp" is dropped too.
 */
export const INSTALLER_ARTIFACT_NAMES: ReadonlySet<string> = new Set([
  "__support",
  "__redist",
  "DOSBOX",
  "app",
  "commonappdata",
  "tmp",
]);

export const GOG_METADATA_PREFIX = "goggame-";

export function isInstallerArtifact(name: string): boolean {
  return (
    INSTALLER_ARTIFACT_NAMES.has(name) ||
    name.startsWith(GOG_METADATA_PREFIX) ||
    name.endsWith(".bin")
  );
}

// ---------------------------------------------------------------------------
// Game data
// ---------------------------------------------------------------------------

/**
 * Copies every non-hidden top-level entry of `gameData` into `outputDir`,
 * recursively, overwriting existing files. Windows installer artifacts are
 * skipped. Returns the copied entry names.
 */
export function copyGameData(gameData: string, outputDir: string, kind: InstallerKind): string[] {
  const copied: string[] = [];

  for (const entry of readdirSync(gameData).sort()) {
    if (entry.startsWith(".")) continue;
    if (kind === "windowsPackage" && isInstallerArtifact(entry)) {
      log.debug({ entry }, "Skipped installer artifact");
      continue;
    }

    // Symlink targets are kept as written; the source tree is deleted afterwards.
    cpSync(join(gameData, entry), join(outputDir, entry), {
      recursive: true,
      force: true,
      verbatimSymlinks: true,
    });
    copied.push(entry);
  }

  log.debug({ count: copied.length, outputDir }, "Copied game data");
  return copied;
}

// ---------------------------------------------------------------------------
// Game-specific config files (Windows)
// ---------------------------------------------------------------------------

const GAME_CONFIG_PATTERN = /\.(CFG|cfg)$/;

/**
 * Copies `*.CFG` / `*.cfg` files from the config root (e.g. U7.CFG with the
 * game's sound card choice) into the output. Files starting with "dosbox"
 * are emulator configs and are skipped. Returns the copied file names.
 */
export function copyGameConfigs(configRoot: string, outputDir: string): string[] {
  const copied: string[] = [];

  for (const entry of readdirSync(configRoot).sort()) {
    if (entry.startsWith(".") || !GAME_CONFIG_PATTERN.test(entry)) continue;
    if (entry.startsWith("dosbox")) continue;

    const source = join(configRoot, entry);
    if (!statSync(source).isFile()) continue;

    copyFileSync(source, join(outputDir, entry));
    copied.push(entry);
  }

  return copied;
}
