import { readdirSync, statSync } from "fs";
import { dirname, join } from "path";
import type { InstallerKind } from "../installer/index.js";
import { StructuralError } from "../../errors.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "layout" });

// ---------------------------------------------------------------------------
// Known layouts
// ---------------------------------------------------------------------------

/**
 * Where Linux installers keep the game files, relative to the extraction
 * root. Checked in order; the first existing directory wins.
 */
export const LINUX_GAME_DATA_CANDIDATES: ReadonlyArray<string> = [
  "data/noarch/game/data",
  "data/noarch/data",
  "data/noarch/game",
  "game/data",
  "game",
];

/** Linux config root, when present. */
export const LINUX_CONFIG_ROOT = "data/noarch";

/** Windows installers keep their DOSBox configs here. */
export const WINDOWS_CONFIG_ROOT = "__support/app";

const LISTING_DEPTH: Readonly<Record<InstallerKind, number>> = {
  linuxArchive: 5,
  windowsPackage: 3,
};

export interface GameLayout {
  /** Directory whose entries are copied into the output */
  gameData: string;
  /** Directory searched for DOSBox and game config files */
  configRoot: string;
}

// ---------------------------------------------------------------------------
// FS helpers
// ---------------------------------------------------------------------------

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Lists directories under `root` (including "." for the root itself) in
 * sorted pre-order, down to `maxDepth` levels, stopping after `limit` lines.
 * Used only to make structural errors diagnosable.
 */
export function listDirectories(root: string, maxDepth: number, limit: number): string[] {
  const results: string[] = [];

  const walk = (dir: string, rel: string, depth: number): void => {
    if (results.length >= limit) return;
    results.push(rel);
    if (depth >= maxDepth) return;

    let entries: string[];
    try {
      entries = readdirSync(dir).sort();
    } catch {
      return;
    }

    for (const entry of entries) {
      const absolutePath = join(dir, entry);
      if (!isDirectory(absolutePath)) continue;
      walk(absolutePath, rel === "." ? entry : `${rel}/${entry}`, depth + 1);
    }
  };

  walk(root, ".", 0);
  return results;
}

// ---------------------------------------------------------------------------
// Locator
// ---------------------------------------------------------------------------

/**
 * Finds the game data directory and the config root inside an extracted
 * installer.
 *
 *   linuxArchive:   first existing LINUX_GAME_DATA_CANDIDATES entry; configs
 *                   in data/noarch if it exists, else next to the game data.
 *   windowsPackage: the extraction root itself; configs in __support/app.
 *
 * Throws StructuralError with a bounded directory listing when the expected
 * layout is missing.
 */
export function locateLayout(
  extractRoot: string,
  kind: InstallerKind,
  listingLimit = 30
): GameLayout {
  const listing = () => listDirectories(extractRoot, LISTING_DEPTH[kind], listingLimit);

  if (kind === "windowsPackage") {
    const configRoot = join(extractRoot, WINDOWS_CONFIG_ROOT);
    if (!isDirectory(configRoot)) {
      throw new StructuralError(`Expected ${WINDOWS_CONFIG_ROOT}/ not found`, listing());
    }
    log.debug({ gameData: extractRoot, configRoot }, "Located Windows layout");
    return { gameData: extractRoot, configRoot };
  }

  for (const candidate of LINUX_GAME_DATA_CANDIDATES) {
    const gameData = join(extractRoot, candidate);
    if (!isDirectory(gameData)) continue;

    const noarch = join(extractRoot, LINUX_CONFIG_ROOT);
    const configRoot = isDirectory(noarch) ? noarch : dirname(gameData);
    log.debug({ gameData, configRoot }, "Located Linux layout");
    return { gameData, configRoot };
  }

  throw new StructuralError("Could not find game data", listing());
}
