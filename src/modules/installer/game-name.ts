import { basename, dirname, join } from "path";

// ---------------------------------------------------------------------------
// Patterns (applied in order)
// ---------------------------------------------------------------------------

const INSTALLER_EXTENSION = /\.(sh|exe)$/;
const INSTALLER_PREFIX = /^(gog_|setup_)/i;

/** _2.1.0.4 */
const DOTTED_VERSION = /_[0-9]+\.[0-9]+\.[0-9]+\.[0-9]+$/;
/** _1_0_20211006_50653; everything from the first such run is dropped */
const UNDERSCORED_VERSION = /_[0-9]+_[0-9]+_[0-9]+.*/;
/** _1.0_(22308) */
const BUILD_VERSION = /_[0-9]+\.[0-9]+_\([0-9]+\)$/;

const LANGUAGE_CODE = /_(en|de|fr|es|it|pl|ru|pt|br|jp|ko|cn|zh)(_|$)/gi;

/** First character of each word, accented letters included */
const WORD_START = /(^|[^\p{L}\p{M}\p{N}_])([\p{L}\p{M}\p{N}_])/gu;

/**
 * Derives a PascalCase folder name from an installer file name.
 *
 * Examples:
 *   "fantasy_general_1_0_20211006_50653.sh" → "FantasyGeneral"
 *   "setup_ultima_vii_1.0.exe"              → "UltimaVii1.0"
 *   "gog_the_game_en_2.1.0.4.sh"            → "TheGame"
 *
 * Never returns an empty string: if every character is stripped away the
 * installer's base name (without extension) is returned instead.
 */
export function deriveGameName(installerBasename: string): string {
  const stem = installerBasename.replace(INSTALLER_EXTENSION, "");

  const name = stem
    .replace(INSTALLER_PREFIX, "")
    .replace(DOTTED_VERSION, "")
    .replace(UNDERSCORED_VERSION, "")
    .replace(BUILD_VERSION, "")
    .replace(LANGUAGE_CODE, "_")
    .replace(/_+$/, "")
    .replace(/_/g, " ")
    .replace(WORD_START, (_match, before: string, first: string) => before + first.toUpperCase())
    .replace(/ /g, "");

  if (name.length > 0) return name;
  return stem.length > 0 ? stem : installerBasename;
}

/**
 * Output directory used when the caller does not name one: a sibling of the
 * installer, named by deriveGameName().
 */
export function defaultOutputDir(installerPath: string): string {
  return join(dirname(installerPath), deriveGameName(basename(installerPath)));
}
