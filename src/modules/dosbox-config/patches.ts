import { lineBody, withLineEnding } from "./config-file.js";

// ---------------------------------------------------------------------------
// Settings config
// ---------------------------------------------------------------------------

const BILINEAR_OUTPUT = "output=opengl";
const SHARP_OUTPUT = "output=openglnb";

/**
 * Rewrites every line that is exactly `output=opengl` to `output=openglnb`
 * (OpenGL without bilinear filtering). Other lines mentioning opengl are
 * left alone.
 */
export function sharpenOutput(lines: readonly string[]): string[] {
  return lines.map((line) =>
    lineBody(line) === BILINEAR_OUTPUT ? withLineEnding(line, SHARP_OUTPUT) : line
  );
}

export function hasBilinearOutput(lines: readonly string[]): boolean {
  return lines.some((line) => lineBody(line) === BILINEAR_OUTPUT);
}

// ---------------------------------------------------------------------------
// Autoexec config
// ---------------------------------------------------------------------------

/** Data-only CD image; cannot play CD audio tracks. */
export const DATA_IMAGE = "game.gog";
/** Cue sheet for the same disc, with audio tracks. */
export const AUDIO_IMAGE = "game.ins";

export function referencesDataImage(lines: readonly string[]): boolean {
  return lines.some((line) => line.includes(DATA_IMAGE));
}

/** Replaces every `game.gog` with `game.ins`. */
export function redirectCdImage(lines: readonly string[]): string[] {
  return lines.map((line) => line.replaceAll(DATA_IMAGE, AUDIO_IMAGE));
}

const MOUNT_DATA = /mount [cC] "data"/g;
const MOUNT_PARENT = /mount [cC] "\.\."/g;
const DATA_PREFIX = /"data\//g;

/**
 * Points mounts written for the installer's nested layout at the flattened
 * output directory:
 *
 *   mount c "data"   → mount C "."
 *   mount C ".."     → mount C "."
 *   "data/SOUND"     → "./SOUND"
 */
export function fixMountPaths(lines: readonly string[]): string[] {
  return lines.map((line) =>
    line
      .replace(MOUNT_DATA, 'mount C "."')
      .replace(MOUNT_PARENT, 'mount C "."')
      .replace(DATA_PREFIX, '"./')
  );
}

export interface AutoexecPatch {
  lines: string[];
  cdAudioFixed: boolean;
}

/**
 * Applies both autoexec rewrites. The CD image is redirected only when the
 * output actually contains `game.ins`. Applying this to its own output is a
 * no-op.
 */
export function patchAutoexec(lines: readonly string[], hasAudioImage: boolean): AutoexecPatch {
  const cdAudioFixed = hasAudioImage && referencesDataImage(lines);
  const redirected = cdAudioFixed ? redirectCdImage(lines) : [...lines];
  return { lines: fixMountPaths(redirected), cdAudioFixed };
}
