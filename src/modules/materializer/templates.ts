// ---------------------------------------------------------------------------
// Output file names
// ---------------------------------------------------------------------------

export const SETTINGS_CONF_NAME = "dosbox_settings.conf";
export const AUTOEXEC_CONF_NAME = "dosbox_autoexec.conf";
export const DISPLAY_CONF_NAME = "display.conf";
export const LAUNCHER_NAME = "play.sh";

// ---------------------------------------------------------------------------
// display.conf
// ---------------------------------------------------------------------------

/** Loaded last by the launcher, so these settings override the game's. */
export const DISPLAY_CONF = `# Display settings - loaded after game config to override display options
# Edit this file to change window size, scaling, fullscreen, etc.

[sdl]
fullscreen=false
windowresolution=1280x960
# openglnb = OpenGL with no bilinear filtering = sharp pixels
output=openglnb

[render]
# normal2x = simple pixel doubling (sharp, no effects)
# Other options: normal3x, hq2x, hq3x, none
scaler=normal2x
aspect=true
`;

// ---------------------------------------------------------------------------
// play.sh
// ---------------------------------------------------------------------------

export interface LauncherOptions {
  /** Whether dosbox_settings.conf was written */
  hasSettings: boolean;
  /** Emulator commands to probe, most preferred first */
  emulators: ReadonlyArray<string>;
}

/**
 * Renders play.sh. Which configs it loads is decided here, not when the
 * script runs:
 *
 *   with settings:    settings → autoexec → display
 *   without settings: autoexec → display
 *
 * Emulator names must already be shell-safe (see CommandName in settings).
 */
export function buildLauncherScript({ hasSettings, emulators }: LauncherOptions): string {
  const probe = emulators.flatMap((name, i) => [
    `${i === 0 ? "if" : "elif"} command -v ${name} &> /dev/null; then`,
    `    DOSBOX="${name}"`,
  ]);

  const confs = hasSettings
    ? [SETTINGS_CONF_NAME, AUTOEXEC_CONF_NAME, DISPLAY_CONF_NAME]
    : [AUTOEXEC_CONF_NAME, DISPLAY_CONF_NAME];

  const comment = hasSettings
    ? "# Load configs in order: settings, autoexec, then display overrides"
    : "# Load autoexec config, then display settings";

  const exec = confs.map((conf, i) => {
    const head = i === 0 ? 'exec "$DOSBOX" ' : "    ";
    const tail = i === confs.length - 1 ? "" : " \\";
    return `${head}-conf "$SCRIPT_DIR/${conf}"${tail}`;
  });

  return [
    "#!/bin/bash",
    'SCRIPT_DIR="$(cd "$(dirname "$0")" && pwd)"',
    'cd "$SCRIPT_DIR"',
    "",
    ...probe,
    "else",
    `    echo "Error: DOSBox not found. Install ${emulators.join(" or ")}."`,
    "    exit 1",
    "fi",
    "",
    'echo "Starting game with $DOSBOX..."',
    comment,
    ...exec,
    "",
  ].join("\n");
}
