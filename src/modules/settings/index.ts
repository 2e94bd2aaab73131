import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { homedir } from "os";
import { z } from "zod";
import { logger } from "../../logger.js";

const log = logger.child({ module: "settings" });

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * A bare command name, looked up on PATH at launch time.
 * Emulator names are written verbatim into play.sh, so anything a shell
 * would interpret (spaces, quotes, `$`, `/`) is rejected.
 */
export const CommandName = z
  .string()
  .min(1, "Command name must not be empty")
  .regex(/^[A-Za-z0-9][A-Za-z0-9._+-]*$/, {
    message: "Command name may only contain letters, digits, '.', '_', '+' and '-'",
  });

export const SettingsSchema = z.object({
  /** ZIP tool for Linux .sh installers; must skip the leading shell stub. */
  unzipCommand: z.string().min(1).default("unzip"),
  /** Inno Setup extractor for Windows .exe installers. */
  innoextractCommand: z.string().min(1).default("innoextract"),
  /** Emulator commands the launcher probes for, most preferred first. */
  emulators: z
    .array(CommandName)
    .min(1, "At least one emulator command is required")
    .default(["dosbox-staging", "dosbox"]),
  /** Cap on directory-listing lines shown with structural errors. */
  listingLimit: z.number().int().positive().default(30),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/**
 * GOG_DOSBOX_CONFIG wins; otherwise the XDG config directory is used.
 */
export function defaultSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.GOG_DOSBOX_CONFIG) return env.GOG_DOSBOX_CONFIG;
  const configHome = env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(configHome, "gog-dosbox-setup", "settings.json");
}

// ---------------------------------------------------------------------------
// Internal state
// ---------------------------------------------------------------------------
let _settings: Settings | null = null;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Reads and validates a settings file. A missing file yields the defaults.
 * Not cached.
 */
export function readSettingsFile(path: string): Settings {
  if (!existsSync(path)) {
    log.debug({ path }, "No settings file, using defaults");
    return SettingsSchema.parse({});
  }

  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  const settings = SettingsSchema.parse(raw);
  log.debug({ path, settings }, "Loaded settings");
  return settings;
}

/**
 * Loads settings from disk once per process and caches them.
 */
export function loadSettings(path: string = defaultSettingsPath()): Settings {
  if (_settings) return _settings;
  _settings = readSettingsFile(path);
  return _settings;
}
