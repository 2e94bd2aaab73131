import { chmodSync, writeFileSync } from "fs";
import { join } from "path";
import {
  DISPLAY_CONF,
  DISPLAY_CONF_NAME,
  LAUNCHER_NAME,
  buildLauncherScript,
  type LauncherOptions,
} from "./templates.js";

/** Writes display.conf, replacing whatever was there. Returns its path. */
export function writeDisplayConfig(outputDir: string): string {
  const path = join(outputDir, DISPLAY_CONF_NAME);
  writeFileSync(path, DISPLAY_CONF, "utf-8");
  return path;
}

/** Writes play.sh with mode 0755. Returns its path. */
export function writeLauncher(outputDir: string, options: LauncherOptions): string {
  const path = join(outputDir, LAUNCHER_NAME);
  writeFileSync(path, buildLauncherScript(options), "utf-8");
  // writeFileSync's mode only applies when the file is created
  chmodSync(path, 0o755);
  return path;
}
