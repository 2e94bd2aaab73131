import { existsSync } from "fs";
import { join } from "path";
import {
  readConfigLines,
  writeConfigLines,
  sharpenOutput,
  hasBilinearOutput,
  patchAutoexec,
  AUDIO_IMAGE,
} from "../dosbox-config/index.js";
import { AUTOEXEC_CONF_NAME, SETTINGS_CONF_NAME } from "./templates.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "materializer" });

/**
 * Copies the settings config to dosbox_settings.conf, switching
 * `output=opengl` to `output=openglnb`. Returns whether that switch happened.
 */
export function writeSettingsConfig(source: string, outputDir: string): boolean {
  const lines = readConfigLines(source);
  const sharpened = hasBilinearOutput(lines);

  writeConfigLines(join(outputDir, SETTINGS_CONF_NAME), sharpened ? sharpenOutput(lines) : lines);
  log.debug({ source, sharpened }, "Wrote settings config");
  return sharpened;
}

/**
 * Copies the autoexec config to dosbox_autoexec.conf with mount paths fixed
 * for the flat output layout and, when `game.ins` was copied, the CD image
 * redirected to it. Returns whether the CD image was redirected.
 */
export function writeAutoexecConfig(source: string, outputDir: string): boolean {
  const hasAudioImage = existsSync(join(outputDir, AUDIO_IMAGE));
  const { lines, cdAudioFixed } = patchAutoexec(readConfigLines(source), hasAudioImage);

  writeConfigLines(join(outputDir, AUTOEXEC_CONF_NAME), lines);
  log.debug({ source, cdAudioFixed }, "Wrote autoexec config");
  return cdAudioFixed;
}
