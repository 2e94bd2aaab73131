import { readFileSync, writeFileSync } from "fs";
import { basename } from "path";
import type { CandidateConfig } from "./types.js";

/**
 * DOSBox configs are free-form text, occasionally with stray bytes that are
 * not valid UTF-8. Latin-1 maps every byte to one char and back, so a read /
 * patch / write cycle leaves untouched bytes exactly as they were.
 */
const CONFIG_ENCODING = "latin1";

export const DISPLAY_SECTION = "sdl";
export const STARTUP_SECTION = "autoexec";

// ---------------------------------------------------------------------------
// Line helpers
// ---------------------------------------------------------------------------

/** Splits on LF only; a CRLF line keeps its trailing `\r`. */
export function splitLines(text: string): string[] {
  return text.split("\n");
}

export function joinLines(lines: readonly string[]): string {
  return lines.join("\n");
}

/** The line without a trailing `\r`. */
export function lineBody(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/** Re-attaches the `\r` that `original` carried, if any. */
export function withLineEnding(original: string, body: string): string {
  return original.endsWith("\r") ? `${body}\r` : body;
}

export function isSectionHeader(line: string, section: string): boolean {
  return line.trim().toLowerCase() === `[${section}]`;
}

export function hasSection(lines: readonly string[], section: string): boolean {
  return lines.some((line) => isSectionHeader(line, section));
}

/**
 * Lines after the first `[autoexec]` header, to the end of the file, without
 * blank lines and `#` comments. Returns null when there is no such header.
 *
 * Everything after the header counts, including any later `[section]` line.
 */
export function startupCommands(lines: readonly string[]): string[] | null {
  const start = lines.findIndex((line) => isSectionHeader(line, STARTUP_SECTION));
  if (start === -1) return null;

  return lines
    .slice(start + 1)
    .filter((line) => !line.startsWith("#") && line.trim() !== "");
}

// ---------------------------------------------------------------------------
// File access
// ---------------------------------------------------------------------------

export function readConfigLines(path: string): string[] {
  return splitLines(readFileSync(path, CONFIG_ENCODING));
}

export function writeConfigLines(path: string, lines: readonly string[]): void {
  writeFileSync(path, joinLines(lines), CONFIG_ENCODING);
}

/**
 * Reads a config file once and records what it can be used for.
 */
export function inspectConfig(path: string): CandidateConfig {
  const lines = readConfigLines(path);
  const commands = startupCommands(lines);

  return {
    path,
    name: basename(path),
    hasDisplaySection: hasSection(lines, DISPLAY_SECTION),
    hasStartupSection: commands !== null,
    hasNonEmptyStartupSection: commands !== null && commands.length > 0,
  };
}
