import { lstatSync, readdirSync } from "fs";
import { join } from "path";

/**
 * Total size in bytes of every regular file under `path`.
 * Symlinks are counted by their own size, not followed.
 */
export function directorySize(path: string): number {
  const stat = lstatSync(path);
  if (!stat.isDirectory()) return stat.isFile() ? stat.size : 0;

  let total = 0;
  for (const entry of readdirSync(path)) {
    total += directorySize(join(path, entry));
  }
  return total;
}

const UNITS = ["B", "K", "M", "G", "T"] as const;

/**
 * Formats a byte count the way `du -h` does: one decimal below 10, rounded
 * up, and a single-letter unit.
 *
 * @example
 *   formatSize(512)        → "512B"
 *   formatSize(1536)       → "1.5K"
 *   formatSize(10485760)   → "10M"
 */
export function formatSize(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  if (unit === 0) return `${value}B`;
  if (value < 10) {
    const rounded = Math.ceil(value * 10) / 10;
    return rounded < 10 ? `${rounded.toFixed(1)}${UNITS[unit]}` : `10${UNITS[unit]}`;
  }
  return `${Math.ceil(value)}${UNITS[unit]}`;
}
