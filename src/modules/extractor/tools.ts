import { accessSync, statSync, constants } from "fs";
import { delimiter, isAbsolute, join, resolve } from "path";

/**
 * Returns true when `path` is a regular file the current user may execute.
 */
export function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves a command the way a shell's `command -v` would.
 *
 * A command containing a slash is checked as a path (relative to the working
 * directory); anything else is looked up in each PATH entry in order.
 * Returns the absolute path of the executable, or null.
 */
export function findExecutable(
  command: string,
  pathVar: string | undefined = process.env.PATH
): string | null {
  if (command.includes("/")) {
    const candidate = isAbsolute(command) ? command : resolve(command);
    return isExecutableFile(candidate) ? candidate : null;
  }

  for (const dir of (pathVar ?? "").split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, command);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}
