import { spawn } from "child_process";
import type { ToolResult } from "./types.js";
import { logger } from "../../logger.js";

const log = logger.child({ module: "tool-runner" });

/**
 * Spawns `command` and waits for it to exit, capturing stdout and stderr into
 * one buffer. No timeout: a hung tool hangs the run.
 */
export function runTool(
  command: string,
  args: readonly string[],
  spawnImpl: typeof spawn = spawn
): Promise<ToolResult> {
  log.debug({ command, args }, "Running tool");

  return new Promise<ToolResult>((resolve, reject) => {
    const child = spawnImpl(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    const chunks: Buffer[] = [];
    child.stdout?.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => chunks.push(chunk));

    child.on("error", reject);
    child.on("close", (status, signal) => {
      log.debug({ command, status, signal }, "Tool exited");
      resolve({ status, signal, output: Buffer.concat(chunks).toString("utf-8") });
    });
  });
}
