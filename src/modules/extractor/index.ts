// Re-export all types
export type { ToolResult, ToolRunner, ToolInvocation } from "./types.js";

export { isExecutableFile, findExecutable } from "./tools.js";

export { runTool } from "./runner.js";

export { withScratchTree } from "./scratch.js";

export {
  EXTRACT_DIR_NAME,
  isAcceptedStatus,
  buildExtractCommand,
  extractInstaller,
} from "./extract.js";
