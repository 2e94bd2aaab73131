// Re-export all types
export type { CandidateConfig, SelectedConfigs, ResolvedConfigs } from "./types.js";

export {
  DISPLAY_SECTION,
  STARTUP_SECTION,
  splitLines,
  joinLines,
  isSectionHeader,
  hasSection,
  startupCommands,
  readConfigLines,
  writeConfigLines,
  inspectConfig,
} from "./config-file.js";

export {
  CONFIG_NAME_PATTERNS,
  matchFiles,
  listConfigCandidates,
  selectConfigs,
  resolveConfigs,
} from "./resolver.js";

export {
  DATA_IMAGE,
  AUDIO_IMAGE,
  sharpenOutput,
  hasBilinearOutput,
  referencesDataImage,
  redirectCdImage,
  fixMountPaths,
  patchAutoexec,
} from "./patches.js";
