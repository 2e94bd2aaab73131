export {
  SETTINGS_CONF_NAME,
  AUTOEXEC_CONF_NAME,
  DISPLAY_CONF_NAME,
  LAUNCHER_NAME,
  DISPLAY_CONF,
  buildLauncherScript,
  type LauncherOptions,
} from "./templates.js";

export {
  INSTALLER_ARTIFACT_NAMES,
  GOG_METADATA_PREFIX,
  isInstallerArtifact,
  copyGameData,
  copyGameConfigs,
} from "./copy.js";

export { writeSettingsConfig, writeAutoexecConfig } from "./configs.js";

export { writeDisplayConfig, writeLauncher } from "./generated.js";
