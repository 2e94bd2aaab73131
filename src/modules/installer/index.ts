export type { Installer, InstallerKind } from "./types.js";

export { detectInstallerKind, classifyInstaller } from "./classifier.js";

export { deriveGameName, defaultOutputDir } from "./game-name.js";
