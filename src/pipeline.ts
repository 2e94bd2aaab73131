/**
 * pipeline.ts — The setup run, stage by stage
 *
 * classify → extract → locate → resolve configs → copy → patch → generate
 * → clean up → summarise
 *
 * Stages run strictly in order and the first SetupError ends the run. The
 * scratch tree holding the raw extraction is removed on every exit path.
 * Nothing is written to the output directory until an autoexec config has
 * been found.
 */

import { mkdirSync } from "fs";
import { basename, resolve } from "path";
import type { Settings } from "./modules/settings/index.js";
import {
  classifyInstaller,
  defaultOutputDir,
  type Installer,
} from "./modules/installer/index.js";
import {
  extractInstaller,
  runTool,
  withScratchTree,
  type ToolRunner,
} from "./modules/extractor/index.js";
import { locateLayout } from "./modules/layout/index.js";
import { resolveConfigs } from "./modules/dosbox-config/index.js";
import {
  AUTOEXEC_CONF_NAME,
  DISPLAY_CONF_NAME,
  LAUNCHER_NAME,
  SETTINGS_CONF_NAME,
  copyGameConfigs,
  copyGameData,
  writeAutoexecConfig,
  writeDisplayConfig,
  writeLauncher,
  writeSettingsConfig,
} from "./modules/materializer/index.js";
import { cleanupOutput } from "./modules/cleanup/index.js";
import { directorySize, formatSize, type Reporter } from "./modules/report/index.js";
import { logger } from "./logger.js";

const log = logger.child({ module: "pipeline" });

const TOTAL_STEPS = 7;

export interface SetupOptions {
  /** Installer file as given by the user */
  installerPath: string;
  /** Output directory; derived from the installer name when omitted */
  outputPath?: string;
  settings: Settings;
  reporter: Reporter;
  /** Replaces spawning the real extraction tools */
  runTool?: ToolRunner;
}

export interface SetupResult {
  installer: Installer;
  outputDir: string;
  /** Name of the source file copied to dosbox_settings.conf, if any */
  settingsConfig: string | null;
  /** Name of the source file copied to dosbox_autoexec.conf */
  autoexecConfig: string;
  sharpened: boolean;
  cdAudioFixed: boolean;
  gameConfigs: string[];
  removed: string[];
  sizeBytes: number;
}

/**
 * Converts one installer into a ready-to-play directory.
 * Rejects with a SetupError on any fatal condition.
 */
export async function setupGame(options: SetupOptions): Promise<SetupResult> {
  const { settings, reporter } = options;

  const installer = classifyInstaller(options.installerPath, settings);
  const outputDir = options.outputPath
    ? resolve(options.outputPath)
    : defaultOutputDir(installer.path);

  reporter.banner("=== GOG DOS Game Extractor ===");
  reporter.info(`Installer: ${installer.path}`);
  reporter.info(`Output:    ${outputDir}`);
  reporter.blank();

  const result = await withScratchTree(async (scratchDir) => {
    // ── 1. Extract ──────────────────────────────────────────────────────────
    reporter.step(1, TOTAL_STEPS, "Extracting game files...");
    const extractRoot = await extractInstaller(
      installer,
      scratchDir,
      settings,
      options.runTool ?? runTool
    );
    reporter.info(
      installer.kind === "linuxArchive"
        ? `  Extracted game data via ${basename(settings.unzipCommand)}`
        : `  Extracted game data via ${basename(settings.innoextractCommand)}`
    );

    const { gameData, configRoot } = locateLayout(extractRoot, installer.kind, settings.listingLimit);
    reporter.info(`Found game data: ${gameData}`);
    reporter.info(`Config root: ${configRoot}`);

    // ── 2. Resolve configs ─────────────────────────────────────────────────
    reporter.step(2, TOTAL_STEPS, "Locating DOSBox configs...");
    const { settingsConfig, autoexecConfig } = resolveConfigs(configRoot);
    reporter.info("Found configs:");
    if (settingsConfig) {
      reporter.info(`  - Full settings: ${settingsConfig.name}`);
    } else {
      reporter.warn("  - No full settings config; using display.conf only");
    }
    reporter.info(`  - Autoexec: ${autoexecConfig.name}`);

    // ── 3. Copy game data ──────────────────────────────────────────────────
    reporter.step(3, TOTAL_STEPS, "Copying game files...");
    mkdirSync(outputDir, { recursive: true });
    const copied = copyGameData(gameData, outputDir, installer.kind);
    reporter.info(`  - Copied ${copied.length} entries`);

    // ── 4. Copy and patch configs ──────────────────────────────────────────
    reporter.step(4, TOTAL_STEPS, "Copying DOSBox configs...");
    let sharpened = false;
    if (settingsConfig) {
      sharpened = writeSettingsConfig(settingsConfig.path, outputDir);
      reporter.info(`  - Copied settings config: ${SETTINGS_CONF_NAME}`);
      if (sharpened) {
        reporter.info("  - Changed output=opengl to output=openglnb (sharp pixels)");
      }
    }

    const cdAudioFixed = writeAutoexecConfig(autoexecConfig.path, outputDir);
    reporter.info(`  - Copied autoexec config: ${AUTOEXEC_CONF_NAME}`);
    if (cdAudioFixed) {
      reporter.info("  - Changed game.gog to game.ins (CD audio fix)");
    }
    reporter.info("  - Fixed mount paths for flattened directory");

    // ── 5. Game-specific configs ───────────────────────────────────────────
    let gameConfigs: string[] = [];
    if (installer.kind === "windowsPackage") {
      reporter.step(5, TOTAL_STEPS, "Copying game config files...");
      gameConfigs = copyGameConfigs(configRoot, outputDir);
      for (const name of gameConfigs) reporter.info(`  - Copied ${name}`);
      if (gameConfigs.length === 0) {
        reporter.info("  - No game-specific config files found");
      }
    } else {
      reporter.step(5, TOTAL_STEPS, "Checking for game config files...");
      reporter.info("  - (Linux installers include configs in game data)");
    }

    // ── 6. display.conf ────────────────────────────────────────────────────
    reporter.step(6, TOTAL_STEPS, "Creating display config...");
    writeDisplayConfig(outputDir);
    reporter.info(`  - Created ${DISPLAY_CONF_NAME} (window size, sharp scaling)`);

    // ── 7. play.sh ─────────────────────────────────────────────────────────
    reporter.step(7, TOTAL_STEPS, "Creating launcher...");
    writeLauncher(outputDir, {
      hasSettings: settingsConfig !== null,
      emulators: settings.emulators,
    });
    reporter.info(`  - Created ${LAUNCHER_NAME}`);

    return {
      settingsConfig: settingsConfig?.name ?? null,
      autoexecConfig: autoexecConfig.name,
      sharpened,
      cdAudioFixed,
      gameConfigs,
    };
  });

  // ── Cleanup ────────────────────────────────────────────────────────────────
  reporter.blank();
  reporter.info("Cleaning up...");
  const { removed, failed } = cleanupOutput(outputDir);
  for (const name of removed) reporter.info(`  - Removed ${name}`);
  for (const { name, reason } of failed) reporter.warn(`  - Could not remove ${name}: ${reason}`);
  if (removed.length === 0 && failed.length === 0) {
    reporter.info("  - No cleanup needed");
  }

  // ── Summary ────────────────────────────────────────────────────────────────
  const sizeBytes = directorySize(outputDir);
  reporter.blank();
  reporter.banner("=== Done! ===");
  reporter.info(`Size: ${formatSize(sizeBytes)}`);
  reporter.blank();
  reporter.info("To play:");
  reporter.info(`  cd "${outputDir}" && ./${LAUNCHER_NAME}`);

  log.debug({ outputDir, sizeBytes }, "Setup complete");
  return { installer, outputDir, ...result, removed, sizeBytes };
}
