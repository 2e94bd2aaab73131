#!/usr/bin/env node
/**
 * cli.ts — Command-line entry point
 *
 *   gog-dosbox-setup <installer.sh|.exe> [output_directory]
 *
 * Exit codes: 0 on success, 1 on a usage error or any failed stage.
 */

import { Command } from "commander";
import { setupGame } from "./pipeline.js";
import { loadSettings } from "./modules/settings/index.js";
import { createConsoleReporter } from "./modules/report/index.js";
import { isSetupError } from "./errors.js";
import { logger } from "./logger.js";

const HELP_FOOTER = `
Extracts a GOG DOS game and creates a minimal directory.
Copies the original GOG DOSBox config and patches it for:
  - Sharp pixels (output=openglnb)
  - Working CD audio (mounts game.ins, not game.gog)

Supported installer types:
  - Linux (.sh) - uses unzip
  - Windows (.exe) - uses innoextract

Examples:
  $ gog-dosbox-setup fantasy_general_1_0_20211006_50653.sh
  $ gog-dosbox-setup setup_ultima_vii_1.0.exe ~/Games/Ultima7
`;

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("gog-dosbox-setup")
    .description("Turn a GOG DOS game installer into a portable DOSBox directory")
    .version("0.1.0")
    .argument("<installer>", "GOG installer (.sh or .exe)")
    .argument("[output_directory]", "where to put the game (default: derived from the installer name)")
    .addHelpText("after", HELP_FOOTER)
    .action(async (installerPath: string, outputPath: string | undefined) => {
      const reporter = createConsoleReporter();
      try {
        const settings = loadSettings();
        await setupGame({ installerPath, outputPath, settings, reporter });
      } catch (err) {
        if (isSetupError(err)) {
          reporter.error(err.message, err.details, err.hint);
        } else {
          logger.error({ err }, "Unexpected failure");
          reporter.error(err instanceof Error ? err.message : String(err));
        }
        process.exitCode = 1;
      }
    });

  await program.parseAsync(process.argv);
}

main().catch((err) => {
  logger.fatal({ err }, "CLI crashed");
  process.exitCode = 1;
});
