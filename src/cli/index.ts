#!/usr/bin/env node

import { Command } from "commander";

import { detectCommand } from "./commands/detect.js";
import { runCommand } from "./commands/run.js";
import { validateCommand } from "./commands/validate.js";
import { resolveCliConfig } from "./config-resolver.js";

import { logger } from "../utils/logger.js";
import { CliError, CliRuntimeError, ValidationFailedError } from "./errors.js";

const program = new Command();

program
  .name("autoremedy")
  .description("Detect, fix and validate common repository hygiene issues")
  .version("0.1.0")
  .option("-v, --verbose", "Enable verbose logging")
  .option("-c, --config <path>", "Path to config file")
  .option("--strict-config", "Fail on malformed or invalid config files")
  .hook("preAction", async (thisCommand, actionCommand) => {
    const {
      strictConfig,
      config: configPath,
      verbose,
    } = thisCommand.opts<{
      strictConfig?: boolean;
      config?: string;
      verbose?: boolean;
    }>();
    const resolvedConfig = await resolveCliConfig({ strictConfig, configPath, verbose });
    actionCommand.setOptionValue("resolvedConfig", resolvedConfig);
  });

program.addCommand(runCommand, { isDefault: true });
program.addCommand(detectCommand);
program.addCommand(validateCommand);

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof ValidationFailedError) {
      logger.error(error.message);
      process.exitCode = error.exitCode;
      return;
    }
    if (error instanceof CliRuntimeError) {
      logger.error(error.toPublicString());
    } else if (error instanceof CliError || error instanceof Error) {
      logger.error(error);
    } else {
      logger.error(`Unexpected error: ${String(error)}`);
    }
    process.exitCode = error instanceof CliError ? error.exitCode : 1;
  }
}

void main();
