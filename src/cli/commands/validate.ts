import { Command } from "commander";

import { logger } from "../../utils/logger.js";
import {
  assertValidationPassed,
  createOrchestrator,
  resolvedConfigOption,
  type WorkspaceOptions,
} from "./shared.js";

export const validateCommand = new Command("validate")
  .description("Run the validation chain against the workspace")
  .option("-w, --workspace <path>", "Workspace root (default: GITHUB_WORKSPACE or config)")
  .option("--json", "Print the validation report as JSON on stdout", false)
  .addOption(resolvedConfigOption())
  .action(async (options: WorkspaceOptions) => {
    const orchestrator = await createOrchestrator(options, true);
    const report = await orchestrator.validate();
    if (options.json) {
      logger.output(JSON.stringify(report, null, 2));
    }
    assertValidationPassed(report);
  });
