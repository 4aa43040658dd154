import { Command } from "commander";

import { logger, redactObject } from "../../utils/logger.js";
import { createOrchestrator, resolvedConfigOption, type WorkspaceOptions } from "./shared.js";

export const detectCommand = new Command("detect")
  .description("Report issues without changing the workspace")
  .option("-w, --workspace <path>", "Workspace root (default: GITHUB_WORKSPACE or config)")
  .option("--json", "Print the detection report as JSON on stdout", false)
  .addOption(resolvedConfigOption())
  .action(async (options: WorkspaceOptions) => {
    const orchestrator = await createOrchestrator(options, true);
    const report = await orchestrator.run();
    if (options.json) {
      logger.output(JSON.stringify(redactObject(report.detection), null, 2));
    }
  });
