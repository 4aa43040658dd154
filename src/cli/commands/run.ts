import { Command } from "commander";
import { resolve } from "path";
import { format } from "date-fns";

import type { RunReport } from "../../core/orchestrator/orchestrator.js";
import type { ValidationReport } from "../../core/types/index.js";
import { logger, redactObject } from "../../utils/logger.js";
import { writeFileAtomicNoFollow } from "../../utils/safe-write.js";
import {
  assertValidationPassed,
  createOrchestrator,
  resolvedConfigOption,
  type WorkspaceOptions,
} from "./shared.js";

interface RunOptions extends WorkspaceOptions {
  dryRun: boolean;
  validate: boolean;
  report?: string | boolean;
}

export interface RunCommandReport extends RunReport {
  generatedAt: string;
  validation: ValidationReport | null;
}

export function defaultReportName(now: Date): string {
  return `autoremedy-report-${format(now, "yyyyMMdd-HHmmss")}.json`;
}

async function runAction(options: RunOptions): Promise<void> {
  const orchestrator = await createOrchestrator(options, options.dryRun);
  const run = await orchestrator.run();
  const validation = options.validate ? await orchestrator.validate() : null;

  const now = new Date();
  const report: RunCommandReport = redactObject({
    ...run,
    generatedAt: now.toISOString(),
    validation,
  });
  const serialized = JSON.stringify(report, null, 2);

  if (options.report !== undefined && options.report !== false) {
    const target = resolve(
      typeof options.report === "string" ? options.report : defaultReportName(now)
    );
    await writeFileAtomicNoFollow(target, `${serialized}\n`, { mode: 0o600 });
    logger.info(`Report written to ${target}`);
  }

  if (options.json) {
    logger.output(serialized);
  }

  if (validation) {
    assertValidationPassed(validation);
  }
}

export const runCommand = new Command("run")
  .description("Detect issues, report them, and apply every safe fix")
  .option("-w, --workspace <path>", "Workspace root (default: GITHUB_WORKSPACE or config)")
  .option("--dry-run", "Report findings without changing anything", false)
  .option("--validate", "Run the validation chain after fixing", false)
  .option("--report [path]", "Write the run report as JSON")
  .option("--json", "Print the run report as JSON on stdout", false)
  .addOption(resolvedConfigOption())
  .action(runAction);
