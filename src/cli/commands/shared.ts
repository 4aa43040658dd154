import { Option } from "commander";

import { loadConfig } from "../../config/loader.js";
import type { AutoremedyConfig } from "../../config/schema.js";
import { ConsoleReporter } from "../../core/orchestrator/console-reporter.js";
import { Orchestrator } from "../../core/orchestrator/orchestrator.js";
import type { ValidationReport } from "../../core/types/index.js";
import { resolveWorkspace } from "../config-resolver.js";
import { ValidationFailedError } from "../errors.js";

export interface WorkspaceOptions {
  workspace?: string;
  json: boolean;
  resolvedConfig?: AutoremedyConfig;
}

/** Filled in by the program's preAction hook. */
export function resolvedConfigOption(): Option {
  return new Option("--resolved-config").hideHelp();
}

export async function createOrchestrator(
  options: WorkspaceOptions,
  dryRun: boolean
): Promise<Orchestrator> {
  const config = options.resolvedConfig ?? (await loadConfig(process.cwd()));
  const workspace = await resolveWorkspace(config, options.workspace);
  return new Orchestrator({ workspace, config, reporter: new ConsoleReporter(), dryRun });
}

export function assertValidationPassed(report: ValidationReport): void {
  if (!report.allPassed) {
    throw new ValidationFailedError(
      report.records.filter((r) => !r.passed).map((r) => r.validator)
    );
  }
}
