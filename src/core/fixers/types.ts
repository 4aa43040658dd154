import type { AutoremedyConfig, FixerName } from "../../config/schema.js";
import type { CapabilityRunner } from "../capability.js";
import type { Finding, FindingCategory, FixOutcome } from "../types/index.js";
import type { Reporter } from "../orchestrator/reporter.js";

export interface FixContext {
  workspace: string;
  config: AutoremedyConfig;
  run: CapabilityRunner;
  reporter: Reporter;
  timeoutSeconds: number;
  signal?: AbortSignal;
}

/**
 * Remediates the findings of its categories. Every fixer checks that a defect is
 * still present before touching the workspace, so applying it twice is the same
 * as applying it once.
 */
export interface Fixer {
  readonly name: FixerName;
  readonly categories: readonly FindingCategory[];
  apply(findings: readonly Finding[], ctx: FixContext): Promise<FixOutcome>;
}
