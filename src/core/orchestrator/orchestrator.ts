import type { AutoremedyConfig } from "../../config/schema.js";
import { runCapability, type CapabilityRunner } from "../capability.js";
import { detectAll } from "../detectors/registry.js";
import { applyFixes } from "../fixers/registry.js";
import type { DetectionReport, FixOutcome, ValidationReport } from "../types/index.js";
import { ValidationChain } from "../validators/chain.js";
import type { Reporter } from "./reporter.js";

export const ORCHESTRATOR_STATES = [
  "idle",
  "detecting",
  "reporting",
  "no-issues",
  "fixing",
  "summarizing",
  "done",
] as const;

export type OrchestratorState = (typeof ORCHESTRATOR_STATES)[number];

const TRANSITIONS: Record<OrchestratorState, readonly OrchestratorState[]> = {
  idle: ["detecting"],
  detecting: ["reporting", "no-issues"],
  reporting: ["fixing", "summarizing"],
  "no-issues": ["done"],
  fixing: ["summarizing"],
  summarizing: ["done"],
  done: [],
};

export class OrchestratorStateError extends Error {
  constructor(
    public readonly from: OrchestratorState,
    public readonly to: OrchestratorState
  ) {
    super(`Illegal orchestrator transition: ${from} -> ${to}`);
    this.name = "OrchestratorStateError";
  }
}

export interface OrchestratorOptions {
  /** Absolute workspace root. */
  workspace: string;
  config: AutoremedyConfig;
  reporter: Reporter;
  run?: CapabilityRunner;
  dryRun?: boolean;
}

export interface RunReport {
  success: true;
  workspace: string;
  dryRun: boolean;
  states: OrchestratorState[];
  detection: DetectionReport;
  /** Null when nothing was fixed because there was nothing to fix, or on a dry run. */
  fixOutcome: FixOutcome | null;
}

/**
 * One detect, report, fix, summarize pass over one workspace. Validation is a
 * separate phase the caller asks for.
 */
export class Orchestrator {
  private state: OrchestratorState = "idle";
  private readonly history: OrchestratorState[] = ["idle"];
  private readonly runner: CapabilityRunner;

  constructor(private readonly options: OrchestratorOptions) {
    this.runner = options.run ?? runCapability;
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  private transition(next: OrchestratorState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new OrchestratorStateError(this.state, next);
    }
    this.state = next;
    this.history.push(next);
  }

  async run(): Promise<RunReport> {
    const { workspace, config, reporter } = this.options;
    const dryRun = this.options.dryRun ?? false;
    const context = { workspace, config, reporter, run: this.runner };

    this.transition("detecting");
    reporter.runStarted(workspace);
    const detection = await detectAll(context);

    if (detection.findings.length === 0) {
      this.transition("no-issues");
      reporter.noIssues();
      this.transition("done");
      return this.report(detection, null, dryRun);
    }

    // Every finding is on record before anything is changed.
    this.transition("reporting");
    reporter.findingsReported(detection.findings);

    let fixOutcome: FixOutcome | null = null;
    if (!dryRun && config.fixing.enabled) {
      this.transition("fixing");
      fixOutcome = await applyFixes(detection.findings, context);
      reporter.manualReview(fixOutcome.manualReview);
    }

    this.transition("summarizing");
    reporter.runSummarized(fixOutcome, detection.findings.length);
    this.transition("done");
    return this.report(detection, fixOutcome, dryRun);
  }

  async validate(): Promise<ValidationReport> {
    const { workspace, config, reporter } = this.options;
    const chain = ValidationChain.fromNames(config.validation.validators);
    const report = await chain.validateAll({ workspace, config, run: this.runner }, reporter);
    reporter.validationSummarized(report);
    return report;
  }

  private report(
    detection: DetectionReport,
    fixOutcome: FixOutcome | null,
    dryRun: boolean
  ): RunReport {
    return {
      success: true,
      workspace: this.options.workspace,
      dryRun,
      states: [...this.history],
      detection,
      fixOutcome,
    };
  }
}
