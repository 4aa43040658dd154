import type {
  Finding,
  FindingCategory,
  FixError,
  FixOutcome,
  ValidationRecord,
  ValidationReport,
} from "../types/index.js";

/**
 * Sink for everything a run has to tell a human. One instance per run; the
 * orchestrator and the steps it drives only talk to the console through it.
 */
export interface Reporter {
  runStarted(workspace: string): void;
  warn(message: string): void;
  detectorDegraded(detector: string, reason: string): void;
  noIssues(): void;
  findingsReported(findings: readonly Finding[]): void;
  fixStarted(fixer: string, categories: readonly FindingCategory[]): void;
  fixApplied(category: FindingCategory, description: string): void;
  fixSkipped(category: FindingCategory, reason: string): void;
  fixFailed(error: FixError): void;
  manualReview(findings: readonly Finding[]): void;
  runSummarized(outcome: FixOutcome | null, findings: number): void;
  validationRecorded(record: ValidationRecord): void;
  validationSummarized(report: ValidationReport): void;
}
