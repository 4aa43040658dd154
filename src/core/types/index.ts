export const FINDING_CATEGORIES = [
  "formatting",
  "imports",
  "linting",
  "security",
  "dependencies",
  "npm-dependencies",
  "docker",
  "docker-compose",
  "git",
] as const;

export type FindingCategory = (typeof FINDING_CATEGORIES)[number];

// Ordered most to least severe.
export const SEVERITIES = ["critical", "high", "medium", "low"] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * `{ path: "(multiple)", line: 0 }` marks a workspace-wide finding.
 */
export interface Location {
  path: string;
  line: number;
}

export const WORKSPACE_WIDE = "(multiple)";

export const FIX_ACTIONS = ["create-dockerignore", "add-compose-healthchecks"] as const;

export type FixAction = (typeof FIX_ACTIONS)[number];

export type Remedy =
  | { kind: "command"; tool: string; args: string[] }
  | { kind: "action"; action: FixAction };

export interface Finding {
  readonly category: FindingCategory;
  readonly severity: Severity;
  readonly location: Location;
  readonly message: string;
  readonly fixable: boolean;
  readonly remedy?: Remedy;
}

/**
 * Yes/no verdict plus evidence from a detector that inspects a whole file
 * (Dockerfile, compose file, commit log) rather than reporting line diagnostics.
 */
export interface DetectionResult {
  category: FindingCategory;
  found: boolean;
  count: number;
  details: Record<string, unknown>;
  severity: Severity;
}

/**
 * `unavailable`: the detector finished but at least one tool it needed is not
 * installed, so its silence is not a clean bill of health.
 */
export type DetectorRunStatus = "ok" | "unavailable" | "timeout" | "failed";

export interface DetectorRun {
  detector: string;
  status: DetectorRunStatus;
  findings: number;
  message?: string;
}

export interface DetectionReport {
  findings: Finding[];
  results: DetectionResult[];
  runs: DetectorRun[];
}

export interface FixError {
  category: FindingCategory;
  message: string;
}

export interface FixOutcome {
  fixedCount: number;
  errors: FixError[];
  manualReview: Finding[];
}

export interface ValidationVerdict {
  passed: boolean;
  message: string;
}

export interface ValidationRecord extends ValidationVerdict {
  validator: string;
}

export interface ValidationReport {
  allPassed: boolean;
  records: ValidationRecord[];
}
