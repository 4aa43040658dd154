import type { AutoremedyConfig, DetectorName } from "../../config/schema.js";
import type { CapabilityRunner } from "../capability.js";
import type { DetectionResult, Finding } from "../types/index.js";
import type { Reporter } from "../orchestrator/reporter.js";

export interface DetectorContext {
  /** Absolute workspace root. */
  workspace: string;
  config: AutoremedyConfig;
  run: CapabilityRunner;
  reporter: Reporter;
  /** Budget of the current detector; external calls use it as their own timeout. */
  timeoutSeconds: number;
  /** Aborted when that budget runs out. */
  signal?: AbortSignal;
}

export type DetectorOutput = Finding | DetectionResult;

/**
 * Read-only inspection of a workspace. Detectors never write to it.
 *
 * Structured detectors return DetectionResults and implement `explain` to turn
 * them into Findings; the registry calls it.
 */
export interface Detector {
  readonly name: DetectorName;
  readonly timeoutSeconds: number;
  detect(ctx: DetectorContext): Promise<DetectorOutput[]>;
  explain?(result: DetectionResult): Finding[];
}
