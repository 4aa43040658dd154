import type { AutoremedyConfig, ValidatorName } from "../../config/schema.js";
import type { CapabilityRunner } from "../capability.js";
import type { ValidationVerdict } from "../types/index.js";

export interface ValidatorContext {
  workspace: string;
  config: AutoremedyConfig;
  run: CapabilityRunner;
  timeoutSeconds: number;
  signal?: AbortSignal;
}

/**
 * Checks that the workspace still builds or passes its tests. A validator whose
 * ecosystem is absent, or whose tool is not installed, passes.
 */
export interface Validator {
  readonly name: ValidatorName;
  readonly timeoutSeconds: number;
  validate(ctx: ValidatorContext): Promise<ValidationVerdict>;
}
