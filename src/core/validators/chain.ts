import type { ValidatorName } from "../../config/schema.js";
import { runStep } from "../step.js";
import type { ValidationRecord, ValidationReport } from "../types/index.js";
import { composeValidator } from "./compose.js";
import { dockerBuildValidator } from "./docker.js";
import { javascriptValidator } from "./javascript.js";
import { pythonValidator } from "./python.js";
import type { Validator, ValidatorContext } from "./types.js";

export const VALIDATORS: Record<ValidatorName, Validator> = {
  python: pythonValidator,
  javascript: javascriptValidator,
  "docker-build": dockerBuildValidator,
  compose: composeValidator,
};

export type ValidationContext = Omit<ValidatorContext, "timeoutSeconds" | "signal">;

export interface ValidationListener {
  validationRecorded(record: ValidationRecord): void;
}

/**
 * Runs validators in order and keeps going after a failure, so the report
 * always has one record per validator.
 */
export class ValidationChain {
  private readonly validators: readonly Validator[];

  constructor(validators: readonly Validator[]) {
    this.validators = validators;
  }

  static fromNames(names: readonly ValidatorName[]): ValidationChain {
    const enabled = new Set(names);
    return new ValidationChain(Object.values(VALIDATORS).filter((v) => enabled.has(v.name)));
  }

  get names(): string[] {
    return this.validators.map((v) => v.name);
  }

  async validateAll(ctx: ValidationContext, listener?: ValidationListener): Promise<ValidationReport> {
    const records: ValidationRecord[] = [];

    for (const validator of this.validators) {
      // The configured budget caps every validator's own.
      const timeoutSeconds = Math.min(validator.timeoutSeconds, ctx.config.validation.timeoutSeconds);
      const step = await runStep(`${validator.name} validator`, timeoutSeconds, (signal) =>
        validator.validate({ ...ctx, timeoutSeconds, signal })
      );

      const record: ValidationRecord =
        step.status === "ok"
          ? { validator: validator.name, ...step.value }
          : { validator: validator.name, passed: false, message: step.message };
      records.push(record);
      listener?.validationRecorded(record);
    }

    return { allPassed: records.every((r) => r.passed), records };
  }
}
