import { outputTail, type CapabilityResult } from "../capability.js";
import type { ValidationVerdict } from "../types/index.js";
import type { ValidatorContext } from "./types.js";

export function notPresent(ecosystem: string): ValidationVerdict {
  return { passed: true, message: `${ecosystem} not present` };
}

export function invoke(ctx: ValidatorContext, tool: string, args: string[]): Promise<CapabilityResult> {
  return ctx.run(tool, args, {
    cwd: ctx.workspace,
    timeoutSeconds: ctx.timeoutSeconds,
    signal: ctx.signal,
  });
}

/**
 * Verdict for a single tool call. `passCodes` lists exit codes other than 0 that
 * still count as a pass.
 */
export function verdictOf(
  result: CapabilityResult,
  label: string,
  passMessage: string,
  passCodes: readonly number[] = []
): ValidationVerdict {
  switch (result.status) {
    case "unavailable":
      return { passed: true, message: `${result.tool} not available, ${label} skipped` };
    case "timeout":
    case "failed":
      return { passed: false, message: `${label}: ${result.message}` };
    case "completed": {
      if (result.exitCode === 0 || passCodes.includes(result.exitCode)) {
        return { passed: true, message: passMessage };
      }
      const tail = outputTail(result);
      return {
        passed: false,
        message: `${label} failed with exit code ${String(result.exitCode)}${tail ? `:\n${tail}` : ""}`,
      };
    }
  }
}
