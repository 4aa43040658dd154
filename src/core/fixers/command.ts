import { describeFailure, outputTail, type CapabilityResult } from "../capability.js";
import type { FixContext } from "./types.js";

export type CommandCheck =
  | { status: "clean" }
  | { status: "dirty"; result: Extract<CapabilityResult, { status: "completed" }> }
  | { status: "error"; message: string };

function call(ctx: FixContext, tool: string, args: string[]): Promise<CapabilityResult> {
  return ctx.run(tool, args, {
    cwd: ctx.workspace,
    timeoutSeconds: ctx.timeoutSeconds,
    signal: ctx.signal,
  });
}

/**
 * Runs a read-only checker whose exit status says whether the defect is present.
 */
export async function check(ctx: FixContext, tool: string, args: string[]): Promise<CommandCheck> {
  const result = await call(ctx, tool, args);
  if (result.status !== "completed") {
    return { status: "error", message: describeFailure(result) };
  }
  return result.exitCode === 0 ? { status: "clean" } : { status: "dirty", result };
}

/**
 * Runs a remedy command. Resolves to null on success, or to the reason it failed.
 */
export async function runRemedy(
  ctx: FixContext,
  tool: string,
  args: string[]
): Promise<string | null> {
  const result = await call(ctx, tool, args);
  if (result.status !== "completed") {
    return describeFailure(result);
  }
  if (result.exitCode !== 0) {
    const tail = outputTail(result);
    return `${[tool, ...args].join(" ")} exited with code ${String(result.exitCode)}${tail ? `: ${tail}` : ""}`;
  }
  return null;
}

/**
 * Plain `ctx.run` for listings whose output, not exit status, is the answer.
 */
export function list(ctx: FixContext, tool: string, args: string[]): Promise<CapabilityResult> {
  return call(ctx, tool, args);
}
