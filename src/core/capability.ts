import { execFileWithLimits, ExecError, TimeoutError, ToolMissingError } from "./exec.js";
import { sanitizeError, stripAnsi } from "../utils/logger.js";

/**
 * Outcome of one external tool invocation. A non-zero exit is still `completed`:
 * for checkers like `black --check` or `npm outdated` the exit status is the answer.
 */
export type CapabilityResult =
  | { status: "completed"; stdout: string; stderr: string; exitCode: number }
  | { status: "unavailable"; tool: string; message: string }
  | { status: "timeout"; tool: string; message: string }
  | { status: "failed"; tool: string; message: string };

export interface CapabilityOptions {
  cwd: string;
  timeoutSeconds: number;
  signal?: AbortSignal;
}

export type CapabilityRunner = (
  tool: string,
  args: string[],
  options: CapabilityOptions
) => Promise<CapabilityResult>;

export const runCapability: CapabilityRunner = async (tool, args, options) => {
  try {
    const { stdout, stderr, exitCode } = await execFileWithLimits(tool, args, {
      cwd: options.cwd,
      timeoutSeconds: options.timeoutSeconds,
      signal: options.signal,
    });
    return { status: "completed", stdout, stderr, exitCode };
  } catch (error: unknown) {
    if (error instanceof ToolMissingError) {
      return { status: "unavailable", tool, message: error.message };
    }
    if (error instanceof TimeoutError) {
      return { status: "timeout", tool, message: error.message };
    }
    if (error instanceof ExecError && error.exitCode !== undefined) {
      return {
        status: "completed",
        stdout: error.stdout ?? "",
        stderr: error.stderr ?? "",
        exitCode: error.exitCode,
      };
    }
    return { status: "failed", tool, message: sanitizeError(error) };
  }
};

export function describeFailure(result: Exclude<CapabilityResult, { status: "completed" }>): string {
  switch (result.status) {
    case "unavailable":
      return `${result.tool} is not installed`;
    case "timeout":
      return result.message;
    case "failed":
      return `${result.tool} could not run: ${result.message}`;
  }
}

/**
 * Last `maxChars` characters of a tool's combined output without colour codes,
 * for failure messages.
 */
export function outputTail(
  result: { stdout: string; stderr: string },
  maxChars = 2000
): string {
  const combined = [result.stdout, result.stderr]
    .map((stream) => stripAnsi(stream).trim())
    .filter(Boolean)
    .join("\n");
  return combined.length > maxChars ? `...${combined.slice(-maxChars)}` : combined;
}
