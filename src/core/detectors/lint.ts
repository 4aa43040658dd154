import { describeFailure } from "../capability.js";
import { createFinding, workspaceWide } from "../findings/finding.js";
import { globWorkspace } from "../../utils/fs.js";
import type { Detector } from "./types.js";

/**
 * Coarse by contract: any "error" or "warning" in pylint's combined output counts
 * as lint issues, even when it only appears in a file name.
 */
export function lintOutputHasIssues(output: string): boolean {
  const lowered = output.toLowerCase();
  return lowered.includes("error") || lowered.includes("warning");
}

export const lintDetector: Detector = {
  name: "lint",
  timeoutSeconds: 60,
  async detect(ctx) {
    const pyFiles = await globWorkspace(ctx.workspace, "**/*.py", ctx.config.ignorePatterns);
    if (pyFiles.length === 0) {
      return [];
    }

    const batch = pyFiles.slice(0, ctx.config.detection.lintMaxFiles);
    const result = await ctx.run("pylint", batch, {
      cwd: ctx.workspace,
      timeoutSeconds: ctx.timeoutSeconds,
      signal: ctx.signal,
    });

    switch (result.status) {
      case "unavailable":
        return [];
      case "timeout":
      case "failed":
        ctx.reporter.warn(`Lint check skipped: ${describeFailure(result)}`);
        return [];
      case "completed":
        break;
    }

    if (!lintOutputHasIssues(result.stdout + result.stderr)) {
      return [];
    }

    return [
      createFinding({
        category: "linting",
        severity: "medium",
        location: workspaceWide(),
        message: `Linting issues detected in ${String(batch.length)} checked file(s)`,
        fixable: false,
      }),
    ];
  },
};
