import { FORMAT_CHECKS } from "../detectors/formatting.js";
import { emptyOutcome } from "../findings/finding.js";
import type { Finding } from "../types/index.js";
import { check, runRemedy } from "./command.js";
import type { Fixer } from "./types.js";

function remedyCommand(finding: Finding, tool: string, workspace: string): [string, string[]] {
  return finding.remedy?.kind === "command"
    ? [finding.remedy.tool, finding.remedy.args]
    : [tool, [workspace]];
}

export const formattingFixer: Fixer = {
  name: "formatting",
  categories: ["formatting", "imports"],
  async apply(findings, ctx) {
    const outcome = emptyOutcome();

    // formatting before imports
    for (const formatCheck of FORMAT_CHECKS) {
      const finding = findings.find((f) => f.category === formatCheck.category && f.fixable);
      if (!finding) continue;

      const before = await check(ctx, formatCheck.tool, [...formatCheck.checkArgs, ctx.workspace]);
      if (before.status === "error") {
        outcome.errors.push({ category: formatCheck.category, message: before.message });
        continue;
      }
      if (before.status === "clean") {
        ctx.reporter.fixSkipped(formatCheck.category, `${formatCheck.tool} reports nothing to change`);
        continue;
      }

      const [tool, args] = remedyCommand(finding, formatCheck.tool, ctx.workspace);
      const failure = await runRemedy(ctx, tool, args);
      if (failure) {
        outcome.errors.push({ category: formatCheck.category, message: failure });
        continue;
      }
      outcome.fixedCount += 1;
      ctx.reporter.fixApplied(formatCheck.category, `Ran ${formatCheck.tool}`);
    }

    return outcome;
  },
};
