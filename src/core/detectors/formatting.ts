import { describeFailure } from "../capability.js";
import { createFinding, workspaceWide } from "../findings/finding.js";
import type { Finding, FindingCategory } from "../types/index.js";
import type { Detector, DetectorContext } from "./types.js";

interface FormatCheck {
  category: FindingCategory;
  tool: string;
  checkArgs: string[];
  message: string;
}

export const FORMAT_CHECKS: FormatCheck[] = [
  {
    category: "formatting",
    tool: "black",
    checkArgs: ["--check", "--quiet"],
    message: "Code not formatted according to Black standards",
  },
  {
    category: "imports",
    tool: "isort",
    checkArgs: ["--check-only", "--quiet"],
    message: "Imports not sorted correctly",
  },
];

async function runCheck(check: FormatCheck, ctx: DetectorContext): Promise<Finding[]> {
  const result = await ctx.run(check.tool, [...check.checkArgs, ctx.workspace], {
    cwd: ctx.workspace,
    timeoutSeconds: ctx.timeoutSeconds,
    signal: ctx.signal,
  });

  if (result.status !== "completed") {
    if (result.status !== "unavailable") {
      ctx.reporter.warn(`Formatting check skipped: ${describeFailure(result)}`);
    }
    return [];
  }

  if (result.exitCode === 0) {
    return [];
  }

  return [
    createFinding({
      category: check.category,
      severity: "low",
      location: workspaceWide(),
      message: check.message,
      fixable: true,
      remedy: { kind: "command", tool: check.tool, args: [ctx.workspace] },
    }),
  ];
}

export const formattingDetector: Detector = {
  name: "formatting",
  timeoutSeconds: 30,
  async detect(ctx) {
    const findings: Finding[] = [];
    for (const check of FORMAT_CHECKS) {
      findings.push(...(await runCheck(check, ctx)));
    }
    return findings;
  },
};
