import { isAbsolute } from "path";
import { z } from "zod";

import { describeFailure } from "../capability.js";
import { createFinding } from "../findings/finding.js";
import { getRelativePath } from "../../utils/fs.js";
import type { Finding, Severity } from "../types/index.js";
import type { Detector } from "./types.js";

const BanditResultSchema = z.object({
  filename: z.string().default("unknown"),
  line_number: z.number().int().min(0).default(0),
  issue_severity: z.string().default("MEDIUM"),
  issue_text: z.string().default("Security issue detected"),
  test_id: z.string().optional(),
});

export const BanditOutputSchema = z.object({
  results: z.array(BanditResultSchema).default([]),
});

export function mapBanditSeverity(severity: string): Severity {
  const s = severity.toLowerCase();
  if (s === "critical") return "critical";
  if (s === "high") return "high";
  if (s === "low") return "low";
  return "medium";
}

/**
 * Parses bandit's JSON report. Returns null when the output is not a report.
 */
export function parseBanditOutput(stdout: string, workspace: string): Finding[] | null {
  if (!stdout.trim()) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return null;
  }

  const result = BanditOutputSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }

  return result.data.results.map((issue) => {
    const relative = isAbsolute(issue.filename) ? getRelativePath(issue.filename, workspace) : "";
    const path = relative || issue.filename;
    return createFinding({
      category: "security",
      severity: mapBanditSeverity(issue.issue_severity),
      location: { path, line: issue.line_number },
      message: issue.test_id ? `${issue.test_id}: ${issue.issue_text}` : issue.issue_text,
      // Security findings always need a human.
      fixable: false,
    });
  });
}

export const securityDetector: Detector = {
  name: "security",
  timeoutSeconds: 60,
  async detect(ctx) {
    const result = await ctx.run("bandit", ["-r", ctx.workspace, "-f", "json", "-q"], {
      cwd: ctx.workspace,
      timeoutSeconds: ctx.timeoutSeconds,
      signal: ctx.signal,
    });

    switch (result.status) {
      case "unavailable":
        return [];
      case "timeout":
      case "failed":
        ctx.reporter.warn(`Security scan skipped: ${describeFailure(result)}`);
        return [];
      case "completed":
        break;
    }

    // bandit exits 1 when it reports issues; the JSON on stdout is the answer either way.
    const findings = parseBanditOutput(result.stdout, ctx.workspace);
    if (findings === null) {
      ctx.reporter.warn("Security scan output could not be parsed; no security findings recorded");
      return [];
    }
    return findings;
  },
};
