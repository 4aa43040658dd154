import { describeFailure } from "../capability.js";
import { createFinding, workspaceWide } from "../findings/finding.js";
import type { Detector } from "./types.js";

export const MAX_SUBJECT_LENGTH = 72;
export const COMMITS_CHECKED = 10;

export function isPoorSubject(subject: string): boolean {
  return subject.length > MAX_SUBJECT_LENGTH || subject.startsWith("Merge");
}

export const gitDetector: Detector = {
  name: "git",
  timeoutSeconds: 10,
  async detect(ctx) {
    const result = await ctx.run("git", ["log", "--format=%s", "-n", String(COMMITS_CHECKED)], {
      cwd: ctx.workspace,
      timeoutSeconds: ctx.timeoutSeconds,
      signal: ctx.signal,
    });

    if (result.status !== "completed") {
      if (result.status !== "unavailable") {
        ctx.reporter.warn(`Commit history check skipped: ${describeFailure(result)}`);
      }
      return [];
    }
    // Not a repository, or no commits yet.
    if (result.exitCode !== 0) {
      return [];
    }

    const subjects = result.stdout.split("\n").filter((line) => line.trim() !== "");
    const poor = subjects.filter(isPoorSubject);

    return [
      {
        category: "git",
        found: poor.length > 0,
        count: poor.length,
        details: { badCommits: poor.length, totalChecked: subjects.length, subjects: poor },
        severity: "low",
      },
    ];
  },
  explain(result) {
    const bad = typeof result.details.badCommits === "number" ? result.details.badCommits : 0;
    const total = typeof result.details.totalChecked === "number" ? result.details.totalChecked : 0;
    return [
      createFinding({
        category: "git",
        severity: "low",
        location: workspaceWide(),
        message: `${String(bad)} of the last ${String(total)} commit subjects are merge commits or longer than ${String(MAX_SUBJECT_LENGTH)} characters`,
        fixable: false,
      }),
    ];
  },
};
