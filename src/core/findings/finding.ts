import { z } from "zod";

import {
  FINDING_CATEGORIES,
  FIX_ACTIONS,
  SEVERITIES,
  WORKSPACE_WIDE,
  type DetectionResult,
  type Finding,
  type FindingCategory,
  type FixOutcome,
  type Severity,
} from "../types/index.js";

export class FindingInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FindingInvariantError";
  }
}

export const RemedySchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("command"),
    tool: z.string().trim().min(1),
    args: z.array(z.string()),
  }),
  z.object({
    kind: z.literal("action"),
    action: z.enum(FIX_ACTIONS),
  }),
]);

export const FindingSchema = z
  .object({
    category: z.enum(FINDING_CATEGORIES),
    severity: z.enum(SEVERITIES),
    location: z.object({
      path: z.string().min(1),
      line: z.number().int().min(0),
    }),
    message: z.string().min(1),
    fixable: z.boolean(),
    remedy: RemedySchema.optional(),
  })
  .refine((finding) => !finding.fixable || finding.remedy !== undefined, {
    message: "a fixable finding must carry a remedy",
    path: ["remedy"],
  })
  .refine((finding) => finding.fixable || finding.remedy === undefined, {
    message: "a finding that is not fixable must not carry a remedy",
    path: ["remedy"],
  });

export type FindingInput = z.input<typeof FindingSchema>;

/**
 * The only way to build a Finding. Throws FindingInvariantError when the value
 * is malformed, in particular when `fixable` is set without a non-empty remedy.
 */
export function createFinding(input: FindingInput): Finding {
  const result = FindingSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "finding"}: ${i.message}`)
      .join("; ");
    throw new FindingInvariantError(`Invalid ${input.category} finding: ${issues}`);
  }
  const { location, remedy, ...rest } = result.data;
  return Object.freeze({
    ...rest,
    location: Object.freeze({ ...location }),
    ...(remedy ? { remedy: Object.freeze(remedy) } : {}),
  });
}

export function workspaceWide(): { path: string; line: number } {
  return { path: WORKSPACE_WIDE, line: 0 };
}

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

/**
 * Stable sort, most severe first.
 */
export function sortBySeverity(findings: readonly Finding[]): Finding[] {
  return [...findings].sort((a, b) => severityRank(a.severity) - severityRank(b.severity));
}

/**
 * Groups findings by category, keeping the order in which categories first appear.
 */
export function groupByCategory(findings: readonly Finding[]): Map<FindingCategory, Finding[]> {
  const groups = new Map<FindingCategory, Finding[]>();
  for (const finding of findings) {
    const group = groups.get(finding.category);
    if (group) {
      group.push(finding);
    } else {
      groups.set(finding.category, [finding]);
    }
  }
  return groups;
}

export function isDetectionResult(value: Finding | DetectionResult): value is DetectionResult {
  return "found" in value && "details" in value;
}

export function emptyOutcome(): FixOutcome {
  return { fixedCount: 0, errors: [], manualReview: [] };
}

/**
 * Adds `next` into `total` in place; the run keeps one outcome for its lifetime.
 */
export function mergeOutcome(total: FixOutcome, next: FixOutcome): FixOutcome {
  total.fixedCount += next.fixedCount;
  total.errors.push(...next.errors);
  total.manualReview.push(...next.manualReview);
  return total;
}
