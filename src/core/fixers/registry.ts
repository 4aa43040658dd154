import type { FixerName } from "../../config/schema.js";
import { emptyOutcome, groupByCategory, mergeOutcome } from "../findings/finding.js";
import { runStep } from "../step.js";
import type { Finding, FindingCategory, FixOutcome } from "../types/index.js";
import { configFixer } from "./compose.js";
import { dependencyFixer } from "./dependencies.js";
import { containerFixer } from "./docker.js";
import { formattingFixer } from "./formatting.js";
import { securityTriageFixer } from "./security.js";
import type { FixContext, Fixer } from "./types.js";

export const FIXERS: Record<FixerName, Fixer> = {
  formatting: formattingFixer,
  dependency: dependencyFixer,
  container: containerFixer,
  config: configFixer,
  "security-triage": securityTriageFixer,
};

/**
 * Which fixer owns each category. `null` means findings of that category are
 * reported but never remediated.
 */
export const CATEGORY_FIXERS: Record<FindingCategory, FixerName | null> = {
  formatting: "formatting",
  imports: "formatting",
  linting: null,
  security: "security-triage",
  dependencies: "dependency",
  "npm-dependencies": "dependency",
  docker: "container",
  "docker-compose": "config",
  git: null,
};

export type FixingContext = Omit<FixContext, "timeoutSeconds" | "signal">;

export function resolveFixers(names: readonly FixerName[]): Fixer[] {
  const enabled = new Set(names);
  return Object.values(FIXERS).filter((fixer) => enabled.has(fixer.name));
}

/**
 * Hands every enabled fixer the findings of the categories it owns, once, in
 * table order. A fixer that throws or overruns the fixing budget leaves one
 * error per category it was given; later fixers still run.
 */
export async function applyFixes(
  findings: readonly Finding[],
  ctx: FixingContext,
  fixers: readonly Fixer[] = resolveFixers(ctx.config.fixing.fixers)
): Promise<FixOutcome> {
  const total = emptyOutcome();
  const groups = groupByCategory(findings);
  const timeoutSeconds = ctx.config.fixing.timeoutSeconds;

  for (const fixer of fixers) {
    const categories = fixer.categories.filter(
      (category) => groups.has(category) && CATEGORY_FIXERS[category] === fixer.name
    );
    if (categories.length === 0) continue;

    const assigned = categories.flatMap((category) => groups.get(category) ?? []);
    ctx.reporter.fixStarted(fixer.name, categories);

    const step = await runStep(`${fixer.name} fixer`, timeoutSeconds, (signal) =>
      fixer.apply(assigned, { ...ctx, timeoutSeconds, signal })
    );

    const outcome: FixOutcome =
      step.status === "ok"
        ? step.value
        : {
            fixedCount: 0,
            errors: categories.map((category) => ({ category, message: step.message })),
            manualReview: [],
          };

    for (const error of outcome.errors) {
      ctx.reporter.fixFailed(error);
    }
    mergeOutcome(total, outcome);
  }

  return total;
}
