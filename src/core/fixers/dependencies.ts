import { describeFailure } from "../capability.js";
import {
  NpmOutdatedSchema,
  PipOutdatedSchema,
  parseListing,
  updatableNpmPackages,
  type NpmOutdated,
  type PipOutdated,
} from "../detectors/dependencies.js";
import { emptyOutcome } from "../findings/finding.js";
import type { Finding, FixOutcome } from "../types/index.js";
import { list, runRemedy } from "./command.js";
import type { FixContext, Fixer } from "./types.js";

function distinctRemedies(findings: readonly Finding[]): [string, string[]][] {
  const seen = new Map<string, [string, string[]]>();
  for (const finding of findings) {
    if (finding.remedy?.kind !== "command") continue;
    const command: [string, string[]] = [finding.remedy.tool, finding.remedy.args];
    seen.set(JSON.stringify(command), command);
  }
  return [...seen.values()];
}

async function fixNpm(findings: readonly Finding[], ctx: FixContext, outcome: FixOutcome): Promise<void> {
  const result = await list(ctx, "npm", ["outdated", "--json"]);
  if (result.status !== "completed") {
    outcome.errors.push({ category: "npm-dependencies", message: describeFailure(result) });
    return;
  }
  const outdated = parseListing<NpmOutdated>(result.stdout, NpmOutdatedSchema, {});
  if (outdated === null) {
    outcome.errors.push({
      category: "npm-dependencies",
      message: "npm outdated listing could not be parsed",
    });
    return;
  }
  const updatable = updatableNpmPackages(outdated);
  if (updatable.length === 0) {
    ctx.reporter.fixSkipped("npm-dependencies", "No package is behind its declared range");
    return;
  }

  // One `npm update` covers every package, however many findings point at it.
  const [command] = distinctRemedies(findings);
  const [tool, args] = command ?? ["npm", ["update"]];
  const failure = await runRemedy(ctx, tool, args);
  if (failure) {
    outcome.errors.push({ category: "npm-dependencies", message: failure });
    return;
  }
  outcome.fixedCount += 1;
  ctx.reporter.fixApplied("npm-dependencies", `Updated ${String(updatable.length)} npm package(s)`);
}

async function fixPip(findings: readonly Finding[], ctx: FixContext, outcome: FixOutcome): Promise<void> {
  const result = await list(ctx, "pip", ["list", "--outdated", "--format", "json"]);
  if (result.status !== "completed") {
    outcome.errors.push({ category: "dependencies", message: describeFailure(result) });
    return;
  }
  const outdated = parseListing<PipOutdated>(result.stdout, PipOutdatedSchema, []);
  if (outdated === null) {
    outcome.errors.push({ category: "dependencies", message: "pip outdated listing could not be parsed" });
    return;
  }
  if (outdated.length === 0) {
    ctx.reporter.fixSkipped("dependencies", "No outdated Python package");
    return;
  }

  const failures: string[] = [];
  for (const [tool, args] of distinctRemedies(findings)) {
    const failure = await runRemedy(ctx, tool, args);
    if (failure) failures.push(failure);
  }
  if (failures.length > 0) {
    outcome.errors.push({ category: "dependencies", message: failures.join("; ") });
    return;
  }
  outcome.fixedCount += 1;
  ctx.reporter.fixApplied("dependencies", `Upgraded ${String(outdated.length)} Python package(s)`);
}

export const dependencyFixer: Fixer = {
  name: "dependency",
  categories: ["dependencies", "npm-dependencies"],
  async apply(findings, ctx) {
    const outcome = emptyOutcome();

    const pip = findings.filter((f) => f.category === "dependencies" && f.fixable);
    if (pip.length > 0) {
      await fixPip(pip, ctx, outcome);
    }

    const npm = findings.filter((f) => f.category === "npm-dependencies" && f.fixable);
    if (npm.length > 0) {
      await fixNpm(npm, ctx, outcome);
    }

    return outcome;
  },
};
