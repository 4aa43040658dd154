import { join } from "path";
import { z } from "zod";

import { describeFailure, type CapabilityResult } from "../capability.js";
import { createFinding } from "../findings/finding.js";
import { fileExists, globWorkspace } from "../../utils/fs.js";
import type { Finding } from "../types/index.js";
import type { Detector, DetectorContext } from "./types.js";

export const PipOutdatedSchema = z.array(
  z.object({
    name: z.string(),
    version: z.string().optional(),
    latest_version: z.string().optional(),
  })
);

export type PipOutdated = z.infer<typeof PipOutdatedSchema>;

export const NpmOutdatedEntrySchema = z.object({
  current: z.string().optional(),
  wanted: z.string().optional(),
  latest: z.string().optional(),
});

export const NpmOutdatedSchema = z.record(z.string(), NpmOutdatedEntrySchema);

export type NpmOutdated = z.infer<typeof NpmOutdatedSchema>;

/**
 * Parses the stdout of a JSON-emitting package manager listing. Empty output
 * means nothing is outdated; null means the output was not what `schema` expects.
 */
export function parseListing<T>(stdout: string, schema: z.ZodType<T>, empty: T): T | null {
  if (!stdout.trim()) {
    return empty;
  }
  try {
    const result = schema.safeParse(JSON.parse(stdout));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

/**
 * `npm outdated` entries that `npm update` can move, i.e. whose installed
 * version is behind the highest version the manifest range allows.
 */
export function updatableNpmPackages(outdated: NpmOutdated): string[] {
  return Object.entries(outdated)
    .filter(([, entry]) => entry.current === undefined || entry.current !== entry.wanted)
    .map(([name]) => name);
}

function completedOrWarn(
  result: CapabilityResult,
  label: string,
  ctx: DetectorContext
): Extract<CapabilityResult, { status: "completed" }> | null {
  if (result.status === "completed") {
    return result;
  }
  if (result.status !== "unavailable") {
    ctx.reporter.warn(`${label} skipped: ${describeFailure(result)}`);
  }
  return null;
}

async function detectPip(ctx: DetectorContext): Promise<Finding[]> {
  const requirementFiles = await globWorkspace(ctx.workspace, "requirements*.txt", [], { deep: 1 });
  if (requirementFiles.length === 0) {
    return [];
  }

  // pip reports on the active environment, not on a file, so one listing serves every file.
  const result = completedOrWarn(
    await ctx.run("pip", ["list", "--outdated", "--format", "json"], {
      cwd: ctx.workspace,
      timeoutSeconds: ctx.timeoutSeconds,
      signal: ctx.signal,
    }),
    "pip dependency check",
    ctx
  );
  if (!result) {
    return [];
  }

  const outdated = parseListing<PipOutdated>(result.stdout, PipOutdatedSchema, []);
  if (outdated === null) {
    ctx.reporter.warn("pip outdated listing could not be parsed");
    return [];
  }
  if (outdated.length === 0) {
    return [];
  }

  return requirementFiles.map((file) =>
    createFinding({
      category: "dependencies",
      severity: "medium",
      location: { path: file, line: 0 },
      message: `${String(outdated.length)} outdated dependencies found`,
      fixable: true,
      remedy: { kind: "command", tool: "pip", args: ["install", "-r", file, "--upgrade"] },
    })
  );
}

async function detectNpm(ctx: DetectorContext): Promise<Finding[]> {
  if (!(await fileExists(join(ctx.workspace, "package.json")))) {
    return [];
  }

  // npm outdated exits 1 whenever something is outdated.
  const result = completedOrWarn(
    await ctx.run("npm", ["outdated", "--json"], {
      cwd: ctx.workspace,
      timeoutSeconds: ctx.timeoutSeconds,
      signal: ctx.signal,
    }),
    "npm dependency check",
    ctx
  );
  if (!result) {
    return [];
  }

  const outdated = parseListing<NpmOutdated>(result.stdout, NpmOutdatedSchema, {});
  if (outdated === null) {
    ctx.reporter.warn("npm outdated listing could not be parsed");
    return [];
  }

  const names = Object.keys(outdated);
  if (names.length === 0) {
    return [];
  }

  const updatable = updatableNpmPackages(outdated).length;
  return [
    createFinding({
      category: "npm-dependencies",
      severity: "medium",
      location: { path: "package.json", line: 0 },
      message: `${String(names.length)} outdated npm package(s) found, ${String(updatable)} updatable within declared ranges`,
      fixable: true,
      remedy: { kind: "command", tool: "npm", args: ["update"] },
    }),
  ];
}

export const dependencyDetector: Detector = {
  name: "dependencies",
  timeoutSeconds: 30,
  async detect(ctx) {
    return [...(await detectPip(ctx)), ...(await detectNpm(ctx))];
  },
};
