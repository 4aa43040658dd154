import { mkdtemp, rm, realpath, mkdir, writeFile } from "fs/promises";
import { dirname, join, resolve } from "path";
import { tmpdir } from "os";

import { AutoremedyConfigSchema, type AutoremedyConfig } from "../config/schema.js";
import type { CapabilityOptions, CapabilityResult, CapabilityRunner } from "../core/capability.js";
import type { Reporter } from "../core/orchestrator/reporter.js";
import type {
  Finding,
  FindingCategory,
  FixError,
  FixOutcome,
  ValidationRecord,
  ValidationReport,
} from "../core/types/index.js";

const PREFIX = "autoremedy-test-";

/**
 * Creates a temporary directory for testing.
 * Returns the path to the created directory.
 */
export async function createTempDir(): Promise<string> {
  const path = await mkdtemp(join(tmpdir(), PREFIX));
  return resolve(path);
}

/**
 * Removes a directory made by createTempDir, and refuses anything else.
 */
export async function cleanupTempDir(dirPath: string): Promise<void> {
  if (!dirPath || dirPath.trim() === "") {
    throw new Error("cleanupTempDir: dirPath must be a non-empty string");
  }

  const absolutePath = resolve(dirPath);
  const tempRoot = resolve(tmpdir());

  if (absolutePath === "/" || absolutePath === resolve(process.cwd())) {
    throw new Error(`cleanupTempDir: Refusing to delete critical directory: ${absolutePath}`);
  }
  if (absolutePath === tempRoot) {
    throw new Error("cleanupTempDir: Refusing to delete the entire system temp directory");
  }
  if (!absolutePath.startsWith(tempRoot)) {
    throw new Error(`cleanupTempDir: Path is not within system temp directory: ${absolutePath}`);
  }

  const lastSegment = absolutePath.split(/[/\\]/).pop();
  if (!lastSegment?.startsWith(PREFIX)) {
    throw new Error(
      `cleanupTempDir: Path does not have expected prefix '${PREFIX}': ${lastSegment ?? "undefined"}`
    );
  }

  const finalPath = await realpath(absolutePath).catch(() => absolutePath);
  await rm(finalPath, { recursive: true, force: true });
}

/**
 * Writes `files` (relative path -> content) under `root`.
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const target = join(root, name);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

export function testConfig(overrides: Record<string, unknown> = {}): AutoremedyConfig {
  return AutoremedyConfigSchema.parse(overrides);
}

export function completed(stdout = "", exitCode = 0, stderr = ""): CapabilityResult {
  return { status: "completed", stdout, stderr, exitCode };
}

export function unavailable(tool: string): CapabilityResult {
  return { status: "unavailable", tool, message: `${tool} not found.` };
}

export interface RecordedCall {
  tool: string;
  args: string[];
  options: CapabilityOptions;
}

export type Script = (tool: string, args: string[]) => CapabilityResult | undefined;

/**
 * A CapabilityRunner answering from `script`. Calls the script does not answer
 * behave like a missing tool. Every call is recorded in order.
 */
export function fakeRunner(script: Script = () => undefined): {
  run: CapabilityRunner;
  calls: RecordedCall[];
  commands: () => string[];
} {
  const calls: RecordedCall[] = [];
  const run: CapabilityRunner = (tool, args, options) => {
    calls.push({ tool, args, options });
    return Promise.resolve(script(tool, args) ?? unavailable(tool));
  };
  return { run, calls, commands: () => calls.map((c) => [c.tool, ...c.args].join(" ")) };
}

/**
 * Reporter that keeps one line per event, e.g. `fixApplied docker: Created .dockerignore`.
 */
export class RecordingReporter implements Reporter {
  readonly events: string[] = [];
  readonly reported: Finding[] = [];
  readonly review: Finding[] = [];

  runStarted(workspace: string): void {
    this.events.push(`runStarted ${workspace}`);
  }
  warn(message: string): void {
    this.events.push(`warn ${message}`);
  }
  detectorDegraded(detector: string, reason: string): void {
    this.events.push(`detectorDegraded ${detector}: ${reason}`);
  }
  noIssues(): void {
    this.events.push("noIssues");
  }
  findingsReported(findings: readonly Finding[]): void {
    this.reported.push(...findings);
    this.events.push(`findingsReported ${String(findings.length)}`);
  }
  fixStarted(fixer: string, categories: readonly FindingCategory[]): void {
    this.events.push(`fixStarted ${fixer} [${categories.join(",")}]`);
  }
  fixApplied(category: FindingCategory, description: string): void {
    this.events.push(`fixApplied ${category}: ${description}`);
  }
  fixSkipped(category: FindingCategory, reason: string): void {
    this.events.push(`fixSkipped ${category}: ${reason}`);
  }
  fixFailed(error: FixError): void {
    this.events.push(`fixFailed ${error.category}: ${error.message}`);
  }
  manualReview(findings: readonly Finding[]): void {
    this.review.push(...findings);
    this.events.push(`manualReview ${String(findings.length)}`);
  }
  runSummarized(outcome: FixOutcome | null, findings: number): void {
    this.events.push(
      `runSummarized ${outcome === null ? "dry" : String(outcome.fixedCount)}/${String(findings)}`
    );
  }
  validationRecorded(record: ValidationRecord): void {
    this.events.push(`validationRecorded ${record.validator} ${record.passed ? "pass" : "fail"}`);
  }
  validationSummarized(report: ValidationReport): void {
    this.events.push(`validationSummarized ${report.allPassed ? "pass" : "fail"}`);
  }

  ofType(type: string): string[] {
    return this.events.filter((e) => e.startsWith(`${type} `) || e === type);
  }
}

/**
 * Context accepted by detectors, fixers and validators alike.
 */
export function pipelineContext(
  workspace: string,
  run: CapabilityRunner,
  reporter: RecordingReporter = new RecordingReporter(),
  config: AutoremedyConfig = testConfig()
) {
  return { workspace, config, run, reporter, timeoutSeconds: 30 };
}
