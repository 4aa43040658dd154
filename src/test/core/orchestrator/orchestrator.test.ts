import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readdir, readFile } from "fs/promises";
import { join } from "path";

import { Orchestrator, OrchestratorStateError } from "../../../core/orchestrator/orchestrator.js";
import {
  cleanupTempDir,
  createTempDir,
  fakeRunner,
  RecordingReporter,
  testConfig,
  writeFiles,
} from "../../fixtures.js";

describe("Orchestrator", () => {
  let ws: string;
  let reporter: RecordingReporter;

  beforeEach(async () => {
    ws = await createTempDir();
    reporter = new RecordingReporter();
  });

  afterEach(async () => {
    await cleanupTempDir(ws);
  });

  function orchestrator(dryRun = false, config = testConfig()) {
    return new Orchestrator({ workspace: ws, config, reporter, run: fakeRunner().run, dryRun });
  }

  it("goes straight to done when nothing is found", async () => {
    await writeFiles(ws, { "README.md": "# demo\n" });

    const report = await orchestrator().run();

    expect(report.states).toEqual(["idle", "detecting", "no-issues", "done"]);
    expect(report.fixOutcome).toBeNull();
    expect(report.success).toBe(true);
    expect(reporter.events).toEqual([`runStarted ${ws}`, "noIssues"]);
    expect(await readdir(ws)).toEqual(["README.md"]);
  });

  it("reports every finding before fixing, then creates .dockerignore", async () => {
    await writeFiles(ws, { Dockerfile: "FROM python:3.12\nCOPY . /app\n" });

    const report = await orchestrator().run();

    expect(report.states).toEqual(["idle", "detecting", "reporting", "fixing", "summarizing", "done"]);
    expect(report.detection.findings).toHaveLength(3);
    expect(report.fixOutcome).toEqual({ fixedCount: 1, errors: [], manualReview: [] });
    expect(reporter.events).toEqual([
      `runStarted ${ws}`,
      "findingsReported 3",
      "fixStarted container [docker]",
      "fixApplied docker: Created .dockerignore",
      "manualReview 0",
      "runSummarized 1/3",
    ]);
    expect(await readFile(join(ws, ".dockerignore"), "utf-8")).toContain("node_modules\n");
  });

  it("changes nothing on a dry run", async () => {
    await writeFiles(ws, { Dockerfile: "FROM python:3.12\n" });

    const report = await orchestrator(true).run();

    expect(report.states).toEqual(["idle", "detecting", "reporting", "summarizing", "done"]);
    expect(report.dryRun).toBe(true);
    expect(report.fixOutcome).toBeNull();
    expect((await readdir(ws)).sort()).toEqual(["Dockerfile"]);
    expect(reporter.ofType("runSummarized")).toEqual(["runSummarized dry/3"]);
  });

  it("skips fixing when fixing is disabled", async () => {
    await writeFiles(ws, { Dockerfile: "FROM python:3.12\n" });

    const report = await orchestrator(false, testConfig({ fixing: { enabled: false } })).run();

    expect(report.states).toEqual(["idle", "detecting", "reporting", "summarizing", "done"]);
    expect(await readdir(ws)).toEqual(["Dockerfile"]);
  });

  it("allows a single run per instance", async () => {
    const instance = orchestrator();
    await instance.run();

    await expect(instance.run()).rejects.toThrow(OrchestratorStateError);
    await expect(instance.run()).rejects.toThrow("Illegal orchestrator transition: done -> detecting");
    expect(instance.currentState).toBe("done");
  });

  it("validates on request with one record per validator", async () => {
    const report = await orchestrator().validate();

    expect(report.allPassed).toBe(true);
    expect(report.records.map((r) => r.validator)).toEqual([
      "python",
      "javascript",
      "docker-build",
      "compose",
    ]);
    expect(reporter.events.at(-1)).toBe("validationSummarized pass");
  });
});
