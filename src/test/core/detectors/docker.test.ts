import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { dockerDetector, inspectDockerfile } from "../../../core/detectors/docker.js";
import { detectAll } from "../../../core/detectors/registry.js";
import {
  cleanupTempDir,
  createTempDir,
  fakeRunner,
  RecordingReporter,
  testConfig,
  writeFiles,
} from "../../fixtures.js";

describe("dockerDetector", () => {
  let ws: string;

  beforeEach(async () => {
    ws = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(ws);
  });

  function context() {
    return {
      workspace: ws,
      config: testConfig(),
      run: fakeRunner().run,
      reporter: new RecordingReporter(),
    };
  }

  it("explains a single-stage root image without .dockerignore", async () => {
    await writeFiles(ws, { Dockerfile: 'FROM python:3.12\nCOPY . /app\nCMD ["python", "app.py"]\n' });

    const report = await detectAll(context(), [dockerDetector]);

    expect(report.results).toEqual([
      {
        category: "docker",
        found: true,
        count: 3,
        details: { dockerignore: false, multiStage: false, nonRootUser: false },
        severity: "medium",
      },
    ]);
    expect(report.findings.map((f) => [f.severity, f.location.path, f.fixable])).toEqual([
      ["medium", ".dockerignore", true],
      ["medium", "Dockerfile", false],
      ["low", "Dockerfile", false],
    ]);
    expect(report.findings[0]?.remedy).toEqual({ kind: "action", action: "create-dockerignore" });
  });

  it("finds nothing in a hardened build", async () => {
    await writeFiles(ws, {
      Dockerfile: "FROM node:20 AS build\nRUN npm ci\nFROM node:20-slim\nUSER node\n",
      ".dockerignore": "node_modules\n",
    });

    const report = await detectAll(context(), [dockerDetector]);

    expect(report.findings).toEqual([]);
    expect(report.results[0]?.found).toBe(false);
  });

  it("skips workspaces without a Dockerfile", async () => {
    const report = await detectAll(context(), [dockerDetector]);
    expect(report.results).toEqual([]);
    expect(report.runs).toEqual([{ detector: "docker", status: "ok", findings: 0 }]);
  });
});

describe("inspectDockerfile", () => {
  it("treats a numeric root uid as root", () => {
    expect(inspectDockerfile("FROM a AS base\nFROM base\nUSER 0:0\n")).toEqual({
      multiStage: true,
      nonRootUser: false,
    });
  });

  it("judges USER by its user part, not the group", () => {
    expect(inspectDockerfile("FROM a\nUSER root:root\n").nonRootUser).toBe(false);
    expect(inspectDockerfile("FROM a\nUSER root:0\n").nonRootUser).toBe(false);
    expect(inspectDockerfile("FROM a\nUSER app:root\n").nonRootUser).toBe(true);
  });

  it("uses the last USER instruction", () => {
    expect(inspectDockerfile("FROM a\nUSER app\nRUN x\nUSER root\n").nonRootUser).toBe(false);
    expect(inspectDockerfile("FROM a\nUSER root\nRUN x\nUSER 1000\n").nonRootUser).toBe(true);
  });
});
