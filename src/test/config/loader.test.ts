import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "path";

import { createTempDir, cleanupTempDir } from "../fixtures.js";
import { loadConfig } from "../../config/loader.js";
import { logger } from "../../utils/logger.js";

describe("Config Loader", () => {
  let tempDir: string;
  const originalEnv = process.env;

  beforeEach(async () => {
    tempDir = await createTempDir();
    process.env = { ...originalEnv };
    delete process.env.AUTOREMEDY_STRICT_CONFIG;
    delete process.env.AUTOREMEDY_LOAD_DOTENV;
    delete process.env.AUTOREMEDY_DOTENV_PATH;
    delete process.env.GITHUB_WORKSPACE;
    delete process.env.NODE_ENV;
    vi.spyOn(logger, "warn").mockImplementation(vi.fn());
    vi.spyOn(logger, "debug").mockImplementation(vi.fn());
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  it("should use complete defaults without a config file", async () => {
    const config = await loadConfig(tempDir);

    expect(config.workspace).toBe(".");
    expect(config.detection.detectors).toEqual([
      "formatting",
      "lint",
      "security",
      "dependencies",
      "docker",
      "compose",
      "git",
    ]);
    expect(config.detection.lintMaxFiles).toBe(10);
    expect(config.fixing).toEqual({
      enabled: true,
      fixers: ["formatting", "dependency", "container", "config", "security-triage"],
      timeoutSeconds: 120,
    });
    expect(config.docker.ignoreEntries).toHaveLength(13);
    expect(logger.debug).toHaveBeenCalledWith(
      "No config file found, using defaults and environment variables"
    );
  });

  it("should load a valid config file", async () => {
    await writeFile(join(tempDir, "autoremedy.json"), JSON.stringify({ detection: { lintMaxFiles: 5 } }));

    const config = await loadConfig(tempDir);

    expect(config.detection.lintMaxFiles).toBe(5);
    expect(config.detection.detectors).toHaveLength(7);
    expect(logger.debug).toHaveBeenCalledWith("Loaded config from autoremedy.json");
  });

  it("should warn but continue on malformed JSON in non-strict mode", async () => {
    await writeFile(join(tempDir, "autoremedy.json"), "{ invalid json }");

    const config = await loadConfig(tempDir);

    expect(config.workspace).toBe(".");
    expect(logger.warn).toHaveBeenCalledWith("Malformed JSON in config file: autoremedy.json");
  });

  it("should throw on malformed JSON in strict mode (option)", async () => {
    await writeFile(join(tempDir, "autoremedy.json"), "{ invalid json }");

    await expect(loadConfig(tempDir, {}, { strict: true })).rejects.toThrow("Malformed JSON");
  });

  it("should throw on malformed JSON in strict mode (env)", async () => {
    await writeFile(join(tempDir, "autoremedy.json"), "{ invalid json }");
    process.env.AUTOREMEDY_STRICT_CONFIG = "1";

    await expect(loadConfig(tempDir)).rejects.toThrow("Malformed JSON");
  });

  it("should throw on malformed JSON in production mode", async () => {
    await writeFile(join(tempDir, "autoremedy.json"), "{ invalid json }");
    process.env.NODE_ENV = "production";

    await expect(loadConfig(tempDir)).rejects.toThrow("Malformed JSON");
  });

  it("should fall through to the next config file when the first is invalid", async () => {
    await writeFile(join(tempDir, "autoremedy.json"), JSON.stringify({ detectors: ["lint"] }));
    await writeFile(join(tempDir, ".autoremedyrc"), JSON.stringify({ workspace: "./app" }));

    const config = await loadConfig(tempDir);

    expect(config.workspace).toBe("./app");
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining("Invalid config in autoremedy.json"));
    expect(logger.debug).toHaveBeenCalledWith("Loaded config from .autoremedyrc");
  });

  it("should reject unknown detector names", async () => {
    await writeFile(
      join(tempDir, "autoremedy.json"),
      JSON.stringify({ detection: { detectors: ["eslint"] } })
    );

    await expect(loadConfig(tempDir, {}, { strict: true })).rejects.toThrow("Invalid config in");
  });

  it("should apply file < environment < overrides", async () => {
    await writeFile(join(tempDir, "autoremedy.json"), JSON.stringify({ workspace: "./from-file" }));
    process.env.GITHUB_WORKSPACE = "/from-env";

    expect((await loadConfig(tempDir)).workspace).toBe("/from-env");
    expect((await loadConfig(tempDir, { workspace: "./from-cli" })).workspace).toBe("./from-cli");
  });

  it("should throw if the final merged config is invalid", async () => {
    await expect(loadConfig(tempDir, { fixing: { timeoutSeconds: -1 } })).rejects.toThrow(
      "Final merged configuration is invalid"
    );
  });

  it("should throw when an explicit config file is missing", async () => {
    await expect(loadConfig(tempDir, {}, { configPath: "missing.json" })).rejects.toThrow(
      "Config file not found: missing.json"
    );
  });

  it("should reject malformed environment flags", async () => {
    process.env.AUTOREMEDY_STRICT_CONFIG = "yes";

    await expect(loadConfig(tempDir)).rejects.toThrow(
      "Invalid environment variables: AUTOREMEDY_STRICT_CONFIG"
    );
  });

  it("should load .env only when asked", async () => {
    await writeFile(join(tempDir, ".env"), "GITHUB_WORKSPACE=/from-dotenv\n");

    expect((await loadConfig(tempDir)).workspace).toBe(".");

    process.env.AUTOREMEDY_LOAD_DOTENV = "1";
    expect((await loadConfig(tempDir)).workspace).toBe("/from-dotenv");
  });

  it("should require an absolute dotenv path in production", async () => {
    process.env.NODE_ENV = "production";
    process.env.AUTOREMEDY_LOAD_DOTENV = "1";

    await expect(loadConfig(tempDir)).rejects.toThrow(
      "In production, AUTOREMEDY_DOTENV_PATH must be set to an absolute path"
    );
  });
});
