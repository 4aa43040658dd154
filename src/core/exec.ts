import { execFile, type ExecFileOptions } from "child_process";
import { promisify } from "util";
import os from "os";
import fs from "fs/promises";
import path from "path";

const execFileAsync = promisify(execFile);

export interface ExecWithLimitsOptions extends Omit<ExecFileOptions, "timeout" | "maxBuffer"> {
  timeoutSeconds?: number;
  maxBufferMB?: number;
  env?: NodeJS.ProcessEnv;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export class ExecError extends Error {
  constructor(
    message: string,
    public readonly stdout?: string,
    public readonly stderr?: string,
    public readonly exitCode?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "ExecError";
  }
}

export class ToolMissingError extends ExecError {
  constructor(
    public readonly tool: string,
    installInstructions?: string
  ) {
    super(`${tool} not found. ${installInstructions ?? ""}`.trim());
    this.name = "ToolMissingError";
  }
}

export class TimeoutError extends ExecError {
  constructor(
    public readonly tool: string,
    timeout: number
  ) {
    super(`${tool} timed out after ${String(timeout)} seconds`);
    this.name = "TimeoutError";
  }
}

// Analyzers, package managers and container tooling the pipeline shells out to.
// Each may be pinned with an absolute <TOOL>_PATH, e.g. BLACK_PATH=/opt/venv/bin/black.
export const KNOWN_TOOLS = [
  "black",
  "isort",
  "pylint",
  "bandit",
  "pip",
  "python3",
  "pytest",
  "npm",
  "docker",
  "git",
] as const;

function toText(value: string | Buffer | undefined): string {
  if (value === undefined) return "";
  return typeof value === "string" ? value : value.toString();
}

/**
 * Executes a file with safe arguments, a timeout and a buffer limit. Never goes
 * through a shell. An abort of `options.signal` is reported as a TimeoutError,
 * since the only caller that aborts is a step whose budget ran out.
 */
export async function execFileWithLimits(
  file: string,
  args: string[],
  options: ExecWithLimitsOptions = {}
): Promise<ExecResult> {
  const timeoutSeconds = options.timeoutSeconds ?? 300;
  const maxBuffer = (options.maxBufferMB ?? 10) * 1024 * 1024;

  const resolvedPath = await resolveBinary(file);

  try {
    const { stdout, stderr } = await execFileAsync(resolvedPath, args, {
      ...options,
      timeout: timeoutSeconds * 1000,
      maxBuffer,
      env: options.env ?? {
        PATH: process.env.PATH,
        HOME: process.env.HOME,
        USER: process.env.USER,
        TMPDIR: process.env.TMPDIR,
        LANG: process.env.LANG,
        LC_ALL: process.env.LC_ALL,
        VIRTUAL_ENV: process.env.VIRTUAL_ENV,
        DOCKER_HOST: process.env.DOCKER_HOST,
        ...getToolPathOverrides(),
      },
    });

    return { stdout: toText(stdout), stderr: toText(stderr), exitCode: 0 };
  } catch (err: unknown) {
    const error = err as {
      name?: string;
      stdout?: string | Buffer;
      stderr?: string | Buffer;
      code?: string | number;
      signal?: string;
    };

    if (error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
      throw new ExecError(
        `Output of ${file} exceeded maxBuffer of ${String(maxBuffer)} bytes`,
        toText(error.stdout),
        toText(error.stderr),
        undefined,
        err
      );
    }

    if (error.name === "AbortError" || error.signal === "SIGTERM" || error.signal === "SIGKILL") {
      throw new TimeoutError(file, timeoutSeconds);
    }

    if (error.code === "ENOENT") {
      throw new ToolMissingError(file);
    }

    const exitCode = error.code;
    throw new ExecError(
      `Execution of ${file} failed with exit code ${String(exitCode)}`,
      toText(error.stdout),
      toText(error.stderr),
      typeof exitCode === "number" ? exitCode : undefined,
      err
    );
  }
}

/**
 * Resolves a binary name to an absolute path. A `<NAME>_PATH` environment
 * override wins over the PATH lookup.
 */
async function resolveBinary(name: string): Promise<string> {
  if (path.isAbsolute(name)) {
    return name;
  }

  const overrideKey = `${name.toUpperCase().replace(/[^A-Z0-9]/g, "_")}_PATH`;
  const override = process.env[overrideKey];
  if (override) {
    if (!path.isAbsolute(override)) {
      throw new Error(`Environment override ${overrideKey} must be an absolute path: ${override}`);
    }
    return override;
  }

  const paths = (process.env.PATH ?? "").split(path.delimiter).filter(Boolean);
  const extensions = os.platform() === "win32" ? [".exe", ".cmd", ".bat"] : [""];

  for (const p of paths) {
    for (const ext of extensions) {
      const fullPath = path.join(p, name + ext);
      try {
        await fs.access(fullPath, fs.constants.X_OK);
        return fullPath;
      } catch {
        continue;
      }
    }
  }

  throw new ToolMissingError(name);
}

function getToolPathOverrides(): NodeJS.ProcessEnv {
  const overrides: NodeJS.ProcessEnv = {};
  for (const tool of KNOWN_TOOLS) {
    const key = `${tool.toUpperCase()}_PATH`;
    if (process.env[key]) {
      overrides[key] = process.env[key];
    }
  }
  return overrides;
}
