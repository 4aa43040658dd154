import { config as loadDotenv } from "dotenv";
import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { join, isAbsolute, basename } from "path";
import { z, ZodError } from "zod";

import { AutoremedyConfigSchema, type AutoremedyConfig } from "./schema.js";
import { logger } from "../utils/logger.js";

/**
 * Basename only, unless verbose outside production.
 */
function formatPathForLog(path: string, verbose = false): string {
  const isProduction = process.env.NODE_ENV === "production";
  if (isProduction || !verbose) {
    return basename(path);
  }
  return path;
}

export const CONFIG_FILES = ["autoremedy.json", ".autoremedyrc", ".autoremedyrc.json"];

const ENV_BOOL = z
  .enum(["0", "1"])
  .optional()
  .transform((v: string | undefined) => v === "1");

export const AutoremedyEnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  GITHUB_WORKSPACE: z.string().min(1).optional(),
  AUTOREMEDY_LOAD_DOTENV: ENV_BOOL,
  AUTOREMEDY_DOTENV_PATH: z.string().optional(),
  AUTOREMEDY_STRICT_CONFIG: ENV_BOOL,
  AUTOREMEDY_DEBUG_DIAGNOSTICS: ENV_BOOL,
  AUTOREMEDY_DEBUG_DIAGNOSTICS_ACK: z.string().optional(),
});

export interface ConfigLoaderOptions {
  strict?: boolean;
  configPath?: string;
  verbose?: boolean;
}

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[]
    ? U[]
    : T[P] extends object | undefined | null
      ? DeepPartial<NonNullable<T[P]>>
      : T[P];
};

function loadDotenvIfRequested(cwd: string, options: ConfigLoaderOptions): void {
  if (process.env.AUTOREMEDY_LOAD_DOTENV !== "1") {
    return;
  }

  const isProduction = process.env.NODE_ENV === "production";
  const explicitPath = process.env.AUTOREMEDY_DOTENV_PATH;

  if (isProduction && (!explicitPath || !isAbsolute(explicitPath))) {
    throw new Error(
      "In production, AUTOREMEDY_DOTENV_PATH must be set to an absolute path to load a .env file."
    );
  }

  const dotenvPath = explicitPath ?? join(cwd, ".env");
  if (existsSync(dotenvPath)) {
    loadDotenv({ path: dotenvPath });
    logger.debug(`Loaded .env configuration from ${formatPathForLog(dotenvPath, options.verbose)}`);
  } else if (explicitPath) {
    throw new Error(`Dotenv file not found: ${formatPathForLog(explicitPath, options.verbose)}`);
  }
}

/**
 * Resolves the run configuration. Precedence, lowest first: defaults, config
 * file, environment (GITHUB_WORKSPACE), `overrides` from the command line.
 *
 * A malformed or invalid config file is skipped with a warning, or rejected in
 * strict mode (option, AUTOREMEDY_STRICT_CONFIG=1, or NODE_ENV=production).
 */
export async function loadConfig(
  cwd: string = process.cwd(),
  overrides: DeepPartial<AutoremedyConfig> = {},
  options: ConfigLoaderOptions = {}
): Promise<AutoremedyConfig> {
  loadDotenvIfRequested(cwd, options);

  const envParsed = AutoremedyEnvSchema.safeParse(process.env);
  if (!envParsed.success) {
    const invalidVars = envParsed.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new Error(`Invalid environment variables: ${invalidVars}`);
  }
  const env = envParsed.data;

  const isStrict =
    (options.strict ?? false) || env.AUTOREMEDY_STRICT_CONFIG || env.NODE_ENV === "production";

  let fileConfig: DeepPartial<AutoremedyConfig> = {};

  const loadConfigFile = async (filepath: string): Promise<boolean> => {
    const safePath = formatPathForLog(filepath, options.verbose);

    const content = await readFile(filepath, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      const msg = `Malformed JSON in config file: ${safePath}`;
      if (isStrict) {
        throw new Error(msg);
      }
      logger.warn(msg);
      return false;
    }

    const result = AutoremedyConfigSchema.partial().safeParse(parsed);
    if (!result.success) {
      const msg = `Invalid config in ${safePath}:\n${result.error.issues
        .map((i) => `- ${i.path.join(".")}: ${i.message}`)
        .join("\n")}`;
      if (isStrict) {
        throw new Error(msg);
      }
      logger.warn(msg);
      return false;
    }

    fileConfig = result.data as DeepPartial<AutoremedyConfig>;
    logger.debug(`Loaded config from ${safePath}`);
    return true;
  };

  if (options.configPath) {
    const configPath = isAbsolute(options.configPath)
      ? options.configPath
      : join(cwd, options.configPath);

    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${formatPathForLog(configPath, options.verbose)}`);
    }
    await loadConfigFile(configPath);
  } else {
    for (const filename of CONFIG_FILES) {
      const filepath = join(cwd, filename);
      if (existsSync(filepath) && (await loadConfigFile(filepath))) {
        break;
      }
    }
  }

  if (Object.keys(fileConfig).length === 0) {
    logger.debug("No config file found, using defaults and environment variables");
  }

  const envConfig: DeepPartial<AutoremedyConfig> = {
    workspace: env.GITHUB_WORKSPACE,
  };

  const merged = deepMerge(
    fileConfig as Record<string, unknown>,
    envConfig as Record<string, unknown>,
    overrides as Record<string, unknown>
  );

  try {
    return AutoremedyConfigSchema.parse(merged);
  } catch (err) {
    if (err instanceof ZodError) {
      const msg = `Final merged configuration is invalid:\n${err.issues
        .map((i) => `- ${i.path.join(".")}: ${i.message}`)
        .join("\n")}`;
      throw new Error(msg);
    }
    throw err;
  }
}

function isObject(item: unknown): item is Record<string, unknown> {
  return !!item && typeof item === "object" && !Array.isArray(item);
}

function deepMerge(
  target: Record<string, unknown>,
  ...sources: Record<string, unknown>[]
): Record<string, unknown> {
  const result = { ...target };

  for (const source of sources) {
    for (const key in source) {
      if (Object.prototype.hasOwnProperty.call(source, key)) {
        const sourceValue = source[key];
        const targetValue = result[key];

        if (isObject(sourceValue) && isObject(targetValue)) {
          result[key] = deepMerge(targetValue, sourceValue);
        } else if (sourceValue !== undefined) {
          result[key] = sourceValue;
        }
      }
    }
  }

  return result;
}
