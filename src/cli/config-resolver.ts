import { stat } from "fs/promises";
import { isAbsolute, resolve } from "path";

import { loadConfig } from "../config/loader.js";
import type { AutoremedyConfig } from "../config/schema.js";
import { CliUsageError } from "./errors.js";

interface ResolveCliConfigParams {
  strictConfig?: boolean;
  configPath?: string;
  verbose?: boolean;
  cwd?: string;
}

export async function resolveCliConfig(params: ResolveCliConfigParams): Promise<AutoremedyConfig> {
  const cwd = params.cwd ?? process.cwd();

  let configPath = params.configPath;
  if (configPath && !isAbsolute(configPath)) {
    configPath = resolve(cwd, configPath);
  }

  return loadConfig(
    cwd,
    {},
    {
      strict: !!params.strictConfig,
      configPath,
      verbose: params.verbose,
    }
  );
}

/**
 * Absolute workspace root: `--workspace`, else the configured workspace
 * (GITHUB_WORKSPACE wins over the config file), relative to `cwd`.
 */
export async function resolveWorkspace(
  config: AutoremedyConfig,
  option: string | undefined,
  cwd: string = process.cwd()
): Promise<string> {
  const workspace = resolve(cwd, option ?? config.workspace);
  const stats = await stat(workspace).catch(() => null);
  if (!stats?.isDirectory()) {
    throw new CliUsageError(`Workspace is not a directory: ${workspace}`);
  }
  return workspace;
}
