/**
 * Every environment variable autoremedy reads, besides the `<TOOL>_PATH`
 * binary overrides listed in core/exec.ts.
 *
 * Used by:
 * - src/config/loader.ts (runtime validation)
 * - src/test/config/env-vars.test.ts (parity with the loader schema)
 */
export const ENV_VAR_NAMES = {
  NODE_ENV: "NODE_ENV",

  // Workspace root override, set by GitHub Actions runners
  GITHUB_WORKSPACE: "GITHUB_WORKSPACE",

  // Dotenv control
  AUTOREMEDY_LOAD_DOTENV: "AUTOREMEDY_LOAD_DOTENV",
  AUTOREMEDY_DOTENV_PATH: "AUTOREMEDY_DOTENV_PATH",

  // Configuration control
  AUTOREMEDY_STRICT_CONFIG: "AUTOREMEDY_STRICT_CONFIG",

  // Debug flags
  AUTOREMEDY_DEBUG_DIAGNOSTICS: "AUTOREMEDY_DEBUG_DIAGNOSTICS",
  AUTOREMEDY_DEBUG_DIAGNOSTICS_ACK: "AUTOREMEDY_DEBUG_DIAGNOSTICS_ACK",
} as const;

export const ALL_ENV_VARS = Object.values(ENV_VAR_NAMES);
