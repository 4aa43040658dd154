import chalk from "chalk";

import { redactText, redactObject, SENSITIVE_NAMES, safeTruncate } from "./redaction.js";
import { sanitizeForTerminal, stripAnsi } from "./terminal-sanitize.js";
export { redactText, redactObject, SENSITIVE_NAMES, safeTruncate, stripAnsi, sanitizeForTerminal };

function isVerbose(verbose?: boolean): boolean {
  return verbose ?? (process.argv.includes("--verbose") || process.argv.includes("-v"));
}

/**
 * Renders an error for logs with secrets redacted and escape sequences removed.
 * Stacks only appear in verbose mode; `cause` chains are followed.
 */
export function sanitizeError(err: unknown, verbose = false): string {
  if (err instanceof Error) {
    let result = sanitizeForTerminal(redactText(err.message));

    if (verbose && err.stack) {
      result += `\n${sanitizeForTerminal(redactText(err.stack))}`;
    }

    if (err.cause) {
      result += `\n[Cause]: ${sanitizeError(err.cause, verbose)}`;
    }

    return result;
  }
  return sanitizeForTerminal(redactText(String(err)));
}

/**
 * Messages are redacted but keep their colours, so text that comes from a
 * workspace must pass sanitizeForTerminal before it is formatted.
 * Diagnostics go to stderr; `output` is the only stdout channel so that
 * `--json` results can be piped.
 */
export const logger = {
  info: (msg: string) => {
    console.error(chalk.blue(`[INFO] ${redactText(msg)}`));
  },
  warn: (msg: string) => {
    console.error(chalk.yellow(`[WARN] ${redactText(msg)}`));
  },
  error: (msg: string | Error, verbose?: boolean) => {
    if (msg instanceof Error) {
      console.error(chalk.red(`[ERROR] ${sanitizeError(msg, isVerbose(verbose))}`));
    } else {
      console.error(chalk.red(`[ERROR] ${redactText(msg)}`));
    }
  },
  debug: (msg: string, verbose?: boolean) => {
    if (isVerbose(verbose)) console.error(chalk.gray(`[DEBUG] ${redactText(msg)}`));
  },
  success: (msg: string) => {
    console.error(chalk.green(`[SUCCESS] ${redactText(msg)}`));
  },
  progress: (msg: string) => {
    console.error(chalk.cyan(redactText(msg)));
  },
  plain: (msg: string) => {
    console.error(redactText(msg));
  },
  output: (msg: string) => {
    console.log(redactText(msg));
  },
};

export type Logger = typeof logger;
