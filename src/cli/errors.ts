import { redactText } from "../utils/logger.js";
import { sanitizeForTerminal } from "../utils/terminal-sanitize.js";

const DIAGNOSTICS_ACK = "I_UNDERSTAND_SECURITY_RISK";

function clean(text: string): string {
  return sanitizeForTerminal(redactText(text));
}

/**
 * Base for errors that end a command. `exitCode` is what the process exits with.
 */
export class CliError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

export class CliUsageError extends CliError {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/**
 * A pipeline failure. Stack traces and the wrapped error are shown only when
 * diagnostics are on: AUTOREMEDY_DEBUG_DIAGNOSTICS=1, plus
 * AUTOREMEDY_DEBUG_DIAGNOSTICS_ACK=I_UNDERSTAND_SECURITY_RISK under NODE_ENV=production.
 */
export class CliRuntimeError extends CliError {
  constructor(
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "CliRuntimeError";
  }

  private diagnosticsEnabled(requested: boolean | undefined): boolean {
    const isProduction = process.env.NODE_ENV === "production";
    const acknowledged = process.env.AUTOREMEDY_DEBUG_DIAGNOSTICS_ACK === DIAGNOSTICS_ACK;
    const wanted = requested ?? process.env.AUTOREMEDY_DEBUG_DIAGNOSTICS === "1";

    if (!wanted) {
      return false;
    }
    return isProduction ? acknowledged : true;
  }

  toPublicString(options: { debug?: boolean } = {}): string {
    const debug = this.diagnosticsEnabled(options.debug);
    const message = clean(this.message);

    if (process.env.NODE_ENV === "production" && !debug) {
      return `${message} [Error Code: ${this.name}]`;
    }
    if (!debug) {
      return message;
    }

    const lines = [message];
    if (this.stack) {
      lines.push(clean(this.stack));
    }
    if (this.originalError instanceof Error) {
      lines.push(`Caused by: ${clean(this.originalError.message)}`);
      if (this.originalError.stack) {
        lines.push(clean(this.originalError.stack));
      }
    }
    return lines.join("\n");
  }
}

/**
 * Validation was requested and at least one validator did not pass. The
 * records have already been printed; only the exit status is left to set.
 */
export class ValidationFailedError extends CliError {
  constructor(public readonly failed: string[]) {
    super(`Validation failed: ${failed.join(", ")}`);
    this.name = "ValidationFailedError";
  }
}
