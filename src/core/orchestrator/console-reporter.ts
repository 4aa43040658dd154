import chalk from "chalk";

import { sortBySeverity } from "../findings/finding.js";
import type {
  Finding,
  FindingCategory,
  FixError,
  FixOutcome,
  Severity,
  ValidationRecord,
  ValidationReport,
} from "../types/index.js";
import { logger, sanitizeForTerminal } from "../../utils/logger.js";
import type { Reporter } from "./reporter.js";

const RULE = "=".repeat(60);

const SEVERITY_STYLE: Record<Severity, (text: string) => string> = {
  critical: chalk.red.bold,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.gray,
};

function formatFinding(finding: Finding): string {
  const { path, line } = finding.location;
  const where = line > 0 ? `${path}:${String(line)}` : path;
  return sanitizeForTerminal(`[${finding.category}] ${finding.message} (${where})`);
}

/**
 * Human-readable progress on stderr.
 */
export class ConsoleReporter implements Reporter {
  runStarted(workspace: string): void {
    logger.plain(chalk.magenta(RULE));
    logger.plain(chalk.magenta.bold("autoremedy"));
    logger.plain(chalk.magenta(RULE));
    logger.progress(`Inspecting ${sanitizeForTerminal(workspace)}...\n`);
  }

  warn(message: string): void {
    logger.warn(sanitizeForTerminal(message));
  }

  detectorDegraded(detector: string, reason: string): void {
    logger.warn(`${detector} detector produced no findings: ${sanitizeForTerminal(reason)}`);
  }

  noIssues(): void {
    logger.success("No issues detected");
  }

  findingsReported(findings: readonly Finding[]): void {
    logger.plain(chalk.yellow(`\nFound ${String(findings.length)} issue(s):\n`));
    for (const finding of sortBySeverity(findings)) {
      const style = SEVERITY_STYLE[finding.severity];
      const fixable = finding.fixable ? chalk.green("fixable") : chalk.yellow("requires review");
      logger.plain(`${style(finding.severity.padEnd(8))} ${formatFinding(finding)} ${fixable}`);
    }
    logger.plain("");
  }

  fixStarted(fixer: string, categories: readonly FindingCategory[]): void {
    logger.progress(`Applying ${fixer} fixes (${categories.join(", ")})...`);
  }

  fixApplied(category: FindingCategory, description: string): void {
    logger.success(`[${category}] ${sanitizeForTerminal(description)}`);
  }

  fixSkipped(category: FindingCategory, reason: string): void {
    logger.debug(`[${category}] ${sanitizeForTerminal(reason)}`);
  }

  fixFailed(error: FixError): void {
    logger.warn(`[${error.category}] fix failed: ${sanitizeForTerminal(error.message)}`);
  }

  manualReview(findings: readonly Finding[]): void {
    if (findings.length === 0) return;
    logger.plain(chalk.yellow(`\n${String(findings.length)} finding(s) need manual review:`));
    for (const finding of findings) {
      logger.plain(`  ${SEVERITY_STYLE[finding.severity](finding.severity)} ${formatFinding(finding)}`);
    }
  }

  runSummarized(outcome: FixOutcome | null, findings: number): void {
    logger.plain(chalk.magenta(`\n${RULE}`));
    if (outcome === null) {
      logger.plain(chalk.cyan(`Dry run complete: ${String(findings)} issue(s) found, nothing changed`));
    } else {
      logger.plain(chalk.green(`Workflow complete: ${String(outcome.fixedCount)} fix(es) applied`));
      if (outcome.errors.length > 0) {
        logger.plain(chalk.yellow(`${String(outcome.errors.length)} fix(es) could not be applied`));
      }
    }
    logger.plain(chalk.magenta(`${RULE}\n`));
  }

  validationRecorded(record: ValidationRecord): void {
    const mark = record.passed ? chalk.green("PASS") : chalk.red("FAIL");
    logger.plain(`${mark} ${record.validator}: ${sanitizeForTerminal(record.message)}`);
  }

  validationSummarized(report: ValidationReport): void {
    if (report.allPassed) {
      logger.success(`All ${String(report.records.length)} validator(s) passed`);
    } else {
      logger.error("Validation failed");
    }
  }
}
