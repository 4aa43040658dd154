import type { DetectorName } from "../../config/schema.js";
import type { CapabilityRunner } from "../capability.js";
import { isDetectionResult } from "../findings/finding.js";
import { runStep } from "../step.js";
import type { DetectionReport, DetectionResult, Finding } from "../types/index.js";
import { composeDetector } from "./compose.js";
import { dependencyDetector } from "./dependencies.js";
import { dockerDetector } from "./docker.js";
import { formattingDetector } from "./formatting.js";
import { gitDetector } from "./git.js";
import { lintDetector } from "./lint.js";
import { securityDetector } from "./security.js";
import type { Detector, DetectorContext } from "./types.js";

/**
 * Every detector, in execution order. A new category gets a new entry here.
 */
export const DETECTORS: Record<DetectorName, Detector> = {
  formatting: formattingDetector,
  lint: lintDetector,
  security: securityDetector,
  dependencies: dependencyDetector,
  docker: dockerDetector,
  compose: composeDetector,
  git: gitDetector,
};

export type DetectionContext = Omit<DetectorContext, "timeoutSeconds" | "signal">;

export function resolveDetectors(names: readonly DetectorName[]): Detector[] {
  const enabled = new Set(names);
  return Object.values(DETECTORS).filter((detector) => enabled.has(detector.name));
}

interface Collected {
  findings: Finding[];
  results: DetectionResult[];
  missingTools: string[];
}

async function collect(detector: Detector, ctx: DetectorContext): Promise<Collected> {
  const findings: Finding[] = [];
  const results: DetectionResult[] = [];
  const missingTools: string[] = [];

  const run: CapabilityRunner = async (tool, args, options) => {
    const result = await ctx.run(tool, args, options);
    if (result.status === "unavailable" && !missingTools.includes(result.tool)) {
      missingTools.push(result.tool);
    }
    return result;
  };

  for (const output of await detector.detect({ ...ctx, run })) {
    if (isDetectionResult(output)) {
      results.push(output);
      if (output.found) {
        findings.push(...(detector.explain?.(output) ?? []));
      }
    } else {
      findings.push(output);
    }
  }

  return { findings, results, missingTools };
}

/**
 * Runs each detector once, one at a time, and concatenates their findings in
 * order. A detector that throws or overruns its budget contributes nothing and
 * the rest still run. Tools a detector found missing mark its run `unavailable`.
 */
export async function detectAll(
  ctx: DetectionContext,
  detectors: readonly Detector[] = resolveDetectors(ctx.config.detection.detectors)
): Promise<DetectionReport> {
  const report: DetectionReport = { findings: [], results: [], runs: [] };

  for (const detector of detectors) {
    const timeoutSeconds = ctx.config.detection.timeouts[detector.name] ?? detector.timeoutSeconds;
    const step = await runStep(`${detector.name} detector`, timeoutSeconds, (signal) =>
      collect(detector, { ...ctx, timeoutSeconds, signal })
    );

    switch (step.status) {
      case "ok": {
        const { findings, results, missingTools } = step.value;
        report.findings.push(...findings);
        report.results.push(...results);
        report.runs.push(
          missingTools.length === 0
            ? { detector: detector.name, status: "ok", findings: findings.length }
            : {
                detector: detector.name,
                status: "unavailable",
                findings: findings.length,
                message: `${missingTools.join(", ")} not available`,
              }
        );
        break;
      }
      case "timeout":
      case "failed":
        ctx.reporter.detectorDegraded(detector.name, step.message);
        report.runs.push({
          detector: detector.name,
          status: step.status,
          findings: 0,
          message: step.message,
        });
        break;
    }
  }

  return report;
}
