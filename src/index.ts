// Config
export * from "./config/schema.js";
export { loadConfig, type ConfigLoaderOptions } from "./config/loader.js";

// Core Types
export * from "./core/types/index.js";
export {
  createFinding,
  FindingInvariantError,
  groupByCategory,
  sortBySeverity,
  type FindingInput,
} from "./core/findings/finding.js";

// Capabilities
export {
  runCapability,
  type CapabilityResult,
  type CapabilityRunner,
  type CapabilityOptions,
} from "./core/capability.js";
export { runStep, type StepResult } from "./core/step.js";
export { ExecError, TimeoutError, ToolMissingError } from "./core/exec.js";

// Pipeline
export { DETECTORS, detectAll, type DetectionContext } from "./core/detectors/registry.js";
export type { Detector, DetectorContext } from "./core/detectors/types.js";
export { FIXERS, CATEGORY_FIXERS, applyFixes, type FixingContext } from "./core/fixers/registry.js";
export type { Fixer, FixContext } from "./core/fixers/types.js";
export { VALIDATORS, ValidationChain, type ValidationContext } from "./core/validators/chain.js";
export type { Validator, ValidatorContext } from "./core/validators/types.js";
export {
  Orchestrator,
  OrchestratorStateError,
  type OrchestratorOptions,
  type OrchestratorState,
  type RunReport,
} from "./core/orchestrator/orchestrator.js";
export type { Reporter } from "./core/orchestrator/reporter.js";
export { ConsoleReporter } from "./core/orchestrator/console-reporter.js";

// Utils
export { logger } from "./utils/logger.js";
export * from "./utils/fs.js";
