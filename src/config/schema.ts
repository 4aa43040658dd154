import { z } from "zod";

export const DETECTOR_NAMES = [
  "formatting",
  "lint",
  "security",
  "dependencies",
  "docker",
  "compose",
  "git",
] as const;

export const FIXER_NAMES = [
  "formatting",
  "dependency",
  "container",
  "config",
  "security-triage",
] as const;

export const VALIDATOR_NAMES = ["python", "javascript", "docker-build", "compose"] as const;

export const DetectorNameSchema = z.enum(DETECTOR_NAMES);
export const FixerNameSchema = z.enum(FIXER_NAMES);
export const ValidatorNameSchema = z.enum(VALIDATOR_NAMES);

export type DetectorName = z.infer<typeof DetectorNameSchema>;
export type FixerName = z.infer<typeof FixerNameSchema>;
export type ValidatorName = z.infer<typeof ValidatorNameSchema>;

export const DEFAULT_DOCKERIGNORE_ENTRIES = [
  ".git",
  ".gitignore",
  ".dockerignore",
  ".env",
  "node_modules",
  "__pycache__",
  ".pytest_cache",
  ".venv",
  "build",
  "dist",
  "*.egg-info",
  ".vscode",
  ".idea",
];

const Seconds = z.number().int().positive();

// Per-detector overrides of the built-in budgets.
export const DetectorTimeoutsSchema = z
  .object({
    formatting: Seconds.optional(),
    lint: Seconds.optional(),
    security: Seconds.optional(),
    dependencies: Seconds.optional(),
    docker: Seconds.optional(),
    compose: Seconds.optional(),
    git: Seconds.optional(),
  })
  .strict();

export const DetectionConfigSchema = z.object({
  detectors: z.array(DetectorNameSchema).default([...DETECTOR_NAMES]),
  lintMaxFiles: z.number().int().positive().max(1000).default(10),
  timeouts: DetectorTimeoutsSchema.default({}),
});

export const FixingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  fixers: z.array(FixerNameSchema).default([...FIXER_NAMES]),
  timeoutSeconds: Seconds.default(120),
});

export const ValidationConfigSchema = z.object({
  validators: z.array(ValidatorNameSchema).default([...VALIDATOR_NAMES]),
  timeoutSeconds: Seconds.default(180),
});

export const HealthcheckSchema = z.object({
  test: z.array(z.string()).min(1),
  interval: z.string().default("30s"),
  timeout: z.string().default("10s"),
  retries: z.number().int().positive().default(3),
  start_period: z.string().default("40s"),
});

export const DockerConfigSchema = z.object({
  ignoreEntries: z.array(z.string().min(1)).min(1).default([...DEFAULT_DOCKERIGNORE_ENTRIES]),
  healthcheck: HealthcheckSchema.default({
    test: ["CMD-SHELL", "curl -f http://localhost/ || exit 1"],
    interval: "30s",
    timeout: "10s",
    retries: 3,
    start_period: "40s",
  }),
});

export const AutoremedyConfigSchema = z
  .object({
    workspace: z.string().default("."),
    ignorePatterns: z
      .array(z.string())
      .default([
        "**/node_modules/**",
        "**/.git/**",
        "**/.venv/**",
        "**/venv/**",
        "**/dist/**",
        "**/build/**",
      ]),
    detection: DetectionConfigSchema.default({
      detectors: [...DETECTOR_NAMES],
      lintMaxFiles: 10,
      timeouts: {},
    }),
    fixing: FixingConfigSchema.default({
      enabled: true,
      fixers: [...FIXER_NAMES],
      timeoutSeconds: 120,
    }),
    validation: ValidationConfigSchema.default({
      validators: [...VALIDATOR_NAMES],
      timeoutSeconds: 180,
    }),
    docker: DockerConfigSchema.default({
      ignoreEntries: [...DEFAULT_DOCKERIGNORE_ENTRIES],
      healthcheck: {
        test: ["CMD-SHELL", "curl -f http://localhost/ || exit 1"],
        interval: "30s",
        timeout: "10s",
        retries: 3,
        start_period: "40s",
      },
    }),
  })
  .strict();

export type AutoremedyConfig = z.infer<typeof AutoremedyConfigSchema>;
export type DetectionConfig = z.infer<typeof DetectionConfigSchema>;
export type FixingConfig = z.infer<typeof FixingConfigSchema>;
export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;
export type DockerConfig = z.infer<typeof DockerConfigSchema>;
export type HealthcheckConfig = z.infer<typeof HealthcheckSchema>;
