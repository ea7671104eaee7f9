/**
 * Planning Configuration
 *
 * One zod schema describes every tunable of the core. Defaults come from
 * `constants.ts`; environment variables (optionally read from a `.env` file)
 * and explicit overrides are layered on top, in that order.
 *
 * @example
 * ```typescript
 * const config = loadConfig({ discussion: { pollIntervalMs: 1000 } });
 * config.cycle.maxCycles; // 100 unless ROLLING_PLANNING_MAX_CYCLES is set
 * ```
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import {
  CYCLE_DEFAULTS,
  DISCUSSION_DEFAULTS,
  DISTRIBUTION_DEFAULTS,
  GEOMETRY_DEFAULTS,
  META_TASK_DEFAULTS,
  REPORTING_DEFAULTS,
} from "./constants.js";
import { CONFIG_ERROR_CODES, PlanningError } from "./errors.js";

// ============================================================================
// SCHEMA
// ============================================================================

export const GeometryConfigSchema = z.object({
  earthRadiusKm: z.number().positive().default(GEOMETRY_DEFAULTS.earthRadiusKm),
  visibilityThresholdKm: z.number().positive().default(GEOMETRY_DEFAULTS.visibilityThresholdKm),
  sampleIntervalSeconds: z.number().positive().default(GEOMETRY_DEFAULTS.sampleIntervalSeconds),
  gdopConditionLimit: z.number().positive().default(GEOMETRY_DEFAULTS.gdopConditionLimit),
});

export const DistributionConfigSchema = z.object({
  maxMatrixPairs: z.number().int().positive().default(DISTRIBUTION_DEFAULTS.maxMatrixPairs),
  concurrency: z.number().int().positive().default(DISTRIBUTION_DEFAULTS.concurrency),
});

export const DiscussionConfigSchema = z.object({
  pollIntervalMs: z.number().int().positive().default(DISCUSSION_DEFAULTS.pollIntervalMs),
  baseTimePerIterationMs: z.number().positive().default(DISCUSSION_DEFAULTS.baseTimePerIterationMs),
  maxIterations: z.number().int().positive().default(DISCUSSION_DEFAULTS.maxIterations),
  safetyMargin: z.number().positive().default(DISCUSSION_DEFAULTS.safetyMargin),
  absoluteCapMs: z.number().positive().default(DISCUSSION_DEFAULTS.absoluteCapMs),
  qualityThreshold: z.number().min(0).max(1).default(DISCUSSION_DEFAULTS.qualityThreshold),
  softTimeoutMs: z.number().positive().default(DISCUSSION_DEFAULTS.softTimeoutMs),
  softTimeoutMinIterations: z
    .number()
    .int()
    .nonnegative()
    .default(DISCUSSION_DEFAULTS.softTimeoutMinIterations),
  hardTimeoutMs: z.number().positive().default(DISCUSSION_DEFAULTS.hardTimeoutMs),
});

export const OverlapPolicySchema = z.enum(["skip", "force"]);

export const CycleConfigSchema = z.object({
  maxCycles: z.number().int().positive().default(CYCLE_DEFAULTS.maxCycles),
  /**
   * What a trigger does while a cycle is still in flight:
   * - skip: return nothing and leave the running cycle alone
   * - force: force the running cycle to completed, then start the new one
   */
  overlapPolicy: OverlapPolicySchema.default(CYCLE_DEFAULTS.overlapPolicy),
});

export const MetaTaskConfigSchema = z
  .object({
    enabled: z.boolean().default(META_TASK_DEFAULTS.enabled),
    windowSeconds: z.number().positive().default(META_TASK_DEFAULTS.windowSeconds),
    overlapSeconds: z.number().nonnegative().default(META_TASK_DEFAULTS.overlapSeconds),
    maxExtensionSeconds: z.number().positive().default(META_TASK_DEFAULTS.maxExtensionSeconds),
  })
  .refine((value) => value.overlapSeconds < value.windowSeconds, {
    message: "overlapSeconds must be smaller than windowSeconds",
    path: ["overlapSeconds"],
  });

export const ReportingConfigSchema = z.object({
  enabled: z.boolean().default(REPORTING_DEFAULTS.enabled),
  outputDir: z.string().min(1).default(REPORTING_DEFAULTS.outputDir),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
  console: z.boolean().default(true),
  file: z.string().min(1).optional(),
});

export const PlanningConfigSchema = z.object({
  geometry: GeometryConfigSchema.default({}),
  distribution: DistributionConfigSchema.default({}),
  discussion: DiscussionConfigSchema.default({}),
  cycle: CycleConfigSchema.default({}),
  metaTask: MetaTaskConfigSchema.default({}),
  reporting: ReportingConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type PlanningConfig = z.infer<typeof PlanningConfigSchema>;
export type PlanningConfigInput = z.input<typeof PlanningConfigSchema>;
export type DiscussionConfig = PlanningConfig["discussion"];
export type GeometryConfig = PlanningConfig["geometry"];
export type OverlapPolicy = z.infer<typeof OverlapPolicySchema>;

// ============================================================================
// ENVIRONMENT
// ============================================================================

const EnvSchema = z.object({
  ROLLING_PLANNING_MAX_CYCLES: z.coerce.number().int().positive().optional(),
  ROLLING_PLANNING_OVERLAP_POLICY: OverlapPolicySchema.optional(),
  ROLLING_PLANNING_POLL_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  ROLLING_PLANNING_MAX_WAIT_CAP_MS: z.coerce.number().positive().optional(),
  ROLLING_PLANNING_VISIBILITY_THRESHOLD_KM: z.coerce.number().positive().optional(),
  ROLLING_PLANNING_MAX_MATRIX_PAIRS: z.coerce.number().int().positive().optional(),
  ROLLING_PLANNING_OUTPUT_DIR: z.string().min(1).optional(),
  ROLLING_PLANNING_REPORTS: z.enum(["on", "off"]).optional(),
  ROLLING_PLANNING_LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error"]).optional(),
  ROLLING_PLANNING_LOG_FILE: z.string().min(1).optional(),
});

type Section = Record<string, unknown>;

function compact(values: Section): Section | undefined {
  const entries = Object.entries(values).filter(([, value]) => value !== undefined);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Read the `ROLLING_PLANNING_*` variables into a partial configuration
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, Section> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new PlanningError(
      CONFIG_ERROR_CODES.INVALID,
      `Invalid environment configuration: ${formatIssues(parsed.error)}`
    );
  }
  const vars = parsed.data;

  const sections: Record<string, Section | undefined> = {
    geometry: compact({ visibilityThresholdKm: vars.ROLLING_PLANNING_VISIBILITY_THRESHOLD_KM }),
    distribution: compact({ maxMatrixPairs: vars.ROLLING_PLANNING_MAX_MATRIX_PAIRS }),
    discussion: compact({
      pollIntervalMs: vars.ROLLING_PLANNING_POLL_INTERVAL_MS,
      absoluteCapMs: vars.ROLLING_PLANNING_MAX_WAIT_CAP_MS,
    }),
    cycle: compact({
      maxCycles: vars.ROLLING_PLANNING_MAX_CYCLES,
      overlapPolicy: vars.ROLLING_PLANNING_OVERLAP_POLICY,
    }),
    reporting: compact({
      outputDir: vars.ROLLING_PLANNING_OUTPUT_DIR,
      enabled:
        vars.ROLLING_PLANNING_REPORTS === undefined
          ? undefined
          : vars.ROLLING_PLANNING_REPORTS === "on",
    }),
    logging: compact({
      level: vars.ROLLING_PLANNING_LOG_LEVEL,
      file: vars.ROLLING_PLANNING_LOG_FILE,
    }),
  };

  const result: Record<string, Section> = {};
  for (const [name, section] of Object.entries(sections)) {
    if (section) result[name] = section;
  }
  return result;
}

/**
 * Merge partial configurations section by section; later inputs win
 */
export function mergeConfigInputs(...inputs: ReadonlyArray<object>): Record<string, Section> {
  const merged: Record<string, Section> = {};
  for (const input of inputs) {
    for (const [name, section] of Object.entries(input)) {
      if (section !== null && typeof section === "object") {
        merged[name] = { ...merged[name], ...section };
      }
    }
  }
  return merged;
}

/**
 * Validate a configuration object and fill in defaults
 */
export function parseConfig(input: unknown = {}): PlanningConfig {
  const parsed = PlanningConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new PlanningError(
      CONFIG_ERROR_CODES.INVALID,
      `Invalid planning configuration: ${formatIssues(parsed.error)}`
    );
  }
  return parsed.data;
}

/**
 * Build the configuration from the environment plus explicit overrides
 */
export function loadConfig(
  overrides: PlanningConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): PlanningConfig {
  return parseConfig(mergeConfigInputs(configFromEnv(env), overrides));
}

/**
 * Load a `.env` file into `process.env`, then build the configuration
 */
export function loadConfigFromEnvFile(
  path?: string,
  overrides: PlanningConfigInput = {}
): PlanningConfig {
  loadDotenv(path ? { path } : undefined);
  return loadConfig(overrides, process.env);
}

/**
 * Upper bound for one discussion phase:
 * min(baseTimePerIteration × maxIterations × safetyMargin, absoluteCap)
 */
export function computeMaxWaitMs(
  discussion: Pick<
    DiscussionConfig,
    "baseTimePerIterationMs" | "maxIterations" | "safetyMargin" | "absoluteCapMs"
  >
): number {
  const estimated =
    discussion.baseTimePerIterationMs * discussion.maxIterations * discussion.safetyMargin;
  return Math.min(estimated, discussion.absoluteCapMs);
}
