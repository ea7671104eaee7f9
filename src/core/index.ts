/**
 * Core services shared by every planning module: configuration, clock,
 * error codes and logging.
 *
 * @module rolling-planning-core/core
 */

// ============================================================================
// CONFIGURATION
// ============================================================================

export {
  PlanningConfigSchema,
  GeometryConfigSchema,
  DistributionConfigSchema,
  DiscussionConfigSchema,
  CycleConfigSchema,
  MetaTaskConfigSchema,
  ReportingConfigSchema,
  LoggingConfigSchema,
  OverlapPolicySchema,
  parseConfig,
  loadConfig,
  loadConfigFromEnvFile,
  configFromEnv,
  mergeConfigInputs,
  computeMaxWaitMs,
  type PlanningConfig,
  type PlanningConfigInput,
  type DiscussionConfig,
  type GeometryConfig,
  type OverlapPolicy,
} from "./config.js";

export {
  GEOMETRY_DEFAULTS,
  DISTRIBUTION_DEFAULTS,
  DISCUSSION_DEFAULTS,
  CYCLE_DEFAULTS,
  META_TASK_DEFAULTS,
  REPORTING_DEFAULTS,
  CONFIDENCE_VARIANCE_SCALE,
  CONFIDENCE_FULL_COVERAGE_WINDOWS,
  CONFIDENCE_PENALTY_BASE,
  GDOP_MIN_PLATFORMS,
  PINV_RCOND,
} from "./constants.js";

// ============================================================================
// TIME
// ============================================================================

export { systemClock, ManualClock, type Clock } from "./clock.js";

// ============================================================================
// ERRORS
// ============================================================================

export {
  GEOMETRY_ERROR_CODES,
  DISTRIBUTION_ERROR_CODES,
  DISCUSSION_ERROR_CODES,
  CYCLE_ERROR_CODES,
  CONFIG_ERROR_CODES,
  REPORT_ERROR_CODES,
  ERROR_CODES,
  PlanningError,
  isPlanningError,
  toErrorMessage,
  getErrorCategory,
  type ErrorCode,
  type ErrorCategory,
} from "./errors.js";

// ============================================================================
// LOGGING
// ============================================================================

export {
  BaseLogReporter,
  ConsoleLogReporter,
  FileLogReporter,
  MemoryLogReporter,
  MultiLogReporter,
  NullLogReporter,
  createLogReporter,
  LEVEL_PRIORITY,
  type LogLevel,
  type LogEntryType,
  type LogEntry,
  type LogReporter,
  type ConsoleLogReporterOptions,
  type FileLogReporterOptions,
} from "./log-reporter.js";
