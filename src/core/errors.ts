/**
 * Standardized Error Codes
 *
 * Centralized error codes for consistent error handling across the
 * planning core. Each error code has a unique identifier and category.
 *
 * Categories:
 * - GEOMETRY_*: Numeric primitive failures (reported as sentinel results)
 * - DISTRIBUTION_*: Matrix construction, assignment and dispatch
 * - DISCUSSION_*: Session polling and reaping
 * - CYCLE_*: Planning cycle state machine
 * - CONFIG_*: Configuration validation
 * - REPORT_*: Report sink failures
 */

/**
 * Geometry error codes
 */
export const GEOMETRY_ERROR_CODES = {
  INVALID_POSITION: "GEOMETRY_INVALID_POSITION",
  INSUFFICIENT_PLATFORMS: "GEOMETRY_INSUFFICIENT_PLATFORMS",
  SINGULAR_MATRIX: "GEOMETRY_SINGULAR_MATRIX",
  INVALID_WEIGHTS: "GEOMETRY_INVALID_WEIGHTS",
} as const;

/**
 * Distribution error codes
 */
export const DISTRIBUTION_ERROR_CODES = {
  DISTANCE_FAILED: "DISTRIBUTION_DISTANCE_FAILED",
  NO_ASSIGNABLE_TARGET: "DISTRIBUTION_NO_ASSIGNABLE_TARGET",
  DISPATCH_FAILED: "DISTRIBUTION_DISPATCH_FAILED",
  POSITION_UNAVAILABLE: "DISTRIBUTION_POSITION_UNAVAILABLE",
} as const;

/**
 * Discussion monitor error codes
 */
export const DISCUSSION_ERROR_CODES = {
  PROGRESS_UNAVAILABLE: "DISCUSSION_PROGRESS_UNAVAILABLE",
  DISSOLVE_FAILED: "DISCUSSION_DISSOLVE_FAILED",
  FORCE_CLEAN_FAILED: "DISCUSSION_FORCE_CLEAN_FAILED",
  UNKNOWN_SESSION: "DISCUSSION_UNKNOWN_SESSION",
} as const;

/**
 * Planning cycle error codes
 */
export const CYCLE_ERROR_CODES = {
  NO_PLATFORMS_REGISTERED: "CYCLE_NO_PLATFORMS_REGISTERED",
  INVALID_TRANSITION: "CYCLE_INVALID_TRANSITION",
  PHASE_FAILED: "CYCLE_PHASE_FAILED",
} as const;

/**
 * Configuration error codes
 */
export const CONFIG_ERROR_CODES = {
  INVALID: "CONFIG_INVALID",
} as const;

/**
 * Report sink error codes
 */
export const REPORT_ERROR_CODES = {
  NO_SESSION: "REPORT_NO_SESSION",
  WRITE_FAILED: "REPORT_WRITE_FAILED",
} as const;

/**
 * All error codes combined
 */
export const ERROR_CODES = {
  ...GEOMETRY_ERROR_CODES,
  ...DISTRIBUTION_ERROR_CODES,
  ...DISCUSSION_ERROR_CODES,
  ...CYCLE_ERROR_CODES,
  ...CONFIG_ERROR_CODES,
  ...REPORT_ERROR_CODES,
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export type ErrorCategory =
  | "geometry"
  | "distribution"
  | "discussion"
  | "cycle"
  | "config"
  | "report";

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  if (code.startsWith("GEOMETRY_")) return "geometry";
  if (code.startsWith("DISTRIBUTION_")) return "distribution";
  if (code.startsWith("DISCUSSION_")) return "discussion";
  if (code.startsWith("CYCLE_")) return "cycle";
  if (code.startsWith("CONFIG_")) return "config";
  return "report";
}

/**
 * Error raised inside the planning core. Phase boundaries convert these
 * into an error-state cycle or a logged, skipped unit of work.
 */
export class PlanningError extends Error {
  readonly code: ErrorCode;
  readonly recoverable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    options: { recoverable?: boolean; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "PlanningError";
    this.code = code;
    this.recoverable = options.recoverable ?? false;
  }
}

export function isPlanningError(error: unknown): error is PlanningError {
  return error instanceof PlanningError;
}

/**
 * Normalize anything thrown into a message string
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
