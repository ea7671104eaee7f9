/**
 * Planning Constants
 *
 * Default policy values and limits for the planning core. The configuration
 * schema takes its defaults from here, so this is the single source of truth.
 *
 * @module rolling-planning-core/core
 *
 * @example
 * ```typescript
 * import { GEOMETRY_DEFAULTS, DISCUSSION_DEFAULTS } from 'rolling-planning-core';
 *
 * console.log(GEOMETRY_DEFAULTS.earthRadiusKm); // 6371
 * console.log(DISCUSSION_DEFAULTS.pollIntervalMs); // 5000
 * ```
 */

// ============================================================================
// GEOMETRY
// ============================================================================

export const GEOMETRY_DEFAULTS = {
  /** Mean earth radius used by the haversine distance */
  earthRadiusKm: 6371,
  /** A trajectory sample is visible from a platform within this distance */
  visibilityThresholdKm: 2000,
  /** Assumed spacing of trajectory samples when sizing visibility windows */
  sampleIntervalSeconds: 10,
  /** Above this condition number the normal matrix is pseudo-inverted */
  gdopConditionLimit: 1e12,
} as const;

/** Variance (km²) at which the stability term of the confidence reaches zero */
export const CONFIDENCE_VARIANCE_SCALE = 1_000_000;

/** Visibility windows needed for full coverage credit */
export const CONFIDENCE_FULL_COVERAGE_WINDOWS = 3;

/** Minimum platforms for a position fix */
export const GDOP_MIN_PLATFORMS = 4;

/** Relative eigenvalue cutoff of the pseudo-inverse */
export const PINV_RCOND = 1e-12;

// ============================================================================
// DISTRIBUTION
// ============================================================================

export const DISTRIBUTION_DEFAULTS = {
  /** Largest number of (target, platform) pairs computed in one shard */
  maxMatrixPairs: 10_000,
  /** Pairs computed concurrently inside a shard */
  concurrency: 64,
} as const;

/** Low confidence inflates the distance up to this factor */
export const CONFIDENCE_PENALTY_BASE = 2;

// ============================================================================
// DISCUSSION MONITOR
// ============================================================================

export const DISCUSSION_DEFAULTS = {
  pollIntervalMs: 5_000,
  baseTimePerIterationMs: 60_000,
  maxIterations: 5,
  safetyMargin: 1.5,
  absoluteCapMs: 600_000,
  qualityThreshold: 0.85,
  softTimeoutMs: 600_000,
  softTimeoutMinIterations: 3,
  hardTimeoutMs: 900_000,
} as const;

// ============================================================================
// CYCLE
// ============================================================================

export const CYCLE_DEFAULTS = {
  maxCycles: 100,
  overlapPolicy: "skip",
} as const;

export const META_TASK_DEFAULTS = {
  enabled: true,
  windowSeconds: 300,
  overlapSeconds: 0,
  maxExtensionSeconds: 1800,
} as const;

export const REPORTING_DEFAULTS = {
  enabled: true,
  outputDir: "./output/planning",
} as const;
