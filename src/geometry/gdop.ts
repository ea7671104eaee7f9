/**
 * Geometric dilution of precision
 *
 * The design matrix has one row per platform: the unit line-of-sight vector
 * from the observer to the platform plus a clock column of 1. The weight
 * matrix is `Q = (AᵀA)⁻¹` and every DOP is a partial sum of its diagonal.
 *
 * Failures come back as `{ success: false }` results; nothing here throws.
 */

import { GDOP_MIN_PLATFORMS, GEOMETRY_DEFAULTS, PINV_RCOND } from "../core/constants.js";
import { GEOMETRY_ERROR_CODES } from "../core/errors.js";
import type { CartesianPosition } from "../types/index.js";
import {
  conditionNumberSymmetric,
  invert,
  multiply,
  pseudoInverseSymmetric,
  transpose,
  type Matrix,
} from "./matrix.js";

/** Platforms closer than this to the observer are left out of the fix */
const COINCIDENT_KM = 1e-6;

export type GeometryQuality = "excellent" | "good" | "fair" | "poor" | "bad";

export type GeometryErrorCode = (typeof GEOMETRY_ERROR_CODES)[keyof typeof GEOMETRY_ERROR_CODES];

export interface GdopSuccess {
  success: true;
  gdop: number;
  pdop: number;
  hdop: number;
  vdop: number;
  tdop: number;
  quality: GeometryQuality;
  platformCount: number;
  /** Rows that made it into the design matrix */
  usedPlatformCount: number;
  conditionNumber: number;
  usedPseudoInverse: boolean;
}

export interface GdopFailure {
  success: false;
  code: GeometryErrorCode;
  error: string;
  platformCount: number;
}

export type GdopResult = GdopSuccess | GdopFailure;

export interface GdopOptions {
  /** Condition number above which `AᵀA` is pseudo-inverted */
  conditionLimit?: number;
}

function failure(code: GeometryErrorCode, error: string, platformCount: number): GdopFailure {
  return { success: false, code, error, platformCount };
}

function isFiniteCartesian(p: CartesianPosition): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y) && Number.isFinite(p.z);
}

// ============================================================================
// MATRICES
// ============================================================================

/**
 * Rows `[ux, uy, uz, 1]`; platforms coincident with the observer are skipped
 */
export function buildDesignMatrix(
  platforms: readonly CartesianPosition[],
  observer: CartesianPosition
): Matrix {
  const rows: Matrix = [];
  for (const platform of platforms) {
    const dx = platform.x - observer.x;
    const dy = platform.y - observer.y;
    const dz = platform.z - observer.z;
    const range = Math.sqrt(dx * dx + dy * dy + dz * dz);
    if (!(range >= COINCIDENT_KM)) continue;
    rows.push([dx / range, dy / range, dz / range, 1]);
  }
  return rows;
}

export interface WeightMatrix {
  q: Matrix;
  conditionNumber: number;
  usedPseudoInverse: boolean;
}

/**
 * `Q = (AᵀA)⁻¹`, falling back to the pseudo-inverse when the normal matrix
 * is ill-conditioned or the direct inversion fails
 */
export function computeWeightMatrix(
  design: Matrix,
  conditionLimit: number = GEOMETRY_DEFAULTS.gdopConditionLimit
): WeightMatrix {
  const normal = multiply(transpose(design), design);
  const conditionNumber = conditionNumberSymmetric(normal);

  if (conditionNumber <= conditionLimit) {
    const q = invert(normal);
    if (q) return { q, conditionNumber, usedPseudoInverse: false };
  }

  return {
    q: pseudoInverseSymmetric(normal, PINV_RCOND),
    conditionNumber,
    usedPseudoInverse: true,
  };
}

// ============================================================================
// DILUTION OF PRECISION
// ============================================================================

function diagonal(q: Matrix): [number, number, number, number] {
  return [q[0][0], q[1][1], q[2][2], q[3][3]];
}

function rootOf(sum: number): number {
  return Number.isFinite(sum) && sum >= 0 ? Math.sqrt(sum) : Number.POSITIVE_INFINITY;
}

export function gdopFromWeights(q: Matrix): number {
  const [q11, q22, q33, q44] = diagonal(q);
  return rootOf(q11 + q22 + q33 + q44);
}

export function pdopFromWeights(q: Matrix): number {
  const [q11, q22, q33] = diagonal(q);
  return rootOf(q11 + q22 + q33);
}

/** Horizontal taken as the x/y plane of the frame */
export function hdopFromWeights(q: Matrix): number {
  const [q11, q22] = diagonal(q);
  return rootOf(q11 + q22);
}

export function vdopFromWeights(q: Matrix): number {
  return rootOf(q[2][2]);
}

export function tdopFromWeights(q: Matrix): number {
  return rootOf(q[3][3]);
}

export function classifyGeometry(gdop: number): GeometryQuality {
  if (gdop <= 1) return "excellent";
  if (gdop <= 2) return "good";
  if (gdop <= 5) return "fair";
  if (gdop <= 10) return "poor";
  return "bad";
}

export function computeGdop(
  platforms: readonly CartesianPosition[],
  observer: CartesianPosition,
  options: GdopOptions = {}
): GdopResult {
  const platformCount = platforms.length;

  if (platformCount < GDOP_MIN_PLATFORMS) {
    return failure(
      GEOMETRY_ERROR_CODES.INSUFFICIENT_PLATFORMS,
      `At least ${GDOP_MIN_PLATFORMS} platforms are required, got ${platformCount}`,
      platformCount
    );
  }
  if (!isFiniteCartesian(observer) || !platforms.every(isFiniteCartesian)) {
    return failure(
      GEOMETRY_ERROR_CODES.INVALID_POSITION,
      "Platform and observer positions must be finite",
      platformCount
    );
  }

  const design = buildDesignMatrix(platforms, observer);
  if (design.length < GDOP_MIN_PLATFORMS) {
    return failure(
      GEOMETRY_ERROR_CODES.INSUFFICIENT_PLATFORMS,
      `Only ${design.length} platforms are separated from the observer`,
      platformCount
    );
  }

  const { q, conditionNumber, usedPseudoInverse } = computeWeightMatrix(
    design,
    options.conditionLimit
  );

  const weights = diagonal(q);
  if (weights.some((w) => !Number.isFinite(w) || w < 0)) {
    return failure(
      GEOMETRY_ERROR_CODES.INVALID_WEIGHTS,
      `Weight matrix diagonal is not usable: ${weights.map((w) => w.toPrecision(4)).join(", ")}`,
      platformCount
    );
  }

  const gdop = gdopFromWeights(q);
  if (!Number.isFinite(gdop)) {
    return failure(GEOMETRY_ERROR_CODES.SINGULAR_MATRIX, "GDOP is not finite", platformCount);
  }

  return {
    success: true,
    gdop,
    pdop: pdopFromWeights(q),
    hdop: hdopFromWeights(q),
    vdop: vdopFromWeights(q),
    tdop: tdopFromWeights(q),
    quality: classifyGeometry(gdop),
    platformCount,
    usedPlatformCount: design.length,
    conditionNumber,
    usedPseudoInverse,
  };
}

// ============================================================================
// DISTRIBUTION METRICS
// ============================================================================

export type GeometryMetrics =
  | {
      success: true;
      /** Pairwise angles between lines of sight, degrees */
      separationAngles: number[];
      elevationAngles: number[];
      /** In [0, 360) */
      azimuthAngles: number[];
      uniformityScore: number;
      minElevation: number;
      maxElevation: number;
      elevationSpread: number;
    }
  | { success: false; code: GeometryErrorCode; error: string };

function lineOfSight(p: CartesianPosition, o: CartesianPosition): [number, number, number] {
  return [p.x - o.x, p.y - o.y, p.z - o.z];
}

function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  return Math.sqrt(values.reduce((s, v) => s + (v - mean) ** 2, 0) / values.length);
}

/**
 * Angular spread of the platforms as seen from the observer. Elevation is
 * measured against the frame's x/y plane.
 */
export function geometryMetrics(
  platforms: readonly CartesianPosition[],
  observer: CartesianPosition
): GeometryMetrics {
  if (platforms.length < GDOP_MIN_PLATFORMS) {
    return {
      success: false,
      code: GEOMETRY_ERROR_CODES.INSUFFICIENT_PLATFORMS,
      error: `At least ${GDOP_MIN_PLATFORMS} platforms are required, got ${platforms.length}`,
    };
  }

  const vectors = platforms.map((p) => lineOfSight(p, observer));

  const separationAngles: number[] = [];
  for (let i = 0; i < vectors.length; i++) {
    for (let j = i + 1; j < vectors.length; j++) {
      const [ax, ay, az] = vectors[i];
      const [bx, by, bz] = vectors[j];
      const norms = Math.hypot(ax, ay, az) * Math.hypot(bx, by, bz);
      const cos = norms > 0 ? (ax * bx + ay * by + az * bz) / norms : 1;
      separationAngles.push((Math.acos(Math.max(-1, Math.min(1, cos))) * 180) / Math.PI);
    }
  }

  const elevationAngles = vectors.map(
    ([dx, dy, dz]) => (Math.atan2(dz, Math.hypot(dx, dy)) * 180) / Math.PI
  );
  const azimuthAngles = vectors.map(([dx, dy]) => {
    const azimuth = (Math.atan2(dy, dx) * 180) / Math.PI;
    return azimuth < 0 ? azimuth + 360 : azimuth;
  });

  const minElevation = Math.min(...elevationAngles);
  const maxElevation = Math.max(...elevationAngles);
  const elevationSpread = maxElevation - minElevation;

  const azimuthUniformity = Math.max(0, 1 - standardDeviation(azimuthAngles) / 180);
  const elevationUniformity = Math.min(1, elevationSpread / 90);

  return {
    success: true,
    separationAngles,
    elevationAngles,
    azimuthAngles,
    uniformityScore: (azimuthUniformity + elevationUniformity) / 2,
    minElevation,
    maxElevation,
    elevationSpread,
  };
}
