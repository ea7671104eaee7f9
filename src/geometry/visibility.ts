/**
 * Visibility windows and distance confidence.
 *
 * A window is a contiguous run of trajectory samples whose distance to the
 * platform stays within the threshold.
 */

import {
  CONFIDENCE_FULL_COVERAGE_WINDOWS,
  CONFIDENCE_VARIANCE_SCALE,
  GEOMETRY_DEFAULTS,
} from "../core/constants.js";
import type { GeoPosition, TrajectorySample, VisibilityWindow } from "../types/index.js";
import { sphericalDistance } from "./spherical.js";

/**
 * Platform position for a given sample (usually constant within a cycle)
 */
export type PlatformPositionFn = (sample: TrajectorySample, index: number) => GeoPosition;

export interface VisibilityScanOptions {
  thresholdKm?: number;
  sampleIntervalSeconds?: number;
  earthRadiusKm?: number;
}

/**
 * Restartable sequence of visibility windows, in trajectory order.
 * Every iteration rescans the trajectory from the start.
 */
export class VisibilityScan implements Iterable<VisibilityWindow> {
  private readonly thresholdKm: number;
  private readonly sampleIntervalSeconds: number;
  private readonly earthRadiusKm: number;

  constructor(
    private readonly trajectory: readonly TrajectorySample[],
    private readonly positionFn: PlatformPositionFn,
    options: VisibilityScanOptions = {}
  ) {
    this.thresholdKm = options.thresholdKm ?? GEOMETRY_DEFAULTS.visibilityThresholdKm;
    this.sampleIntervalSeconds =
      options.sampleIntervalSeconds ?? GEOMETRY_DEFAULTS.sampleIntervalSeconds;
    this.earthRadiusKm = options.earthRadiusKm ?? GEOMETRY_DEFAULTS.earthRadiusKm;
  }

  *[Symbol.iterator](): Iterator<VisibilityWindow> {
    let start: number | undefined;
    let runMin = Number.POSITIVE_INFINITY;

    for (let i = 0; i < this.trajectory.length; i++) {
      const sample = this.trajectory[i];
      const distance = sphericalDistance(
        sample.position,
        this.positionFn(sample, i),
        this.earthRadiusKm
      );

      if (distance <= this.thresholdKm) {
        if (start === undefined) {
          start = i;
          runMin = distance;
        } else {
          runMin = Math.min(runMin, distance);
        }
      } else if (start !== undefined) {
        yield this.closeWindow(start, i - 1, runMin);
        start = undefined;
      }
    }

    if (start !== undefined) {
      yield this.closeWindow(start, this.trajectory.length - 1, runMin);
    }
  }

  private closeWindow(startIndex: number, endIndex: number, minDistanceKm: number): VisibilityWindow {
    return {
      startIndex,
      endIndex,
      durationSeconds: (endIndex - startIndex + 1) * this.sampleIntervalSeconds,
      minDistanceKm,
      startTime: this.trajectory[startIndex].time,
      endTime: this.trajectory[endIndex].time,
    };
  }
}

/**
 * Collect every visibility window of a trajectory
 */
export function visibilityWindows(
  trajectory: readonly TrajectorySample[],
  positionFn: PlatformPositionFn,
  thresholdKm: number = GEOMETRY_DEFAULTS.visibilityThresholdKm,
  options: Omit<VisibilityScanOptions, "thresholdKm"> = {}
): VisibilityWindow[] {
  return [...new VisibilityScan(trajectory, positionFn, { ...options, thresholdKm })];
}

/**
 * Population variance; NaN for an empty list
 */
export function variance(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  return values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
}

/**
 * Confidence of a distance estimate in [0, 1]: the mean of a stability term
 * `max(0, 1 − variance/1e6)` and a coverage term `min(1, windows/3)`.
 *
 * Empty input gives 0. Any non-finite distance zeroes the stability term.
 */
export function distanceConfidence(
  distances: readonly number[],
  windows: readonly unknown[] | number
): number {
  if (distances.length === 0) return 0;

  const windowCount = typeof windows === "number" ? windows : windows.length;
  const allFinite = distances.every((d) => Number.isFinite(d));
  const stability = allFinite
    ? Math.max(0, 1 - variance(distances) / CONFIDENCE_VARIANCE_SCALE)
    : 0;
  const coverage = Math.min(1, Math.max(0, windowCount) / CONFIDENCE_FULL_COVERAGE_WINDOWS);

  const confidence = (stability + coverage) / 2;
  if (!Number.isFinite(confidence)) return 0;
  return Math.max(0, Math.min(1, confidence));
}
