/**
 * Distance-Based Task Distributor
 *
 * Builds the target × platform distance matrix, gives each target to the
 * platform with the lowest confidence-weighted distance and sends the
 * resulting tracking tasks. Dispatch is best effort: a platform that rejects
 * its task is logged and skipped.
 *
 * @example
 * ```typescript
 * const distributor = new TaskDistributor({
 *   calculator: new GeometricDistanceCalculator(oracle),
 *   logger,
 * });
 * const { assignment, unassigned } = await distributor.distribute(targets, platforms);
 * ```
 */

import { systemClock, type Clock } from "../core/clock.js";
import {
  CONFIDENCE_PENALTY_BASE,
  DISTRIBUTION_DEFAULTS,
  GEOMETRY_DEFAULTS,
} from "../core/constants.js";
import { DISTRIBUTION_ERROR_CODES, toErrorMessage } from "../core/errors.js";
import { NullLogReporter, type LogReporter } from "../core/log-reporter.js";
import { sphericalDistance } from "../geometry/spherical.js";
import { distanceConfidence, visibilityWindows } from "../geometry/visibility.js";
import type { PlanningHooks } from "../hooks/manager.js";
import {
  assignmentToRecord,
  flightEndTime,
  type Assignment,
  type DistanceMatrix,
  type DistanceResult,
  type PlatformHandle,
  type PositionOracle,
  type Target,
  type TrackingTask,
} from "../types/index.js";

// ============================================================================
// DISTANCE CALCULATION
// ============================================================================

export interface DistanceCalculator {
  compute(target: Target, platformId: string, time: number): Promise<DistanceResult>;
}

export interface GeometricDistanceOptions {
  thresholdKm?: number;
  sampleIntervalSeconds?: number;
  earthRadiusKm?: number;
}

/**
 * Result for a pair that cannot be measured
 */
export function unreachableResult(target: Target, platformId: string): DistanceResult {
  return Object.freeze({
    targetId: target.id,
    platformId,
    minDistanceKm: Number.POSITIVE_INFINITY,
    avgDistanceKm: Number.POSITIVE_INFINITY,
    closestApproachTime: target.launchTime,
    visibilityWindows: Object.freeze([]),
    confidence: 0,
  });
}

/**
 * Distances from every trajectory sample to the platform's position at
 * `time`, as reported by the oracle
 */
export class GeometricDistanceCalculator implements DistanceCalculator {
  constructor(
    private readonly oracle: PositionOracle,
    private readonly options: GeometricDistanceOptions = {}
  ) {}

  async compute(target: Target, platformId: string, time: number): Promise<DistanceResult> {
    const position = await this.oracle.positionAt(platformId, time);
    if (!position || target.trajectory.length === 0) {
      return unreachableResult(target, platformId);
    }

    const earthRadiusKm = this.options.earthRadiusKm ?? GEOMETRY_DEFAULTS.earthRadiusKm;
    const distances = target.trajectory.map((sample) =>
      sphericalDistance(sample.position, position, earthRadiusKm)
    );

    let closest = 0;
    for (let i = 1; i < distances.length; i++) {
      if (distances[i] < distances[closest]) closest = i;
    }

    const windows = visibilityWindows(
      target.trajectory,
      () => position,
      this.options.thresholdKm ?? GEOMETRY_DEFAULTS.visibilityThresholdKm,
      { sampleIntervalSeconds: this.options.sampleIntervalSeconds, earthRadiusKm }
    );

    return Object.freeze({
      targetId: target.id,
      platformId,
      minDistanceKm: distances[closest],
      avgDistanceKm: distances.reduce((sum, d) => sum + d, 0) / distances.length,
      closestApproachTime: target.trajectory[closest].time,
      visibilityWindows: Object.freeze(windows.map((w) => Object.freeze(w))),
      confidence: distanceConfidence(distances, windows),
    });
  }
}

/**
 * `minDistance × (2 − confidence)`: low confidence makes a platform look
 * up to twice as far away
 */
export function weightedScore(result: Pick<DistanceResult, "minDistanceKm" | "confidence">): number {
  if (!Number.isFinite(result.minDistanceKm)) return Number.POSITIVE_INFINITY;
  return result.minDistanceKm * (CONFIDENCE_PENALTY_BASE - result.confidence);
}

// ============================================================================
// DISTRIBUTOR
// ============================================================================

export interface TaskDistributorOptions {
  calculator: DistanceCalculator;
  clock?: Clock;
  logger?: LogReporter;
  hooks?: PlanningHooks;
  /** Pairs per matrix shard */
  maxMatrixPairs?: number;
  /** Pairs computed at once inside a shard */
  concurrency?: number;
}

export interface DistributeOptions {
  /** Simulation time for platform positions; defaults to the clock */
  time?: number;
  cycleNumber?: number;
}

export interface DispatchFailure {
  platformId: string;
  targetId: string;
  taskId: string;
  message: string;
}

export interface DistributionOutcome {
  assignment: Assignment;
  matrix: DistanceMatrix;
  /** Targets without any viable platform */
  unassigned: string[];
  dispatched: TrackingTask[];
  dispatchFailures: DispatchFailure[];
}

export class TaskDistributor {
  private readonly calculator: DistanceCalculator;
  private readonly clock: Clock;
  private readonly logger: LogReporter;
  private readonly hooks?: PlanningHooks;
  private readonly maxMatrixPairs: number;
  private readonly concurrency: number;

  constructor(options: TaskDistributorOptions) {
    this.calculator = options.calculator;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new NullLogReporter();
    this.hooks = options.hooks;
    this.maxMatrixPairs = options.maxMatrixPairs ?? DISTRIBUTION_DEFAULTS.maxMatrixPairs;
    this.concurrency = options.concurrency ?? DISTRIBUTION_DEFAULTS.concurrency;
  }

  async distribute(
    targets: readonly Target[],
    platforms: readonly PlatformHandle[],
    options: DistributeOptions = {}
  ): Promise<DistributionOutcome> {
    if (targets.length === 0 || platforms.length === 0) {
      this.logger.warn(
        "distribution",
        targets.length === 0 ? "No targets to distribute" : "No platforms to distribute to"
      );
      return {
        assignment: new Map(),
        matrix: new Map(),
        unassigned: targets.map((t) => t.id),
        dispatched: [],
        dispatchFailures: [],
      };
    }

    const time = options.time ?? this.clock.now();
    const platformIds = platforms.map((p) => p.id);
    const matrix = await this.buildMatrix(targets, platformIds, time);
    const { assignment, unassigned } = this.assign(targets, matrix);
    const { dispatched, failures } = await this.dispatch(
      assignment,
      targets,
      platforms,
      options.cycleNumber
    );

    this.logSummary(targets.length, assignment, unassigned);

    return { assignment, matrix, unassigned, dispatched, dispatchFailures: failures };
  }

  /**
   * Every (target, platform) pair, computed shard by shard with bounded
   * concurrency inside a shard
   */
  async buildMatrix(
    targets: readonly Target[],
    platformIds: readonly string[],
    time: number
  ): Promise<DistanceMatrix> {
    const pairs: Array<[Target, string]> = [];
    for (const target of targets) {
      for (const platformId of platformIds) pairs.push([target, platformId]);
    }

    const matrix: DistanceMatrix = new Map();
    for (const target of targets) matrix.set(target.id, new Map());

    const shardCount = Math.ceil(pairs.length / this.maxMatrixPairs);
    if (shardCount > 1) {
      this.logger.info(
        "distribution",
        `Building ${pairs.length} distance pairs in ${shardCount} shards`
      );
    }

    for (let offset = 0; offset < pairs.length; offset += this.maxMatrixPairs) {
      const shard = pairs.slice(offset, offset + this.maxMatrixPairs);
      for (let i = 0; i < shard.length; i += this.concurrency) {
        const batch = shard.slice(i, i + this.concurrency);
        const results = await Promise.all(
          batch.map(([target, platformId]) => this.computePair(target, platformId, time))
        );
        for (const result of results) {
          matrix.get(result.targetId)?.set(result.platformId, result);
        }
      }
    }

    return matrix;
  }

  private async computePair(
    target: Target,
    platformId: string,
    time: number
  ): Promise<DistanceResult> {
    try {
      return await this.calculator.compute(target, platformId, time);
    } catch (error) {
      this.logger.warn(
        "distribution",
        `Distance ${target.id} → ${platformId} failed: ${toErrorMessage(error)}`,
        { code: DISTRIBUTION_ERROR_CODES.DISTANCE_FAILED }
      );
      return unreachableResult(target, platformId);
    }
  }

  /**
   * Lowest weighted score wins; equal scores go to the lowest platform id
   */
  assign(
    targets: readonly Target[],
    matrix: DistanceMatrix
  ): { assignment: Assignment; unassigned: string[] } {
    const assignment: Assignment = new Map();
    const unassigned: string[] = [];

    for (const target of targets) {
      const row = matrix.get(target.id);
      const candidates = row ? [...row.values()] : [];
      candidates.sort((a, b) => (a.platformId < b.platformId ? -1 : a.platformId > b.platformId ? 1 : 0));

      let bestPlatform: string | undefined;
      let bestScore = Number.POSITIVE_INFINITY;
      for (const candidate of candidates) {
        const score = weightedScore(candidate);
        if (score < bestScore) {
          bestScore = score;
          bestPlatform = candidate.platformId;
        }
      }

      if (bestPlatform === undefined) {
        unassigned.push(target.id);
        this.logger.warn("distribution", `No viable platform for target ${target.id}`, {
          code: DISTRIBUTION_ERROR_CODES.NO_ASSIGNABLE_TARGET,
        });
        continue;
      }

      const list = assignment.get(bestPlatform) ?? [];
      list.push(target.id);
      assignment.set(bestPlatform, list);
    }

    return { assignment, unassigned };
  }

  private async dispatch(
    assignment: Assignment,
    targets: readonly Target[],
    platforms: readonly PlatformHandle[],
    cycleNumber?: number
  ): Promise<{ dispatched: TrackingTask[]; failures: DispatchFailure[] }> {
    const targetsById = new Map(targets.map((t) => [t.id, t]));
    const platformsById = new Map(platforms.map((p) => [p.id, p]));
    const dispatched: TrackingTask[] = [];
    const failures: DispatchFailure[] = [];

    for (const [platformId, targetIds] of assignment) {
      const platform = platformsById.get(platformId);
      for (const targetId of targetIds) {
        const target = targetsById.get(targetId);
        if (!platform || !target) continue;

        const task: TrackingTask = {
          id: `track_${target.id}_${platform.id}`,
          targetId: target.id,
          priority: target.priority,
          window: { start: target.launchTime, end: flightEndTime(target) },
          metadata: { threatLevel: target.threatLevel, cycleNumber },
        };

        try {
          await platform.receiveTask(task, target);
          dispatched.push(task);
          this.logger.debug("dispatch", `Sent ${task.id}`);
        } catch (error) {
          const message = toErrorMessage(error);
          failures.push({ platformId, targetId, taskId: task.id, message });
          this.logger.warn("dispatch", `Dispatch of ${task.id} failed: ${message}`, {
            code: DISTRIBUTION_ERROR_CODES.DISPATCH_FAILED,
          });
          await this.hooks?.trigger("dispatch-failed", {
            cycleNumber,
            platformId,
            targetId,
            error,
            timestamp: this.clock.now(),
          });
        }
      }
    }

    return { dispatched, failures };
  }

  private logSummary(totalTargets: number, assignment: Assignment, unassigned: string[]): void {
    const assigned = totalTargets - unassigned.length;
    this.logger.info(
      "distribution",
      `Assigned ${assigned}/${totalTargets} targets to ${assignment.size} platform(s)`,
      { assignment: assignmentToRecord(assignment), unassigned }
    );
  }
}
