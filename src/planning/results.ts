/**
 * Cycle results
 *
 * Per-platform summaries and aggregate metrics, gathered after the
 * discussion phase from the assignment, the distance matrix and the
 * monitor report.
 */

import type { MonitorReport, SessionOutcome } from "../discussion/monitor.js";
import { CONSENSUS_REASONS } from "../discussion/policy.js";
import type { DispatchFailure } from "../distribution/distributor.js";
import { classifyGeometry, computeGdop, type GeometryQuality } from "../geometry/gdop.js";
import { geodeticToEcef } from "../geometry/spherical.js";
import type {
  Assignment,
  CartesianPosition,
  DistanceMatrix,
  DistanceResult,
  Target,
} from "../types/index.js";

export interface PlatformMetrics {
  meanMinDistanceKm: number;
  meanConfidence: number;
  sessionCount: number;
}

export interface PlatformSummary {
  platformId: string;
  assignedTargets: string[];
  /** No session of this platform had to be force-cleaned */
  discussionCompleted: boolean;
  /** Every session of this platform ended in agreement */
  consensusReached: boolean;
  metrics: PlatformMetrics;
}

export interface OptimizationMetrics {
  /** Assigned targets / detected targets */
  coverage: number;
  /** Platforms with work / registered platforms */
  utilization: number;
  /** Mean confidence of the assigned pairs */
  meanConfidence: number;
  /** Platforms that reached consensus / platforms with work */
  consensusRate: number;
  /** Mean GDOP of the platform constellation seen from each launch point */
  meanGdop?: number;
  geometryQuality?: GeometryQuality;
}

export interface DiscussionSummary {
  watched: number;
  dissolved: number;
  forceCleaned: number;
  timedOut: boolean;
  elapsedMs: number;
}

export interface CycleResults {
  platforms: PlatformSummary[];
  metrics: OptimizationMetrics;
  unassigned: string[];
  dispatchFailures: DispatchFailure[];
  discussion?: DiscussionSummary;
}

function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

function assignedResults(
  platformId: string,
  targetIds: readonly string[],
  matrix: DistanceMatrix
): DistanceResult[] {
  const results: DistanceResult[] = [];
  for (const targetId of targetIds) {
    const result = matrix.get(targetId)?.get(platformId);
    if (result) results.push(result);
  }
  return results;
}

/**
 * One summary per platform with work, sorted by platform id
 */
export function summarizePlatforms(
  assignment: Assignment,
  matrix: DistanceMatrix,
  report?: MonitorReport
): PlatformSummary[] {
  const sessions = report?.sessions ?? [];

  return [...assignment.keys()].sort().map((platformId) => {
    const assignedTargets = [...(assignment.get(platformId) ?? [])];
    const own: SessionOutcome[] = sessions.filter((s) => s.participants.includes(platformId));
    const results = assignedResults(platformId, assignedTargets, matrix);

    return {
      platformId,
      assignedTargets,
      discussionCompleted: own.every((s) => s.outcome === "dissolved"),
      consensusReached:
        own.length > 0 &&
        own.every((s) => s.reason !== undefined && CONSENSUS_REASONS.has(s.reason)),
      metrics: {
        meanMinDistanceKm: mean(results.map((r) => r.minDistanceKm)),
        meanConfidence: mean(results.map((r) => r.confidence)),
        sessionCount: own.length,
      },
    };
  });
}

export function summarizeDiscussion(report: MonitorReport): DiscussionSummary {
  return {
    watched: report.watched,
    dissolved: report.sessions.filter((s) => s.outcome === "dissolved").length,
    forceCleaned: report.sessions.filter((s) => s.outcome === "force_cleaned").length,
    timedOut: report.timedOut,
    elapsedMs: report.elapsedMs,
  };
}

/**
 * Mean GDOP over the targets' launch points; undefined when no target
 * yields a usable fix
 */
export function constellationGdop(
  platformPositions: readonly CartesianPosition[],
  targets: readonly Target[],
  earthRadiusKm?: number,
  conditionLimit?: number
): { meanGdop: number; quality: GeometryQuality } | undefined {
  const values: number[] = [];
  for (const target of targets) {
    const observer = geodeticToEcef(target.launchPosition, earthRadiusKm);
    const result = computeGdop(platformPositions, observer, { conditionLimit });
    if (result.success) values.push(result.gdop);
  }
  if (values.length === 0) return undefined;
  const meanGdop = mean(values);
  return { meanGdop, quality: classifyGeometry(meanGdop) };
}

export interface OptimizationInput {
  targets: readonly Target[];
  platformCount: number;
  assignment: Assignment;
  matrix: DistanceMatrix;
  summaries: readonly PlatformSummary[];
  geometry?: { meanGdop: number; quality: GeometryQuality };
}

export function computeOptimizationMetrics(input: OptimizationInput): OptimizationMetrics {
  let assignedCount = 0;
  const confidences: number[] = [];
  for (const [platformId, targetIds] of input.assignment) {
    assignedCount += targetIds.length;
    for (const result of assignedResults(platformId, targetIds, input.matrix)) {
      confidences.push(result.confidence);
    }
  }

  const metrics: OptimizationMetrics = {
    coverage: input.targets.length > 0 ? assignedCount / input.targets.length : 0,
    utilization: input.platformCount > 0 ? input.assignment.size / input.platformCount : 0,
    meanConfidence: mean(confidences),
    consensusRate:
      input.summaries.length > 0
        ? input.summaries.filter((s) => s.consensusReached).length / input.summaries.length
        : 0,
  };
  if (input.geometry) {
    metrics.meanGdop = input.geometry.meanGdop;
    metrics.geometryQuality = input.geometry.quality;
  }
  return metrics;
}
