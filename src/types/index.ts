/**
 * Shared domain types
 *
 * Targets, platforms and the distance results that connect them. Times are
 * epoch milliseconds, distances kilometres, angles degrees.
 */

// ============================================================================
// POSITIONS
// ============================================================================

/**
 * Geodetic position. `alt` is kilometres above the reference sphere.
 */
export interface GeoPosition {
  lat: number;
  lon: number;
  alt?: number;
}

/**
 * Earth-centred Cartesian position in kilometres
 */
export interface CartesianPosition {
  x: number;
  y: number;
  z: number;
}

export interface TrajectorySample {
  position: GeoPosition;
  time: number;
}

// ============================================================================
// TARGETS
// ============================================================================

export type ThreatLevel = "low" | "medium" | "high" | "critical" | (string & {});

/**
 * A detected moving target. Immutable once detected within a cycle.
 */
export interface Target {
  readonly id: string;
  readonly launchPosition: GeoPosition;
  /** Predicted end point of the flight */
  readonly targetPosition?: GeoPosition;
  readonly launchTime: number;
  readonly flightDurationSeconds: number;
  /** Time-ordered samples */
  readonly trajectory: readonly TrajectorySample[];
  readonly priority: number;
  readonly threatLevel: ThreatLevel;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * End of a target's flight in epoch ms
 */
export function flightEndTime(target: Pick<Target, "launchTime" | "flightDurationSeconds">): number {
  return target.launchTime + target.flightDurationSeconds * 1000;
}

// ============================================================================
// PLATFORMS
// ============================================================================

export interface TimeWindow {
  start: number;
  end: number;
}

/**
 * Task handed to a platform for one target
 */
export interface TrackingTask {
  id: string;
  targetId: string;
  priority: number;
  window: TimeWindow;
  metadata?: Record<string, unknown>;
}

/**
 * Non-owning reference to a tracking platform. Its geometry comes from a
 * {@link PositionOracle}; the core only addresses it.
 */
export interface PlatformHandle {
  readonly id: string;
  readonly capabilities?: readonly string[];
  /** Rejects when the platform refuses or cannot take the task */
  receiveTask(task: TrackingTask, target: Target): Promise<void>;
}

/**
 * Black-box position source (orbit propagator, ephemeris service, ...)
 */
export interface PositionOracle {
  positionAt(platformId: string, time: number): Promise<GeoPosition | undefined>;
}

// ============================================================================
// DISTANCES
// ============================================================================

export interface VisibilityWindow {
  startIndex: number;
  endIndex: number;
  durationSeconds: number;
  minDistanceKm: number;
  startTime?: number;
  endTime?: number;
}

/**
 * Distance of one target's trajectory to one platform. Never mutated.
 */
export interface DistanceResult {
  readonly targetId: string;
  readonly platformId: string;
  readonly minDistanceKm: number;
  readonly avgDistanceKm: number;
  readonly closestApproachTime: number;
  readonly visibilityWindows: readonly VisibilityWindow[];
  /** In [0, 1] */
  readonly confidence: number;
}

/** targetId → platformId → result */
export type DistanceMatrix = Map<string, Map<string, DistanceResult>>;

/** platformId → targetIds; only platforms with at least one target are keys */
export type Assignment = Map<string, string[]>;

export function assignmentToRecord(assignment: Assignment): Record<string, string[]> {
  const record: Record<string, string[]> = {};
  for (const [platformId, targetIds] of assignment) {
    record[platformId] = [...targetIds];
  }
  return record;
}
