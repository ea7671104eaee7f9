/**
 * Planning cycle state
 *
 * A cycle walks a fixed sequence of phases. `completed` and `error` are
 * terminal; either can be reached from any other state (a cycle can be
 * forced to `completed` when the next one starts).
 */

import { nanoid } from "nanoid";
import { CYCLE_ERROR_CODES, PlanningError } from "../core/errors.js";
import type { MetaTaskSet } from "../meta-task/builder.js";
import type { Assignment, Target } from "../types/index.js";
import type { CycleResults } from "./results.js";

export type CycleState =
  | "idle"
  | "initializing"
  | "collecting_targets"
  | "distributing_tasks"
  | "discussing"
  | "gathering_results"
  | "generating_reports"
  | "completed"
  | "error";

export const TERMINAL_STATES: ReadonlySet<CycleState> = new Set(["completed", "error"]);

/**
 * Allowed successors of each state
 */
export const CYCLE_TRANSITIONS: Readonly<Record<CycleState, readonly CycleState[]>> = {
  idle: ["initializing", "completed", "error"],
  initializing: ["collecting_targets", "completed", "error"],
  collecting_targets: ["distributing_tasks", "completed", "error"],
  distributing_tasks: ["discussing", "completed", "error"],
  discussing: ["gathering_results", "completed", "error"],
  gathering_results: ["generating_reports", "completed", "error"],
  generating_reports: ["completed", "error"],
  completed: [],
  error: [],
};

export interface CycleMetadata {
  metaTaskSet?: MetaTaskSet;
  reportFiles?: string[];
  /** Closed by the start of the next cycle or by stop() */
  forceCompleted?: boolean;
  extra: Record<string, unknown>;
}

export interface CycleInfo {
  cycleId: string;
  /** Strictly increasing, never reused */
  cycleNumber: number;
  startTime: number;
  endTime?: number;
  state: CycleState;
  detectedTargets: readonly Target[];
  assignment: Assignment;
  results?: CycleResults;
  errorMessage?: string;
  metadata: CycleMetadata;
}

export function isTerminalState(state: CycleState): boolean {
  return TERMINAL_STATES.has(state);
}

export function canTransition(from: CycleState, to: CycleState): boolean {
  return CYCLE_TRANSITIONS[from].includes(to);
}

export function createCycleInfo(
  cycleNumber: number,
  detectedTargets: readonly Target[],
  startTime: number
): CycleInfo {
  return {
    cycleId: `planning_cycle_${cycleNumber}_${nanoid(8)}`,
    cycleNumber,
    startTime,
    state: "idle",
    detectedTargets: [...detectedTargets],
    assignment: new Map(),
    metadata: { extra: {} },
  };
}

/**
 * Move a cycle to `to`, stamping `endTime` on terminal states
 * @throws PlanningError when the transition table forbids it
 */
export function transitionCycle(cycle: CycleInfo, to: CycleState, now: number): CycleInfo {
  if (!canTransition(cycle.state, to)) {
    throw new PlanningError(
      CYCLE_ERROR_CODES.INVALID_TRANSITION,
      `Invalid cycle transition ${cycle.state} → ${to} (cycle ${cycle.cycleNumber})`
    );
  }
  cycle.state = to;
  if (isTerminalState(to)) cycle.endTime = now;
  return cycle;
}

/**
 * Detached copy for history and callers; later changes to the live cycle
 * do not show through
 */
export function snapshotCycle(cycle: CycleInfo): CycleInfo {
  const assignment: Assignment = new Map();
  for (const [platformId, targetIds] of cycle.assignment) {
    assignment.set(platformId, [...targetIds]);
  }
  return {
    ...cycle,
    detectedTargets: [...cycle.detectedTargets],
    assignment,
    results: cycle.results ? structuredClone(cycle.results) : undefined,
    metadata: {
      ...cycle.metadata,
      metaTaskSet: cycle.metadata.metaTaskSet ? structuredClone(cycle.metadata.metaTaskSet) : undefined,
      reportFiles: cycle.metadata.reportFiles ? [...cycle.metadata.reportFiles] : undefined,
      extra: { ...cycle.metadata.extra },
    },
  };
}

export interface HistorySummary {
  total: number;
  completed: number;
  errored: number;
  forceCompleted: number;
  /** Mean of cycles that have an end time */
  averageDurationMs: number;
}

export function summarizeHistory(history: readonly CycleInfo[]): HistorySummary {
  const durations = history
    .filter((c) => c.endTime !== undefined)
    .map((c) => (c.endTime ?? c.startTime) - c.startTime);

  return {
    total: history.length,
    completed: history.filter((c) => c.state === "completed").length,
    errored: history.filter((c) => c.state === "error").length,
    forceCompleted: history.filter((c) => c.metadata.forceCompleted === true).length,
    averageDurationMs:
      durations.length > 0 ? durations.reduce((a, b) => a + b, 0) / durations.length : 0,
  };
}
