/**
 * Planning Hooks Types
 *
 * Observability and veto points around the planning cycle. Handlers run in
 * registration order; a `cycle-start` handler may stop a cycle from running.
 */

import type { CycleState } from "../planning/state.js";
import type { LogReporter } from "../core/log-reporter.js";

// ============================================================================
// HOOK TYPES
// ============================================================================

/**
 * Hook event types
 */
export type HookType =
  | "cycle-start"
  | "cycle-end"
  | "phase-start"
  | "phase-end"
  | "dispatch-failed"
  | "session-dissolved"
  | "session-force-cleaned"
  | "discussion-progress"
  | "error";

/**
 * Hook context passed to handlers
 */
export interface HookContext {
  /** Type of hook being triggered */
  hookType: HookType;
  /** Timestamp of event */
  timestamp: number;
  cycleId?: string;
  cycleNumber?: number;
  /** Phase being entered or left */
  phase?: CycleState;
  /** Duration of the phase or cycle (ms) */
  duration?: number;
  sessionId?: string;
  platformId?: string;
  targetId?: string;
  error?: unknown;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Hook result - only `cycle-start` honours `proceed: false`
 */
export interface HookResult {
  /** Whether to proceed with the operation */
  proceed: boolean;
  /** Reason for blocking (if proceed is false) */
  reason?: string;
}

/**
 * Hook handler function
 */
export type HookHandler = (context: HookContext) => Promise<HookResult | void> | HookResult | void;

// ============================================================================
// METRICS TYPES
// ============================================================================

export interface PhaseMetrics {
  /** Times the phase was entered */
  runs: number;
  errors: number;
  avgDuration: number;
  p95Duration: number;
}

/**
 * Metrics summary keyed by phase
 */
export type PhaseMetricsSummary = Partial<Record<CycleState, PhaseMetrics>>;

// ============================================================================
// HOOK CONFIGURATION
// ============================================================================

export interface HookConfig {
  type: HookType;
  handler: HookHandler;
  /** Whether hook is enabled */
  enabled?: boolean;
}

export interface PlanningHooksConfig {
  /** Initial hooks to register */
  hooks?: HookConfig[];
  /** Whether to emit events */
  emitEvents?: boolean;
  /** Whether to track metrics */
  trackMetrics?: boolean;
  /**
   * Maximum number of duration samples kept per phase.
   * @default 1000
   */
  metricsBufferSize?: number;
  /** Receives handler failures */
  logger?: LogReporter;
}
