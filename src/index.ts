/**
 * rolling-planning-core
 *
 * Repeated planning cycles that hand detected targets to the nearest
 * tracking platform, then wait for the platforms' discussion sessions to
 * converge before the next cycle starts.
 *
 * @example
 * ```typescript
 * import {
 *   InMemoryPlatformRegistry,
 *   InMemorySessionStore,
 *   RollingPlanningCycleManager,
 *   StaticPositionOracle,
 *   loadConfig,
 * } from 'rolling-planning-core';
 *
 * const manager = new RollingPlanningCycleManager({
 *   store: new InMemorySessionStore(),
 *   registry: new InMemoryPlatformRegistry(platforms),
 *   oracle: new StaticPositionOracle(positions),
 *   config: loadConfig(),
 * });
 * manager.start();
 * const cycle = await manager.checkAndExecuteCycle(detected);
 * ```
 */

// =============================================================================
// CORE
// =============================================================================

export * from "./core/index.js";
export * from "./types/index.js";

// =============================================================================
// GEOMETRY
// =============================================================================

export * from "./geometry/index.js";

// =============================================================================
// DISTRIBUTION
// =============================================================================

export {
  GeometricDistanceCalculator,
  TaskDistributor,
  unreachableResult,
  weightedScore,
  type DistanceCalculator,
  type GeometricDistanceOptions,
  type TaskDistributorOptions,
  type DistributeOptions,
  type DispatchFailure,
  type DistributionOutcome,
} from "./distribution/distributor.js";

// =============================================================================
// DISCUSSION
// =============================================================================

export {
  InMemorySessionStore,
  TERMINAL_SESSION_STATUSES,
  type SessionStatus,
  type SessionProgress,
  type SessionStore,
  type CreateSessionInput,
  type SessionUpdate,
} from "./discussion/store.js";

export {
  classifySession,
  policyFromConfig,
  DEFAULT_COMPLETION_POLICY,
  CONSENSUS_REASONS,
  type CompletionPolicy,
  type CompletionReason,
  type SessionDecision,
} from "./discussion/policy.js";

export {
  DiscussionMonitor,
  type DiscussionMonitorOptions,
  type AwaitCompletionOptions,
  type SessionOutcome,
  type MonitorReport,
} from "./discussion/monitor.js";

// =============================================================================
// PLANNING CYCLE
// =============================================================================

export * from "./planning/index.js";

export {
  MetaTaskBuilder,
  MAX_META_WINDOWS,
  type MetaTaskBuilderOptions,
  type MetaTaskSet,
  type MetaTaskWindow,
} from "./meta-task/builder.js";

// =============================================================================
// HOOKS
// =============================================================================

export {
  PlanningHooks,
  CommonHooks,
  CircularBuffer,
  createPlanningHooks,
  type TriggerOutcome,
} from "./hooks/manager.js";

export type {
  HookType,
  HookContext,
  HookResult,
  HookHandler,
  HookConfig,
  PhaseMetrics,
  PhaseMetricsSummary,
  PlanningHooksConfig,
} from "./hooks/types.js";

// =============================================================================
// PLATFORMS & REPORTING
// =============================================================================

export {
  InMemoryPlatformRegistry,
  StaticPositionOracle,
  FunctionPositionOracle,
  type PlatformRegistry,
} from "./platforms/registry.js";

export { SimulatedPlatform, type SimulatedPlatformOptions } from "./platforms/simulated.js";

export {
  buildPlanningGanttData,
  renderTimelineHtml,
  escapeHtml,
  type PlanningGanttData,
  type PlanningGanttTask,
  type GanttSource,
} from "./reporting/gantt.js";

export {
  InMemoryReportSink,
  type ReportSink,
  type ChartFormat,
} from "./reporting/sink.js";

export { FileReportSink } from "./reporting/file-sink.js";
