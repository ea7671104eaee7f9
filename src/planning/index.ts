/**
 * Planning cycle: state machine, results and the coordinating manager
 */

export {
  RollingPlanningCycleManager,
  type RollingPlanningCycleManagerOptions,
  type CycleStatistics,
} from "./cycle-manager.js";

export {
  CYCLE_TRANSITIONS,
  TERMINAL_STATES,
  canTransition,
  createCycleInfo,
  isTerminalState,
  snapshotCycle,
  summarizeHistory,
  transitionCycle,
  type CycleState,
  type CycleInfo,
  type CycleMetadata,
  type HistorySummary,
} from "./state.js";

export {
  computeOptimizationMetrics,
  constellationGdop,
  summarizeDiscussion,
  summarizePlatforms,
  type CycleResults,
  type DiscussionSummary,
  type OptimizationInput,
  type OptimizationMetrics,
  type PlatformMetrics,
  type PlatformSummary,
} from "./results.js";
