/**
 * Rolling Planning Cycle Manager
 *
 * Top-level coordinator. Each call to `checkAndExecuteCycle` with a fresh
 * set of detections runs one cycle through its phases:
 *
 * ```
 * idle → initializing → collecting_targets → distributing_tasks
 *      → discussing → gathering_results → generating_reports → completed
 * ```
 *
 * Any phase that throws sends the cycle to `error`. A cycle still running
 * when the next one is requested is either left alone (overlap policy
 * `skip`) or forced to `completed` after its sessions are reaped (`force`).
 *
 * @example
 * ```typescript
 * const manager = new RollingPlanningCycleManager({ store, registry, oracle, logger });
 * manager.start();
 * const cycle = await manager.checkAndExecuteCycle(detectedTargets);
 * cycle?.results?.metrics.coverage;
 * await manager.stop();
 * ```
 */

import { systemClock, type Clock } from "../core/clock.js";
import {
  computeMaxWaitMs,
  parseConfig,
  type PlanningConfig,
  type PlanningConfigInput,
} from "../core/config.js";
import {
  CYCLE_ERROR_CODES,
  DISTRIBUTION_ERROR_CODES,
  PlanningError,
  isPlanningError,
  toErrorMessage,
} from "../core/errors.js";
import { NullLogReporter, type LogReporter } from "../core/log-reporter.js";
import { DiscussionMonitor, type MonitorReport } from "../discussion/monitor.js";
import { policyFromConfig } from "../discussion/policy.js";
import type { SessionStore } from "../discussion/store.js";
import {
  GeometricDistanceCalculator,
  TaskDistributor,
  type DistanceCalculator,
  type DistributionOutcome,
} from "../distribution/distributor.js";
import { geodeticToEcef, isValidPosition } from "../geometry/spherical.js";
import type { PlanningHooks } from "../hooks/manager.js";
import { MetaTaskBuilder } from "../meta-task/builder.js";
import type { PlatformRegistry } from "../platforms/registry.js";
import { buildPlanningGanttData } from "../reporting/gantt.js";
import type { ReportSink } from "../reporting/sink.js";
import type { CartesianPosition, PlatformHandle, PositionOracle, Target } from "../types/index.js";
import {
  computeOptimizationMetrics,
  constellationGdop,
  summarizeDiscussion,
  summarizePlatforms,
  type CycleResults,
} from "./results.js";
import {
  createCycleInfo,
  isTerminalState,
  snapshotCycle,
  summarizeHistory,
  transitionCycle,
  type CycleInfo,
  type CycleState,
  type HistorySummary,
} from "./state.js";

// ============================================================================
// TYPES
// ============================================================================

export interface RollingPlanningCycleManagerOptions {
  store: SessionStore;
  /** Without a registry the manager refuses to start */
  registry?: PlatformRegistry;
  oracle: PositionOracle;
  /** Defaults to geometric distances from the oracle */
  calculator?: DistanceCalculator;
  reportSink?: ReportSink;
  /** Name of the report session opened on the first report */
  reportSessionName?: string;
  config?: PlanningConfigInput;
  clock?: Clock;
  logger?: LogReporter;
  hooks?: PlanningHooks;
}

export interface CycleStatistics extends HistorySummary {
  running: boolean;
  cyclesStarted: number;
  maxCycles: number;
  currentCycle?: { cycleNumber: number; state: CycleState };
}

// ============================================================================
// MANAGER
// ============================================================================

export class RollingPlanningCycleManager {
  private readonly config: PlanningConfig;
  private readonly registry?: PlatformRegistry;
  private readonly oracle: PositionOracle;
  private readonly reportSink?: ReportSink;
  private readonly reportSessionName: string;
  private readonly clock: Clock;
  private readonly logger: LogReporter;
  private readonly hooks?: PlanningHooks;
  private readonly distributor: TaskDistributor;
  private readonly monitor: DiscussionMonitor;
  private readonly metaTaskBuilder: MetaTaskBuilder;

  private running = false;
  /** A call is between its overlap check and the creation of its cycle */
  private starting = false;
  private cycleCounter = 0;
  private current?: CycleInfo;
  private readonly history: CycleInfo[] = [];
  private readonly recorded = new Set<string>();

  constructor(options: RollingPlanningCycleManagerOptions) {
    this.config = parseConfig(options.config ?? {});
    this.registry = options.registry;
    this.oracle = options.oracle;
    this.reportSink = options.reportSink;
    this.reportSessionName = options.reportSessionName ?? "rolling_planning";
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new NullLogReporter();
    this.hooks = options.hooks;

    const { geometry, distribution, discussion, metaTask } = this.config;

    this.distributor = new TaskDistributor({
      calculator:
        options.calculator ??
        new GeometricDistanceCalculator(this.oracle, {
          thresholdKm: geometry.visibilityThresholdKm,
          sampleIntervalSeconds: geometry.sampleIntervalSeconds,
          earthRadiusKm: geometry.earthRadiusKm,
        }),
      clock: this.clock,
      logger: this.logger,
      hooks: this.hooks,
      maxMatrixPairs: distribution.maxMatrixPairs,
      concurrency: distribution.concurrency,
    });

    this.monitor = new DiscussionMonitor({
      store: options.store,
      clock: this.clock,
      logger: this.logger,
      hooks: this.hooks,
      policy: policyFromConfig(discussion),
    });

    this.metaTaskBuilder = new MetaTaskBuilder({
      windowSeconds: metaTask.windowSeconds,
      overlapSeconds: metaTask.overlapSeconds,
      maxExtensionSeconds: metaTask.maxExtensionSeconds,
      logger: this.logger,
    });
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  start(): boolean {
    if (this.running) {
      this.logger.warn("cycle", "Rolling planning is already running");
      return false;
    }
    if (!this.registry) {
      this.logger.error(
        "cycle",
        new PlanningError(
          CYCLE_ERROR_CODES.NO_PLATFORMS_REGISTERED,
          "Cannot start rolling planning without a platform registry"
        )
      );
      return false;
    }

    this.running = true;
    this.logger.info("cycle", "Rolling planning started", {
      maxCycles: this.config.cycle.maxCycles,
      overlapPolicy: this.config.cycle.overlapPolicy,
    });
    return true;
  }

  /**
   * Force the current cycle to completed, reap every session and stop
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    await this.forceCompleteCurrent("planning stopped");
    await this.monitor.forceCleanAll();

    const stats = this.getStatistics();
    this.logger.info(
      "cycle",
      `Rolling planning stopped: ${stats.total} cycle(s), ${stats.completed} completed, ${stats.errored} errored`,
      { ...stats }
    );
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one planning cycle for the given detections. Resolves to a copy of
   * the finished cycle, or undefined when no cycle was run.
   */
  async checkAndExecuteCycle(detected: readonly Target[]): Promise<CycleInfo | undefined> {
    if (!this.running || this.starting) return undefined;

    // Held until the new cycle is registered, across any forced completion
    this.starting = true;
    let cycle: CycleInfo | undefined;
    try {
      cycle = await this.prepareCycle(detected);
    } finally {
      this.starting = false;
    }
    if (!cycle) return undefined;

    await this.runCycle(cycle);
    return snapshotCycle(cycle);
  }

  private async prepareCycle(detected: readonly Target[]): Promise<CycleInfo | undefined> {
    if (this.current && !isTerminalState(this.current.state)) {
      if (this.config.cycle.overlapPolicy === "skip") {
        this.logger.debug(
          "cycle",
          `Cycle ${this.current.cycleNumber} still in ${this.current.state}, skipping`
        );
        return undefined;
      }
      await this.forceCompleteCurrent("superseded by a new cycle");
      if (!this.running) return undefined;
    }

    if (this.cycleCounter >= this.config.cycle.maxCycles) {
      this.logger.info(
        "cycle",
        `Reached the maximum of ${this.config.cycle.maxCycles} cycles, stopping`
      );
      await this.stop();
      return undefined;
    }

    return this.openCycle(detected);
  }

  /**
   * Ask the `cycle-start` handlers, then number and register the cycle.
   * The counter only moves for cycles that actually start.
   */
  private async openCycle(detected: readonly Target[]): Promise<CycleInfo | undefined> {
    const cycleNumber = this.cycleCounter + 1;
    const outcome = await this.hooks?.trigger("cycle-start", {
      cycleNumber,
      timestamp: this.clock.now(),
      metadata: { targetCount: detected.length },
    });
    if (outcome?.blocked) {
      this.logger.info(
        "cycle",
        `Cycle ${cycleNumber} vetoed${outcome.message ? `: ${outcome.message}` : ""}`
      );
      return undefined;
    }

    this.cycleCounter = cycleNumber;
    const cycle = createCycleInfo(cycleNumber, detected, this.clock.now());
    this.current = cycle;
    return cycle;
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  getHistory(): readonly CycleInfo[] {
    return this.history.map(snapshotCycle);
  }

  getCurrentCycle(): CycleInfo | undefined {
    return this.current ? snapshotCycle(this.current) : undefined;
  }

  getStatistics(): CycleStatistics {
    const stats: CycleStatistics = {
      ...summarizeHistory(this.history),
      running: this.running,
      cyclesStarted: this.cycleCounter,
      maxCycles: this.config.cycle.maxCycles,
    };
    if (this.current) {
      stats.currentCycle = { cycleNumber: this.current.cycleNumber, state: this.current.state };
    }
    return stats;
  }

  getConfig(): PlanningConfig {
    return this.config;
  }

  // ==========================================================================
  // CYCLE EXECUTION
  // ==========================================================================

  private async runCycle(cycle: CycleInfo): Promise<void> {
    this.logger.info(
      "cycle",
      `Starting planning cycle ${cycle.cycleNumber} with ${cycle.detectedTargets.length} target(s)`,
      { cycleId: cycle.cycleId }
    );

    try {
      const platforms = await this.runPhase(cycle, "initializing", async () =>
        this.registry ? [...this.registry.listPlatforms()] : []
      );
      if (!platforms) return;

      const collected = await this.runPhase(cycle, "collecting_targets", async () => {
        this.collectTargets(cycle);
        return true;
      });
      if (!collected) return;

      if (cycle.detectedTargets.length === 0) {
        this.logger.info("cycle", `No targets detected, completing cycle ${cycle.cycleNumber}`);
        cycle.results = emptyResults(platforms.length);
        if (!isTerminalState(cycle.state)) await this.finish(cycle, "completed");
        return;
      }

      const distribution = await this.runPhase(cycle, "distributing_tasks", () =>
        this.distribute(cycle, platforms)
      );
      if (!distribution) return;

      const report = await this.runPhase(cycle, "discussing", () => this.discuss(cycle));
      if (!report) return;

      const gathered = await this.runPhase(cycle, "gathering_results", async () => {
        cycle.results = await this.gatherResults(cycle, platforms, distribution, report);
        return true;
      });
      if (!gathered) return;

      const reported = await this.runPhase(cycle, "generating_reports", async () => {
        await this.generateReports(cycle);
        return true;
      });
      if (!reported || isTerminalState(cycle.state)) return;

      await this.finish(cycle, "completed");
    } catch (error) {
      await this.fail(cycle, error);
    }
  }

  /**
   * Enter `phase`, run `work`, leave. Resolves to undefined without running
   * `work` when the cycle was closed from outside in the meantime.
   */
  private async runPhase<T>(
    cycle: CycleInfo,
    phase: CycleState,
    work: () => Promise<T>
  ): Promise<T | undefined> {
    if (isTerminalState(cycle.state)) return undefined;

    transitionCycle(cycle, phase, this.clock.now());
    this.logger.phase(cycle.cycleNumber, phase);
    await this.hooks?.trigger("phase-start", {
      cycleId: cycle.cycleId,
      cycleNumber: cycle.cycleNumber,
      phase,
      timestamp: this.clock.now(),
    });
    if (isTerminalState(cycle.state)) return undefined;

    const startedAt = this.clock.now();
    const result = await work();

    await this.hooks?.trigger("phase-end", {
      cycleId: cycle.cycleId,
      cycleNumber: cycle.cycleNumber,
      phase,
      duration: this.clock.now() - startedAt,
      timestamp: this.clock.now(),
    });
    return result;
  }

  private collectTargets(cycle: CycleInfo): void {
    const targets = cycle.detectedTargets;
    this.logger.info("cycle", `Collected ${targets.length} target(s)`, {
      cycleNumber: cycle.cycleNumber,
      targetIds: targets.map((t) => t.id),
    });
    if (!this.config.metaTask.enabled || targets.length === 0) return;

    try {
      cycle.metadata.metaTaskSet = this.metaTaskBuilder.build(this.clock.now(), targets);
    } catch (error) {
      this.logger.warn(
        "cycle",
        `Meta-task set generation failed: ${toErrorMessage(error)}`,
        { cycleNumber: cycle.cycleNumber }
      );
    }
  }

  private async distribute(
    cycle: CycleInfo,
    platforms: readonly PlatformHandle[]
  ): Promise<DistributionOutcome> {
    if (platforms.length === 0) {
      throw new PlanningError(CYCLE_ERROR_CODES.NO_PLATFORMS_REGISTERED, "No platforms registered");
    }
    const outcome = await this.distributor.distribute(cycle.detectedTargets, platforms, {
      cycleNumber: cycle.cycleNumber,
    });
    cycle.assignment = outcome.assignment;
    return outcome;
  }

  private async discuss(cycle: CycleInfo): Promise<MonitorReport> {
    const { discussion } = this.config;
    return this.monitor.awaitCompletion({
      maxWaitMs: computeMaxWaitMs(discussion),
      pollIntervalMs: discussion.pollIntervalMs,
      cycleNumber: cycle.cycleNumber,
    });
  }

  private async gatherResults(
    cycle: CycleInfo,
    platforms: readonly PlatformHandle[],
    distribution: DistributionOutcome,
    report: MonitorReport
  ): Promise<CycleResults> {
    const summaries = summarizePlatforms(distribution.assignment, distribution.matrix, report);
    const positions = await this.platformPositions(platforms);
    const geometry = constellationGdop(
      positions,
      cycle.detectedTargets,
      this.config.geometry.earthRadiusKm,
      this.config.geometry.gdopConditionLimit
    );

    const results: CycleResults = {
      platforms: summaries,
      metrics: computeOptimizationMetrics({
        targets: cycle.detectedTargets,
        platformCount: platforms.length,
        assignment: distribution.assignment,
        matrix: distribution.matrix,
        summaries,
        geometry,
      }),
      unassigned: distribution.unassigned,
      dispatchFailures: distribution.dispatchFailures,
      discussion: summarizeDiscussion(report),
    };

    this.logger.info(
      "cycle",
      `Cycle ${cycle.cycleNumber} results: ${summaries.length} platform(s), coverage ${(results.metrics.coverage * 100).toFixed(0)}%`,
      { metrics: { ...results.metrics } }
    );
    return results;
  }

  private async platformPositions(
    platforms: readonly PlatformHandle[]
  ): Promise<CartesianPosition[]> {
    const now = this.clock.now();
    const positions: CartesianPosition[] = [];
    for (const platform of platforms) {
      try {
        const position = await this.oracle.positionAt(platform.id, now);
        if (isValidPosition(position)) {
          positions.push(geodeticToEcef(position, this.config.geometry.earthRadiusKm));
        }
      } catch (error) {
        this.logger.warn(
          "geometry",
          `Position of ${platform.id} unavailable: ${toErrorMessage(error)}`,
          { code: DISTRIBUTION_ERROR_CODES.POSITION_UNAVAILABLE }
        );
      }
    }
    return positions;
  }

  private async generateReports(cycle: CycleInfo): Promise<void> {
    const sink = this.reportSink;
    if (!this.config.reporting.enabled || !sink) {
      this.logger.debug("report", "Reporting disabled, skipping");
      return;
    }

    const data = buildPlanningGanttData(cycle, this.clock.now());
    if (!data) {
      this.logger.debug("report", `No assigned tasks in cycle ${cycle.cycleNumber}, no report`);
      return;
    }

    try {
      if (!sink.hasSession()) await sink.createSession(this.reportSessionName);
      const files = [
        await sink.saveData(data, `cycle_${cycle.cycleNumber}_planning_gantt`),
        await sink.renderChart(data, "html"),
      ];
      cycle.metadata.reportFiles = files;
      this.logger.info("report", `Wrote ${files.length} report file(s)`, { files });
    } catch (error) {
      this.logger.error("report", error, { cycleNumber: cycle.cycleNumber });
    }
  }

  // ==========================================================================
  // CLOSING CYCLES
  // ==========================================================================

  private async forceCompleteCurrent(reason: string): Promise<void> {
    const cycle = this.current;
    if (!cycle || isTerminalState(cycle.state)) return;

    this.logger.warn(
      "cycle",
      `Force-completing cycle ${cycle.cycleNumber} in ${cycle.state}: ${reason}`
    );
    await this.monitor.forceCleanAll(cycle.cycleNumber);

    // The cycle may have finished while sessions were being reaped
    if (isTerminalState(cycle.state)) return;
    cycle.metadata.forceCompleted = true;
    await this.finish(cycle, "completed");
  }

  private async finish(cycle: CycleInfo, state: "completed" | "error"): Promise<void> {
    transitionCycle(cycle, state, this.clock.now());
    this.record(cycle);

    const duration = (cycle.endTime ?? cycle.startTime) - cycle.startTime;
    this.logger.info(
      "cycle",
      `Cycle ${cycle.cycleNumber} ${state} in ${(duration / 1000).toFixed(1)}s`,
      { cycleId: cycle.cycleId, forceCompleted: cycle.metadata.forceCompleted === true }
    );
    await this.hooks?.trigger("cycle-end", {
      cycleId: cycle.cycleId,
      cycleNumber: cycle.cycleNumber,
      duration,
      timestamp: this.clock.now(),
      metadata: { state, forceCompleted: cycle.metadata.forceCompleted === true },
    });
  }

  private async fail(cycle: CycleInfo, error: unknown): Promise<void> {
    const logged = isPlanningError(error)
      ? error
      : new PlanningError(
          CYCLE_ERROR_CODES.PHASE_FAILED,
          `Phase ${cycle.state} failed: ${toErrorMessage(error)}`,
          { cause: error }
        );
    this.logger.error("cycle", logged, { cycleNumber: cycle.cycleNumber, phase: cycle.state });
    if (isTerminalState(cycle.state)) return;

    const phase = cycle.state;
    cycle.errorMessage = toErrorMessage(error);
    await this.hooks?.trigger("error", {
      cycleId: cycle.cycleId,
      cycleNumber: cycle.cycleNumber,
      phase,
      error,
      timestamp: this.clock.now(),
    });
    await this.finish(cycle, "error");
  }

  private record(cycle: CycleInfo): void {
    if (this.recorded.has(cycle.cycleId)) return;
    this.recorded.add(cycle.cycleId);
    this.history.push(snapshotCycle(cycle));
  }
}

function emptyResults(platformCount: number): CycleResults {
  return {
    platforms: [],
    metrics: computeOptimizationMetrics({
      targets: [],
      platformCount,
      assignment: new Map(),
      matrix: new Map(),
      summaries: [],
    }),
    unassigned: [],
    dispatchFailures: [],
  };
}
