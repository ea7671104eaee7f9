/**
 * Planning Hooks
 *
 * Event channel of the planning cycle. Handlers registered here can observe
 * every phase and veto a cycle before it starts; listeners on the emitter
 * side receive the same contexts as Node events.
 *
 * @example
 * ```typescript
 * const hooks = new PlanningHooks();
 *
 * hooks.onPhaseEnd((ctx) => {
 *   console.log(`cycle ${ctx.cycleNumber} ${ctx.phase} took ${ctx.duration}ms`);
 * });
 *
 * // Skip cycles while maintenance is running
 * hooks.onCycleStart(() => (maintenance ? { proceed: false, reason: 'maintenance' } : undefined));
 *
 * hooks.getMetrics().discussing?.p95Duration;
 * ```
 */

import { EventEmitter } from "node:events";
import { NullLogReporter, type LogReporter } from "../core/log-reporter.js";
import type { CycleState } from "../planning/state.js";
import type {
  HookContext,
  HookHandler,
  HookType,
  PhaseMetrics,
  PhaseMetricsSummary,
  PlanningHooksConfig,
} from "./types.js";

// ============================================================================
// CIRCULAR BUFFER FOR METRICS
// ============================================================================

/**
 * Fixed-size circular buffer; when full, oldest values are overwritten.
 */
export class CircularBuffer<T> {
  private buffer: T[] = [];
  private head = 0;
  private size = 0;

  constructor(private readonly capacity: number) {}

  push(value: T): void {
    this.buffer[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    if (this.size < this.capacity) {
      this.size++;
    }
  }

  /**
   * All values, oldest first
   */
  toArray(): T[] {
    if (this.size < this.capacity) {
      return this.buffer.slice(0, this.size);
    }
    return [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
  }

  get length(): number {
    return this.size;
  }

  clear(): void {
    this.buffer = [];
    this.head = 0;
    this.size = 0;
  }
}

const DEFAULT_METRICS_BUFFER_SIZE = 1000;

export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.ceil(p * sorted.length) - 1;
  return sorted[Math.max(0, index)];
}

export interface TriggerOutcome {
  blocked: boolean;
  message?: string;
}

// ============================================================================
// PLANNING HOOKS
// ============================================================================

export class PlanningHooks extends EventEmitter {
  private handlers = new Map<HookType, HookHandler[]>();
  private runs = new Map<CycleState, number>();
  private durations = new Map<CycleState, CircularBuffer<number>>();
  private errors = new Map<CycleState, number>();
  private readonly emitEvents: boolean;
  private readonly trackMetrics: boolean;
  private readonly metricsBufferSize: number;
  private readonly logger: LogReporter;

  constructor(config: PlanningHooksConfig = {}) {
    super();
    this.emitEvents = config.emitEvents ?? true;
    this.trackMetrics = config.trackMetrics ?? true;
    this.metricsBufferSize = config.metricsBufferSize ?? DEFAULT_METRICS_BUFFER_SIZE;
    this.logger = config.logger ?? new NullLogReporter();

    for (const hook of config.hooks ?? []) {
      if (hook.enabled !== false) {
        this.register(hook.type, hook.handler);
      }
    }
  }

  // ==========================================================================
  // REGISTRATION
  // ==========================================================================

  /**
   * Register a hook handler
   * @returns Unregister function
   */
  register(type: HookType, handler: HookHandler): () => void {
    const list = this.handlers.get(type) ?? [];
    list.push(handler);
    this.handlers.set(type, list);

    return () => {
      const handlers = this.handlers.get(type);
      if (!handlers) return;
      const index = handlers.indexOf(handler);
      if (index > -1) handlers.splice(index, 1);
    };
  }

  // ==========================================================================
  // TRIGGERING
  // ==========================================================================

  /**
   * Run the handlers for an event. A handler returning `{ proceed: false }`
   * stops the remaining handlers and reports the event as blocked.
   */
  async trigger(type: HookType, context: Omit<HookContext, "hookType" | "timestamp"> & {
    timestamp?: number;
  }): Promise<TriggerOutcome> {
    const fullContext: HookContext = {
      ...context,
      hookType: type,
      timestamp: context.timestamp ?? Date.now(),
    };

    if (this.trackMetrics && fullContext.phase) {
      this.recordMetrics(type, fullContext.phase, fullContext.duration);
    }

    for (const handler of [...(this.handlers.get(type) ?? [])]) {
      try {
        const result = await handler(fullContext);
        if (result && !result.proceed) {
          return { blocked: true, message: result.reason };
        }
      } catch (error) {
        // A failing observer never breaks the cycle
        this.logger.error("custom", error, { hookType: type });
      }
    }

    // "error" would throw on an EventEmitter without listeners
    if (this.emitEvents && type !== "error") {
      this.emit(type, fullContext);
    }

    return { blocked: false };
  }

  // ==========================================================================
  // CONVENIENCE METHODS
  // ==========================================================================

  onCycleStart(handler: HookHandler): () => void {
    return this.register("cycle-start", handler);
  }

  onCycleEnd(handler: HookHandler): () => void {
    return this.register("cycle-end", handler);
  }

  onPhaseStart(handler: HookHandler): () => void {
    return this.register("phase-start", handler);
  }

  onPhaseEnd(handler: HookHandler): () => void {
    return this.register("phase-end", handler);
  }

  onDispatchFailed(handler: HookHandler): () => void {
    return this.register("dispatch-failed", handler);
  }

  onSessionDissolved(handler: HookHandler): () => void {
    return this.register("session-dissolved", handler);
  }

  onSessionForceCleaned(handler: HookHandler): () => void {
    return this.register("session-force-cleaned", handler);
  }

  onDiscussionProgress(handler: HookHandler): () => void {
    return this.register("discussion-progress", handler);
  }

  onError(handler: HookHandler): () => void {
    return this.register("error", handler);
  }

  // ==========================================================================
  // MANAGEMENT
  // ==========================================================================

  clearHandlers(type: HookType): void {
    this.handlers.delete(type);
  }

  clearAll(): void {
    this.handlers.clear();
  }

  handlerCount(type: HookType): number {
    return this.handlers.get(type)?.length ?? 0;
  }

  hasHandlers(type: HookType): boolean {
    return this.handlerCount(type) > 0;
  }

  getRegisteredTypes(): HookType[] {
    return [...this.handlers.keys()];
  }

  // ==========================================================================
  // METRICS
  // ==========================================================================

  private recordMetrics(type: HookType, phase: CycleState, duration?: number): void {
    if (type === "phase-start") {
      this.runs.set(phase, (this.runs.get(phase) ?? 0) + 1);
    } else if (type === "phase-end" && duration !== undefined) {
      let buffer = this.durations.get(phase);
      if (!buffer) {
        buffer = new CircularBuffer<number>(this.metricsBufferSize);
        this.durations.set(phase, buffer);
      }
      buffer.push(duration);
    } else if (type === "error") {
      this.errors.set(phase, (this.errors.get(phase) ?? 0) + 1);
    }
  }

  getPhaseMetrics(phase: CycleState): PhaseMetrics | null {
    const runs = this.runs.get(phase);
    if (runs === undefined) return null;

    const durations = this.durations.get(phase)?.toArray() ?? [];
    const avg = durations.length > 0 ? durations.reduce((a, b) => a + b, 0) / durations.length : 0;

    return {
      runs,
      errors: this.errors.get(phase) ?? 0,
      avgDuration: Math.round(avg),
      p95Duration: percentile(durations, 0.95),
    };
  }

  getMetrics(): PhaseMetricsSummary {
    const summary: PhaseMetricsSummary = {};
    for (const phase of this.runs.keys()) {
      const metrics = this.getPhaseMetrics(phase);
      if (metrics) summary[phase] = metrics;
    }
    return summary;
  }

  resetMetrics(): void {
    this.runs.clear();
    this.durations.clear();
    this.errors.clear();
  }

  /**
   * Drop handlers, listeners and metrics. The instance is not reused after.
   */
  destroy(): void {
    this.handlers.clear();
    this.removeAllListeners();
    this.resetMetrics();
  }
}

// ============================================================================
// COMMON HOOK IMPLEMENTATIONS
// ============================================================================

export const CommonHooks = {
  /**
   * Log every phase transition through a reporter
   */
  logPhases: (logger: LogReporter): HookHandler => {
    return (ctx) => {
      if (ctx.cycleNumber === undefined || !ctx.phase) return;
      const suffix = ctx.duration !== undefined ? ` (${ctx.duration}ms)` : "";
      logger.log({
        timestamp: new Date(ctx.timestamp).toISOString(),
        level: "debug",
        type: "phase",
        message: `${ctx.hookType} ${ctx.phase}${suffix}`,
        cycleNumber: ctx.cycleNumber,
        phase: ctx.phase,
      });
    };
  },

  /**
   * Veto cycles while a predicate holds
   */
  vetoWhen: (predicate: (ctx: HookContext) => boolean, reason: string): HookHandler => {
    return (ctx) => {
      if (ctx.hookType !== "cycle-start") return;
      if (predicate(ctx)) return { proceed: false, reason };
    };
  },

  /**
   * Remember ended cycles
   */
  trackCycles: (): {
    handler: HookHandler;
    getCycles: () => Array<{ cycleId?: string; cycleNumber?: number; duration?: number }>;
    clear: () => void;
  } => {
    const cycles: Array<{ cycleId?: string; cycleNumber?: number; duration?: number }> = [];
    return {
      handler: (ctx) => {
        if (ctx.hookType !== "cycle-end") return;
        cycles.push({ cycleId: ctx.cycleId, cycleNumber: ctx.cycleNumber, duration: ctx.duration });
      },
      getCycles: () => [...cycles],
      clear: () => {
        cycles.length = 0;
      },
    };
  },

  /**
   * Forward session lifecycle events to another emitter
   */
  forwardSessions: (emitter: EventEmitter): HookHandler => {
    return (ctx) => {
      if (ctx.hookType === "session-dissolved") {
        emitter.emit("session:dissolved", { sessionId: ctx.sessionId });
      }
      if (ctx.hookType === "session-force-cleaned") {
        emitter.emit("session:force-cleaned", { sessionId: ctx.sessionId });
      }
    };
  },
};

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export function createPlanningHooks(config?: PlanningHooksConfig): PlanningHooks {
  return new PlanningHooks(config);
}
