/**
 * Discussion Lifecycle Monitor
 *
 * Polls the session store until every watched session has finished or the
 * wait budget is spent. Finished sessions are dissolved once; whatever is
 * left when the budget runs out is force-cleaned.
 *
 * @example
 * ```typescript
 * const monitor = new DiscussionMonitor({ store, logger });
 * const report = await monitor.awaitCompletion({ maxWaitMs: 450_000, pollIntervalMs: 5_000 });
 * report.timedOut; // true when sessions had to be force-cleaned
 * ```
 */

import { systemClock, type Clock } from "../core/clock.js";
import { DISCUSSION_DEFAULTS } from "../core/constants.js";
import { DISCUSSION_ERROR_CODES, PlanningError, toErrorMessage } from "../core/errors.js";
import { NullLogReporter, type LogReporter } from "../core/log-reporter.js";
import type { PlanningHooks } from "../hooks/manager.js";
import {
  DEFAULT_COMPLETION_POLICY,
  classifySession,
  type CompletionPolicy,
  type CompletionReason,
} from "./policy.js";
import type { SessionProgress, SessionStatus, SessionStore } from "./store.js";

export interface DiscussionMonitorOptions {
  store: SessionStore;
  clock?: Clock;
  logger?: LogReporter;
  hooks?: PlanningHooks;
  policy?: Partial<CompletionPolicy>;
}

export interface AwaitCompletionOptions {
  maxWaitMs: number;
  pollIntervalMs?: number;
  /** Sessions to watch; defaults to the store's active list */
  sessionIds?: readonly string[];
  /** Tags log entries and hook events */
  cycleNumber?: number;
}

export interface SessionOutcome {
  sessionId: string;
  participants: readonly string[];
  outcome: "dissolved" | "force_cleaned";
  /** Set for dissolved sessions */
  reason?: CompletionReason;
  /** False when the store refused or failed the dissolution */
  dissolvedCleanly: boolean;
}

export interface MonitorReport {
  startedAt: number;
  finishedAt: number;
  elapsedMs: number;
  /** Poll rounds performed */
  ticks: number;
  watched: number;
  sessions: SessionOutcome[];
  /** The wait budget ran out with sessions still open */
  timedOut: boolean;
}

interface SessionSnapshot {
  progress?: SessionProgress;
  status?: SessionStatus;
}

export class DiscussionMonitor {
  private readonly store: SessionStore;
  private readonly clock: Clock;
  private readonly logger: LogReporter;
  private readonly hooks?: PlanningHooks;
  private readonly policy: CompletionPolicy;
  /** Sessions whose dissolution was already attempted */
  private readonly dissolveAttempted = new Set<string>();
  /** Last participants seen per session, for sessions that vanish */
  private readonly knownParticipants = new Map<string, readonly string[]>();
  /** Sessions under a running `awaitCompletion` */
  private readonly watching = new Set<string>();
  /** Watched sessions force-cleaned from outside the wait loop */
  private readonly reaped = new Map<string, SessionOutcome>();

  constructor(options: DiscussionMonitorOptions) {
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new NullLogReporter();
    this.hooks = options.hooks;
    this.policy = { ...DEFAULT_COMPLETION_POLICY, ...options.policy };
  }

  async awaitCompletion(options: AwaitCompletionOptions): Promise<MonitorReport> {
    const pollIntervalMs = options.pollIntervalMs ?? DISCUSSION_DEFAULTS.pollIntervalMs;
    const startedAt = this.clock.now();
    const pending = new Set(options.sessionIds ?? (await this.listActive()));
    const watchedIds = [...pending];
    for (const id of watchedIds) this.watching.add(id);
    const sessions: SessionOutcome[] = [];
    let ticks = 0;
    let timedOut = false;

    if (pending.size === 0) {
      this.logger.debug("discussion", "No discussion sessions to wait for");
    }

    try {
      this.takeReaped(pending, sessions);
      while (pending.size > 0) {
        ticks++;
        await this.pollOnce(pending, sessions, startedAt, options);
        this.takeReaped(pending, sessions);
        if (pending.size === 0) break;

        const elapsedMs = this.clock.now() - startedAt;
        if (elapsedMs >= options.maxWaitMs) {
          timedOut = true;
          this.logger.warn(
            "discussion",
            `Wait budget of ${Math.round(options.maxWaitMs / 1000)}s spent, force-cleaning ${pending.size} session(s)`,
            { sessionIds: [...pending] }
          );
          const cleaned = await this.forceClean([...pending], options.cycleNumber);
          sessions.push(...cleaned);
          pending.clear();
          break;
        }

        await this.clock.sleep(Math.min(pollIntervalMs, options.maxWaitMs - elapsedMs));
        this.takeReaped(pending, sessions);
      }
    } finally {
      await this.release(watchedIds);
    }

    const finishedAt = this.clock.now();
    return {
      startedAt,
      finishedAt,
      elapsedMs: finishedAt - startedAt,
      ticks,
      watched: watchedIds.length,
      sessions,
      timedOut,
    };
  }

  /** Number of sessions the monitor still keeps state for */
  get trackedSessions(): number {
    return new Set([...this.dissolveAttempted, ...this.knownParticipants.keys()]).size;
  }

  private async pollOnce(
    pending: Set<string>,
    sessions: SessionOutcome[],
    startedAt: number,
    options: AwaitCompletionOptions
  ): Promise<void> {
    const snapshots = new Map<string, SessionSnapshot>();

    for (const id of [...pending]) {
      const snapshot = await this.readSession(id);
      snapshots.set(id, snapshot);
      if (snapshot.status === "force_cleaned") continue;
      const decision = classifySession(
        snapshot.progress,
        snapshot.status,
        this.clock.now(),
        this.policy
      );
      if (!decision.completed) continue;

      pending.delete(id);
      const dissolvedCleanly = await this.dissolve(id, decision.reason, options.cycleNumber);
      sessions.push({
        sessionId: id,
        participants: this.knownParticipants.get(id) ?? [],
        outcome: "dissolved",
        reason: decision.reason,
        dissolvedCleanly,
      });
    }

    this.takeReaped(pending, sessions);
    for (const id of [...pending]) {
      if (snapshots.get(id)?.status !== "force_cleaned") continue;
      pending.delete(id);
      sessions.push({
        sessionId: id,
        participants: this.knownParticipants.get(id) ?? [],
        outcome: "force_cleaned",
        dissolvedCleanly: false,
      });
    }

    const elapsedMs = this.clock.now() - startedAt;
    await this.reportTick(pending, snapshots, elapsedMs, options.cycleNumber);
  }

  /**
   * Move sessions force-cleaned elsewhere from `pending` to `sessions`
   */
  private takeReaped(pending: Set<string>, sessions: SessionOutcome[]): void {
    for (const id of [...pending]) {
      const outcome = this.reaped.get(id);
      if (!outcome) continue;
      pending.delete(id);
      sessions.push(outcome);
    }
  }

  /**
   * Forget watched sessions the store no longer lists. A session whose
   * dissolution failed stays known so it is not dissolved twice.
   */
  private async release(ids: readonly string[]): Promise<void> {
    const active = new Set(await this.listActive());
    for (const id of ids) {
      this.watching.delete(id);
      this.reaped.delete(id);
      if (!active.has(id)) this.forget(id);
    }
  }

  private forget(id: string): void {
    this.dissolveAttempted.delete(id);
    this.knownParticipants.delete(id);
  }

  /**
   * Force-clean every session the store still lists as active
   */
  async forceCleanAll(cycleNumber?: number): Promise<SessionOutcome[]> {
    const ids = await this.listActive();
    if (ids.length === 0) return [];
    this.logger.info("discussion", `Force-cleaning ${ids.length} active session(s)`);
    return this.forceClean(ids, cycleNumber);
  }

  /**
   * Dissolve (once), mark force_cleaned, remove. Each step is attempted
   * even when the previous one failed. Sessions reaped before are skipped.
   */
  async forceClean(ids: readonly string[], cycleNumber?: number): Promise<SessionOutcome[]> {
    const outcomes: SessionOutcome[] = [];

    for (const id of ids) {
      if (this.reaped.has(id)) continue;
      let dissolvedCleanly = false;
      if (!this.dissolveAttempted.has(id)) {
        this.dissolveAttempted.add(id);
        dissolvedCleanly = await this.tryStep(id, "dissolve", () => this.store.completeSession(id));
      }
      await this.tryStep(id, "mark force_cleaned", async () => {
        await this.store.forceUpdateStatus(id, "force_cleaned");
        return true;
      });
      await this.tryStep(id, "remove", async () => {
        await this.store.removeSession(id);
        return true;
      });

      const outcome: SessionOutcome = {
        sessionId: id,
        participants: this.knownParticipants.get(id) ?? [],
        outcome: "force_cleaned",
        dissolvedCleanly,
      };
      outcomes.push(outcome);
      if (this.watching.has(id)) this.reaped.set(id, outcome);
      else this.forget(id);
      await this.hooks?.trigger("session-force-cleaned", {
        sessionId: id,
        cycleNumber,
        timestamp: this.clock.now(),
      });
    }

    return outcomes;
  }

  private async listActive(): Promise<string[]> {
    try {
      return await this.store.listActive();
    } catch (error) {
      this.logger.error("discussion", error, { operation: "listActive" });
      return [];
    }
  }

  private async readSession(id: string): Promise<SessionSnapshot> {
    let progress: SessionProgress | undefined;
    let status: SessionStatus | undefined;
    try {
      progress = await this.store.getProgress(id);
      status = await this.store.getStatus(id);
    } catch (error) {
      this.logger.warn("discussion", `Progress of ${id} unavailable: ${toErrorMessage(error)}`, {
        code: DISCUSSION_ERROR_CODES.PROGRESS_UNAVAILABLE,
      });
      return {};
    }
    if (progress) this.knownParticipants.set(id, progress.participants);
    return { progress, status };
  }

  private async dissolve(
    id: string,
    reason: CompletionReason,
    cycleNumber?: number
  ): Promise<boolean> {
    if (this.dissolveAttempted.has(id)) return false;
    this.dissolveAttempted.add(id);

    const ok = await this.tryStep(id, "dissolve", () => this.store.completeSession(id));
    if (ok) {
      this.logger.info("discussion", `Session ${id} dissolved (${reason})`);
      await this.hooks?.trigger("session-dissolved", {
        sessionId: id,
        cycleNumber,
        timestamp: this.clock.now(),
        metadata: { reason },
      });
    }
    return ok;
  }

  private async tryStep(
    id: string,
    step: string,
    action: () => Promise<boolean>
  ): Promise<boolean> {
    try {
      const ok = await action();
      if (!ok) {
        this.logger.warn("discussion", `Could not ${step} session ${id}`, {
          code: DISCUSSION_ERROR_CODES.UNKNOWN_SESSION,
        });
      }
      return ok;
    } catch (error) {
      const code =
        step === "dissolve"
          ? DISCUSSION_ERROR_CODES.DISSOLVE_FAILED
          : DISCUSSION_ERROR_CODES.FORCE_CLEAN_FAILED;
      this.logger.error(
        "discussion",
        new PlanningError(code, `Failed to ${step} session ${id}: ${toErrorMessage(error)}`, {
          cause: error,
        })
      );
      return false;
    }
  }

  private async reportTick(
    pending: ReadonlySet<string>,
    snapshots: ReadonlyMap<string, SessionSnapshot>,
    elapsedMs: number,
    cycleNumber?: number
  ): Promise<void> {
    const summaries = [...pending].map((id) => {
      const progress = snapshots.get(id)?.progress;
      return progress
        ? `${id}(${progress.iteration}/${progress.maxIterations}, Q:${progress.quality.toFixed(2)})`
        : id;
    });

    this.logger.info(
      "discussion",
      `${pending.size} session(s) remaining after ${Math.round(elapsedMs / 1000)}s` +
        (summaries.length > 0 ? `: ${summaries.join(", ")}` : ""),
      { cycleNumber }
    );

    await this.hooks?.trigger("discussion-progress", {
      cycleNumber,
      timestamp: this.clock.now(),
      metadata: { remaining: pending.size, elapsedMs, sessions: summaries },
    });
  }
}
