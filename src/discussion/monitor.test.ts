import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ManualClock, type Clock } from '../core/clock.js';
import { MemoryLogReporter } from '../core/log-reporter.js';
import { PlanningHooks } from '../hooks/manager.js';
import { DiscussionMonitor } from './monitor.js';
import { InMemorySessionStore } from './store.js';

describe('DiscussionMonitor', () => {
  let clock: ManualClock;
  let store: InMemorySessionStore;
  let logger: MemoryLogReporter;

  beforeEach(() => {
    clock = new ManualClock(0);
    store = new InMemorySessionStore();
    logger = new MemoryLogReporter();
  });

  it('should return immediately when nothing is active', async () => {
    const monitor = new DiscussionMonitor({ store, clock, logger });

    const report = await monitor.awaitCompletion({ maxWaitMs: 30_000, pollIntervalMs: 5_000 });

    expect(report).toMatchObject({ ticks: 0, watched: 0, sessions: [], timedOut: false, elapsedMs: 0 });
    expect(clock.sleeps).toEqual([]);
  });

  it('should dissolve finished sessions and force-clean the rest at the deadline', async () => {
    const done = store.createSession({ participants: ['P1'], createdAt: 0 });
    store.advance(done.id, { quality: 0.9 });
    const stuck = store.createSession({ participants: ['P2'], createdAt: 0 });
    const monitor = new DiscussionMonitor({ store, clock, logger });

    const report = await monitor.awaitCompletion({ maxWaitMs: 30_000, pollIntervalMs: 5_000 });

    expect(report.ticks).toBe(7);
    expect(report.elapsedMs).toBe(30_000);
    expect(report.timedOut).toBe(true);
    expect(clock.sleeps).toEqual([5_000, 5_000, 5_000, 5_000, 5_000, 5_000]);
    expect(report.sessions).toEqual([
      { sessionId: done.id, participants: ['P1'], outcome: 'dissolved', reason: 'quality', dissolvedCleanly: true },
      { sessionId: stuck.id, participants: ['P2'], outcome: 'force_cleaned', dissolvedCleanly: true },
    ]);
    expect(await store.getStatus(done.id)).toBe('dissolved');
    expect(await store.getStatus(stuck.id)).toBe('force_cleaned');
    expect(await store.listActive()).toEqual([]);
  });

  it('should exit early once every session has finished', async () => {
    const session = store.createSession({ participants: ['P1'], createdAt: 0 });
    const manual = new ManualClock(0);
    const advancing: Clock = {
      now: () => manual.now(),
      sleep: async (ms) => {
        await manual.sleep(ms);
        store.advance(session.id, { status: 'completed' });
      },
    };
    const monitor = new DiscussionMonitor({ store, clock: advancing, logger });

    const report = await monitor.awaitCompletion({ maxWaitMs: 60_000, pollIntervalMs: 5_000 });

    expect(report.ticks).toBe(2);
    expect(report.elapsedMs).toBe(5_000);
    expect(report.timedOut).toBe(false);
    expect(report.sessions[0]).toMatchObject({ outcome: 'dissolved', reason: 'status_completed' });
  });

  it('should shorten the last sleep to the remaining budget', async () => {
    store.createSession({ participants: ['P1'], createdAt: 0 });
    const monitor = new DiscussionMonitor({ store, clock, logger });

    const report = await monitor.awaitCompletion({ maxWaitMs: 12_000, pollIntervalMs: 5_000 });

    expect(clock.sleeps).toEqual([5_000, 5_000, 2_000]);
    expect(report.elapsedMs).toBe(12_000);
    expect(report.timedOut).toBe(true);
  });

  it('should treat an unreadable session as finished', async () => {
    const session = store.createSession({ participants: ['P1'], createdAt: 0 });
    vi.spyOn(store, 'getProgress').mockRejectedValue(new Error('runtime offline'));
    const complete = vi.spyOn(store, 'completeSession');
    const monitor = new DiscussionMonitor({ store, clock, logger });

    const report = await monitor.awaitCompletion({ maxWaitMs: 30_000 });

    expect(report.ticks).toBe(1);
    expect(report.sessions).toEqual([
      {
        sessionId: session.id,
        participants: [],
        outcome: 'dissolved',
        reason: 'progress_unavailable',
        dissolvedCleanly: true,
      },
    ]);
    expect(complete).toHaveBeenCalledOnce();
    expect(logger.byLevel('warn')[0].message).toBe(`Progress of ${session.id} unavailable: runtime offline`);
  });

  it('should attempt each dissolution only once', async () => {
    const session = store.createSession({ participants: ['P1'], createdAt: 0 });
    store.advance(session.id, { iteration: 5 });
    const complete = vi.spyOn(store, 'completeSession').mockRejectedValue(new Error('busy'));
    const monitor = new DiscussionMonitor({ store, clock, logger });

    const report = await monitor.awaitCompletion({ maxWaitMs: 30_000 });
    expect(monitor.trackedSessions).toBe(1);
    const cleaned = await monitor.forceCleanAll();
    expect(monitor.trackedSessions).toBe(0);

    expect(report.sessions[0]).toMatchObject({ reason: 'max_iterations', dissolvedCleanly: false });
    expect(cleaned.map((outcome) => outcome.sessionId)).toEqual([session.id]);
    expect(complete).toHaveBeenCalledOnce();
    expect(logger.byLevel('error')[0].error?.code).toBe('DISCUSSION_DISSOLVE_FAILED');
    expect(await store.getStatus(session.id)).toBe('force_cleaned');
  });

  it('should stop waiting for sessions force-cleaned by someone else', async () => {
    const session = store.createSession({ participants: ['P1'], createdAt: 0 });
    const hooks = new PlanningHooks();
    const forceCleaned = vi.fn();
    hooks.onSessionForceCleaned(forceCleaned);
    const monitor = new DiscussionMonitor({ store, clock, logger, hooks });
    hooks.onDiscussionProgress(async () => {
      await monitor.forceCleanAll();
    });

    const report = await monitor.awaitCompletion({ maxWaitMs: 30_000, pollIntervalMs: 5_000 });

    expect(report.ticks).toBe(1);
    expect(report.timedOut).toBe(false);
    expect(clock.sleeps).toEqual([]);
    expect(report.sessions).toEqual([
      { sessionId: session.id, participants: ['P1'], outcome: 'force_cleaned', dissolvedCleanly: true },
    ]);
    expect(forceCleaned).toHaveBeenCalledOnce();
  });

  it('should drop sessions the store reports as force_cleaned', async () => {
    const session = store.createSession({ participants: ['P1'], createdAt: 0 });
    store.advance(session.id, { status: 'force_cleaned' });
    const complete = vi.spyOn(store, 'completeSession');
    const monitor = new DiscussionMonitor({ store, clock, logger });

    const report = await monitor.awaitCompletion({ maxWaitMs: 30_000, sessionIds: [session.id] });

    expect(report.ticks).toBe(1);
    expect(report.sessions).toEqual([
      { sessionId: session.id, participants: ['P1'], outcome: 'force_cleaned', dissolvedCleanly: false },
    ]);
    expect(complete).not.toHaveBeenCalled();
  });

  it('should forget sessions once they leave the store', async () => {
    const done = store.createSession({ participants: ['P1'], createdAt: 0 });
    store.advance(done.id, { quality: 0.9 });
    store.createSession({ participants: ['P2'], createdAt: 0 });
    const monitor = new DiscussionMonitor({ store, clock, logger });

    await monitor.awaitCompletion({ maxWaitMs: 10_000, pollIntervalMs: 5_000 });

    expect(monitor.trackedSessions).toBe(0);
  });

  it('should only watch the given sessions', async () => {
    const watched = store.createSession({ participants: ['P1'], createdAt: 0 });
    store.advance(watched.id, { status: 'completed' });
    const other = store.createSession({ participants: ['P2'], createdAt: 0 });
    const monitor = new DiscussionMonitor({ store, clock, logger });

    const report = await monitor.awaitCompletion({ maxWaitMs: 30_000, sessionIds: [watched.id] });

    expect(report.watched).toBe(1);
    expect(report.sessions.map((s) => s.sessionId)).toEqual([watched.id]);
    expect(await store.listActive()).toEqual([other.id]);
  });

  it('should apply the configured completion policy', async () => {
    const session = store.createSession({ participants: ['P1'], createdAt: 0 });
    store.advance(session.id, { quality: 0.6 });
    const monitor = new DiscussionMonitor({ store, clock, logger, policy: { qualityThreshold: 0.6 } });

    const report = await monitor.awaitCompletion({ maxWaitMs: 30_000 });

    expect(report.sessions[0]).toMatchObject({ reason: 'quality' });
  });

  it('should log and emit progress on every tick', async () => {
    const session = store.createSession({ participants: ['P1'], createdAt: 0 });
    store.advance(session.id, { iteration: 1, quality: 0.25 });
    const hooks = new PlanningHooks();
    const progress = vi.fn();
    const forceCleaned = vi.fn();
    hooks.onDiscussionProgress(progress);
    hooks.onSessionForceCleaned(forceCleaned);
    const monitor = new DiscussionMonitor({ store, clock, logger, hooks });

    await monitor.awaitCompletion({ maxWaitMs: 5_000, pollIntervalMs: 5_000, cycleNumber: 4 });

    expect(progress).toHaveBeenCalledTimes(2);
    expect(progress.mock.calls[0][0]).toMatchObject({
      hookType: 'discussion-progress',
      cycleNumber: 4,
      metadata: { remaining: 1, elapsedMs: 0, sessions: [`${session.id}(1/5, Q:0.25)`] },
    });
    expect(forceCleaned).toHaveBeenCalledWith(
      expect.objectContaining({ sessionId: session.id, cycleNumber: 4, timestamp: 5_000 })
    );
    expect(logger.byLevel('info')[0].message).toBe(
      `1 session(s) remaining after 0s: ${session.id}(1/5, Q:0.25)`
    );
  });

  it('should emit session-dissolved for clean dissolutions', async () => {
    const session = store.createSession({ participants: ['P1'], createdAt: 0 });
    store.advance(session.id, { status: 'completed' });
    const hooks = new PlanningHooks();
    const dissolved = vi.fn();
    hooks.onSessionDissolved(dissolved);
    const monitor = new DiscussionMonitor({ store, clock, hooks });

    await monitor.awaitCompletion({ maxWaitMs: 5_000 });

    expect(dissolved).toHaveBeenCalledWith(
      expect.objectContaining({ sessionId: session.id, metadata: { reason: 'status_completed' } })
    );
  });
});
