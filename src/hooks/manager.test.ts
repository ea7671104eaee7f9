import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "node:events";
import { MemoryLogReporter } from "../core/log-reporter.js";
import { CircularBuffer, CommonHooks, PlanningHooks, createPlanningHooks, percentile } from "./manager.js";

describe("PlanningHooks", () => {
  let hooks: PlanningHooks;

  beforeEach(() => {
    hooks = new PlanningHooks();
  });

  describe("Hook Registration", () => {
    it("should register and trigger hooks", async () => {
      const handler = vi.fn();
      hooks.register("cycle-start", handler);

      await hooks.trigger("cycle-start", { cycleNumber: 1, timestamp: 42 });

      expect(handler).toHaveBeenCalledOnce();
      expect(handler).toHaveBeenCalledWith({
        hookType: "cycle-start",
        cycleNumber: 1,
        timestamp: 42,
      });
    });

    it("should return unregister function", async () => {
      const handler = vi.fn();
      const unregister = hooks.onCycleEnd(handler);

      await hooks.trigger("cycle-end", {});
      unregister();
      await hooks.trigger("cycle-end", {});

      expect(handler).toHaveBeenCalledOnce();
    });

    it("should run handlers in registration order", async () => {
      const order: string[] = [];
      hooks.onPhaseStart(() => {
        order.push("first");
      });
      hooks.onPhaseStart(() => {
        order.push("second");
      });

      await hooks.trigger("phase-start", { phase: "discussing" });

      expect(order).toEqual(["first", "second"]);
    });

    it("should register hooks passed in the configuration unless disabled", () => {
      const configured = createPlanningHooks({
        hooks: [
          { type: "cycle-start", handler: vi.fn() },
          { type: "cycle-end", handler: vi.fn(), enabled: false },
        ],
      });
      expect(configured.handlerCount("cycle-start")).toBe(1);
      expect(configured.hasHandlers("cycle-end")).toBe(false);
      expect(configured.getRegisteredTypes()).toEqual(["cycle-start"]);
    });
  });

  describe("Blocking", () => {
    it("should stop at the first handler that refuses", async () => {
      const later = vi.fn();
      hooks.onCycleStart(() => ({ proceed: false, reason: "paused" }));
      hooks.onCycleStart(later);

      const outcome = await hooks.trigger("cycle-start", { cycleNumber: 3 });

      expect(outcome).toEqual({ blocked: true, message: "paused" });
      expect(later).not.toHaveBeenCalled();
    });

    it("should log handler errors and carry on", async () => {
      const logger = new MemoryLogReporter();
      const guarded = new PlanningHooks({ logger });
      const after = vi.fn();
      guarded.onCycleEnd(() => {
        throw new Error("observer broke");
      });
      guarded.onCycleEnd(after);

      const outcome = await guarded.trigger("cycle-end", {});

      expect(outcome.blocked).toBe(false);
      expect(after).toHaveBeenCalledOnce();
      expect(logger.entries).toHaveLength(1);
      expect(logger.entries[0].level).toBe("error");
      expect(logger.entries[0].message).toBe("observer broke");
      expect(logger.entries[0].metadata).toEqual({ hookType: "cycle-end" });
    });
  });

  describe("Events", () => {
    it("should emit triggered hooks to listeners", async () => {
      const listener = vi.fn();
      hooks.on("session-dissolved", listener);

      await hooks.trigger("session-dissolved", { sessionId: "s1", timestamp: 5 });

      expect(listener).toHaveBeenCalledWith({
        hookType: "session-dissolved",
        sessionId: "s1",
        timestamp: 5,
      });
    });

    it("should not emit error events", async () => {
      await expect(hooks.trigger("error", { error: new Error("x") })).resolves.toEqual({
        blocked: false,
      });
    });

    it("should not emit when events are disabled", async () => {
      const quiet = new PlanningHooks({ emitEvents: false });
      const listener = vi.fn();
      quiet.on("cycle-end", listener);
      await quiet.trigger("cycle-end", {});
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("Metrics", () => {
    it("should track runs, durations and errors per phase", async () => {
      for (const duration of [10, 20, 30]) {
        await hooks.trigger("phase-start", { phase: "discussing" });
        await hooks.trigger("phase-end", { phase: "discussing", duration });
      }
      await hooks.trigger("error", { phase: "discussing" });

      expect(hooks.getPhaseMetrics("discussing")).toEqual({
        runs: 3,
        errors: 1,
        avgDuration: 20,
        p95Duration: 30,
      });
      expect(Object.keys(hooks.getMetrics())).toEqual(["discussing"]);
      expect(hooks.getPhaseMetrics("idle")).toBeNull();
    });

    it("should not track metrics when disabled", async () => {
      const untracked = new PlanningHooks({ trackMetrics: false });
      await untracked.trigger("phase-start", { phase: "discussing" });
      expect(untracked.getMetrics()).toEqual({});
    });

    it("should keep only the newest durations", async () => {
      const small = new PlanningHooks({ metricsBufferSize: 2 });
      await small.trigger("phase-start", { phase: "completed" });
      for (const duration of [1000, 2, 4]) {
        await small.trigger("phase-end", { phase: "completed", duration });
      }
      expect(small.getPhaseMetrics("completed")?.avgDuration).toBe(3);
    });

    it("should clear everything on destroy", async () => {
      const listener = vi.fn();
      hooks.on("cycle-end", listener);
      hooks.onCycleEnd(vi.fn());
      await hooks.trigger("phase-start", { phase: "idle" });

      hooks.destroy();

      expect(hooks.listenerCount("cycle-end")).toBe(0);
      expect(hooks.hasHandlers("cycle-end")).toBe(false);
      expect(hooks.getMetrics()).toEqual({});
    });
  });
});

describe("CommonHooks", () => {
  it("vetoWhen should block only cycle-start", async () => {
    const hooks = new PlanningHooks();
    hooks.onCycleStart(CommonHooks.vetoWhen((ctx) => ctx.cycleNumber === 2, "skip even"));

    expect((await hooks.trigger("cycle-start", { cycleNumber: 1 })).blocked).toBe(false);
    expect(await hooks.trigger("cycle-start", { cycleNumber: 2 })).toEqual({
      blocked: true,
      message: "skip even",
    });
  });

  it("trackCycles should record ended cycles", async () => {
    const hooks = new PlanningHooks();
    const tracker = CommonHooks.trackCycles();
    hooks.onCycleEnd(tracker.handler);

    await hooks.trigger("cycle-end", { cycleId: "c1", cycleNumber: 1, duration: 7 });

    expect(tracker.getCycles()).toEqual([{ cycleId: "c1", cycleNumber: 1, duration: 7 }]);
    tracker.clear();
    expect(tracker.getCycles()).toEqual([]);
  });

  it("logPhases should write debug entries", async () => {
    const logger = new MemoryLogReporter();
    const hooks = new PlanningHooks();
    hooks.onPhaseEnd(CommonHooks.logPhases(logger));

    await hooks.trigger("phase-end", { cycleNumber: 4, phase: "discussing", duration: 12 });

    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0]).toMatchObject({
      level: "debug",
      type: "phase",
      message: "phase-end discussing (12ms)",
      cycleNumber: 4,
    });
  });

  it("forwardSessions should re-emit session events", async () => {
    const hooks = new PlanningHooks();
    const external = new EventEmitter();
    const listener = vi.fn();
    external.on("session:force-cleaned", listener);
    hooks.onSessionForceCleaned(CommonHooks.forwardSessions(external));

    await hooks.trigger("session-force-cleaned", { sessionId: "s9" });

    expect(listener).toHaveBeenCalledWith({ sessionId: "s9" });
  });
});

describe("CircularBuffer", () => {
  it("should return values oldest first once wrapped", () => {
    const buffer = new CircularBuffer<number>(3);
    [1, 2, 3, 4, 5].forEach((v) => buffer.push(v));
    expect(buffer.toArray()).toEqual([3, 4, 5]);
    expect(buffer.length).toBe(3);
    buffer.clear();
    expect(buffer.toArray()).toEqual([]);
  });
});

describe("percentile", () => {
  it("should pick the nearest-rank value", () => {
    expect(percentile([5, 1, 4, 2, 3], 0.95)).toBe(5);
    expect(percentile([5, 1, 4, 2, 3], 0.5)).toBe(3);
    expect(percentile([], 0.95)).toBe(0);
  });
});
