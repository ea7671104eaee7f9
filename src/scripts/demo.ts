/**
 * Rolling Planning Demo
 *
 * Runs a few planning cycles against simulated platforms. A fake discussion
 * runtime raises each session's quality on every monitor tick, so some
 * sessions converge and the slow ones are force-cleaned.
 *
 * Run: npm run demo
 */

import {
  createLogReporter,
  loadConfig,
  type LogReporter,
} from "../core/index.js";
import { InMemorySessionStore } from "../discussion/store.js";
import { CommonHooks, createPlanningHooks } from "../hooks/manager.js";
import { RollingPlanningCycleManager } from "../planning/cycle-manager.js";
import { InMemoryPlatformRegistry, StaticPositionOracle } from "../platforms/registry.js";
import { SimulatedPlatform } from "../platforms/simulated.js";
import { FileReportSink } from "../reporting/file-sink.js";
import type { GeoPosition, Target, ThreatLevel } from "../types/index.js";

const PLATFORM_POSITIONS: Record<string, GeoPosition> = {
  "leo-01": { lat: 10, lon: 20, alt: 550 },
  "leo-02": { lat: -5, lon: 35, alt: 550 },
  "leo-03": { lat: 25, lon: 50, alt: 550 },
  "meo-01": { lat: 0, lon: 80, alt: 20200 },
};

function createTarget(
  id: string,
  from: GeoPosition,
  to: GeoPosition,
  launchTime: number,
  threatLevel: ThreatLevel
): Target {
  const samples = 12;
  const flightDurationSeconds = 660;
  const trajectory = Array.from({ length: samples }, (_, i) => {
    const f = i / (samples - 1);
    return {
      position: {
        lat: from.lat + (to.lat - from.lat) * f,
        lon: from.lon + (to.lon - from.lon) * f,
        alt: 1200 * Math.sin(Math.PI * f),
      },
      time: launchTime + i * 60_000,
    };
  });
  return {
    id,
    launchPosition: from,
    targetPosition: to,
    launchTime,
    flightDurationSeconds,
    trajectory,
    priority: threatLevel === "critical" ? 3 : threatLevel === "high" ? 2 : 1,
    threatLevel,
  };
}

function detections(now: number, cycle: number): Target[] {
  const shift = cycle * 3;
  return [
    createTarget(`tgt-${cycle}-a`, { lat: 5, lon: 15 + shift, alt: 0 }, { lat: 20, lon: 45, alt: 0 }, now, "high"),
    createTarget(`tgt-${cycle}-b`, { lat: -10, lon: 30, alt: 0 }, { lat: 0, lon: 60 + shift, alt: 0 }, now, "medium"),
    createTarget(`tgt-${cycle}-c`, { lat: 30, lon: 55, alt: 0 }, { lat: 15, lon: 75, alt: 0 }, now, "critical"),
  ];
}

/**
 * Every tick, move each live session one iteration forward. Sessions of
 * high-priority tasks gain quality faster.
 */
function simulateDiscussions(store: InMemorySessionStore, logger: LogReporter): void {
  for (const session of store.all()) {
    if (session.status !== "active") continue;
    const priority = typeof session.metadata?.priority === "number" ? session.metadata.priority : 1;
    const quality = Math.min(1, session.quality + 0.15 * priority);
    store.advance(session.id, { iteration: session.iteration + 1, quality });
    logger.debug("discussion", `Session ${session.id} at quality ${quality.toFixed(2)}`);
  }
}

async function main(): Promise<void> {
  const config = loadConfig({
    discussion: {
      pollIntervalMs: 250,
      baseTimePerIterationMs: 500,
      maxIterations: 4,
      safetyMargin: 1.5,
    },
    cycle: { maxCycles: 3 },
    reporting: { outputDir: "./output/planning-demo" },
  });

  const logger = createLogReporter({
    console: config.logging.console && { minLevel: config.logging.level, prefix: "[planning]" },
    file: config.logging.file,
  });

  const store = new InMemorySessionStore();
  const hooks = createPlanningHooks({ logger });
  hooks.register("phase-end", CommonHooks.logPhases(logger));
  hooks.onDiscussionProgress(() => simulateDiscussions(store, logger));
  hooks.onDispatchFailed((ctx) => {
    logger.warn("dispatch", `Task for ${ctx.targetId ?? "?"} not delivered to ${ctx.platformId ?? "?"}`);
  });

  const platforms = Object.keys(PLATFORM_POSITIONS).map(
    (id) => new SimulatedPlatform({ id, store, maxIterations: config.discussion.maxIterations })
  );

  const manager = new RollingPlanningCycleManager({
    store,
    registry: new InMemoryPlatformRegistry(platforms),
    oracle: new StaticPositionOracle(PLATFORM_POSITIONS),
    reportSink: new FileReportSink(config.reporting.outputDir),
    config,
    logger,
    hooks,
  });

  manager.start();
  for (let n = 1; n <= config.cycle.maxCycles + 1; n++) {
    const cycle = await manager.checkAndExecuteCycle(detections(Date.now(), n));
    if (!cycle) break;

    const metrics = cycle.results?.metrics;
    logger.info(
      "custom",
      `Cycle ${cycle.cycleNumber}: ${cycle.state}, coverage ${((metrics?.coverage ?? 0) * 100).toFixed(0)}%` +
        (metrics?.meanGdop !== undefined ? `, GDOP ${metrics.meanGdop.toFixed(2)} (${metrics.geometryQuality})` : ""),
      { reportFiles: cycle.metadata.reportFiles ?? [] }
    );
  }
  await manager.stop();

  logger.info("custom", "Phase metrics", { ...hooks.getMetrics() });
  hooks.destroy();
  await logger.close?.();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
