/**
 * Meta-task sets
 *
 * Slices the time from a collection instant to the last expected flight end
 * into fixed windows and records which targets fly through each window,
 * together with their trajectory samples inside it.
 */

import { META_TASK_DEFAULTS } from "../core/constants.js";
import { NullLogReporter, type LogReporter } from "../core/log-reporter.js";
import { flightEndTime, type Target, type TimeWindow, type TrajectorySample } from "../types/index.js";

/** Hard stop for window splitting */
export const MAX_META_WINDOWS = 100;

export interface MetaTaskWindow {
  windowId: string;
  start: number;
  end: number;
  durationSeconds: number;
  targetIds: string[];
  trajectorySegments: Record<string, TrajectorySample[]>;
}

export interface MetaTaskSet {
  collectionTime: number;
  interval: TimeWindow;
  /** No target was still flying, so the interval got the default extension */
  extended: boolean;
  /** Window splitting stopped at {@link MAX_META_WINDOWS} */
  truncated: boolean;
  windowSeconds: number;
  overlapSeconds: number;
  targetIds: string[];
  windows: MetaTaskWindow[];
}

export interface MetaTaskBuilderOptions {
  windowSeconds?: number;
  overlapSeconds?: number;
  maxExtensionSeconds?: number;
  logger?: LogReporter;
}

export class MetaTaskBuilder {
  private readonly windowMs: number;
  private readonly overlapMs: number;
  private readonly maxExtensionMs: number;
  private readonly logger: LogReporter;

  constructor(options: MetaTaskBuilderOptions = {}) {
    this.windowMs = (options.windowSeconds ?? META_TASK_DEFAULTS.windowSeconds) * 1000;
    this.overlapMs = (options.overlapSeconds ?? META_TASK_DEFAULTS.overlapSeconds) * 1000;
    this.maxExtensionMs =
      (options.maxExtensionSeconds ?? META_TASK_DEFAULTS.maxExtensionSeconds) * 1000;
    this.logger = options.logger ?? new NullLogReporter();
  }

  build(collectionTime: number, targets: readonly Target[]): MetaTaskSet {
    const { interval, extended } = this.establishInterval(collectionTime, targets);
    const { windows, truncated } = this.splitWindows(interval, targets);

    this.logger.debug(
      "custom",
      `Meta-task set: ${windows.length} window(s) over ${Math.round(
        (interval.end - interval.start) / 1000
      )}s for ${targets.length} target(s)`
    );

    return {
      collectionTime,
      interval,
      extended,
      truncated,
      windowSeconds: this.windowMs / 1000,
      overlapSeconds: this.overlapMs / 1000,
      targetIds: targets.map((t) => t.id),
      windows,
    };
  }

  establishInterval(
    collectionTime: number,
    targets: readonly Target[]
  ): { interval: TimeWindow; extended: boolean } {
    let latestEnd = collectionTime;
    for (const target of targets) {
      latestEnd = Math.max(latestEnd, flightEndTime(target));
    }

    if (latestEnd === collectionTime) {
      this.logger.warn(
        "custom",
        `No target ends after the collection time, extending by ${this.maxExtensionMs / 1000}s`
      );
      return {
        interval: { start: collectionTime, end: collectionTime + this.maxExtensionMs },
        extended: true,
      };
    }

    return { interval: { start: collectionTime, end: latestEnd }, extended: false };
  }

  private splitWindows(
    interval: TimeWindow,
    targets: readonly Target[]
  ): { windows: MetaTaskWindow[]; truncated: boolean } {
    const windows: MetaTaskWindow[] = [];
    const stepMs = this.windowMs - this.overlapMs;
    let start = interval.start;

    while (start < interval.end) {
      if (windows.length >= MAX_META_WINDOWS) {
        this.logger.warn("custom", `Stopped splitting after ${MAX_META_WINDOWS} windows`);
        return { windows, truncated: true };
      }

      const end = Math.min(start + this.windowMs, interval.end);
      const inWindow = targets.filter((t) => t.launchTime < end && flightEndTime(t) > start);

      const trajectorySegments: Record<string, TrajectorySample[]> = {};
      for (const target of inWindow) {
        trajectorySegments[target.id] = target.trajectory.filter(
          (sample) => sample.time >= start && sample.time <= end
        );
      }

      windows.push({
        windowId: `MetaWindow_${String(windows.length).padStart(3, "0")}`,
        start,
        end,
        durationSeconds: (end - start) / 1000,
        targetIds: inWindow.map((t) => t.id),
        trajectorySegments,
      });

      if (end >= interval.end) break;
      start += stepMs;
    }

    return { windows, truncated: false };
  }
}
