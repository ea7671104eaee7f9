/**
 * Simulated tracking platform. Accepting a task opens a discussion session
 * in the store with the platform as its only participant.
 */

import { systemClock, type Clock } from "../core/clock.js";
import { DISTRIBUTION_ERROR_CODES, PlanningError } from "../core/errors.js";
import type { InMemorySessionStore } from "../discussion/store.js";
import type { PlatformHandle, Target, TrackingTask } from "../types/index.js";

export interface SimulatedPlatformOptions {
  id: string;
  store: InMemorySessionStore;
  clock?: Clock;
  capabilities?: readonly string[];
  maxIterations?: number;
  /** Reject every task, as an overloaded or offline platform would */
  refuseTasks?: boolean;
}

export class SimulatedPlatform implements PlatformHandle {
  readonly id: string;
  readonly capabilities: readonly string[];
  readonly receivedTasks: TrackingTask[] = [];
  readonly sessionIds: string[] = [];
  private readonly store: InMemorySessionStore;
  private readonly clock: Clock;
  private readonly maxIterations?: number;
  refuseTasks: boolean;

  constructor(options: SimulatedPlatformOptions) {
    this.id = options.id;
    this.capabilities = options.capabilities ?? ["tracking"];
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.maxIterations = options.maxIterations;
    this.refuseTasks = options.refuseTasks ?? false;
  }

  async receiveTask(task: TrackingTask, target: Target): Promise<void> {
    if (this.refuseTasks) {
      throw new PlanningError(
        DISTRIBUTION_ERROR_CODES.DISPATCH_FAILED,
        `Platform ${this.id} refused task ${task.id}`,
        { recoverable: true }
      );
    }

    this.receivedTasks.push(task);
    const session = this.store.createSession({
      participants: [this.id],
      maxIterations: this.maxIterations,
      createdAt: this.clock.now(),
      metadata: { taskId: task.id, targetId: target.id, priority: task.priority },
    });
    this.sessionIds.push(session.id);
  }
}
