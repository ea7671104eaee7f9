import { describe, it, expect } from 'vitest';
import { createMockTarget } from '../__tests__/test-utils.js';
import { ManualClock } from '../core/clock.js';
import { InMemorySessionStore } from '../discussion/store.js';
import type { TrackingTask } from '../types/index.js';
import {
  FunctionPositionOracle,
  InMemoryPlatformRegistry,
  StaticPositionOracle,
} from './registry.js';
import { SimulatedPlatform } from './simulated.js';

const task: TrackingTask = {
  id: 'track_t1_P1',
  targetId: 't1',
  priority: 2,
  window: { start: 1_000_000, end: 1_600_000 },
};

describe('InMemoryPlatformRegistry', () => {
  it('should keep registration order and replace by id', () => {
    const store = new InMemorySessionStore();
    const p1 = new SimulatedPlatform({ id: 'P1', store });
    const p2 = new SimulatedPlatform({ id: 'P2', store });
    const registry = new InMemoryPlatformRegistry([p1, p2]);

    const replacement = new SimulatedPlatform({ id: 'P1', store, capabilities: ['radar'] });
    registry.register(replacement);

    expect(registry.listPlatforms().map((p) => p.id)).toEqual(['P1', 'P2']);
    expect(registry.get('P1')).toBe(replacement);
    expect(registry.unregister('P2')).toBe(true);
    expect(registry.unregister('P2')).toBe(false);
    expect(registry.size).toBe(1);
  });
});

describe('position oracles', () => {
  it('should answer fixed positions', async () => {
    const oracle = new StaticPositionOracle(new Map([['P1', { lat: 1, lon: 2 }]]));
    oracle.set('P2', { lat: 3, lon: 4, alt: 500 });

    expect(await oracle.positionAt('P1', 0)).toEqual({ lat: 1, lon: 2 });
    expect(await oracle.positionAt('P2', 99)).toEqual({ lat: 3, lon: 4, alt: 500 });
    expect(await oracle.positionAt('P3', 0)).toBeUndefined();
  });

  it('should pass the time to the position function', async () => {
    const oracle = new FunctionPositionOracle((id, time) =>
      id === 'P1' ? { lat: 0, lon: time / 1000 } : undefined
    );

    expect(await oracle.positionAt('P1', 45_000)).toEqual({ lat: 0, lon: 45 });
    expect(await oracle.positionAt('P2', 45_000)).toBeUndefined();
  });
});

describe('SimulatedPlatform', () => {
  it('should open a session for every accepted task', async () => {
    const store = new InMemorySessionStore();
    const clock = new ManualClock(5_000);
    const platform = new SimulatedPlatform({ id: 'P1', store, clock, maxIterations: 3 });

    await platform.receiveTask(task, createMockTarget('t1'));

    expect(platform.receivedTasks).toEqual([task]);
    expect(platform.sessionIds).toHaveLength(1);
    expect(await store.getProgress(platform.sessionIds[0])).toMatchObject({
      participants: ['P1'],
      iteration: 0,
      maxIterations: 3,
      quality: 0,
      status: 'active',
      createdAt: 5_000,
      metadata: { taskId: 'track_t1_P1', targetId: 't1', priority: 2 },
    });
  });

  it('should reject tasks while refusing', async () => {
    const store = new InMemorySessionStore();
    const platform = new SimulatedPlatform({ id: 'P1', store, refuseTasks: true });

    await expect(platform.receiveTask(task, createMockTarget('t1'))).rejects.toMatchObject({
      code: 'DISTRIBUTION_DISPATCH_FAILED',
      message: 'Platform P1 refused task track_t1_P1',
    });
    expect(store.liveCount).toBe(0);
  });
});
