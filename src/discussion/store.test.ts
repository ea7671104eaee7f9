import { describe, it, expect, beforeEach } from 'vitest';
import { PlanningError } from '../core/errors.js';
import { InMemorySessionStore } from './store.js';

describe('InMemorySessionStore', () => {
  let store: InMemorySessionStore;

  beforeEach(() => {
    store = new InMemorySessionStore();
  });

  it('should create active sessions with generated ids', async () => {
    const session = store.createSession({ participants: ['P1', 'P2'], createdAt: 100 });

    expect(session.id).toMatch(/^session_[\w-]{10}$/);
    expect(session).toMatchObject({
      participants: ['P1', 'P2'],
      iteration: 0,
      maxIterations: 5,
      quality: 0,
      status: 'active',
      createdAt: 100,
    });
    expect(await store.listActive()).toEqual([session.id]);
  });

  it('should advance a session', async () => {
    const { id } = store.createSession({ participants: ['P1'], createdAt: 0 });
    store.advance(id, { iteration: 2, quality: 0.4 });

    expect(await store.getProgress(id)).toMatchObject({ iteration: 2, quality: 0.4, status: 'active' });
  });

  it('should refuse to advance an unknown session', () => {
    expect(() => store.advance('missing', { iteration: 1 })).toThrow(PlanningError);
  });

  it('should dissolve a session and keep its final status', async () => {
    const { id } = store.createSession({ participants: ['P1'], createdAt: 0 });

    expect(await store.completeSession(id)).toBe(true);
    expect(await store.completeSession(id)).toBe(false);
    expect(await store.listActive()).toEqual([]);
    expect(await store.getStatus(id)).toBe('dissolved');
    expect(store.liveCount).toBe(0);
  });

  it('should keep completed but undissolved sessions in the active list', async () => {
    const { id } = store.createSession({ participants: ['P1'], createdAt: 0 });
    store.advance(id, { status: 'completed' });
    expect(await store.listActive()).toEqual([id]);
  });

  it('should run the force-clean sequence', async () => {
    const { id } = store.createSession({ participants: ['P1'], createdAt: 0 });

    await store.completeSession(id);
    await store.forceUpdateStatus(id, 'force_cleaned');
    await store.removeSession(id);

    expect(await store.getStatus(id)).toBe('force_cleaned');
    expect(store.all().map((s) => s.status)).toEqual(['force_cleaned']);
  });

  it('should reject a status update for an unknown session', async () => {
    await expect(store.forceUpdateStatus('missing', 'failed')).rejects.toMatchObject({
      code: 'DISCUSSION_UNKNOWN_SESSION',
    });
  });
});
