import { describe, it, expect } from 'vitest';
import { DEFAULT_COMPLETION_POLICY, classifySession, policyFromConfig } from './policy.js';
import type { SessionProgress } from './store.js';

function progress(overrides: Partial<SessionProgress> = {}): SessionProgress {
  return {
    id: 's1',
    participants: ['P1'],
    iteration: 1,
    maxIterations: 5,
    quality: 0.5,
    status: 'active',
    createdAt: 0,
    ...overrides,
  };
}

describe('classifySession', () => {
  it('should keep a fresh active session open', () => {
    expect(classifySession(progress(), 'active', 1_000)).toEqual({ completed: false });
  });

  it('should finish on reported completion', () => {
    expect(classifySession(progress({ status: 'completed' }), 'active', 0)).toEqual({
      completed: true,
      reason: 'status_completed',
    });
  });

  it('should finish when the iteration budget is spent', () => {
    expect(classifySession(progress({ iteration: 5 }), 'active', 0)).toEqual({
      completed: true,
      reason: 'max_iterations',
    });
  });

  it('should finish at the quality threshold', () => {
    expect(classifySession(progress({ quality: 0.85 }), 'active', 0)).toEqual({
      completed: true,
      reason: 'quality',
    });
    expect(classifySession(progress({ quality: 0.84 }), 'active', 0).completed).toBe(false);
  });

  it('should finish on a terminal store status', () => {
    for (const status of ['completed', 'dissolved', 'failed'] as const) {
      expect(classifySession(progress(), status, 0)).toEqual({
        completed: true,
        reason: 'terminal_status',
      });
    }
  });

  it('should apply the soft timeout only after enough iterations', () => {
    expect(classifySession(progress({ iteration: 3 }), 'active', 600_001)).toEqual({
      completed: true,
      reason: 'soft_timeout',
    });
    expect(classifySession(progress({ iteration: 2 }), 'active', 600_001).completed).toBe(false);
    expect(classifySession(progress({ iteration: 3 }), 'active', 600_000).completed).toBe(false);
  });

  it('should apply the hard timeout regardless of iterations', () => {
    expect(classifySession(progress({ iteration: 0 }), 'active', 900_001)).toEqual({
      completed: true,
      reason: 'hard_timeout',
    });
  });

  it('should treat unreadable progress as finished', () => {
    expect(classifySession(undefined, undefined, 0)).toEqual({
      completed: true,
      reason: 'progress_unavailable',
    });
  });

  it('should check the signals in order', () => {
    const session = progress({ status: 'completed', iteration: 9, quality: 1 });
    expect(classifySession(session, 'failed', 10_000_000)).toEqual({
      completed: true,
      reason: 'status_completed',
    });
  });

  it('should honour a custom policy', () => {
    const policy = { ...DEFAULT_COMPLETION_POLICY, qualityThreshold: 0.5 };
    expect(classifySession(progress({ quality: 0.5 }), 'active', 0, policy)).toEqual({
      completed: true,
      reason: 'quality',
    });
  });
});

describe('policyFromConfig', () => {
  it('should copy the thresholds from the discussion configuration', () => {
    expect(
      policyFromConfig({
        qualityThreshold: 0.9,
        softTimeoutMs: 1,
        softTimeoutMinIterations: 2,
        hardTimeoutMs: 3,
      })
    ).toEqual({ qualityThreshold: 0.9, softTimeoutMs: 1, softTimeoutMinIterations: 2, hardTimeoutMs: 3 });
  });
});
