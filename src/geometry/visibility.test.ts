import { describe, it, expect } from 'vitest';
import type { TrajectorySample } from '../types/index.js';
import { VisibilityScan, distanceConfidence, variance, visibilityWindows } from './visibility.js';

const ONE_DEGREE_KM = (6371 * Math.PI) / 180;

// Equatorial trajectory seen from a platform at (0, 0)
const trajectory: TrajectorySample[] = [0, 1, 2, 0.5, 5].map((lon, i) => ({
  position: { lat: 0, lon },
  time: 1_000 + i * 10_000,
}));
const origin = () => ({ lat: 0, lon: 0 });

describe('visibilityWindows', () => {
  it('should split contiguous visible runs into windows', () => {
    const windows = visibilityWindows(trajectory, origin, 150);

    expect(windows).toHaveLength(2);
    expect(windows[0]).toMatchObject({ startIndex: 0, endIndex: 1, durationSeconds: 20 });
    expect(windows[0].minDistanceKm).toBe(0);
    expect(windows[0].startTime).toBe(1_000);
    expect(windows[0].endTime).toBe(11_000);

    expect(windows[1]).toMatchObject({ startIndex: 3, endIndex: 3, durationSeconds: 10 });
    expect(windows[1].minDistanceKm).toBeCloseTo(ONE_DEGREE_KM / 2, 6);
  });

  it('should close a window still open at the end of the trajectory', () => {
    const windows = visibilityWindows(trajectory, origin, 1_000);
    expect(windows).toHaveLength(1);
    expect(windows[0]).toMatchObject({ startIndex: 0, endIndex: 4, durationSeconds: 50 });
  });

  it('should use the configured sample interval for durations', () => {
    const windows = visibilityWindows(trajectory, origin, 150, { sampleIntervalSeconds: 30 });
    expect(windows.map((w) => w.durationSeconds)).toEqual([60, 30]);
  });

  it('should return nothing for an empty trajectory or an unreachable platform', () => {
    expect(visibilityWindows([], origin, 2000)).toEqual([]);
    expect(visibilityWindows(trajectory, () => ({ lat: 0, lon: 90 }), 2000)).toEqual([]);
  });

  it('should pass each sample and index to the position function', () => {
    const seen: number[] = [];
    visibilityWindows(trajectory, (_sample, index) => {
      seen.push(index);
      return origin();
    });
    expect(seen).toEqual([0, 1, 2, 3, 4]);
  });
});

describe('VisibilityScan', () => {
  it('should restart from the beginning on every iteration', () => {
    const scan = new VisibilityScan(trajectory, origin, { thresholdKm: 150 });
    const first = [...scan];
    const second = [...scan];
    expect(second).toEqual(first);
    expect(first).toHaveLength(2);
  });
});

describe('distanceConfidence', () => {
  it('should be 0 for no distances', () => {
    expect(distanceConfidence([], 3)).toBe(0);
  });

  it('should be 1 for stable distances with full coverage', () => {
    expect(distanceConfidence([100, 100, 100], 3)).toBe(1);
    expect(distanceConfidence([100, 100, 100], 5)).toBe(1);
  });

  it('should average the stability and coverage terms', () => {
    expect(distanceConfidence([1_000, 1_000], 1)).toBeCloseTo(2 / 3, 10);
    // variance of [0, 2000] is exactly 1e6
    expect(distanceConfidence([0, 2_000], 0)).toBe(0);
    expect(distanceConfidence([0, 2_000], 3)).toBe(0.5);
  });

  it('should accept a window list instead of a count', () => {
    expect(distanceConfidence([10, 10], [{}, {}, {}])).toBe(1);
  });

  it('should zero the stability term when any distance is not finite', () => {
    expect(distanceConfidence([100, Infinity], 3)).toBe(0.5);
    expect(distanceConfidence([Infinity], 0)).toBe(0);
  });
});

describe('variance', () => {
  it('should compute the population variance', () => {
    expect(variance([2, 4, 4, 4, 5, 5, 7, 9])).toBe(4);
    expect(Number.isNaN(variance([]))).toBe(true);
  });
});
