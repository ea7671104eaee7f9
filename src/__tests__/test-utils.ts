/**
 * Test utilities for the planning core
 */

import type { DistanceCalculator } from "../distribution/distributor.js";
import type { DistanceResult, GeoPosition, Target, TrackingTask } from "../types/index.js";

/**
 * Create a target flying due east along the equator from `startLon`,
 * one sample per `stepSeconds`
 */
export function createMockTarget(id: string, overrides: Partial<Target> = {}): Target {
	const launchTime = overrides.launchTime ?? 1_000_000;
	const startLon = 0;
	const trajectory = Array.from({ length: 5 }, (_, i) => ({
		position: { lat: 0, lon: startLon + i, alt: 100 },
		time: launchTime + i * 10_000,
	}));

	return {
		id,
		launchPosition: { lat: 0, lon: startLon, alt: 0 },
		targetPosition: { lat: 0, lon: startLon + 10, alt: 0 },
		launchTime,
		flightDurationSeconds: 600,
		trajectory,
		priority: 1,
		threatLevel: "medium",
		...overrides,
	};
}

/**
 * Create a trajectory of fixed positions spaced `stepMs` apart
 */
export function createTrajectory(positions: GeoPosition[], start = 0, stepMs = 10_000) {
	return positions.map((position, i) => ({ position, time: start + i * stepMs }));
}

/**
 * Calculator returning preset distances and confidences:
 * `table[targetId][platformId] = [minDistanceKm, confidence]`
 */
export function createTableCalculator(
	table: Record<string, Record<string, [number, number]>>,
): DistanceCalculator & { calls: Array<{ targetId: string; platformId: string; time: number }> } {
	const calls: Array<{ targetId: string; platformId: string; time: number }> = [];
	return {
		calls,
		async compute(target: Target, platformId: string, time: number): Promise<DistanceResult> {
			calls.push({ targetId: target.id, platformId, time });
			const entry = table[target.id]?.[platformId];
			const [minDistanceKm, confidence] = entry ?? [Number.POSITIVE_INFINITY, 0];
			return {
				targetId: target.id,
				platformId,
				minDistanceKm,
				avgDistanceKm: minDistanceKm,
				closestApproachTime: target.launchTime,
				visibilityWindows: [],
				confidence,
			};
		},
	};
}

/**
 * Platform handle that records the tasks it receives
 */
export function createRecordingPlatform(id: string, fail = false) {
	const received: TrackingTask[] = [];
	return {
		id,
		received,
		async receiveTask(task: TrackingTask): Promise<void> {
			if (fail) throw new Error(`${id} is offline`);
			received.push(task);
		},
	};
}
