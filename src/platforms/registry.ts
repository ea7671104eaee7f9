/**
 * Platform registry and position oracles
 */

import type { GeoPosition, PlatformHandle, PositionOracle } from "../types/index.js";

export interface PlatformRegistry {
  /** Registered platforms in registration order */
  listPlatforms(): readonly PlatformHandle[];
  get(id: string): PlatformHandle | undefined;
}

export class InMemoryPlatformRegistry implements PlatformRegistry {
  private readonly platforms = new Map<string, PlatformHandle>();

  constructor(platforms: Iterable<PlatformHandle> = []) {
    for (const platform of platforms) this.register(platform);
  }

  /** Replaces a platform registered under the same id */
  register(platform: PlatformHandle): void {
    this.platforms.set(platform.id, platform);
  }

  unregister(id: string): boolean {
    return this.platforms.delete(id);
  }

  listPlatforms(): readonly PlatformHandle[] {
    return [...this.platforms.values()];
  }

  get(id: string): PlatformHandle | undefined {
    return this.platforms.get(id);
  }

  get size(): number {
    return this.platforms.size;
  }
}

/**
 * Oracle answering with fixed positions regardless of time
 */
export class StaticPositionOracle implements PositionOracle {
  private readonly positions: Map<string, GeoPosition>;

  constructor(positions: Record<string, GeoPosition> | Map<string, GeoPosition> = {}) {
    this.positions =
      positions instanceof Map ? new Map(positions) : new Map(Object.entries(positions));
  }

  set(platformId: string, position: GeoPosition): void {
    this.positions.set(platformId, position);
  }

  async positionAt(platformId: string, _time: number): Promise<GeoPosition | undefined> {
    return this.positions.get(platformId);
  }
}

/**
 * Oracle computing positions from a function of time, e.g. a circular
 * ground track for simulated platforms
 */
export class FunctionPositionOracle implements PositionOracle {
  constructor(
    private readonly fn: (platformId: string, time: number) => GeoPosition | undefined
  ) {}

  async positionAt(platformId: string, time: number): Promise<GeoPosition | undefined> {
    return this.fn(platformId, time);
  }
}
