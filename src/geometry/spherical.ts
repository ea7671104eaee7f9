/**
 * Spherical-earth distance and coordinate helpers.
 */

import { GEOMETRY_DEFAULTS } from "../core/constants.js";
import type { CartesianPosition, GeoPosition } from "../types/index.js";

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

/**
 * Finite latitude/longitude and, when present, a finite altitude
 */
export function isValidPosition(position: unknown): position is GeoPosition {
  if (position === null || typeof position !== "object") return false;
  const lat = "lat" in position ? position.lat : undefined;
  const lon = "lon" in position ? position.lon : undefined;
  const alt = "alt" in position ? position.alt : undefined;
  if (typeof lat !== "number" || !Number.isFinite(lat)) return false;
  if (typeof lon !== "number" || !Number.isFinite(lon)) return false;
  if (alt !== undefined && (typeof alt !== "number" || !Number.isFinite(alt))) return false;
  return true;
}

/**
 * Haversine ground distance combined with the altitude difference:
 * `sqrt(ground² + Δalt²)`.
 *
 * Returns `+Infinity` for malformed input instead of throwing.
 */
export function sphericalDistance(
  a: GeoPosition,
  b: GeoPosition,
  earthRadiusKm: number = GEOMETRY_DEFAULTS.earthRadiusKm
): number {
  if (!isValidPosition(a) || !isValidPosition(b)) {
    return Number.POSITIVE_INFINITY;
  }

  const lat1 = toRadians(a.lat);
  const lat2 = toRadians(b.lat);
  const dLat = lat2 - lat1;
  const dLon = toRadians(b.lon) - toRadians(a.lon);

  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  // rounding can push h a hair above 1 for antipodal points
  const c = 2 * Math.asin(Math.sqrt(Math.min(1, h)));

  const ground = earthRadiusKm * c;
  const dAlt = (b.alt ?? 0) - (a.alt ?? 0);
  return Math.sqrt(ground * ground + dAlt * dAlt);
}

/**
 * Geodetic → earth-centred Cartesian on a spherical earth
 */
export function geodeticToEcef(
  position: GeoPosition,
  earthRadiusKm: number = GEOMETRY_DEFAULTS.earthRadiusKm
): CartesianPosition {
  const lat = toRadians(position.lat);
  const lon = toRadians(position.lon);
  const r = earthRadiusKm + (position.alt ?? 0);
  return {
    x: r * Math.cos(lat) * Math.cos(lon),
    y: r * Math.cos(lat) * Math.sin(lon),
    z: r * Math.sin(lat),
  };
}
