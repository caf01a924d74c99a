import type { Position } from '../types/telemetry.js';

export const EARTH_RADIUS_NM = 3440.065;
const DEG_TO_RAD = Math.PI / 180;

/** Convert degrees to radians */
export function toRadians(degrees: number): number {
  return degrees * DEG_TO_RAD;
}

/**
 * Haversine distance between two positions in nautical miles
 */
export function haversineDistance(a: Position, b: Position): number {
  const lat1 = toRadians(a.lat);
  const lat2 = toRadians(b.lat);
  const dLat = toRadians(b.lat - a.lat);
  const dLon = toRadians(b.lon - a.lon);

  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) * Math.sin(dLon / 2);

  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
  return EARTH_RADIUS_NM * c;
}

/** True for the 0/0 position a sim reports before it has a fix */
export function isNullIsland(position: Position): boolean {
  return position.lat === 0 && position.lon === 0;
}

/** Round to a fixed number of decimals */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
