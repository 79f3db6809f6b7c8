import type { Coord, ID, PathResult } from './types';

const EARTH_RADIUS_KM = 6371.0088;

// Haversine formula to compute great-circle distance between two points on Earth in km
export function haversineKm(a: Coord, b: Coord): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const lat1 = toRad(a[0]);
  const lon1 = toRad(a[1]);
  const lat2 = toRad(b[0]);
  const lon2 = toRad(b[1]);
  const dLat = lat2 - lat1;
  const dLon = lon2 - lon1;
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(h));
}

/**
 * Straight-line distance between two cities, or undefined when either has no
 * known position.
 */
export function straightLineKm(
  from: ID,
  to: ID,
  positions: Readonly<Record<ID, Coord>>,
): number | undefined {
  const a = positions[from];
  const b = positions[to];
  if (!a || !b) return undefined;
  return haversineKm(a, b);
}

/**
 * Road distance divided by straight-line distance for a found path.
 */
export function detourRatio(
  result: PathResult,
  positions: Readonly<Record<ID, Coord>>,
): number | undefined {
  const line = straightLineKm(result.source, result.target, positions);
  if (line === undefined || line === 0) return undefined;
  return result.totalKm / line;
}
