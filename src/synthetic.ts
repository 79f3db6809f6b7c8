import seedrandom from 'seedrandom';
import type { ID, RoadRecord } from './types';

export interface SyntheticOptions {
  cities: number;
  roads: number;
  seed?: number;
  /** Upper bound for generated road lengths */
  maxKm?: number;
  /** Share of roads generated as one-way, 0..1 */
  oneWayShare?: number;
}

export interface SyntheticNetwork {
  cities: ID[];
  roads: RoadRecord[];
}

function cityName(i: number): ID {
  return `C${String(i).padStart(2, '0')}`;
}

/**
 * Generate a random road network. The same seed always gives the same
 * network. Each unordered pair of cities gets at most one road, so the
 * result always loads into a graph.
 */
export function generateNetwork(opts: SyntheticOptions): SyntheticNetwork {
  if (!Number.isInteger(opts.cities) || opts.cities < 1) {
    throw new Error(`cities must be a positive integer: ${opts.cities}`);
  }
  const rng = seedrandom(String(opts.seed ?? 0));
  const maxKm = opts.maxKm ?? 900;
  const oneWayShare = opts.oneWayShare ?? 0;
  const cities = Array.from({ length: opts.cities }, (_, i) => cityName(i));

  const maxRoads = (opts.cities * (opts.cities - 1)) / 2;
  const target = Math.min(Math.max(0, Math.floor(opts.roads)), maxRoads);
  const used = new Set<string>();
  const roads: RoadRecord[] = [];
  while (roads.length < target) {
    const a = Math.floor(rng() * opts.cities);
    const b = Math.floor(rng() * opts.cities);
    if (a === b) continue;
    const key = a < b ? `${a}:${b}` : `${b}:${a}`;
    if (used.has(key)) continue;
    used.add(key);
    const road: RoadRecord = {
      from: cities[a],
      to: cities[b],
      km: 10 + Math.round(rng() * (maxKm - 10)),
    };
    if (rng() < oneWayShare) road.directed = true;
    roads.push(road);
  }
  return { cities, roads };
}

/** Render records in the distances CSV layout. */
export function toDistancesCsv(roads: readonly RoadRecord[]): string {
  const lines = ['source,target,distance_km,directed'];
  for (const r of roads) {
    lines.push(`${r.from},${r.to},${r.km},${r.directed ? 'true' : 'false'}`);
  }
  return lines.join('\n');
}
