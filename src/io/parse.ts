import type {
  Coord,
  ID,
  NetworkConfig,
  NetworkInput,
  RoadRecord,
} from '../types';

type PlainObj = Record<string, unknown>;

function isPlainObj(value: unknown): value is PlainObj {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function ensureValidCoord(lat: number, lon: number): Coord {
  if (
    Number.isNaN(lat) ||
    Number.isNaN(lon) ||
    lat < -90 ||
    lat > 90 ||
    lon < -180 ||
    lon > 180
  ) {
    throw new Error(`Invalid coordinates: ${lat},${lon}`);
  }
  return [lat, lon];
}

function parseKm(raw: unknown, where: string): number {
  const km = typeof raw === 'number' ? raw : Number(String(raw).trim());
  if (raw === '' || raw == null || Number.isNaN(km)) {
    throw new Error(`Invalid distance ${where}: ${String(raw)}`);
  }
  return km;
}

function parseFlag(raw: unknown): boolean {
  if (typeof raw === 'boolean') return raw;
  return /^(true|1|yes)$/i.test(String(raw ?? '').trim());
}

/**
 * Parse a distances CSV with a `source,target,distance_km` header and an
 * optional `directed` column. Weight validity is left to the graph.
 */
export function parseDistancesCsv(csv: string): RoadRecord[] {
  const lines = csv
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .map((l, i) => ({ text: l, lineNo: i + 1 }))
    .filter((l) => l.text.trim().length > 0);
  if (lines.length === 0) return [];

  const headers = lines[0].text.split(',').map((h) => h.trim());
  const col = (name: string): number => headers.indexOf(name);
  for (const required of ['source', 'target', 'distance_km']) {
    if (col(required) < 0) {
      throw new Error(`Distances CSV missing column: ${required}`);
    }
  }

  const records: RoadRecord[] = [];
  for (const { text, lineNo } of lines.slice(1)) {
    const values = text.split(',').map((v) => v.trim());
    const from = values[col('source')] ?? '';
    const to = values[col('target')] ?? '';
    if (!from || !to) {
      throw new Error(`Missing city on line ${lineNo}`);
    }
    const record: RoadRecord = {
      from,
      to,
      km: parseKm(values[col('distance_km')], `on line ${lineNo}`),
    };
    if (col('directed') >= 0 && parseFlag(values[col('directed')])) {
      record.directed = true;
    }
    records.push(record);
  }
  return records;
}

/** Parse `{ "<city>": { "lat": n, "lon": n } }`. */
export function parsePositions(json: unknown): Record<ID, Coord> {
  if (!isPlainObj(json)) {
    throw new Error('Positions JSON must be an object');
  }
  const positions: Record<ID, Coord> = {};
  for (const [city, value] of Object.entries(json)) {
    if (!isPlainObj(value) || typeof value.lat !== 'number' || typeof value.lon !== 'number') {
      throw new Error(`Position for ${city} must have numeric lat and lon`);
    }
    positions[city] = ensureValidCoord(value.lat, value.lon);
  }
  return positions;
}

function parseConfig(obj: unknown): NetworkConfig {
  const cfg: NetworkConfig = {};
  if (!isPlainObj(obj)) return cfg;
  if (obj.source !== undefined) cfg.source = String(obj.source);
  if (obj.target !== undefined) cfg.target = String(obj.target);
  if (obj.earlyStop !== undefined) cfg.earlyStop = parseFlag(obj.earlyStop);
  if (obj.stepDelayMs !== undefined) {
    const delay = Number(obj.stepDelayMs);
    if (!Number.isFinite(delay) || delay < 0) {
      throw new Error(`Invalid stepDelayMs: ${String(obj.stepDelayMs)}`);
    }
    cfg.stepDelayMs = delay;
  }
  return cfg;
}

function parseRoad(obj: unknown, index: number): RoadRecord {
  if (!isPlainObj(obj) || typeof obj.from !== 'string' || typeof obj.to !== 'string') {
    throw new Error(`Road ${index} must have from and to`);
  }
  const road: RoadRecord = {
    from: obj.from,
    to: obj.to,
    km: parseKm(obj.km, `for road ${obj.from}-${obj.to}`),
  };
  if (obj.directed !== undefined && parseFlag(obj.directed)) {
    road.directed = true;
  }
  return road;
}

/**
 * Parse a network JSON document:
 * `{ config?, cities?: (id | { id, lat?, lon? })[], roads: { from, to, km, directed? }[] }`.
 */
export function parseNetwork(json: unknown): NetworkInput {
  if (!isPlainObj(json)) {
    throw new Error('Network JSON must be an object');
  }
  const config = parseConfig(json.config);
  const roads = Array.isArray(json.roads)
    ? json.roads.map((r, i) => parseRoad(r, i))
    : [];

  const cities: ID[] = [];
  const positions: Record<ID, Coord> = {};
  const seen = new Set<ID>();
  const addCity = (id: ID) => {
    if (seen.has(id)) {
      throw new Error(`Duplicate city: ${id}`);
    }
    seen.add(id);
    cities.push(id);
  };

  if (Array.isArray(json.cities)) {
    for (const c of json.cities) {
      if (typeof c === 'string') {
        addCity(c);
        continue;
      }
      if (!isPlainObj(c) || typeof c.id !== 'string') {
        throw new Error('City must be a name or have an id');
      }
      addCity(c.id);
      if (typeof c.lat === 'number' && typeof c.lon === 'number') {
        positions[c.id] = ensureValidCoord(c.lat, c.lon);
      }
    }
  } else {
    for (const r of roads) {
      if (!seen.has(r.from)) addCity(r.from);
      if (!seen.has(r.to)) addCity(r.to);
    }
  }

  return { config, cities, roads, positions };
}
