export type ID = string;

export type Coord = readonly [number, number];

export interface RoadRecord {
  from: ID;
  to: ID;
  km: number;
  directed?: boolean;
}

export interface Arc {
  to: ID;
  weight: number;
}

export interface LogicalEdge {
  from: ID;
  to: ID;
  km: number;
  directed: boolean;
}

export type DistanceSnapshot = Readonly<Record<ID, number>>;

interface StepBase {
  index: number;
  current: ID;
  distances: DistanceSnapshot;
  visited: readonly ID[];
}

export interface ExpandStep extends StepBase {
  kind: 'expand';
}

export interface RelaxStep extends StepBase {
  kind: 'relax';
  neighbor: ID;
  weight: number;
  candidate: number;
  improved: boolean;
  newDistance?: number; // set only when improved
}

export type SearchStep = ExpandStep | RelaxStep;

export interface Segment {
  from: ID;
  to: ID;
  km: number;
}

interface ResultBase {
  source: ID;
  distances: DistanceSnapshot;
  predecessors: Readonly<Record<ID, ID | null>>;
}

export interface PathResult extends ResultBase {
  kind: 'path';
  target: ID;
  path: ID[];
  totalKm: number;
  segments: Segment[];
}

export interface NoPathResult extends ResultBase {
  kind: 'no-path';
  target: ID;
}

export interface DistancesResult extends ResultBase {
  kind: 'distances';
}

export type SearchResult = PathResult | NoPathResult | DistancesResult;

export interface NetworkConfig {
  source?: ID;
  target?: ID;
  earlyStop?: boolean;
  stepDelayMs?: number;
}

export interface NetworkInput {
  config: NetworkConfig;
  cities: ID[];
  roads: RoadRecord[];
  positions: Record<ID, Coord>;
}
