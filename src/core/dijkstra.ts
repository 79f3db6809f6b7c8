import { UnknownVertexError } from '../errors';
import type { Graph } from './graph';
import { StepTrace } from './trace';
import type {
  DistanceSnapshot,
  ID,
  SearchResult,
  SearchStep,
  Segment,
} from '../types';

export type StepFn = (step: SearchStep) => void;

export interface SearchOptions {
  /** Called for each step as it is recorded. */
  onStep?: StepFn;
}

export interface SearchRun {
  trace: StepTrace;
  result: SearchResult;
}

function pickNext(
  order: readonly ID[],
  dist: ReadonlyMap<ID, number>,
  visited: ReadonlySet<ID>,
): ID | undefined {
  let best: ID | undefined;
  let bestDist = Infinity;
  // `order` is sorted, so strict < keeps the lowest id on ties.
  for (const v of order) {
    if (visited.has(v)) continue;
    const d = dist.get(v) ?? Infinity;
    if (d < bestDist) {
      best = v;
      bestDist = d;
    }
  }
  return best;
}

function snapshot(order: readonly ID[], dist: ReadonlyMap<ID, number>): DistanceSnapshot {
  return Object.freeze(
    Object.fromEntries(order.map((v): [ID, number] => [v, dist.get(v) ?? Infinity])),
  );
}

export function reconstructPath(
  predecessors: Readonly<Record<ID, ID | null>>,
  source: ID,
  target: ID,
): ID[] {
  const path: ID[] = [];
  let current: ID | null = target;
  while (current !== null) {
    path.push(current);
    if (current === source) break;
    current = predecessors[current] ?? null;
  }
  if (path[path.length - 1] !== source) {
    return [];
  }
  return path.reverse();
}

function segmentsOf(path: readonly ID[], distances: DistanceSnapshot): Segment[] {
  const segments: Segment[] = [];
  for (let i = 1; i < path.length; i++) {
    const from = path[i - 1];
    const to = path[i];
    segments.push({ from, to, km: distances[to] - distances[from] });
  }
  return segments;
}

/**
 * Dijkstra's algorithm with O(V²) minimum selection, recording every
 * expansion and every relaxation attempt. Runs on a snapshot of `graph`.
 *
 * With `earlyStop` the search ends right after `target` is expanded.
 */
export function search(
  graph: Graph,
  source: ID,
  target?: ID,
  earlyStop = true,
  opts: SearchOptions = {},
): SearchRun {
  if (!graph.hasVertex(source)) {
    throw new UnknownVertexError(source);
  }
  if (target !== undefined && !graph.hasVertex(target)) {
    throw new UnknownVertexError(target);
  }

  const g = graph.clone();
  const order = g.vertices();
  const dist = new Map<ID, number>();
  const prev = new Map<ID, ID | null>();
  for (const v of order) {
    dist.set(v, Infinity);
    prev.set(v, null);
  }
  dist.set(source, 0);

  const visited = new Set<ID>();
  const visitOrder: ID[] = [];
  const steps: SearchStep[] = [];

  const record = (step: SearchStep): void => {
    const frozen = Object.freeze(step);
    steps.push(frozen);
    opts.onStep?.(frozen);
  };

  while (visited.size < order.length) {
    const u = pickNext(order, dist, visited);
    if (u === undefined) break; // the rest is unreachable

    visited.add(u);
    visitOrder.push(u);
    record({
      kind: 'expand',
      index: steps.length,
      current: u,
      distances: snapshot(order, dist),
      visited: Object.freeze([...visitOrder]),
    });

    if (earlyStop && u === target) break;

    const du = dist.get(u) ?? Infinity;
    for (const { to: w, weight } of g.neighbors(u)) {
      const candidate = du + weight;
      const improved = candidate < (dist.get(w) ?? Infinity);
      if (improved) {
        dist.set(w, candidate);
        prev.set(w, u);
      }
      record({
        kind: 'relax',
        index: steps.length,
        current: u,
        neighbor: w,
        weight,
        candidate,
        improved,
        newDistance: improved ? candidate : undefined,
        distances: snapshot(order, dist),
        visited: Object.freeze([...visitOrder]),
      });
    }
  }

  const distances = snapshot(order, dist);
  const predecessors = Object.freeze(Object.fromEntries(prev));
  const base = { source, distances, predecessors };
  const trace = new StepTrace(steps);

  if (target === undefined) {
    return { trace, result: { ...base, kind: 'distances' } };
  }
  if (!Number.isFinite(distances[target])) {
    return { trace, result: { ...base, kind: 'no-path', target } };
  }
  const path = reconstructPath(predecessors, source, target);
  return {
    trace,
    result: {
      ...base,
      kind: 'path',
      target,
      path,
      totalKm: distances[target],
      segments: segmentsOf(path, distances),
    },
  };
}
