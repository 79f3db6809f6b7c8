import {
  DuplicateVertexError,
  InvalidWeightError,
  UnknownEdgeError,
  UnknownVertexError,
} from '../errors';
import type { Arc, ID, LogicalEdge, RoadRecord } from '../types';

// Both arcs of an undirected road point at the same entry, so a weight change
// or a conversion to one-way is seen from either side.
interface EdgeEntry {
  from: ID;
  to: ID;
  km: number;
  directed: boolean;
}

function byId(a: ID, b: ID): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function ensureWeight(weight: number): number {
  if (typeof weight !== 'number' || !Number.isFinite(weight) || weight <= 0) {
    throw new InvalidWeightError(weight);
  }
  return weight;
}

/**
 * Weighted road network keyed by city name. Undirected roads are stored as
 * two mirrored arcs sharing one edge entry; one-way roads as a single arc.
 */
export class Graph {
  private readonly adjacency = new Map<ID, Map<ID, EdgeEntry>>();

  /**
   * Build a graph from loader records. When `cities` is omitted every
   * endpoint named by a record becomes a city.
   */
  static fromRecords(records: readonly RoadRecord[], cities?: readonly ID[]): Graph {
    const graph = new Graph();
    if (cities) {
      for (const city of cities) graph.addVertex(city);
    } else {
      for (const r of records) {
        if (!graph.hasVertex(r.from)) graph.addVertex(r.from);
        if (!graph.hasVertex(r.to)) graph.addVertex(r.to);
      }
    }
    for (const r of records) {
      graph.addEdge(r.from, r.to, r.km, r.directed ?? false);
    }
    return graph;
  }

  get size(): number {
    return this.adjacency.size;
  }

  hasVertex(id: ID): boolean {
    return this.adjacency.has(id);
  }

  /** City names in the fixed order used for tie-breaks. */
  vertices(): ID[] {
    return [...this.adjacency.keys()].sort(byId);
  }

  addVertex(id: ID): void {
    if (this.adjacency.has(id)) {
      throw new DuplicateVertexError(id);
    }
    this.adjacency.set(id, new Map());
  }

  removeVertex(id: ID): void {
    if (!this.adjacency.has(id)) {
      throw new UnknownVertexError(id);
    }
    this.adjacency.delete(id);
    for (const arcs of this.adjacency.values()) {
      arcs.delete(id);
    }
  }

  /**
   * Insert a road, replacing any road already holding an arc the new one
   * needs. A one-way road in the opposite direction is kept.
   */
  addEdge(from: ID, to: ID, weight: number, directed: boolean): void {
    const out = this.arcsOf(from);
    const back = this.arcsOf(to);
    ensureWeight(weight);
    this.dropArc(from, to);
    if (!directed) {
      this.dropArc(to, from);
    }
    const entry: EdgeEntry = { from, to, km: weight, directed };
    out.set(to, entry);
    if (!directed) {
      back.set(from, entry);
    }
  }

  /**
   * Remove the road named by `from`→`to`. Either orientation names an
   * undirected road; a one-way road only by its own direction.
   */
  removeEdge(from: ID, to: ID): void {
    this.entry(from, to);
    this.dropArc(from, to);
  }

  setWeight(from: ID, to: ID, weight: number): void {
    const entry = this.entry(from, to);
    entry.km = ensureWeight(weight);
  }

  /** Keep only the `from`→`to` arc of an undirected road. */
  makeDirected(from: ID, to: ID): void {
    const entry = this.entry(from, to);
    if (entry.directed) return;
    if (from !== to) {
      this.adjacency.get(to)?.delete(from);
    }
    entry.from = from;
    entry.to = to;
    entry.directed = true;
  }

  neighbors(id: ID): Arc[] {
    const arcs = this.arcsOf(id);
    return [...arcs.entries()]
      .map(([to, e]) => ({ to, weight: e.km }))
      .sort((a, b) => byId(a.to, b.to));
  }

  /** Weight of the `from`→`to` arc, or undefined when there is none. */
  weight(from: ID, to: ID): number | undefined {
    return this.adjacency.get(from)?.get(to)?.km;
  }

  /** Logical roads, each undirected road listed once. */
  edges(): LogicalEdge[] {
    const seen = new Set<EdgeEntry>();
    const out: LogicalEdge[] = [];
    for (const arcs of this.adjacency.values()) {
      for (const e of arcs.values()) {
        if (seen.has(e)) continue;
        seen.add(e);
        out.push({ from: e.from, to: e.to, km: e.km, directed: e.directed });
      }
    }
    return out.sort((a, b) => byId(a.from, b.from) || byId(a.to, b.to));
  }

  /** Deep copy; later edits to either graph do not affect the other. */
  clone(): Graph {
    const copy = new Graph();
    for (const id of this.adjacency.keys()) copy.addVertex(id);
    for (const e of this.edges()) copy.addEdge(e.from, e.to, e.km, e.directed);
    return copy;
  }

  private arcsOf(id: ID): Map<ID, EdgeEntry> {
    const arcs = this.adjacency.get(id);
    if (!arcs) {
      throw new UnknownVertexError(id);
    }
    return arcs;
  }

  private dropArc(from: ID, to: ID): void {
    const entry = this.adjacency.get(from)?.get(to);
    if (!entry) return;
    this.adjacency.get(from)?.delete(to);
    if (!entry.directed) {
      this.adjacency.get(to)?.delete(from);
    }
  }

  private entry(from: ID, to: ID): EdgeEntry {
    const entry = this.adjacency.get(from)?.get(to);
    if (!entry) {
      throw new UnknownEdgeError(from, to);
    }
    return entry;
  }
}
