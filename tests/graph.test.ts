import { describe, it, expect } from 'vitest';
import { Graph } from '../src/core/graph';
import {
  DuplicateVertexError,
  InvalidWeightError,
  UnknownEdgeError,
  UnknownVertexError,
  isGraphError,
} from '../src/errors';
import { parseDistancesCsv } from '../src/io/parse';
import { triangle } from './helpers';

describe('Graph', () => {
  it('lists vertices in identifier order', () => {
    const g = new Graph();
    g.addVertex('Odesa');
    g.addVertex('Kyiv');
    g.addVertex('Lviv');
    expect(g.vertices()).toEqual(['Kyiv', 'Lviv', 'Odesa']);
    expect(g.size).toBe(3);
  });

  it('rejects duplicate cities', () => {
    const g = new Graph();
    g.addVertex('Kyiv');
    expect(() => g.addVertex('Kyiv')).toThrow(DuplicateVertexError);
  });

  it('mirrors undirected roads', () => {
    const g = triangle();
    expect(g.neighbors('Kyiv')).toEqual([
      { to: 'Lviv', weight: 540 },
      { to: 'Odesa', weight: 480 },
    ]);
    expect(g.neighbors('Odesa')).toEqual([
      { to: 'Kyiv', weight: 480 },
      { to: 'Lviv', weight: 700 },
    ]);
  });

  it('fails on unknown endpoints without changing the graph', () => {
    const g = triangle();
    const before = g.edges();
    expect(() => g.addEdge('Kyiv', 'Warsaw', 800, false)).toThrow(UnknownVertexError);
    expect(() => g.addEdge('Warsaw', 'Kyiv', 800, false)).toThrow(UnknownVertexError);
    expect(g.edges()).toEqual(before);
    expect(g.neighbors('Kyiv')).toHaveLength(2);
  });

  it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])(
    'rejects weight %s',
    (km) => {
      const g = new Graph();
      g.addVertex('A');
      g.addVertex('B');
      expect(() => g.addEdge('A', 'B', km, false)).toThrow(InvalidWeightError);
      expect(g.neighbors('A')).toEqual([]);
      expect(g.neighbors('B')).toEqual([]);
    },
  );

  it('replaces a road added again between the same cities', () => {
    const g = triangle();
    g.addEdge('Lviv', 'Kyiv', 545, false);
    expect(g.weight('Kyiv', 'Lviv')).toBe(545);
    expect(g.weight('Lviv', 'Kyiv')).toBe(545);
    g.addEdge('Kyiv', 'Lviv', 100, true);
    expect(g.weight('Kyiv', 'Lviv')).toBe(100);
    expect(g.weight('Lviv', 'Kyiv')).toBeUndefined();
    expect(g.edges().filter((e) => e.from === 'Kyiv' && e.to === 'Lviv')).toEqual([
      { from: 'Kyiv', to: 'Lviv', km: 100, directed: true },
    ]);
  });

  it('loads a distances file that lists a road in both directions', () => {
    const g = Graph.fromRecords(
      parseDistancesCsv('source,target,distance_km\nKyiv,Lviv,540\nLviv,Kyiv,545\n'),
    );
    expect(g.weight('Kyiv', 'Lviv')).toBe(545);
    expect(g.edges()).toHaveLength(1);
  });

  it('turns two opposite one-way roads into one two-way road', () => {
    const g = new Graph();
    g.addVertex('A');
    g.addVertex('B');
    g.addEdge('A', 'B', 10, true);
    g.addEdge('B', 'A', 12, true);
    g.addEdge('A', 'B', 11, false);
    expect(g.weight('A', 'B')).toBe(11);
    expect(g.weight('B', 'A')).toBe(11);
    expect(g.edges()).toHaveLength(1);
  });

  it('allows opposite one-way roads with their own lengths', () => {
    const g = new Graph();
    g.addVertex('A');
    g.addVertex('B');
    g.addEdge('A', 'B', 10, true);
    g.addEdge('B', 'A', 12, true);
    expect(g.weight('A', 'B')).toBe(10);
    expect(g.weight('B', 'A')).toBe(12);
  });

  it('removes a city with every road touching it', () => {
    const g = triangle();
    g.removeVertex('Odesa');
    expect(g.hasVertex('Odesa')).toBe(false);
    expect(g.neighbors('Kyiv')).toEqual([{ to: 'Lviv', weight: 540 }]);
    expect(g.neighbors('Lviv')).toEqual([{ to: 'Kyiv', weight: 540 }]);
    expect(() => g.removeVertex('Odesa')).toThrow(UnknownVertexError);
  });

  it('removes an undirected road named in either direction', () => {
    const g = triangle();
    g.removeEdge('Odesa', 'Kyiv');
    expect(g.weight('Kyiv', 'Odesa')).toBeUndefined();
    expect(g.weight('Odesa', 'Kyiv')).toBeUndefined();
    expect(() => g.removeEdge('Kyiv', 'Odesa')).toThrow(UnknownEdgeError);
  });

  it('names a one-way road only by its own direction', () => {
    const g = triangle();
    g.makeDirected('Kyiv', 'Lviv');
    expect(() => g.removeEdge('Lviv', 'Kyiv')).toThrow(UnknownEdgeError);
    g.removeEdge('Kyiv', 'Lviv');
    expect(g.weight('Kyiv', 'Lviv')).toBeUndefined();
  });

  it('updates both arcs when the length changes', () => {
    const g = triangle();
    g.setWeight('Lviv', 'Kyiv', 555);
    expect(g.weight('Kyiv', 'Lviv')).toBe(555);
    expect(g.weight('Lviv', 'Kyiv')).toBe(555);
    expect(() => g.setWeight('Kyiv', 'Lviv', 0)).toThrow(InvalidWeightError);
    expect(g.weight('Kyiv', 'Lviv')).toBe(555);
    expect(() => g.setWeight('Kyiv', 'Kharkiv', 10)).toThrow(UnknownEdgeError);
  });

  it('keeps only the forward arc after makeDirected', () => {
    const g = triangle();
    g.makeDirected('Kyiv', 'Lviv');
    expect(g.neighbors('Lviv').map((n) => n.to)).not.toContain('Kyiv');
    expect(g.neighbors('Kyiv')).toContainEqual({ to: 'Lviv', weight: 540 });
    expect(g.edges()).toContainEqual({ from: 'Kyiv', to: 'Lviv', km: 540, directed: true });
  });

  it('treats makeDirected on a one-way road as a no-op', () => {
    const g = triangle();
    g.makeDirected('Lviv', 'Kyiv');
    g.makeDirected('Lviv', 'Kyiv');
    expect(g.weight('Lviv', 'Kyiv')).toBe(540);
    expect(g.weight('Kyiv', 'Lviv')).toBeUndefined();
    expect(() => g.makeDirected('Kyiv', 'Lviv')).toThrow(UnknownEdgeError);
  });

  it('keeps a self loop when made one-way', () => {
    const g = new Graph();
    g.addVertex('A');
    g.addEdge('A', 'A', 5, false);
    g.makeDirected('A', 'A');
    expect(g.neighbors('A')).toEqual([{ to: 'A', weight: 5 }]);
  });

  it('lists each undirected road once', () => {
    expect(triangle().edges()).toEqual([
      { from: 'Kyiv', to: 'Lviv', km: 540, directed: false },
      { from: 'Kyiv', to: 'Odesa', km: 480, directed: false },
      { from: 'Lviv', to: 'Odesa', km: 700, directed: false },
    ]);
  });

  it('clones deeply', () => {
    const g = triangle();
    const copy = g.clone();
    g.setWeight('Kyiv', 'Lviv', 1);
    g.removeVertex('Odesa');
    expect(copy.weight('Kyiv', 'Lviv')).toBe(540);
    expect(copy.vertices()).toEqual(['Kyiv', 'Lviv', 'Odesa']);
  });

  it('fails neighbors for an unknown city', () => {
    expect(() => triangle().neighbors('Warsaw')).toThrow(UnknownVertexError);
  });

  it('validates records against an explicit city set', () => {
    expect(() =>
      Graph.fromRecords([{ from: 'Kyiv', to: 'Warsaw', km: 800 }], ['Kyiv']),
    ).toThrow(UnknownVertexError);
    expect(() =>
      Graph.fromRecords([{ from: 'Kyiv', to: 'Lviv', km: -1 }]),
    ).toThrow(InvalidWeightError);
    const g = Graph.fromRecords([{ from: 'Kyiv', to: 'Lviv', km: 540, directed: true }], [
      'Kyiv',
      'Lviv',
      'Chop',
    ]);
    expect(g.vertices()).toEqual(['Chop', 'Kyiv', 'Lviv']);
    expect(g.weight('Lviv', 'Kyiv')).toBeUndefined();
  });

  it('tags failures with their kind', () => {
    try {
      triangle().removeEdge('Kyiv', 'Kharkiv');
      expect.unreachable();
    } catch (err) {
      expect(isGraphError(err)).toBe(true);
      if (isGraphError(err)) {
        expect(err.kind).toBe('UnknownEdge');
        expect(err.message).toBe('No road from Kyiv to Kharkiv');
      }
    }
  });
});
