import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { Graph } from '../core/graph';
import { parseDistancesCsv, parseNetwork, parsePositions } from '../io/parse';
import type { Coord, ID, NetworkConfig } from '../types';

export interface LoadedNetwork {
  graph: Graph;
  positions: Record<ID, Coord>;
  config: NetworkConfig;
}

export type GraphEdit =
  | { type: 'addCity'; city: ID; position?: Coord }
  | { type: 'removeCity'; city: ID }
  | { type: 'addRoad'; from: ID; to: ID; km: number; directed?: boolean }
  | { type: 'removeRoad'; from: ID; to: ID }
  | { type: 'setKm'; from: ID; to: ID; km: number }
  | { type: 'oneWay'; from: ID; to: ID };

/**
 * Load a network from a distances CSV or a network JSON file, with optional
 * city positions from a separate JSON file.
 */
export function loadNetwork(networkPath: string, positionsPath?: string): LoadedNetwork {
  const raw = readFileSync(networkPath, 'utf8');
  let loaded: LoadedNetwork;
  if (extname(networkPath).toLowerCase() === '.csv') {
    loaded = { graph: Graph.fromRecords(parseDistancesCsv(raw)), positions: {}, config: {} };
  } else {
    const input = parseNetwork(JSON.parse(raw));
    loaded = {
      graph: Graph.fromRecords(input.roads, input.cities),
      positions: input.positions,
      config: input.config,
    };
  }

  if (positionsPath) {
    const extra = parsePositions(JSON.parse(readFileSync(positionsPath, 'utf8')));
    for (const [city, coord] of Object.entries(extra)) {
      if (!loaded.graph.hasVertex(city)) {
        console.warn(`Ignoring position for unknown city ${city}`);
        continue;
      }
      loaded.positions[city] = coord;
    }
  }
  return loaded;
}

/** Apply one edit. City positions added or removed are kept in `positions` when given. */
export function applyEdit(
  graph: Graph,
  edit: GraphEdit,
  positions?: Record<ID, Coord>,
): void {
  switch (edit.type) {
    case 'addCity':
      graph.addVertex(edit.city);
      if (positions && edit.position) {
        positions[edit.city] = edit.position;
      }
      break;
    case 'removeCity':
      graph.removeVertex(edit.city);
      if (positions) {
        delete positions[edit.city];
      }
      break;
    case 'addRoad':
      graph.addEdge(edit.from, edit.to, edit.km, edit.directed ?? false);
      break;
    case 'removeRoad':
      graph.removeEdge(edit.from, edit.to);
      break;
    case 'setKm':
      graph.setWeight(edit.from, edit.to, edit.km);
      break;
    case 'oneWay':
      graph.makeDirected(edit.from, edit.to);
      break;
  }
}

/** Apply edits in order; the first failing edit stops the batch. */
export function applyEdits(
  graph: Graph,
  edits: readonly GraphEdit[],
  positions?: Record<ID, Coord>,
): void {
  for (const edit of edits) {
    applyEdit(graph, edit, positions);
  }
}
