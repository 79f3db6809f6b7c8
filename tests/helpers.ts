import { Graph } from '../src/core/graph';

/** Kyiv–Lviv 540, Lviv–Odesa 700, Kyiv–Odesa 480, all two-way. */
export function triangle(): Graph {
  return Graph.fromRecords([
    { from: 'Kyiv', to: 'Lviv', km: 540 },
    { from: 'Lviv', to: 'Odesa', km: 700 },
    { from: 'Kyiv', to: 'Odesa', km: 480 },
  ]);
}
