import { describe, it, expect } from 'vitest';
import { search } from '../src/core/dijkstra';
import { emitStepsCsv } from '../src/io/emitCsv';
import { Graph } from '../src/core/graph';
import { triangle } from './helpers';

describe('emitStepsCsv', () => {
  it('writes one row per step', () => {
    const { trace } = search(triangle(), 'Kyiv', 'Odesa', true);
    const lines = emitStepsCsv(trace).split('\n');
    expect(lines).toEqual([
      'index,kind,current,neighbor,weight_km,candidate_km,improved,current_km,visited',
      '0,expand,Kyiv,,,,,0,Kyiv',
      '1,relax,Kyiv,Lviv,540,540,true,0,Kyiv',
      '2,relax,Kyiv,Odesa,480,480,true,0,Kyiv',
      '3,expand,Odesa,,,,,480,Kyiv;Odesa',
    ]);
  });

  it('quotes city names containing commas', () => {
    const g = Graph.fromRecords([{ from: 'Kyiv', to: 'Bila Tserkva, Kyiv Oblast', km: 85 }]);
    const { trace } = search(g, 'Kyiv', undefined, false);
    const lines = emitStepsCsv(trace).split('\n');
    expect(lines[2]).toBe('1,relax,Kyiv,"Bila Tserkva, Kyiv Oblast",85,85,true,0,Kyiv');
  });
});
