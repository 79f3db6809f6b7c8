import { describe, it, expect } from 'vitest';
import { DOMParser } from '@xmldom/xmldom';
import { search } from '../src/core/dijkstra';
import { emitKml } from '../src/io/emitKml';
import type { Coord, PathResult } from '../src/types';
import { triangle } from './helpers';

const positions: Record<string, Coord> = {
  Kyiv: [50.45, 30.52],
  Lviv: [49.84, 24.03],
  Odesa: [46.48, 30.72],
};

function detourPath(): PathResult {
  const g = triangle();
  g.removeEdge('Kyiv', 'Odesa');
  const { result } = search(g, 'Kyiv', 'Odesa', true);
  if (result.kind !== 'path') throw new Error('expected a path');
  return result;
}

interface DataHolder {
  getElementsByTagName(name: string): ArrayLike<{ getAttribute(name: string): string | null }>;
}

function dataNames(placemark: DataHolder): (string | null)[] {
  return Array.from(placemark.getElementsByTagName('Data')).map((d) => d.getAttribute('name'));
}

describe('emitKml', () => {
  it('produces a placemark per city plus the route', () => {
    const kml = emitKml(detourPath(), positions);
    const doc = new DOMParser().parseFromString(kml, 'text/xml');
    const placemarks = doc.getElementsByTagName('Placemark');
    expect(placemarks.length).toBe(4);
    expect(doc.getElementsByTagName('LineString').length).toBe(1);
    const coords = doc.getElementsByTagName('LineString')[0]
      .getElementsByTagName('coordinates')[0].textContent;
    expect(coords).toBe('30.52,50.45,0 24.03,49.84,0 30.72,46.48,0');
  });

  it('adds leg and cumulative distances after the first city', () => {
    const kml = emitKml(detourPath(), positions);
    const doc = new DOMParser().parseFromString(kml, 'text/xml');
    const placemarks = doc.getElementsByTagName('Placemark');
    expect(dataNames(placemarks[0])).toEqual(['order', 'cumulativeKm']);
    expect(dataNames(placemarks[2])).toEqual(['order', 'cumulativeKm', 'legKm']);
    const values = Array.from(placemarks[2].getElementsByTagName('value')).map(
      (v) => v.textContent,
    );
    expect(values).toEqual(['2', '1240', '700']);
  });

  it('skips cities without a position', () => {
    const kml = emitKml(detourPath(), { Kyiv: positions.Kyiv });
    const doc = new DOMParser().parseFromString(kml, 'text/xml');
    expect(doc.getElementsByTagName('Placemark').length).toBe(2);
  });
});
