import type { Coord, ID, PathResult } from '../types';

function escapeXml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Serialize a found path to KML. Cities without a position are skipped. */
export function emitKml(
  result: PathResult,
  positions: Readonly<Record<ID, Coord>>,
): string {
  const placemarks: string[] = [];
  const routeCoords: string[] = [];
  result.path.forEach((city, i) => {
    const coord = positions[city];
    if (!coord) return;
    const cumulative = result.distances[city];
    const legIn = i > 0 ? result.segments[i - 1].km : undefined;
    const details: [string, string | number | undefined][] = [
      ['order', i],
      ['cumulativeKm', cumulative],
      ['legKm', legIn],
    ];
    const data = details
      .filter(([, value]) => value !== undefined)
      .map(
        ([name, value]) =>
          `<Data name="${name}"><value>${escapeXml(String(value))}</value></Data>`,
      )
      .join('');
    const [lat, lon] = coord;
    placemarks.push(
      `<Placemark><name>${escapeXml(city)}</name><ExtendedData>${data}</ExtendedData><Point><coordinates>${lon},${lat},0</coordinates></Point></Placemark>`,
    );
    routeCoords.push(`${lon},${lat},0`);
  });
  const route = `<Placemark><name>${escapeXml(
    `${result.source} → ${result.target}`,
  )}</name><LineString><coordinates>${routeCoords.join(' ')}</coordinates></LineString></Placemark>`;
  const doc = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<kml xmlns="http://www.opengis.net/kml/2.2">',
    '<Document>',
    ...placemarks,
    route,
    '</Document>',
    '</kml>',
  ];
  return doc.join('\n');
}

export default emitKml;
