import type { SearchRun } from '../core/dijkstra';
import { detourRatio } from '../distance';
import { formatElapsed } from '../time';
import type { Coord, ID, SearchResult, SearchStep } from '../types';

export interface EmitOptions {
  /** include Markdown summary */
  markdown?: boolean;
  runId?: string;
  runNote?: string;
  earlyStop?: boolean;
  elapsedMs?: number;
  positions?: Readonly<Record<ID, Coord>>;
}

export interface EmitResult {
  json: string;
  runTimestamp: string;
  runId?: string;
  runNote?: string;
  markdown?: string;
}

export function formatKm(km: number): string {
  return Number.isFinite(km) ? `${km.toFixed(0)} km` : '∞';
}

/** One-line description of a step for terminal replay. */
export function formatStep(step: SearchStep): string {
  const at = `#${step.index}`;
  if (step.kind === 'expand') {
    return `${at} expand ${step.current} (${formatKm(step.distances[step.current])}) visited=${step.visited.length}`;
  }
  const base = step.distances[step.current];
  const sum = `${formatKm(base)} + ${formatKm(step.weight)} = ${formatKm(step.candidate)}`;
  if (step.improved) {
    return `${at} relax ${step.current} → ${step.neighbor}: ${sum} (improved)`;
  }
  return `${at} relax ${step.current} → ${step.neighbor}: ${sum}, kept ${formatKm(
    step.distances[step.neighbor],
  )}`;
}

/**
 * Human-readable result:
 *
 *     Shortest path: 1240 km (time: 0.120 ms)
 *     Kyiv (540 km) → Lviv (700 km) → Odesa
 *
 *     Segments:
 *       Kyiv → Lviv: 540 km
 *       Lviv → Odesa: 700 km
 */
export function formatPathResult(result: SearchResult, elapsedMs?: number): string {
  if (result.kind === 'no-path') {
    return 'No path found.';
  }
  if (result.kind === 'distances') {
    const lines = [`Distances from ${result.source}:`];
    for (const [city, km] of Object.entries(result.distances)) {
      lines.push(`  ${city}: ${formatKm(km)}`);
    }
    return lines.join('\n');
  }
  const arrow = result.segments.map((s) => `${s.from} (${formatKm(s.km)})`);
  arrow.push(result.target);
  const lines = [
    `Shortest path: ${formatKm(result.totalKm)} (time: ${formatElapsed(elapsedMs)})`,
    arrow.join(' → '),
    '',
    'Segments:',
    ...result.segments.map((s) => `  ${s.from} → ${s.to}: ${formatKm(s.km)}`),
  ];
  return lines.join('\n');
}

function toMarkdown(run: SearchRun, opts: EmitOptions): string {
  const { result, trace } = run;
  const lines: string[] = [
    `# Search from ${result.source}`,
    '',
    '| City | Distance (km) | Via |',
    '| ---- | -------------:| --- |',
  ];
  for (const [city, km] of Object.entries(result.distances)) {
    lines.push(`| ${city} | ${formatKm(km)} | ${result.predecessors[city] ?? '—'} |`);
  }
  lines.push('');
  lines.push(
    `- **Steps** – ${trace.length} (${trace.expansions().length} expansions)`,
  );
  if (result.kind === 'path') {
    lines.push(`- **Path** – ${result.path.join(' → ')} (${formatKm(result.totalKm)})`);
    const ratio = opts.positions ? detourRatio(result, opts.positions) : undefined;
    if (ratio !== undefined) {
      lines.push(`- **Detour ratio** – ${ratio.toFixed(2)}`);
    }
  } else if (result.kind === 'no-path') {
    lines.push(`- **Path** – none to ${result.target}`);
  }
  lines.push('');
  return lines.join('\n');
}

// JSON has no Infinity; unreached cities are written as null.
function replacer(_key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return null;
  }
  return value;
}

/** Serialize a search run to JSON and optional Markdown summary. */
export function emitSearch(
  run: SearchRun,
  runTimestamp = new Date().toISOString(),
  opts: EmitOptions = {},
): EmitResult {
  const { result } = run;
  const json = JSON.stringify(
    {
      runTimestamp,
      runId: opts.runId,
      runNote: opts.runNote,
      source: result.source,
      target: result.kind === 'distances' ? undefined : result.target,
      earlyStop: opts.earlyStop,
      elapsedMs: opts.elapsedMs,
      result,
      steps: run.trace.toArray(),
    },
    replacer,
    2,
  );
  const emitted: EmitResult = { json, runTimestamp };
  if (opts.runId) emitted.runId = opts.runId;
  if (opts.runNote) emitted.runNote = opts.runNote;
  if (opts.markdown) {
    emitted.markdown = toMarkdown(run, opts);
  }
  return emitted;
}

export { toMarkdown as emitMarkdown };
