import { readFileSync } from 'node:fs';
import Mustache from 'mustache';
import type { SearchRun } from '../core/dijkstra';
import { formatElapsed } from '../time';
import { formatKm, formatStep } from './emit';

const defaultTemplate = readFileSync(
  new URL('./templates/trace.mustache', import.meta.url),
  'utf8',
);
const defaultPartials = {
  step: readFileSync(new URL('./templates/step.mustache', import.meta.url), 'utf8'),
};

export interface EmitHtmlOptions {
  /** Override the base template */
  template?: string;
  /** Partials merged over the defaults (`step`) */
  partials?: Record<string, string>;
  runId?: string;
  runNote?: string;
  elapsedMs?: number;
}

interface TemplateStep {
  index: number;
  kind: string;
  text: string;
  improved: boolean;
  visited: string;
}

interface ViewModel {
  runTimestamp: string;
  runId?: string;
  runNote?: string;
  source: string;
  target?: string;
  status: string;
  path?: string;
  totalKm?: string;
  elapsed: string;
  segments: { from: string; to: string; km: string }[];
  distances: { city: string; km: string }[];
  steps: TemplateStep[];
}

export function emitHtml(
  run: SearchRun,
  runTimestamp: string,
  opts: EmitHtmlOptions = {},
): string {
  const { result, trace } = run;
  const view: ViewModel = {
    runTimestamp,
    runId: opts.runId,
    runNote: opts.runNote,
    source: result.source,
    target: result.kind === 'distances' ? undefined : result.target,
    status: result.kind,
    path: result.kind === 'path' ? result.path.join(' → ') : undefined,
    totalKm: result.kind === 'path' ? formatKm(result.totalKm) : undefined,
    elapsed: formatElapsed(opts.elapsedMs),
    segments:
      result.kind === 'path'
        ? result.segments.map((s) => ({ from: s.from, to: s.to, km: formatKm(s.km) }))
        : [],
    distances: Object.entries(result.distances).map(([city, km]) => ({
      city,
      km: formatKm(km),
    })),
    steps: trace.toArray().map((s) => ({
      index: s.index,
      kind: s.kind,
      text: formatStep(s),
      improved: s.kind === 'relax' && s.improved,
      visited: s.visited.join(', '),
    })),
  };
  const template = opts.template ?? defaultTemplate;
  const partials = { ...defaultPartials, ...opts.partials };
  return Mustache.render(template, view, partials);
}

export default emitHtml;
