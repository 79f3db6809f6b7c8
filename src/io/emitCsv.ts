import type { StepTrace } from '../core/trace';
import type { SearchStep } from '../types';

function escapeCsv(value: string): string {
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function num(n: number | undefined): string {
  if (n == null) return '';
  return Number.isFinite(n) ? String(n) : 'inf';
}

function stepToRow(step: SearchStep): string {
  const relax = step.kind === 'relax' ? step : undefined;
  const cols = [
    String(step.index),
    step.kind,
    escapeCsv(step.current),
    relax ? escapeCsv(relax.neighbor) : '',
    num(relax?.weight),
    num(relax?.candidate),
    relax ? String(relax.improved) : '',
    num(step.distances[step.current]),
    escapeCsv(step.visited.join(';')),
  ];
  return cols.join(',');
}

/** Serialize every step of a trace to CSV. */
export function emitStepsCsv(trace: StepTrace): string {
  const header = [
    'index',
    'kind',
    'current',
    'neighbor',
    'weight_km',
    'candidate_km',
    'improved',
    'current_km',
    'visited',
  ];
  const lines = [header.join(',')];
  for (const step of trace) {
    lines.push(stepToRow(step));
  }
  return lines.join('\n');
}

export default emitStepsCsv;
