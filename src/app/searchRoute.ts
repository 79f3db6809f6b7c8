import { performance } from 'node:perf_hooks';
import { search, type SearchRun, type StepFn } from '../core/dijkstra';
import { emitSearch, type EmitResult } from '../io/emit';
import { applyEdits, loadNetwork, type GraphEdit, type LoadedNetwork } from './loadNetwork';
import { DEFAULT_STEP_DELAY_MS, clampDelay } from './player';
import type { ID } from '../types';

export interface SearchRouteOptions {
  networkPath: string;
  positionsPath?: string;
  source?: ID;
  target?: ID;
  earlyStop?: boolean;
  stepDelayMs?: number;
  edits?: GraphEdit[];
  runId?: string;
  runNote?: string;
  onStep?: StepFn;
}

export interface SearchRouteResult extends EmitResult {
  run: SearchRun;
  network: LoadedNetwork;
  source: ID;
  target?: ID;
  earlyStop: boolean;
  stepDelayMs: number;
  elapsedMs: number;
}

export function summaryLine(run: SearchRun, target: ID | undefined): string {
  const { result, trace } = run;
  const parts = [
    `Search ${result.source}${target ? ` → ${target}` : ''}`,
    `status=${result.kind}`,
  ];
  if (result.kind === 'path') {
    parts.push(`km=${result.totalKm}`);
    parts.push(`hops=${result.segments.length}`);
  }
  parts.push(`steps=${trace.length}`);
  parts.push(`expanded=${trace.expansions().length}`);
  return parts.join(' | ');
}

/**
 * Load a network, apply edits, run the search and serialize the run.
 * Options override the network file's `config` section, which overrides
 * the built-in defaults.
 */
export function searchRoute(opts: SearchRouteOptions): SearchRouteResult {
  const network = loadNetwork(opts.networkPath, opts.positionsPath);
  const cfg = network.config;

  const source = opts.source ?? cfg.source;
  if (!source) {
    throw new Error('No source city given');
  }
  const target = opts.target ?? cfg.target;
  const earlyStop = opts.earlyStop ?? cfg.earlyStop ?? true;
  const stepDelayMs = clampDelay(opts.stepDelayMs ?? cfg.stepDelayMs ?? DEFAULT_STEP_DELAY_MS);

  if (opts.edits) {
    applyEdits(network.graph, opts.edits, network.positions);
  }

  const started = performance.now();
  const run = search(network.graph, source, target, earlyStop, { onStep: opts.onStep });
  const elapsedMs = performance.now() - started;

  const runTimestamp = new Date().toISOString();
  const emit = emitSearch(run, runTimestamp, {
    runId: opts.runId,
    runNote: opts.runNote,
    earlyStop,
    elapsedMs,
    positions: network.positions,
    markdown: true,
  });
  console.log(summaryLine(run, target));
  return { ...emit, run, network, source, target, earlyStop, stepDelayMs, elapsedMs };
}
