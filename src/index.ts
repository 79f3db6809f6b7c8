import { Command, InvalidArgumentError } from 'commander';
import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { searchRoute } from './app/searchRoute';
import { loadNetwork, type GraphEdit } from './app/loadNetwork';
import { TracePlayer } from './app/player';
import { emitStepsCsv } from './io/emitCsv';
import { emitHtml } from './io/emitHtml';
import { emitKml } from './io/emitKml';
import { formatPathResult, formatStep } from './io/emit';
import { generateNetwork, toDistancesCsv } from './synthetic';
import { formatTimestampToken } from './time';
import type { Coord } from './types';

interface SearchCliOptions {
  network: string;
  positions?: string;
  from?: string;
  to?: string;
  earlyStop?: boolean;
  removeCity: string[];
  addCity: string[];
  addRoad: string[];
  addOneWay: string[];
  removeRoad: string[];
  setKm: string[];
  oneWay: string[];
  trace?: boolean;
  play?: number | true;
  out?: string;
  csv?: string;
  html?: string | true;
  kml?: string | true;
  runId?: string;
  note?: string;
}

interface GenerateCliOptions {
  cities: number;
  roads: number;
  seed?: number;
  maxKm?: number;
  oneWay?: number;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function splitPair(value: string, flag: string): [string, string] {
  const parts = value.split(':').map((s) => s.trim());
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`${flag} expects <from>:<to>, got "${value}"`);
  }
  return [parts[0], parts[1]];
}

function splitRoad(value: string, flag: string): [string, string, number] {
  const idx = value.lastIndexOf(':');
  const km = Number(value.slice(idx + 1));
  if (idx < 0 || value.slice(idx + 1).trim() === '' || Number.isNaN(km)) {
    throw new Error(`${flag} expects <from>:<to>:<km>, got "${value}"`);
  }
  const [from, to] = splitPair(value.slice(0, idx), flag);
  return [from, to, km];
}

function splitCity(value: string): { city: string; position?: Coord } {
  const parts = value.split(':').map((s) => s.trim());
  const usage = new Error(`--add-city expects <name>[:<lat>:<lon>], got "${value}"`);
  if (!parts[0] || (parts.length !== 1 && parts.length !== 3)) {
    throw usage;
  }
  if (parts.length === 1) {
    return { city: parts[0] };
  }
  const lat = Number(parts[1]);
  const lon = Number(parts[2]);
  if (
    parts[1] === '' ||
    parts[2] === '' ||
    !Number.isFinite(lat) ||
    !Number.isFinite(lon) ||
    Math.abs(lat) > 90 ||
    Math.abs(lon) > 180
  ) {
    throw usage;
  }
  return { city: parts[0], position: [lat, lon] };
}

export function parseDelayOption(value: string): number {
  const ms = Number(value);
  if (value.trim() === '' || !Number.isFinite(ms) || ms < 0) {
    throw new InvalidArgumentError('Delay must be a non-negative number of milliseconds.');
  }
  return ms;
}

/**
 * Edits run in a fixed order: cities removed, cities added, roads added
 * (two-way then one-way), removed, reweighted, made one-way.
 */
export function editsFromOptions(opts: Pick<
  SearchCliOptions,
  'removeCity' | 'addCity' | 'addRoad' | 'addOneWay' | 'removeRoad' | 'setKm' | 'oneWay'
>): GraphEdit[] {
  const edits: GraphEdit[] = [];
  for (const city of opts.removeCity) {
    edits.push({ type: 'removeCity', city: city.trim() });
  }
  for (const value of opts.addCity) {
    edits.push({ type: 'addCity', ...splitCity(value) });
  }
  for (const value of opts.addRoad) {
    const [from, to, km] = splitRoad(value, '--add-road');
    edits.push({ type: 'addRoad', from, to, km });
  }
  for (const value of opts.addOneWay) {
    const [from, to, km] = splitRoad(value, '--add-one-way');
    edits.push({ type: 'addRoad', from, to, km, directed: true });
  }
  for (const value of opts.removeRoad) {
    const [from, to] = splitPair(value, '--remove-road');
    edits.push({ type: 'removeRoad', from, to });
  }
  for (const value of opts.setKm) {
    const [from, to, km] = splitRoad(value, '--set-km');
    edits.push({ type: 'setKm', from, to, km });
  }
  for (const value of opts.oneWay) {
    const [from, to] = splitPair(value, '--one-way');
    edits.push({ type: 'oneWay', from, to });
  }
  return edits;
}

function writeOut(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf8');
  console.log(`Wrote ${path}`);
}

function reportError(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`error: ${message}`);
  process.exitCode = 1;
}

export const program = new Command();

program
  .name('roadtrace')
  .description('Step-by-step Dijkstra shortest paths over a road network')
  .version('0.1.0')
  .showHelpAfterError();

program
  .command('search', { isDefault: true })
  .requiredOption('--network <file>', 'Path to distances CSV or network JSON')
  .option('--positions <file>', 'Path to city positions JSON')
  .option('--from <city>', 'Source city')
  .option('--to <city>', 'Target city (omit for distances to every city)')
  .option('--no-early-stop', 'Keep exploring after the target is reached')
  .option('--remove-city <city>', 'Remove a city before searching', collect, [])
  .option('--add-city <name[:lat:lon]>', 'Add a city before searching', collect, [])
  .option('--add-road <from:to:km>', 'Add a two-way road before searching', collect, [])
  .option('--add-one-way <from:to:km>', 'Add a one-way road before searching', collect, [])
  .option('--remove-road <from:to>', 'Remove a road before searching', collect, [])
  .option('--set-km <from:to:km>', 'Change a road length before searching', collect, [])
  .option('--one-way <from:to>', 'Make a road one-way before searching', collect, [])
  .option('--trace', 'Print every step as it is recorded')
  .option('--play [ms]', 'Replay the steps with a delay between them', parseDelayOption)
  .option('--out <file>', 'Write search JSON to this path (overwrite)')
  .option('--csv <file>', 'Write steps CSV to this path')
  .option('--html [file]', 'Write HTML trace report to this path (or stdout)')
  .option('--kml [file]', 'Write KML of the path to this path (or stdout)')
  .option('--run-id <id>', 'Run identifier recorded in reports')
  .option('--note <text>', 'Run note recorded in reports')
  .action(async (opts: SearchCliOptions) => {
    try {
      const result = searchRoute({
        networkPath: opts.network,
        positionsPath: opts.positions,
        source: opts.from,
        target: opts.to,
        // --no-early-stop leaves earlyStop=true unless given, so only `false` overrides the network config
        earlyStop: opts.earlyStop === false ? false : undefined,
        edits: editsFromOptions(opts),
        runId: opts.runId,
        runNote: opts.note,
        onStep: opts.trace ? (step) => console.log(formatStep(step)) : undefined,
      });
      const { run } = result;
      const tsToken = formatTimestampToken(result.runTimestamp);
      const tokenize = (s: string): string =>
        s.replace(/\$\{(runId|timestamp)\}/g, (_, k: string) =>
          k === 'runId' ? result.runId ?? '' : tsToken,
        );

      if (opts.play !== undefined) {
        const player = new TracePlayer(
          run.trace,
          typeof opts.play === 'number' ? opts.play : result.stepDelayMs,
        );
        await player.play((step) => console.log(formatStep(step)));
      }

      if (opts.out) {
        writeOut(tokenize(opts.out), result.json);
      }
      if (opts.csv) {
        writeOut(tokenize(opts.csv), emitStepsCsv(run.trace));
      }
      if (opts.html !== undefined) {
        const html = emitHtml(run, result.runTimestamp, {
          runId: result.runId,
          runNote: result.runNote,
          elapsedMs: result.elapsedMs,
        });
        if (typeof opts.html === 'string') {
          writeOut(tokenize(opts.html), html);
        } else {
          console.log(html);
        }
      }
      if (opts.kml !== undefined) {
        if (run.result.kind !== 'path') {
          console.warn('No path found; KML not written');
        } else {
          const kml = emitKml(run.result, result.network.positions);
          if (typeof opts.kml === 'string') {
            writeOut(tokenize(opts.kml), kml);
          } else {
            console.log(kml);
          }
        }
      }

      console.log(formatPathResult(run.result, result.elapsedMs));
    } catch (err) {
      reportError(err);
    }
  });

program
  .command('cities')
  .description('List the cities of a network')
  .requiredOption('--network <file>', 'Path to distances CSV or network JSON')
  .action((opts: { network: string }) => {
    try {
      const { graph } = loadNetwork(opts.network);
      for (const city of graph.vertices()) {
        console.log(city);
      }
    } catch (err) {
      reportError(err);
    }
  });

program
  .command('generate')
  .description('Print a random distances CSV')
  .requiredOption('--cities <n>', 'Number of cities', parseFloat)
  .requiredOption('--roads <n>', 'Number of roads', parseFloat)
  .option('--seed <seed>', 'Random seed', parseFloat)
  .option('--max-km <km>', 'Longest road length', parseFloat)
  .option('--one-way <share>', 'Share of one-way roads (0..1)', parseFloat)
  .action((opts: GenerateCliOptions) => {
    try {
      const { roads } = generateNetwork({
        cities: opts.cities,
        roads: opts.roads,
        seed: opts.seed,
        maxKm: opts.maxKm,
        oneWayShare: opts.oneWay,
      });
      console.log(toDistancesCsv(roads));
    } catch (err) {
      reportError(err);
    }
  });

export function run(argv: readonly string[] = process.argv): Promise<Command> {
  return program.parseAsync(argv);
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  run().catch(reportError);
}
