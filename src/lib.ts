export { Graph } from './core/graph';
export { search, reconstructPath } from './core/dijkstra';
export type { SearchOptions, SearchRun, StepFn } from './core/dijkstra';
export { StepTrace } from './core/trace';
export {
  GraphError,
  UnknownVertexError,
  DuplicateVertexError,
  UnknownEdgeError,
  InvalidWeightError,
  isGraphError,
} from './errors';
export type { GraphErrorKind } from './errors';
export { TracePlayer, DEFAULT_STEP_DELAY_MS, MIN_STEP_DELAY_MS } from './app/player';
export { loadNetwork, applyEdit, applyEdits } from './app/loadNetwork';
export type { GraphEdit, LoadedNetwork } from './app/loadNetwork';
export { searchRoute } from './app/searchRoute';
export { parseDistancesCsv, parseNetwork, parsePositions } from './io/parse';
export { emitSearch, formatPathResult, formatStep } from './io/emit';
export { emitStepsCsv } from './io/emitCsv';
export { emitHtml } from './io/emitHtml';
export { emitKml } from './io/emitKml';
export { generateNetwork, toDistancesCsv } from './synthetic';
export { haversineKm, straightLineKm, detourRatio } from './distance';
export type * from './types';
