import type { ID } from './types';

export type GraphErrorKind =
  | 'UnknownVertex'
  | 'DuplicateVertex'
  | 'UnknownEdge'
  | 'InvalidWeight';

/**
 * Base class for precondition failures raised by the graph and the search
 * engine. All of them are detected before any state changes.
 */
export abstract class GraphError extends Error {
  abstract readonly kind: GraphErrorKind;
}

export class UnknownVertexError extends GraphError {
  readonly kind = 'UnknownVertex';

  constructor(readonly vertex: ID) {
    super(`Unknown city: ${vertex}`);
    this.name = 'UnknownVertexError';
  }
}

export class DuplicateVertexError extends GraphError {
  readonly kind = 'DuplicateVertex';

  constructor(readonly vertex: ID) {
    super(`City already exists: ${vertex}`);
    this.name = 'DuplicateVertexError';
  }
}

export class UnknownEdgeError extends GraphError {
  readonly kind = 'UnknownEdge';

  constructor(
    readonly from: ID,
    readonly to: ID,
  ) {
    super(`No road from ${from} to ${to}`);
    this.name = 'UnknownEdgeError';
  }
}

export class InvalidWeightError extends GraphError {
  readonly kind = 'InvalidWeight';

  constructor(readonly weight: number) {
    super(`Distance must be a positive number of km: ${weight}`);
    this.name = 'InvalidWeightError';
  }
}

export function isGraphError(err: unknown): err is GraphError {
  return err instanceof GraphError;
}
