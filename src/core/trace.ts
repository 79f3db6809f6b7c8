import type { ExpandStep, SearchStep } from '../types';

/**
 * Materialized sequence of search steps. It holds no reference to the search
 * that produced it and can be iterated any number of times.
 */
export class StepTrace implements Iterable<SearchStep> {
  private readonly steps: readonly SearchStep[];

  constructor(steps: readonly SearchStep[]) {
    this.steps = Object.freeze([...steps]);
  }

  get length(): number {
    return this.steps.length;
  }

  at(index: number): SearchStep | undefined {
    return this.steps[index];
  }

  [Symbol.iterator](): Iterator<SearchStep> {
    return this.steps[Symbol.iterator]();
  }

  toArray(): SearchStep[] {
    return [...this.steps];
  }

  expansions(): ExpandStep[] {
    return this.steps.filter((s): s is ExpandStep => s.kind === 'expand');
  }

  final(): SearchStep | undefined {
    return this.steps[this.steps.length - 1];
  }
}
