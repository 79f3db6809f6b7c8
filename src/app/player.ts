import type { StepTrace } from '../core/trace';
import type { SearchStep } from '../types';

export const DEFAULT_STEP_DELAY_MS = 300;
export const MIN_STEP_DELAY_MS = 50;

/** Delays below the minimum are raised to it; a non-finite delay means the default. */
export function clampDelay(ms: number): number {
  if (!Number.isFinite(ms)) return DEFAULT_STEP_DELAY_MS;
  return Math.max(MIN_STEP_DELAY_MS, ms);
}

/**
 * Replays a finished trace one step at a time, either on demand with `next()`
 * or on a timer with `play()`.
 */
export class TracePlayer {
  private index = 0;
  private delay: number;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private settle: (() => void) | undefined;

  constructor(
    private readonly trace: StepTrace,
    delayMs = DEFAULT_STEP_DELAY_MS,
  ) {
    this.delay = clampDelay(delayMs);
  }

  get position(): number {
    return this.index;
  }

  get delayMs(): number {
    return this.delay;
  }

  get done(): boolean {
    return this.index >= this.trace.length;
  }

  get playing(): boolean {
    return this.settle !== undefined;
  }

  setDelay(ms: number): void {
    this.delay = clampDelay(ms);
  }

  next(): SearchStep | undefined {
    const step = this.trace.at(this.index);
    if (step) this.index++;
    return step;
  }

  /**
   * Emit the remaining steps every `delayMs`. Resolves once the trace is
   * exhausted or playback is paused or reset.
   */
  play(onStep: (step: SearchStep) => void): Promise<void> {
    this.pause();
    return new Promise<void>((resolve, reject) => {
      const settle = (): void => resolve();
      // A pause(), reset() or new play() from inside onStep replaces or clears
      // `this.settle`; this run must then stop scheduling.
      const live = (): boolean => this.settle === settle;
      this.settle = settle;
      const tick = (): void => {
        this.timer = undefined;
        const step = this.next();
        if (!step) {
          this.stop();
          return;
        }
        try {
          onStep(step);
        } catch (err) {
          if (live()) {
            this.settle = undefined;
            this.stop();
          }
          reject(err);
          return;
        }
        if (!live()) return;
        if (this.done) {
          this.stop();
          return;
        }
        this.timer = setTimeout(tick, this.delay);
      };
      this.timer = setTimeout(tick, this.delay);
    });
  }

  pause(): void {
    this.stop();
  }

  reset(): void {
    this.stop();
    this.index = 0;
  }

  private stop(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    const settle = this.settle;
    this.settle = undefined;
    settle?.();
  }
}
