import { performance } from 'node:perf_hooks';

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));
export const monotonicClock: Clock = () => performance.now();

export interface MinIntervalLimiterOptions {
  intervalMs: number;
  clock?: Clock;
  sleep?: Sleep;
}

/**
 * Keeps consecutive requests from one client at least `intervalMs` apart.
 * The timestamp is taken right after the wait, before the request leaves,
 * and only ever moves forward.
 */
export class MinIntervalLimiter {
  readonly intervalMs: number;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private last: number | null = null;

  constructor(options: MinIntervalLimiterOptions) {
    this.intervalMs = options.intervalMs;
    this.clock = options.clock ?? monotonicClock;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get lastRequestTime(): number | null { return this.last; }

  async wait(): Promise<void> {
    if (this.last === null) {
      this.last = this.clock();
      return;
    }
    const elapsed = this.clock() - this.last;
    if (elapsed < this.intervalMs) {
      await this.sleep(this.intervalMs - elapsed);
    }
    this.last = Math.max(this.last, this.clock());
  }
}
