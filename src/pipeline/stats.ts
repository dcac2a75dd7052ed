/**
 * Streaming delay statistics (Welford). Constant memory however long the
 * consumer runs.
 */

import type { DelaySummary } from '../types.js';

export class DelayStats {
  private n = 0;
  private mean = 0;
  private m2 = 0;
  private min = Infinity;
  private max = -Infinity;

  get count(): number {
    return this.n;
  }

  add(sample: number): void {
    this.n++;
    const delta = sample - this.mean;
    this.mean += delta / this.n;
    this.m2 += delta * (sample - this.mean);
    if (sample < this.min) this.min = sample;
    if (sample > this.max) this.max = sample;
  }

  /** Population statistics; all zero when nothing was added */
  summary(): DelaySummary {
    if (this.n === 0) {
      return { count: 0, mean: 0, stdev: 0, min: 0, max: 0 };
    }
    return {
      count: this.n,
      mean: this.mean,
      stdev: Math.sqrt(this.m2 / this.n),
      min: this.min,
      max: this.max,
    };
  }
}

export function messagesPerSecond(count: number, elapsedSeconds: number): number {
  return elapsedSeconds > 0 ? count / elapsedSeconds : 0;
}
