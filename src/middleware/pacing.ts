/**
 * pacing.ts — Space out page loads against the portal.
 *
 * A single Bottleneck limiter serialises every navigation (listing pages and
 * detail pages alike) and enforces the minimum gap; a random jitter on top
 * spreads the gaps across [minDelayMs, maxDelayMs].
 */

import Bottleneck from 'bottleneck';
import { randomBetween, sleep as realSleep, type Sleep } from '../core/timing';

export interface PacingOptions {
  minDelayMs: number;
  maxDelayMs: number;
  sleep?: Sleep;
  random?: (min: number, max: number) => number;
}

export class RequestPacer {
  private readonly limiter: Bottleneck;
  private readonly jitterMs: number;
  private readonly sleep: Sleep;
  private readonly random: (min: number, max: number) => number;
  private started = false;

  constructor(options: PacingOptions) {
    this.limiter = new Bottleneck({ maxConcurrent: 1, minTime: options.minDelayMs });
    this.jitterMs = Math.max(0, options.maxDelayMs - options.minDelayMs);
    this.sleep = options.sleep ?? realSleep;
    this.random = options.random ?? randomBetween;
  }

  /** Run `task` once its turn comes; the first task runs without jitter. */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    return this.limiter.schedule(async () => {
      if (this.started && this.jitterMs > 0) {
        await this.sleep(this.random(0, this.jitterMs));
      }
      this.started = true;
      return task();
    });
  }
}
