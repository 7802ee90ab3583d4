import { sleep } from './retry';
import { BucketState, Clock } from './types';

export interface LeakyBucketOptions {
  capacity?: number;
  drainIntervalMs?: number;
  now?: Clock;
}

/**
 * LeakyBucket estimates the remote call counter for one access token.
 * Every granted request adds one unit; the bucket drains one unit per
 * `drainIntervalMs`. Consumers call `grant()` before sending a request;
 * if the bucket is full, `grant()` waits until enough has leaked out.
 * Responses correct the estimate through `setState()`.
 *
 * Leak, admission check and increment run in one synchronous block, so no
 * two callers see the same leakage window.
 */
export class LeakyBucket {
  private capacity: number;
  private fillLevel = 0;
  private lastUpdateMs: number;
  private readonly drainIntervalMs: number;
  private readonly now: Clock;

  constructor(options: LeakyBucketOptions = {}) {
    const capacity = options.capacity ?? 40;
    const drainIntervalMs = options.drainIntervalMs ?? 500;

    if (capacity <= 0) {
      throw new Error('LeakyBucket capacity must be greater than zero');
    }
    if (!Number.isInteger(capacity)) {
      throw new Error('LeakyBucket capacity must be an integer');
    }
    if (drainIntervalMs <= 0) {
      throw new Error('LeakyBucket drainIntervalMs must be greater than zero');
    }

    this.capacity = capacity;
    this.drainIntervalMs = drainIntervalMs;
    this.now = options.now ?? (() => performance.now());
    this.lastUpdateMs = this.now();
  }

  private leak(): void {
    const now = this.now();
    const elapsedMs = Math.max(0, now - this.lastUpdateMs);

    this.fillLevel = Math.max(0, this.fillLevel - elapsedMs / this.drainIntervalMs);
    this.lastUpdateMs = now;
  }

  /**
   * Take one unit when it fits, otherwise return how long to wait for it
   */
  private tryTake(): number {
    this.leak();

    if (this.fillLevel + 1 <= this.capacity) {
      this.fillLevel += 1;
      return 0;
    }

    return (this.fillLevel + 1 - this.capacity) * this.drainIntervalMs;
  }

  /**
   * Wait until one more request fits in the bucket, then account for it.
   * Rejects with the abort reason if `signal` aborts first.
   */
  async grant(signal?: AbortSignal): Promise<void> {
    for (;;) {
      signal?.throwIfAborted();

      const waitMs = this.tryTake();
      if (waitMs === 0) {
        return;
      }

      // setState may land while we wait, so re-evaluate afterwards
      await sleep(Math.ceil(waitMs), signal);
    }
  }

  /**
   * Replace the estimate with an authoritative observation
   */
  setState(state: BucketState): void {
    this.capacity = state.capacity;
    this.fillLevel = state.currentFillLevel;
    this.lastUpdateMs = this.now();
  }

  /**
   * Current estimate with leakage applied, without mutating the bucket
   */
  snapshot(): { capacity: number; estimatedFillLevel: number } {
    const elapsedMs = Math.max(0, this.now() - this.lastUpdateMs);
    return {
      capacity: this.capacity,
      estimatedFillLevel: Math.max(0, this.fillLevel - elapsedMs / this.drainIntervalMs),
    };
  }
}
