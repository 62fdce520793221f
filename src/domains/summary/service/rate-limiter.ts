/**
 * @fileoverview Minimum-interval throttle for generative calls.
 *
 * Holds the single "last call" timestamp shared by every summarization
 * request. Callers queue behind each other, so concurrent requests are
 * spaced by at least `minIntervalMs` measured between call issue times.
 */

import { systemClock, type Clock } from '../../../utils/timing.js';

export class MinIntervalLimiter {
  private lastCallAt: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Resolve when the caller may issue its call, and record that moment as
   * the new last-call timestamp.
   *
   * @returns milliseconds spent waiting
   */
  acquire(): Promise<number> {
    const turn = this.tail.then(() => this.waitForSlot());
    // Keep the queue alive if a sleep rejects; the rejection reaches the caller through `turn`.
    this.tail = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  /** Forget the last call, e.g. between tests. */
  reset(): void {
    this.lastCallAt = null;
  }

  getLastCallAt(): number | null {
    return this.lastCallAt;
  }

  private async waitForSlot(): Promise<number> {
    let waitedMs = 0;
    if (this.lastCallAt !== null) {
      const elapsed = this.clock.now() - this.lastCallAt;
      if (elapsed < this.minIntervalMs) {
        waitedMs = this.minIntervalMs - elapsed;
        await this.clock.sleep(waitedMs);
      }
    }
    this.lastCallAt = this.clock.now();
    return waitedMs;
  }
}
