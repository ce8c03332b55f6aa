import { Semaphore } from 'es-toolkit';

/**
 * ConcurrencyGate - counting gate that bounds how many operations run at once.
 *
 * Unlike a fixed worker pool, a holder may give its slot back in the middle
 * of a unit of work (for example while waiting out a retry delay) and queue
 * for a slot again later. Waiters are served in FIFO order.
 */
export class ConcurrencyGate {
  private readonly semaphore: Semaphore;
  private active = 0;
  private peak = 0;

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(
        `Concurrency limit must be a positive integer, got ${limit}`,
      );
    }
    this.semaphore = new Semaphore(limit);
  }

  /** Number of slots currently held */
  get inFlight(): number {
    return this.active;
  }

  /** Highest number of slots held at the same time so far */
  get peakInFlight(): number {
    return this.peak;
  }

  /**
   * Wait for a free slot.
   *
   * Resolves `false` without holding a slot when the signal is already
   * aborted, or was aborted while waiting; the caller must not proceed then.
   */
  async acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return false;
    }

    await this.semaphore.acquire();

    if (signal?.aborted) {
      this.semaphore.release();
      return false;
    }

    this.active++;
    this.peak = Math.max(this.peak, this.active);
    return true;
  }

  release(): void {
    if (this.active === 0) {
      throw new Error('ConcurrencyGate.release() called without a held slot');
    }
    this.active--;
    this.semaphore.release();
  }

  /**
   * Run `task` while holding a slot.
   *
   * @returns `{ ran: false }` when the signal aborted before a slot was obtained
   */
  async run<R>(
    task: () => Promise<R>,
    signal?: AbortSignal,
  ): Promise<{ ran: true; value: R } | { ran: false }> {
    if (!(await this.acquire(signal))) {
      return { ran: false };
    }

    try {
      return { ran: true, value: await task() };
    } finally {
      this.release();
    }
  }
}
