import { sleep } from '../utils/sleep';

/**
 * RateLimiter - one permit per fixed interval, burst of one.
 *
 * Each caller reserves the next free slot and waits for it, so callers are
 * delayed rather than rejected. A cancelled wait rejects with CancelledError.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private nextPermitAt = 0;

  constructor(intervalMs: number) {
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new RangeError(`Rate limit interval must be a non-negative number, got ${intervalMs}`);
    }
    this.intervalMs = intervalMs;
  }

  async wait(signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    const permitAt = Math.max(now, this.nextPermitAt);
    const reservedUntil = permitAt + this.intervalMs;
    this.nextPermitAt = reservedUntil;

    try {
      await sleep(permitAt - now, signal);
    } catch (error) {
      // Give the slot back if nobody reserved after us
      if (this.nextPermitAt === reservedUntil) {
        this.nextPermitAt = permitAt;
      }
      throw error;
    }
  }

  getIntervalMs(): number {
    return this.intervalMs;
  }
}
