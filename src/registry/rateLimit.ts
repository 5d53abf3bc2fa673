import { ECOSYSTEMS, type Ecosystem } from "../core/target.js";
import { RebuildError } from "../core/errors.js";

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export function cancelled(): RebuildError {
  return new RebuildError("Internal", "cancelled");
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(cancelled());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(cancelled());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    })
};

/**
 * Token bucket shared by every caller of one ecosystem's registry.
 * Waiters are served in arrival order.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly ratePerSecond: number,
    readonly burst: number = 1,
    private readonly clock: Clock = systemClock
  ) {
    if (!(ratePerSecond > 0)) throw new RebuildError("Malformed", `rate must be > 0 (got ${ratePerSecond})`);
    if (!Number.isInteger(burst) || burst < 1) throw new RebuildError("Malformed", `burst must be an integer >= 1 (got ${burst})`);
    this.tokens = burst;
    this.lastRefill = clock.now();
  }

  wait(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(() => this.take(signal));
    // A cancelled waiter must not stall the ones queued behind it.
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.burst, this.tokens + (elapsed / 1000) * this.ratePerSecond);
    this.lastRefill = now;
  }

  private async take(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw cancelled();
    this.refill();
    if (this.tokens < 1) {
      const waitMs = Math.ceil(((1 - this.tokens) / this.ratePerSecond) * 1000);
      await this.clock.sleep(waitMs, signal);
      this.refill();
    }
    this.tokens = Math.max(0, this.tokens - 1);
  }
}

export class RateLimiters {
  private readonly buckets = new Map<Ecosystem, TokenBucket>();

  constructor(limits: Partial<Record<Ecosystem, number>>, clock: Clock = systemClock) {
    for (const eco of ECOSYSTEMS) {
      const rate = limits[eco];
      if (rate !== undefined) this.buckets.set(eco, new TokenBucket(rate, 1, clock));
    }
  }

  static unlimited(): RateLimiters {
    return new RateLimiters({});
  }

  for(ecosystem: Ecosystem): TokenBucket | null {
    return this.buckets.get(ecosystem) ?? null;
  }
}
