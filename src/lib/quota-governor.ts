import { performance } from 'perf_hooks';
import { cancelledError } from './errors.js';
import { abortable, sleep as defaultSleep, type Sleep } from './retry.js';

export type QuotaCategory = 'catalog' | 'pricing';

export interface BucketConfig {
  /** Steady refill rate, tokens per second */
  refillPerSecond: number;
  /** Maximum tokens held at once */
  burst: number;
}

export type QuotaConfig = Record<QuotaCategory, BucketConfig>;

/** Milliseconds from a monotonic source. */
export type Clock = () => number;

const monotonic: Clock = () => performance.now();

/**
 * Token bucket with continuous, lazily computed refill. Waiters are
 * serialized through a promise chain, which is the mutual exclusion around
 * token accounting when several workers acquire at once.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly config: BucketConfig,
    private readonly now: Clock = monotonic,
    private readonly wait: Sleep = defaultSleep
  ) {
    if (!(config.refillPerSecond > 0)) throw new Error('refillPerSecond must be positive');
    if (!(config.burst >= 1)) throw new Error('burst must be at least 1');
    this.tokens = config.burst;
    this.lastRefill = now();
  }

  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(() => this.take(signal));
    // The next waiter starts once this one settles; a cancelled waiter must not poison the chain.
    this.tail = turn.then(
      () => undefined,
      () => undefined
    );
    // An aborted waiter stops waiting now; its queued turn sees the abort and passes on without a token.
    return abortable(turn, signal);
  }

  /** Tokens available right now (fractional). */
  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const t = this.now();
    const elapsedSeconds = Math.max(0, t - this.lastRefill) / 1000;
    this.tokens = Math.min(this.config.burst, this.tokens + elapsedSeconds * this.config.refillPerSecond);
    this.lastRefill = t;
  }

  private async take(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted) throw cancelledError();
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const deficitMs = ((1 - this.tokens) / this.config.refillPerSecond) * 1000;
      await this.wait(Math.ceil(deficitMs), signal);
    }
  }
}

/**
 * One independent bucket per API category. `acquire` has no timeout of its
 * own; callers bound their wait through the abort signal.
 */
export class QuotaGovernor {
  private readonly buckets: Record<QuotaCategory, TokenBucket>;

  constructor(config: QuotaConfig, options: { now?: Clock; sleep?: Sleep } = {}) {
    this.buckets = {
      catalog: new TokenBucket(config.catalog, options.now, options.sleep),
      pricing: new TokenBucket(config.pricing, options.now, options.sleep),
    };
  }

  acquire(category: QuotaCategory, signal?: AbortSignal): Promise<void> {
    return this.buckets[category].acquire(signal);
  }

  snapshot(): Record<QuotaCategory, number> {
    return {
      catalog: this.buckets.catalog.available(),
      pricing: this.buckets.pricing.available(),
    };
  }
}
