import { SpApiError, FailureKind, cancelledError } from './errors.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
  onRetry?: (info: { attempt: number; delayMs: number; error: SpApiError }) => void;
};

/** setTimeout-backed sleep that rejects with a cancellation failure when `signal` aborts. */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Settles with `promise`, or rejects with a cancellation failure as soon as
 * `signal` aborts. The underlying work keeps running for its other callers.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(cancelledError());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(cancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

/** A signal that aborts after `timeoutMs` or when `parent` aborts; call `done` to release the timer. */
export function linkTimeout(parent: AbortSignal | undefined, timeoutMs: number) {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();
  parent?.addEventListener('abort', onAbort, { once: true });
  return {
    signal: controller.signal,
    done: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Backoff before the retry that follows `attempt` (1-based): exponential,
 * capped at `maxDelayMs`, with full jitter.
 */
export function backoffDelay(
  attempt: number,
  opts: { baseDelayMs: number; maxDelayMs: number; factor: number },
  random: () => number = Math.random
): number {
  const ceiling = Math.min(opts.maxDelayMs, opts.baseDelayMs * Math.pow(opts.factor, attempt - 1));
  return Math.round(ceiling * random());
}

/**
 * Runs `fn` until it succeeds, throws a non-transient error, or runs out of
 * attempts. Transient failures that survive every attempt are rethrown as
 * RETRIES_EXHAUSTED with the last reason and the attempt count.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts ?? 3));
  const backoff = {
    baseDelayMs: opts.baseDelayMs ?? 1000,
    maxDelayMs: opts.maxDelayMs ?? 10000,
    factor: opts.factor ?? 2,
  };
  const wait = opts.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    if (opts.signal?.aborted) throw cancelledError();
    try {
      return await fn(attempt);
    } catch (err) {
      if (!(err instanceof SpApiError) || !err.isTransient) throw err;

      if (attempt >= maxAttempts) {
        throw new SpApiError(
          FailureKind.RETRIES_EXHAUSTED,
          err.reason,
          `${err.message} (gave up after ${attempt} attempts)`,
          err.status,
          attempt
        );
      }

      const delayMs = backoffDelay(attempt, backoff, opts.random);
      opts.onRetry?.({ attempt, delayMs, error: err });
      await wait(delayMs, opts.signal);
    }
  }
}
