import { z } from 'zod';
import {
  ConfigurationError,
  FailureKind,
  FailureReason,
  toFailure,
  type AnalysisFailure,
} from './errors.js';
import { normalizeOffers, type Offer } from './offer-normalizer.js';
import { determineBuyBox, type BuyBoxReason, type WinnerBasis } from './buybox-engine.js';
import { silentLogger, type Logger } from './logger.js';
import type { RawOffersPayload } from './sp-api-client.js';
import type { CredentialProvider } from './sp-api-auth.js';

/** What the orchestrator needs from the API client. */
export interface OfferSource {
  fetchProductName(productId: string, signal?: AbortSignal): Promise<string>;
  fetchOffers(productId: string, signal?: AbortSignal): Promise<RawOffersPayload>;
}

export interface AnalysisResult {
  readonly productId: string;
  readonly productName?: string;
  readonly winningOffer?: Offer;
  readonly winnerBasis?: WinnerBasis;
  readonly totalOfferCount: number;
  readonly reasons: readonly BuyBoxReason[];
  readonly failure?: AnalysisFailure;
  /** Only set when discarding malformed entries left no offers at all */
  readonly discardedOfferCount?: number;
  readonly analyzedAt: string;
}

export type ItemOutcome =
  | { ok: true; result: AnalysisResult }
  | { ok: false; failure: AnalysisFailure };

export type ProgressObserver = (completed: number, total: number, latest: AnalysisResult) => void | Promise<void>;

export interface AnalyzeOptions {
  client: OfferSource;
  /** Checked once before the batch starts */
  credentials?: CredentialProvider;
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: ProgressObserver;
  logger?: Logger;
  now?: () => Date;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  withWinner: number;
  failuresByKind: Record<FailureKind, number>;
}

const ProductIdList = z.array(z.string());

/**
 * Runs fetch, normalize and determine for one identifier. Never throws:
 * every failure comes back as the failure variant.
 */
export async function analyzeOne(
  productId: string,
  client: OfferSource,
  options: { signal?: AbortSignal; logger?: Logger; now?: () => Date } = {}
): Promise<ItemOutcome> {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  try {
    const productName = await client.fetchProductName(productId, options.signal);
    const payload = await client.fetchOffers(productId, options.signal);
    const { offers, discardedCount } = normalizeOffers(payload.offers, logger);
    const decision = determineBuyBox(offers);

    if (discardedCount > 0) {
      logger.info('Discarded malformed offers', { productId, discardedCount, kept: offers.length });
    }

    const result: AnalysisResult = {
      productId,
      productName,
      totalOfferCount: offers.length,
      reasons: decision.reasons,
      analyzedAt: now().toISOString(),
      ...(decision.winner ? { winningOffer: decision.winner, winnerBasis: decision.basis } : {}),
      ...(offers.length === 0 && discardedCount > 0 ? { discardedOfferCount: discardedCount } : {}),
    };
    return { ok: true, result };
  } catch (err) {
    const failure = toFailure(err);
    logger.warn('Analysis failed', { productId, kind: failure.kind, reason: failure.reason, message: failure.message });
    return { ok: false, failure };
  }
}

function failedResult(productId: string, failure: AnalysisFailure, now: () => Date): AnalysisResult {
  return {
    productId,
    totalOfferCount: 0,
    reasons: [],
    failure,
    analyzedAt: now().toISOString(),
  };
}

const SKIPPED: AnalysisFailure = {
  kind: FailureKind.CANCELLED,
  reason: FailureReason.RUN_CANCELLED,
  message: 'Skipped: run cancelled before this identifier started',
};

function notifyProgress(
  observer: ProgressObserver | undefined,
  completed: number,
  total: number,
  latest: AnalysisResult,
  logger: Logger
): void {
  if (!observer) return;
  try {
    const ret = observer(completed, total, latest);
    // Not awaited: a slow observer must not hold up the pipeline
    if (ret instanceof Promise) {
      ret.catch((err: unknown) => logger.warn('Progress observer rejected', err));
    }
  } catch (err) {
    logger.warn('Progress observer threw', err);
  }
}

/**
 * Analyzes every identifier and returns one result per identifier, in input
 * order. Duplicates are analyzed independently. Per-identifier failures,
 * cancellation included, are recorded in the results; only invalid input or
 * unusable credentials reject the whole call.
 */
export async function analyzeProducts(productIds: readonly string[], options: AnalyzeOptions): Promise<AnalysisResult[]> {
  const parsed = ProductIdList.safeParse(productIds);
  if (!parsed.success) {
    throw new ConfigurationError('productIds must be an array of strings');
  }
  options.credentials?.assertCredentials();

  const ids = parsed.data;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const limit = Math.max(1, Math.floor(options.concurrency ?? 1));
  const total = ids.length;

  const results: AnalysisResult[] = new Array(total);
  let nextIndex = 0;
  let completed = 0;

  logger.info('Starting Buy Box analysis', { total, concurrency: limit });

  async function worker(): Promise<void> {
    while (nextIndex < total) {
      const current = nextIndex++;
      const productId = ids[current];

      let result: AnalysisResult;
      if (options.signal?.aborted) {
        result = failedResult(productId, SKIPPED, now);
      } else {
        logger.debug('Analyzing', { productId, position: current + 1, total });
        const outcome = await analyzeOne(productId, options.client, { signal: options.signal, logger, now });
        result = outcome.ok ? outcome.result : failedResult(productId, outcome.failure, now);
      }

      results[current] = result;
      completed++;
      notifyProgress(options.onProgress, completed, total, result, logger);
    }
  }

  const workers = new Array(Math.min(limit, total)).fill(0).map(() => worker());
  await Promise.all(workers);

  const summary = summarizeResults(results);
  logger.info('Analysis complete', summary);
  return results;
}

export function summarizeResults(results: readonly AnalysisResult[]): BatchSummary {
  const failuresByKind: Record<FailureKind, number> = {
    [FailureKind.TRANSIENT]: 0,
    [FailureKind.PERMANENT]: 0,
    [FailureKind.RETRIES_EXHAUSTED]: 0,
    [FailureKind.CANCELLED]: 0,
  };
  let failed = 0;
  let withWinner = 0;
  for (const r of results) {
    if (r.failure) {
      failed++;
      failuresByKind[r.failure.kind]++;
    }
    if (r.winningOffer) withWinner++;
  }
  return { total: results.length, succeeded: results.length - failed, failed, withWinner, failuresByKind };
}
