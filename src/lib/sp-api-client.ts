import { z } from 'zod';
import { fetch as undiciFetch } from 'undici';
import {
  FailureReason,
  SpApiError,
  cancelledError,
  errorFromStatus,
  errorMessage,
  permanentError,
  transientError,
} from './errors.js';
import { withRetry, linkTimeout, sleep as defaultSleep, type Sleep } from './retry.js';
import { silentLogger, type Logger } from './logger.js';
import type { QuotaCategory, QuotaGovernor } from './quota-governor.js';
import type { CredentialProvider } from './sp-api-auth.js';

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

/** The slice of `fetch` the client uses; undici's fetch satisfies it. */
export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

export interface RawOffersPayload {
  productId: string;
  /** Offer entries exactly as the pricing API returned them */
  offers: unknown[];
}

export interface SpApiClientOptions {
  endpoint: string;
  marketplaceId: string;
  credentials: CredentialProvider;
  governor: QuotaGovernor;
  itemCondition?: string;
  requestTimeoutMs?: number;
  retry?: { maxAttempts?: number; baseDelayMs?: number; maxDelayMs?: number };
  logger?: Logger;
  fetch?: FetchLike;
  sleep?: Sleep;
  random?: () => number;
}

// Upstream "errors" array, present on non-2xx and on some 200 payloads
const ApiErrors = z
  .array(z.object({ code: z.string(), message: z.string().optional() }))
  .optional();

const GetItemOffersResponse = z.object({
  payload: z
    .object({
      ASIN: z.string().optional(),
      status: z.string().optional(),
      Offers: z.array(z.unknown()).default([]),
    })
    .optional(),
  errors: ApiErrors,
});

const CatalogItemResponse = z.object({
  asin: z.string().optional(),
  summaries: z
    .array(
      z.object({
        marketplaceId: z.string().optional(),
        itemName: z.string().nullish(),
      })
    )
    .default([]),
});

const IDENTIFIER_PATTERN = /^[A-Za-z0-9]+$/;
const CONNECTION_TEST_ASIN = 'B08N5WRWNW';

/** Maps an SP-API error code (from a 200 or error body) onto the failure taxonomy. */
function errorFromApiCode(code: string, message: string): SpApiError {
  switch (code) {
    case 'QuotaExceeded':
      return transientError(FailureReason.RATE_LIMITED, message);
    case 'InternalFailure':
    case 'ServiceUnavailable':
      return transientError(FailureReason.SERVER_ERROR, message);
    case 'Unauthorized':
    case 'Forbidden':
      return permanentError(FailureReason.UNAUTHORIZED, message);
    case 'NotFound':
      return permanentError(FailureReason.NOT_FOUND, message);
    default:
      return permanentError(FailureReason.INVALID_IDENTIFIER, message);
  }
}

/**
 * Selling Partner API client for the two lookups the analyzer needs: the
 * catalog item name and the competing offers. Every attempt spends a fresh
 * quota token; transient failures are retried with backoff and jitter.
 */
export class SpApiClient {
  private readonly doFetch: FetchLike;
  private readonly logger: Logger;
  private readonly endpoint: string;

  constructor(private readonly opts: SpApiClientOptions) {
    this.doFetch = opts.fetch ?? undiciFetch;
    this.logger = opts.logger ?? silentLogger;
    this.endpoint = opts.endpoint.replace(/\/$/, '');
  }

  async fetchOffers(productId: string, signal?: AbortSignal): Promise<RawOffersPayload> {
    const asin = this.checkIdentifier(productId);
    const query = new URLSearchParams({
      MarketplaceId: this.opts.marketplaceId,
      ItemCondition: this.opts.itemCondition ?? 'New',
    });
    const path = `/products/pricing/v0/items/${encodeURIComponent(asin)}/offers?${query}`;

    const payload = await this.request('pricing', 'getItemOffers', asin, path, signal, (json) => {
      const parsed = GetItemOffersResponse.safeParse(json);
      if (!parsed.success) {
        throw permanentError(FailureReason.MALFORMED_RESPONSE, `getItemOffers ${asin}: unexpected response shape`);
      }
      const { payload, errors } = parsed.data;
      if (payload) return payload;
      const first = errors?.[0];
      if (first) throw errorFromApiCode(first.code, `getItemOffers ${asin}: ${first.message ?? first.code}`);
      throw permanentError(FailureReason.MALFORMED_RESPONSE, `getItemOffers ${asin}: response has no payload`);
    });

    this.logger.debug('Fetched offers', { asin, count: payload.Offers.length, status: payload.status });
    return { productId: payload.ASIN ?? asin, offers: payload.Offers };
  }

  async fetchProductName(productId: string, signal?: AbortSignal): Promise<string> {
    const asin = this.checkIdentifier(productId);
    const query = new URLSearchParams({
      marketplaceIds: this.opts.marketplaceId,
      includedData: 'summaries',
    });
    const path = `/catalog/2022-04-01/items/${encodeURIComponent(asin)}?${query}`;

    const item = await this.request('catalog', 'getCatalogItem', asin, path, signal, (json) => {
      const parsed = CatalogItemResponse.safeParse(json);
      if (!parsed.success) {
        throw permanentError(FailureReason.MALFORMED_RESPONSE, `getCatalogItem ${asin}: unexpected response shape`);
      }
      return parsed.data;
    });

    const summaries = item.summaries;
    const summary = summaries.find((s) => s.marketplaceId === this.opts.marketplaceId) ?? summaries[0];
    const name = summary?.itemName?.trim();
    return name || 'Unknown';
  }

  /** Calls the catalog API with a well-known ASIN; false on any failure. */
  async testConnection(signal?: AbortSignal): Promise<boolean> {
    try {
      await this.fetchProductName(CONNECTION_TEST_ASIN, signal);
      this.logger.info('SP-API connection test successful');
      return true;
    } catch (err) {
      this.logger.error('SP-API connection test failed', err);
      return false;
    }
  }

  private checkIdentifier(productId: string): string {
    const asin = productId.trim();
    if (!IDENTIFIER_PATTERN.test(asin)) {
      throw permanentError(FailureReason.INVALID_IDENTIFIER, `Invalid product identifier: "${productId}"`);
    }
    return asin;
  }

  /**
   * One rate-governed, retried GET. `parse` runs inside the retry loop so a
   * throttling error reported in a 200 body is retried like a 429.
   */
  private request<T>(
    category: QuotaCategory,
    operation: string,
    asin: string,
    path: string,
    signal: AbortSignal | undefined,
    parse: (json: unknown) => T
  ): Promise<T> {
    const url = `${this.endpoint}${path}`;
    const timeoutMs = this.opts.requestTimeoutMs ?? 15000;

    return withRetry(
      async (attempt) => {
        await this.opts.governor.acquire(category, signal);
        const token = await this.opts.credentials.getAccessToken(signal);

        const { status, text } = await this.send(url, token, `${operation} ${asin}`, timeoutMs, signal);

        this.logger.debug(`${operation} response`, { asin, status, attempt, len: text.length });

        if (status < 200 || status >= 300) {
          throw errorFromStatus(status, `${operation} ${asin}: HTTP ${status} ${text.slice(0, 200)}`.trim());
        }

        let json: unknown;
        try {
          json = JSON.parse(text);
        } catch {
          throw permanentError(FailureReason.MALFORMED_RESPONSE, `${operation} ${asin}: response is not JSON`, status);
        }
        return parse(json);
      },
      {
        ...this.opts.retry,
        signal,
        sleep: this.opts.sleep ?? defaultSleep,
        random: this.opts.random,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn(`${operation} retrying`, { asin, attempt, delayMs, reason: error.reason, status: error.status });
        },
      }
    );
  }

  private async send(
    url: string,
    token: string,
    label: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<{ status: number; text: string }> {
    const timeout = linkTimeout(signal, timeoutMs);
    try {
      const res = await this.doFetch(url, {
        method: 'GET',
        headers: {
          'x-amz-access-token': token,
          Accept: 'application/json',
          'User-Agent': 'buybox-analyzer/1.0 (Language=TypeScript)',
        },
        signal: timeout.signal,
      });
      return { status: res.status, text: await res.text() };
    } catch (err) {
      if (signal?.aborted) throw cancelledError();
      if (timeout.signal.aborted) {
        throw transientError(FailureReason.TIMEOUT, `${label}: timed out after ${timeoutMs}ms`);
      }
      throw transientError(FailureReason.NETWORK, `${label}: ${errorMessage(err)}`);
    } finally {
      timeout.done();
    }
  }
}
