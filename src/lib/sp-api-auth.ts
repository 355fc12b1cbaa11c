import { z } from 'zod';
import { fetch as undiciFetch } from 'undici';
import {
  ConfigurationError,
  FailureReason,
  cancelledError,
  permanentError,
  transientError,
  errorMessage,
} from './errors.js';
import { abortable, linkTimeout } from './retry.js';
import type { FetchLike } from './sp-api-client.js';

export interface CredentialProvider {
  getAccessToken(signal?: AbortSignal): Promise<string>;
  /** Throws a ConfigurationError when the provider cannot possibly authorize a call. */
  assertCredentials(): void;
}

export interface LwaCredentials {
  refreshToken: string;
  clientId: string;
  clientSecret: string;
  tokenUrl?: string;
}

const LwaTokenResponse = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive(),
});

// Refresh a minute before Amazon says the token expires
const EXPIRY_SKEW_MS = 60_000;

/**
 * Login with Amazon refresh-token exchange. The access token is cached until
 * shortly before it expires; concurrent callers share one in-flight exchange.
 * The exchange is bounded by its own timeout, not by any caller's signal: a
 * caller that aborts stops waiting, the others still get the token.
 */
export function createLwaCredentialProvider(
  creds: LwaCredentials,
  options: { fetch?: FetchLike; now?: () => number; timeoutMs?: number } = {}
): CredentialProvider {
  const doFetch: FetchLike = options.fetch ?? undiciFetch;
  const now = options.now ?? Date.now;
  const timeoutMs = options.timeoutMs ?? 15000;
  const tokenUrl = creds.tokenUrl || 'https://api.amazon.com/auth/o2/token';

  let cached: { token: string; expiresAt: number } | null = null;
  let inflight: Promise<string> | null = null;

  function missingCredentials(): string[] {
    const missing: string[] = [];
    if (!creds.refreshToken.trim()) missing.push('SP_API_REFRESH_TOKEN');
    if (!creds.clientId.trim()) missing.push('SP_API_CLIENT_ID');
    if (!creds.clientSecret.trim()) missing.push('SP_API_CLIENT_SECRET');
    return missing;
  }

  function assertCredentials(): void {
    const missing = missingCredentials();
    if (missing.length) {
      throw new ConfigurationError(`SP-API credentials not configured (missing ${missing.join(', ')})`);
    }
  }

  async function exchange(): Promise<string> {
    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: creds.refreshToken,
      client_id: creds.clientId,
      client_secret: creds.clientSecret,
    });

    const timeout = linkTimeout(undefined, timeoutMs);
    let res: { ok: boolean; status: number; text: string };
    try {
      const request = doFetch(tokenUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded;charset=UTF-8' },
        body: body.toString(),
        signal: timeout.signal,
      }).then(async (r) => ({ ok: r.ok, status: r.status, text: await r.text() }));
      res = await abortable(request, timeout.signal);
    } catch (err) {
      if (timeout.signal.aborted) {
        throw transientError(FailureReason.TIMEOUT, `LWA token request timed out after ${timeoutMs}ms`);
      }
      throw transientError(FailureReason.NETWORK, `LWA token request failed: ${errorMessage(err)}`);
    } finally {
      timeout.done();
    }

    if (res.status === 429 || res.status >= 500) {
      throw transientError(
        res.status === 429 ? FailureReason.RATE_LIMITED : FailureReason.SERVER_ERROR,
        `LWA token refresh failed: ${res.status}`,
        res.status
      );
    }
    if (!res.ok) {
      throw permanentError(FailureReason.UNAUTHORIZED, `LWA token refresh failed: ${res.status} ${res.text.slice(0, 200)}`, res.status);
    }

    let json: unknown;
    try {
      json = JSON.parse(res.text);
    } catch {
      throw permanentError(FailureReason.UNAUTHORIZED, 'LWA token response is not JSON', res.status);
    }
    const parsed = LwaTokenResponse.safeParse(json);
    if (!parsed.success) {
      throw permanentError(FailureReason.UNAUTHORIZED, 'LWA token response missing access_token', res.status);
    }

    cached = { token: parsed.data.access_token, expiresAt: now() + parsed.data.expires_in * 1000 - EXPIRY_SKEW_MS };
    return parsed.data.access_token;
  }

  async function getAccessToken(signal?: AbortSignal): Promise<string> {
    if (missingCredentials().length) {
      throw permanentError(FailureReason.UNAUTHORIZED, 'SP-API credentials not configured');
    }
    if (cached && cached.expiresAt > now()) return cached.token;
    if (signal?.aborted) throw cancelledError();
    if (!inflight) {
      inflight = exchange().finally(() => {
        inflight = null;
      });
    }
    return abortable(inflight, signal);
  }

  return { getAccessToken, assertCredentials };
}

/** A provider for a token obtained elsewhere (tests, or a caller that manages LWA itself). */
export function staticCredentialProvider(token: string): CredentialProvider {
  return {
    getAccessToken: async () => token,
    assertCredentials: () => {
      if (!token) throw new ConfigurationError('Access token is empty');
    },
  };
}
