import { cfg, type AppConfig } from '../config.js';
import { QuotaGovernor } from './quota-governor.js';
import { createLwaCredentialProvider, type CredentialProvider } from './sp-api-auth.js';
import { SpApiClient, type FetchLike } from './sp-api-client.js';
import { analyzeProducts, type AnalysisResult, type ProgressObserver } from './batch-orchestrator.js';
import { createLogger, type Logger } from './logger.js';

export interface BuyBoxAnalyzer {
  readonly client: SpApiClient;
  readonly governor: QuotaGovernor;
  readonly credentials: CredentialProvider;
  analyze(
    productIds: readonly string[],
    options?: { signal?: AbortSignal; onProgress?: ProgressObserver; concurrency?: number; logger?: Logger }
  ): Promise<AnalysisResult[]>;
}

/**
 * Wires the credential provider, quota governor and API client from
 * configuration. One analyzer shares its token buckets across every run
 * it executes.
 */
export function createBuyBoxAnalyzer(
  config: AppConfig = cfg,
  overrides: { credentials?: CredentialProvider; fetch?: FetchLike; logger?: Logger } = {}
): BuyBoxAnalyzer {
  const logger = overrides.logger ?? createLogger('buybox', { level: config.log.level });
  const credentials =
    overrides.credentials ??
    createLwaCredentialProvider(
      {
        refreshToken: config.spApi.refreshToken,
        clientId: config.spApi.clientId,
        clientSecret: config.spApi.clientSecret,
        tokenUrl: config.spApi.tokenUrl,
      },
      { fetch: overrides.fetch, timeoutMs: config.spApi.requestTimeoutMs }
    );
  const governor = new QuotaGovernor(config.quota);
  const client = new SpApiClient({
    endpoint: config.spApi.endpoint,
    marketplaceId: config.spApi.marketplace.id,
    itemCondition: config.spApi.itemCondition,
    requestTimeoutMs: config.spApi.requestTimeoutMs,
    retry: config.retry,
    credentials,
    governor,
    fetch: overrides.fetch,
    logger: logger.child('sp-api'),
  });

  return {
    client,
    governor,
    credentials,
    analyze: (productIds, options = {}) =>
      analyzeProducts(productIds, {
        client,
        credentials,
        concurrency: options.concurrency ?? config.concurrency,
        signal: options.signal,
        onProgress: options.onProgress,
        logger: options.logger ?? logger,
      }),
  };
}
