import 'dotenv/config';
import { resolveMarketplace, endpointFor } from './config/marketplaces.js';

const marketplace = resolveMarketplace(process.env.SP_API_MARKETPLACE);

function num(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return value !== undefined && value.trim() !== '' && Number.isFinite(n) ? n : fallback;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

function logLevel(value: string | undefined): LogLevel {
  const v = (value || 'info').toLowerCase();
  return v === 'debug' || v === 'warn' || v === 'error' ? v : 'info';
}

export const cfg = {
  port: Number(process.env.PORT || 3000),

  spApi: {
    refreshToken: process.env.SP_API_REFRESH_TOKEN || '',
    clientId: process.env.SP_API_CLIENT_ID || '',
    clientSecret: process.env.SP_API_CLIENT_SECRET || '',
    tokenUrl: process.env.SP_API_TOKEN_URL || 'https://api.amazon.com/auth/o2/token',
    endpoint: process.env.SP_API_ENDPOINT || endpointFor(marketplace, process.env.SP_API_REGION),
    marketplace,
    itemCondition: process.env.SP_API_ITEM_CONDITION || 'New',
    requestTimeoutMs: num(process.env.REQUEST_TIMEOUT_MS, 15000),
  },

  // Contractual SP-API limits: getCatalogItem 2 rps / burst 2, getItemOffers 0.5 rps / burst 1
  quota: {
    catalog: {
      refillPerSecond: num(process.env.CATALOG_RATE, 2),
      burst: num(process.env.CATALOG_BURST, 2),
    },
    pricing: {
      refillPerSecond: num(process.env.PRICING_RATE, 0.5),
      burst: num(process.env.PRICING_BURST, 1),
    },
  },

  retry: {
    maxAttempts: num(process.env.RETRY_MAX_ATTEMPTS, 3),
    baseDelayMs: num(process.env.RETRY_BASE_DELAY_MS, 1000),
    maxDelayMs: num(process.env.RETRY_MAX_DELAY_MS, 10000),
  },

  concurrency: num(process.env.BUYBOX_CONCURRENCY, 1),

  log: {
    level: logLevel(process.env.LOG_LEVEL),
    dir: process.env.LOG_DIR || 'logs',
  },
};

export type AppConfig = typeof cfg;
