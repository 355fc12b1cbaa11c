// Selling Partner API marketplaces and the regional endpoint that serves each.

export type SpApiRegion = 'NA' | 'EU' | 'FE';

export interface Marketplace {
  id: string;
  region: SpApiRegion;
  countryCode: string;
  name: string;
}

export const SP_API_ENDPOINTS: Record<SpApiRegion, string> = {
  NA: 'https://sellingpartnerapi-na.amazon.com',
  EU: 'https://sellingpartnerapi-eu.amazon.com',
  FE: 'https://sellingpartnerapi-fe.amazon.com',
};

export const MARKETPLACES: Record<string, Marketplace> = {
  US: { id: 'ATVPDKIKX0DER', region: 'NA', countryCode: 'US', name: 'United States' },
  CA: { id: 'A2EUQ1WTGCTBG2', region: 'NA', countryCode: 'CA', name: 'Canada' },
  MX: { id: 'A1AM78C64UM0Y8', region: 'NA', countryCode: 'MX', name: 'Mexico' },
  UK: { id: 'A1F83G8C2ARO7P', region: 'EU', countryCode: 'GB', name: 'United Kingdom' },
  DE: { id: 'A1PA6795UKMFR9', region: 'EU', countryCode: 'DE', name: 'Germany' },
  FR: { id: 'A13V1IB3VIYZZH', region: 'EU', countryCode: 'FR', name: 'France' },
  IT: { id: 'APJ6JRA9NG5V4', region: 'EU', countryCode: 'IT', name: 'Italy' },
  ES: { id: 'A1RKKUPIHCS9HS', region: 'EU', countryCode: 'ES', name: 'Spain' },
  JP: { id: 'A1VC38T7YXB528', region: 'FE', countryCode: 'JP', name: 'Japan' },
  AU: { id: 'A39IBJ37TRP1C6', region: 'FE', countryCode: 'AU', name: 'Australia' },
};

export const DEFAULT_MARKETPLACE = MARKETPLACES.US;

export function resolveMarketplace(code: string | undefined): Marketplace {
  if (!code) return DEFAULT_MARKETPLACE;
  const key = code.trim().toUpperCase();
  const byCode = MARKETPLACES[key];
  if (byCode) return byCode;
  const byId = Object.values(MARKETPLACES).find((m) => m.id === code.trim());
  if (byId) return byId;
  throw new Error(`Unknown marketplace: ${code}`);
}

function isRegion(value: string): value is SpApiRegion {
  return value === 'NA' || value === 'EU' || value === 'FE';
}

/** Regional endpoint for the marketplace, or for an explicit region override. */
export function endpointFor(marketplace: Marketplace, region?: string): string {
  if (!region) return SP_API_ENDPOINTS[marketplace.region];
  const key = region.trim().toUpperCase();
  if (!isRegion(key)) throw new Error(`Unknown SP-API region: ${region}`);
  return SP_API_ENDPOINTS[key];
}
