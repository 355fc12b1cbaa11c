import type { FetchResponse } from '../../src/lib/sp-api-client.js';
import type { Offer } from '../../src/lib/offer-normalizer.js';

export function jsonResponse(status: number, body: unknown): FetchResponse {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return { ok: status >= 200 && status < 300, status, text: async () => text };
}

export function makeOffer(overrides: Partial<Offer> & Pick<Offer, 'sellerId'>): Offer {
  return {
    listingPrice: 10,
    shippingPrice: 0,
    isFulfilledByPlatform: false,
    isPrimeEligible: false,
    isInStock: true,
    isFeaturedOffer: false,
    ...overrides,
  };
}

/** A pricing-API offer entry as it comes off the wire. */
export function rawOffer(sellerId: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    SellerId: sellerId,
    ListingPrice: { Amount: 19.99, CurrencyCode: 'USD' },
    Shipping: { Amount: 0, CurrencyCode: 'USD' },
    IsFulfilledByAmazon: true,
    IsBuyBoxWinner: false,
    PrimeInformation: { IsPrime: true, IsNationalPrime: true },
    SellerFeedbackRating: { SellerPositiveFeedbackRating: 98, FeedbackCount: 2500 },
    ShippingTime: { minimumHours: 0, maximumHours: 24, availabilityType: 'NOW' },
    ...overrides,
  };
}

export function offersBody(asin: string, offers: unknown[]): unknown {
  return { payload: { ASIN: asin, status: 'Success', Offers: offers } };
}

export function catalogBody(asin: string, itemName: string, marketplaceId = 'ATVPDKIKX0DER'): unknown {
  return { asin, summaries: [{ marketplaceId, itemName }] };
}
