import { z } from 'zod';
import { silentLogger, type Logger } from './logger.js';

/** One seller's listing state at lookup time. Never mutated after normalization. */
export interface Offer {
  readonly sellerId: string;
  readonly listingPrice: number;
  readonly shippingPrice: number;
  readonly currency?: string;
  readonly isFulfilledByPlatform: boolean;
  readonly isPrimeEligible: boolean;
  /** Positive feedback percentage; absent when the seller has no rating history */
  readonly sellerFeedbackRating?: number;
  readonly sellerFeedbackCount?: number;
  readonly isInStock: boolean;
  readonly shippingHours?: number;
  readonly isFeaturedOffer: boolean;
}

export interface NormalizedOffers {
  offers: Offer[];
  discardedCount: number;
}

/** listingPrice + shippingPrice, rounded to cents. Always derived, never stored. */
export function totalPrice(offer: Pick<Offer, 'listingPrice' | 'shippingPrice'>): number {
  return Math.round((offer.listingPrice + offer.shippingPrice) * 100) / 100;
}

// Amounts arrive as numbers, occasionally as numeric strings
const Amount = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(/^\d+(\.\d+)?$/)
      .transform(Number),
  ])
  .pipe(z.number().finite().nonnegative());

const optionalBool = z.boolean().optional().catch(undefined);

const RawOffer = z.object({
  SellerId: z.string().trim().min(1),
  ListingPrice: z.object({
    Amount: Amount,
    CurrencyCode: z.string().optional().catch(undefined),
  }),
  Shipping: z
    .object({
      Amount: Amount.optional(),
    })
    .nullish(),
  IsFulfilledByAmazon: optionalBool,
  IsBuyBoxWinner: optionalBool,
  PrimeInformation: z
    .object({ IsPrime: optionalBool })
    .optional()
    .catch(undefined),
  SellerFeedbackRating: z
    .object({
      SellerPositiveFeedbackRating: z.number().min(0).max(100).optional().catch(undefined),
      FeedbackCount: z.number().int().nonnegative().optional().catch(undefined),
    })
    .optional()
    .catch(undefined),
  ShippingTime: z
    .object({
      maximumHours: z.number().finite().nonnegative().optional().catch(undefined),
      availabilityType: z.string().optional().catch(undefined),
    })
    .optional()
    .catch(undefined),
});

type RawOffer = z.infer<typeof RawOffer>;

function toOffer(raw: RawOffer): Offer {
  const offer: {
    -readonly [K in keyof Offer]: Offer[K];
  } = {
    sellerId: raw.SellerId,
    listingPrice: raw.ListingPrice.Amount,
    shippingPrice: raw.Shipping?.Amount ?? 0,
    isFulfilledByPlatform: raw.IsFulfilledByAmazon ?? false,
    isPrimeEligible: raw.PrimeInformation?.IsPrime ?? false,
    isInStock: raw.ShippingTime?.availabilityType === 'NOW',
    isFeaturedOffer: raw.IsBuyBoxWinner ?? false,
  };

  // Absent stays absent: an unrated seller is not a 0% seller
  if (raw.ListingPrice.CurrencyCode) offer.currency = raw.ListingPrice.CurrencyCode;
  const rating = raw.SellerFeedbackRating?.SellerPositiveFeedbackRating;
  if (rating !== undefined) offer.sellerFeedbackRating = rating;
  const count = raw.SellerFeedbackRating?.FeedbackCount;
  if (count !== undefined) offer.sellerFeedbackCount = count;
  // 0 hours means the upstream did not say
  const hours = raw.ShippingTime?.maximumHours;
  if (hours !== undefined && hours > 0) offer.shippingHours = hours;

  return Object.freeze(offer);
}

/**
 * Turns raw pricing-API offer entries into `Offer` records.
 *
 * Entries with a missing or malformed listing price, a malformed shipping
 * amount, or no seller id are discarded, as are repeats of a seller id
 * already seen. Malformed optional fields fall back to absent.
 */
export function normalizeOffers(entries: readonly unknown[], logger: Logger = silentLogger): NormalizedOffers {
  const offers: Offer[] = [];
  const seen = new Set<string>();
  let discardedCount = 0;

  entries.forEach((entry, index) => {
    const parsed = RawOffer.safeParse(entry);
    if (!parsed.success) {
      discardedCount++;
      logger.debug('Discarded malformed offer', {
        index,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return;
    }

    const offer = toOffer(parsed.data);
    if (seen.has(offer.sellerId)) {
      discardedCount++;
      logger.debug('Discarded duplicate seller offer', { index, sellerId: offer.sellerId });
      return;
    }

    seen.add(offer.sellerId);
    offers.push(offer);
  });

  return { offers, discardedCount };
}
