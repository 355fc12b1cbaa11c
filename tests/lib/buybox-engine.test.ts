import {
  compareOffers,
  describeReason,
  determineBuyBox,
  selectWinner,
} from '../../src/lib/buybox-engine.js';
import type { Offer } from '../../src/lib/offer-normalizer.js';
import { makeOffer } from '../helpers/fixtures.js';

function permutations<T>(items: readonly T[]): T[][] {
  if (items.length <= 1) return [[...items]];
  return items.flatMap((item, i) =>
    permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest])
  );
}

describe('determineBuyBox', () => {
  const sellerA = makeOffer({
    sellerId: 'A',
    listingPrice: 20,
    shippingPrice: 0,
    isFulfilledByPlatform: true,
    isPrimeEligible: true,
    sellerFeedbackRating: 96,
    sellerFeedbackCount: 15000,
    isInStock: true,
    shippingHours: 24,
  });
  const sellerB = makeOffer({
    sellerId: 'B',
    listingPrice: 16.3,
    shippingPrice: 4,
    sellerFeedbackRating: 80,
    sellerFeedbackCount: 50,
    isInStock: true,
    shippingHours: 96,
  });

  it('should pick the lowest price and report every factor that holds', () => {
    const decision = determineBuyBox([sellerB, sellerA]);

    expect(decision.winner).toBe(sellerA);
    expect(decision.basis).toBe('lowest_price');
    expect(decision.reasons).toEqual([
      { factor: 'price', tier: 'lowest', totalPrice: 20, minimumPrice: 20 },
      { factor: 'fulfillment' },
      { factor: 'prime' },
      { factor: 'rating', tier: 'excellent', rating: 96 },
      { factor: 'feedback', tier: 'high', count: 15000 },
      { factor: 'availability' },
      { factor: 'shipping', hours: 24 },
    ]);
  });

  it('should report nothing for an empty offer set', () => {
    expect(determineBuyBox([])).toEqual({ reasons: [] });
  });

  it('should prefer the in-stock offer on equal totals', () => {
    const outOfStock = makeOffer({ sellerId: 'A', listingPrice: 15, isInStock: false });
    const inStock = makeOffer({ sellerId: 'Z', listingPrice: 12, shippingPrice: 3 });

    expect(determineBuyBox([outOfStock, inStock]).winner).toBe(inStock);
  });

  it('should let the featured offer win over a cheaper one', () => {
    const cheap = makeOffer({ sellerId: 'CHEAP', listingPrice: 10 });
    const featured = makeOffer({ sellerId: 'FEATURED', listingPrice: 12, isFeaturedOffer: true });

    const decision = determineBuyBox([cheap, featured]);

    expect(decision.winner).toBe(featured);
    expect(decision.basis).toBe('featured');
    // 12.00 is outside 2% of 10.00, so no price reason
    expect(decision.reasons).toEqual([{ factor: 'availability' }]);
  });

  it('should fall back to price when several offers are flagged featured', () => {
    const a = makeOffer({ sellerId: 'A', listingPrice: 12, isFeaturedOffer: true });
    const b = makeOffer({ sellerId: 'B', listingPrice: 11, isFeaturedOffer: true });

    expect(selectWinner([a, b])).toEqual({ winner: b, basis: 'lowest_price' });
  });

  it('should call a featured winner within 2% of the lowest competitive', () => {
    const lowest = makeOffer({ sellerId: 'LOW', listingPrice: 100, isInStock: false });
    const featured = makeOffer({ sellerId: 'FEAT', listingPrice: 102, isFeaturedOffer: true, isInStock: false });

    expect(determineBuyBox([lowest, featured]).reasons).toEqual([
      { factor: 'price', tier: 'competitive', totalPrice: 102, minimumPrice: 100 },
    ]);
  });

  it('should give no price reason beyond the 2% band', () => {
    const lowest = makeOffer({ sellerId: 'LOW', listingPrice: 100 });
    const featured = makeOffer({ sellerId: 'FEAT', listingPrice: 102.01, isFeaturedOffer: true });

    expect(determineBuyBox([lowest, featured]).reasons).toEqual([{ factor: 'availability' }]);
  });

  it('should use the good tiers below the excellent thresholds', () => {
    const offer = makeOffer({ sellerId: 'A', sellerFeedbackRating: 90, sellerFeedbackCount: 1000, isInStock: false });

    expect(determineBuyBox([offer]).reasons).toEqual([
      { factor: 'price', tier: 'lowest', totalPrice: 10, minimumPrice: 10 },
      { factor: 'rating', tier: 'good', rating: 90 },
      { factor: 'feedback', tier: 'strong', count: 1000 },
    ]);
  });

  it('should give no rating reason to an unrated seller', () => {
    const offer = makeOffer({ sellerId: 'A', isInStock: false });

    expect(determineBuyBox([offer]).reasons.map((r) => r.factor)).toEqual(['price']);
  });

  it('should treat 48 hours as fast shipping and 49 as not', () => {
    const at48 = makeOffer({ sellerId: 'A', shippingHours: 48, isInStock: false });
    const at49 = makeOffer({ sellerId: 'A', shippingHours: 49, isInStock: false });

    expect(determineBuyBox([at48]).reasons.map((r) => r.factor)).toEqual(['price', 'shipping']);
    expect(determineBuyBox([at49]).reasons.map((r) => r.factor)).toEqual(['price']);
  });

  it('should not call zero shipping hours fast', () => {
    const offer = makeOffer({ sellerId: 'A', shippingHours: 0, isInStock: false });

    expect(determineBuyBox([offer]).reasons.map((r) => r.factor)).toEqual(['price']);
  });

  it('should carry the winner currency on the price reason', () => {
    const offer = makeOffer({ sellerId: 'A', listingPrice: 25, currency: 'EUR', isInStock: false });

    expect(determineBuyBox([offer]).reasons).toEqual([
      { factor: 'price', tier: 'lowest', totalPrice: 25, minimumPrice: 25, currency: 'EUR' },
    ]);
  });
});

describe('selectWinner', () => {
  it('should pick the same winner for every ordering of equal totals', () => {
    const offers: Offer[] = [
      makeOffer({ sellerId: 'A', isFulfilledByPlatform: true, isInStock: false }),
      makeOffer({ sellerId: 'B' }),
      makeOffer({ sellerId: 'D', isFulfilledByPlatform: true }),
      makeOffer({ sellerId: 'C', listingPrice: 7.5, shippingPrice: 2.5, isFulfilledByPlatform: true }),
    ];
    const orderings = permutations(offers);

    expect(orderings).toHaveLength(24);
    for (const ordering of orderings) {
      expect(selectWinner(ordering)?.winner.sellerId).toBe('C');
    }
  });
});

describe('compareOffers', () => {
  it('should break remaining ties by fulfillment, then seller id', () => {
    const merchant = makeOffer({ sellerId: 'A' });
    const fba = makeOffer({ sellerId: 'B', isFulfilledByPlatform: true });
    const fbaLater = makeOffer({ sellerId: 'C', isFulfilledByPlatform: true });

    expect([merchant, fbaLater, fba].sort(compareOffers).map((o) => o.sellerId)).toEqual(['B', 'C', 'A']);
  });

  it('should treat totals equal to the cent as a tie', () => {
    const a = makeOffer({ sellerId: 'B', listingPrice: 0.1, shippingPrice: 0.2 });
    const b = makeOffer({ sellerId: 'A', listingPrice: 0.3 });

    expect(compareOffers(a, b)).toBeGreaterThan(0);
    expect(compareOffers(b, a)).toBeLessThan(0);
  });
});

describe('describeReason', () => {
  it('should render each reason as report text', () => {
    expect(describeReason({ factor: 'price', tier: 'lowest', totalPrice: 20, minimumPrice: 20 })).toBe(
      'Lowest total price ($20.00)'
    );
    expect(describeReason({ factor: 'price', tier: 'competitive', totalPrice: 20.3, minimumPrice: 20 })).toBe(
      'Competitive price within 2% of lowest ($20.30)'
    );
    expect(describeReason({ factor: 'fulfillment' })).toBe('Fulfilled by Amazon (FBA)');
    expect(describeReason({ factor: 'prime' })).toBe('Prime eligible');
    expect(describeReason({ factor: 'rating', tier: 'excellent', rating: 96 })).toBe('Excellent seller rating (96%)');
    expect(describeReason({ factor: 'feedback', tier: 'high', count: 15000 })).toBe(
      'High feedback volume (15,000 ratings)'
    );
    expect(describeReason({ factor: 'availability' })).toBe('In stock and ready to ship');
    expect(describeReason({ factor: 'shipping', hours: 24 })).toBe('Fast shipping (24h max)');
  });
});
