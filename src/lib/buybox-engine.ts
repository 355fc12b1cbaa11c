/**
 * Buy Box determination
 *
 * Picks the winning offer for one product and explains the win.
 *
 * Winner selection is an ordered two-tier rule:
 *   1. the single offer the marketplace flags as featured, if exactly one is flagged;
 *   2. otherwise the lowest total price, tie-broken by in-stock, then
 *      platform-fulfilled, then the smallest seller id.
 *
 * Reasons are evaluated against the winner in a fixed order and only the
 * ones that hold are reported. They explain the result; they are not a
 * model of the marketplace's ranking.
 */

import { totalPrice, type Offer } from './offer-normalizer.js';

export const PRICE_TOLERANCE = 0.02;
export const RATING_EXCELLENT = 95;
export const RATING_GOOD = 90;
export const FEEDBACK_HIGH = 10_000;
export const FEEDBACK_STRONG = 1_000;
export const FAST_SHIPPING_HOURS = 48;

export type BuyBoxReason =
  | { factor: 'price'; tier: 'lowest' | 'competitive'; totalPrice: number; minimumPrice: number; currency?: string }
  | { factor: 'fulfillment' }
  | { factor: 'prime' }
  | { factor: 'rating'; tier: 'excellent' | 'good'; rating: number }
  | { factor: 'feedback'; tier: 'high' | 'strong'; count: number }
  | { factor: 'availability' }
  | { factor: 'shipping'; hours: number };

/** How the winner was chosen */
export type WinnerBasis = 'featured' | 'lowest_price';

export interface BuyBoxDecision {
  winner?: Offer;
  basis?: WinnerBasis;
  reasons: BuyBoxReason[];
}

const cents = (amount: number) => Math.round(amount * 100);

function compareSellerIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Lowest total first; ties: in stock, then platform-fulfilled, then seller id. */
export function compareOffers(a: Offer, b: Offer): number {
  const byPrice = cents(totalPrice(a)) - cents(totalPrice(b));
  if (byPrice !== 0) return byPrice;
  if (a.isInStock !== b.isInStock) return a.isInStock ? -1 : 1;
  if (a.isFulfilledByPlatform !== b.isFulfilledByPlatform) return a.isFulfilledByPlatform ? -1 : 1;
  return compareSellerIds(a.sellerId, b.sellerId);
}

export function selectWinner(offers: readonly Offer[]): { winner: Offer; basis: WinnerBasis } | undefined {
  if (offers.length === 0) return undefined;

  const featured = offers.filter((o) => o.isFeaturedOffer);
  if (featured.length === 1) return { winner: featured[0], basis: 'featured' };

  const [winner] = [...offers].sort(compareOffers);
  return { winner, basis: 'lowest_price' };
}

export function deriveReasons(winner: Offer, offers: readonly Offer[]): BuyBoxReason[] {
  const reasons: BuyBoxReason[] = [];

  const winnerTotal = totalPrice(winner);
  const minimum = Math.min(winnerTotal, ...offers.map((o) => totalPrice(o)));
  const winnerCents = cents(winnerTotal);
  const minimumCents = cents(minimum);

  if (winnerCents <= minimumCents * (1 + PRICE_TOLERANCE)) {
    reasons.push({
      factor: 'price',
      tier: winnerCents === minimumCents ? 'lowest' : 'competitive',
      totalPrice: winnerTotal,
      minimumPrice: minimum,
      ...(winner.currency ? { currency: winner.currency } : {}),
    });
  }

  if (winner.isFulfilledByPlatform) reasons.push({ factor: 'fulfillment' });
  if (winner.isPrimeEligible) reasons.push({ factor: 'prime' });

  const rating = winner.sellerFeedbackRating;
  if (rating !== undefined && rating >= RATING_EXCELLENT) {
    reasons.push({ factor: 'rating', tier: 'excellent', rating });
  } else if (rating !== undefined && rating >= RATING_GOOD) {
    reasons.push({ factor: 'rating', tier: 'good', rating });
  }

  const count = winner.sellerFeedbackCount;
  if (count !== undefined && count >= FEEDBACK_HIGH) {
    reasons.push({ factor: 'feedback', tier: 'high', count });
  } else if (count !== undefined && count >= FEEDBACK_STRONG) {
    reasons.push({ factor: 'feedback', tier: 'strong', count });
  }

  if (winner.isInStock) reasons.push({ factor: 'availability' });

  const hours = winner.shippingHours;
  if (hours !== undefined && hours > 0 && hours <= FAST_SHIPPING_HOURS) {
    reasons.push({ factor: 'shipping', hours });
  }

  return reasons;
}

export function determineBuyBox(offers: readonly Offer[]): BuyBoxDecision {
  const selected = selectWinner(offers);
  if (!selected) return { reasons: [] };
  return {
    winner: selected.winner,
    basis: selected.basis,
    reasons: deriveReasons(selected.winner, offers),
  };
}

function formatMoney(amount: number, currency = 'USD'): string {
  try {
    return new Intl.NumberFormat('en-US', { style: 'currency', currency }).format(amount);
  } catch {
    return `${amount.toFixed(2)} ${currency}`;
  }
}

/** Human-readable sentence for a reason, as shown in reports. */
export function describeReason(reason: BuyBoxReason): string {
  switch (reason.factor) {
    case 'price':
      return reason.tier === 'lowest'
        ? `Lowest total price (${formatMoney(reason.totalPrice, reason.currency)})`
        : `Competitive price within 2% of lowest (${formatMoney(reason.totalPrice, reason.currency)})`;
    case 'fulfillment':
      return 'Fulfilled by Amazon (FBA)';
    case 'prime':
      return 'Prime eligible';
    case 'rating':
      return `${reason.tier === 'excellent' ? 'Excellent' : 'Good'} seller rating (${reason.rating.toFixed(0)}%)`;
    case 'feedback':
      return `${reason.tier === 'high' ? 'High' : 'Strong'} feedback volume (${reason.count.toLocaleString('en-US')} ratings)`;
    case 'availability':
      return 'In stock and ready to ship';
    case 'shipping':
      return `Fast shipping (${reason.hours}h max)`;
  }
}
