import { Decimal } from 'decimal.js';
import { BidIncrementPolicy } from '@gemhouse/shared';

/** Upper bound (exclusive) → increment. Anything above the last bound uses TOP_TIER. */
const TIERS: ReadonlyArray<readonly [number, number]> = [
  [100, 5],
  [500, 10],
  [1000, 25],
  [5000, 50],
  [10000, 100],
];
const TOP_TIER = 250;

export function tierIncrement(floor: Decimal.Value): Decimal {
  const price = new Decimal(floor);
  for (const [bound, increment] of TIERS) {
    if (price.lessThan(bound)) {
      return new Decimal(increment);
    }
  }
  return new Decimal(TOP_TIER);
}

export interface LotPricing {
  startPrice: string;
  stepPrice: string;
  currentHighestBid: string | null;
}

export function bidIncrement(policy: BidIncrementPolicy, lot: LotPricing): Decimal {
  const step = new Decimal(lot.stepPrice);
  if (policy === BidIncrementPolicy.FIXED) {
    return step;
  }
  return Decimal.max(step, tierIncrement(lot.currentHighestBid ?? lot.startPrice));
}

/** (current highest bid, or start price before the first bid) + increment. */
export function minimumNextBid(policy: BidIncrementPolicy, lot: LotPricing): Decimal {
  return new Decimal(lot.currentHighestBid ?? lot.startPrice).plus(bidIncrement(policy, lot));
}
