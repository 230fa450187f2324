import { Decimal } from 'decimal.js';
import { toMoney } from '../../../common/utils/money';

export interface FeeRates {
  /** Percent, e.g. "10.00". */
  buyerPercentage: string;
  sellerPercentage: string;
  minFee: string;
  maxFee: string | null;
}

export const DEFAULT_FEE_RATES: FeeRates = {
  buyerPercentage: '10.00',
  sellerPercentage: '5.00',
  minFee: '1.00',
  maxFee: '1000.00',
};

export interface FeeOverrides {
  buyerFeePercentage?: string;
  sellerFeePercentage?: string;
}

/** Session rule overrides win over the active schedule, which wins over defaults. */
export function resolveFeeRates(schedule: FeeRates | null, overrides: FeeOverrides = {}): FeeRates {
  const base = schedule ?? DEFAULT_FEE_RATES;
  return {
    buyerPercentage: overrides.buyerFeePercentage ?? base.buyerPercentage,
    sellerPercentage: overrides.sellerFeePercentage ?? base.sellerPercentage,
    minFee: base.minFee,
    maxFee: base.maxFee,
  };
}

export function computeFee(
  hammerPrice: Decimal.Value,
  percentage: Decimal.Value,
  minFee: Decimal.Value,
  maxFee: Decimal.Value | null,
): string {
  let fee = new Decimal(hammerPrice).times(percentage).dividedBy(100);
  fee = Decimal.max(fee, minFee);
  if (maxFee !== null) {
    fee = Decimal.min(fee, maxFee);
  }
  return toMoney(fee);
}

export interface SettlementAmounts {
  hammerPrice: string;
  buyerPremium: string;
  sellerCommission: string;
  /** hammer + buyer premium */
  paymentAmount: string;
  /** hammer − seller commission */
  payoutAmount: string;
}

export function computeSettlementAmounts(hammerPrice: string, rates: FeeRates): SettlementAmounts {
  const hammer = new Decimal(hammerPrice);
  const buyerPremium = computeFee(hammer, rates.buyerPercentage, rates.minFee, rates.maxFee);
  const sellerCommission = computeFee(hammer, rates.sellerPercentage, rates.minFee, rates.maxFee);
  return {
    hammerPrice: toMoney(hammer),
    buyerPremium,
    sellerCommission,
    paymentAmount: toMoney(hammer.plus(buyerPremium)),
    payoutAmount: toMoney(hammer.minus(sellerCommission)),
  };
}
