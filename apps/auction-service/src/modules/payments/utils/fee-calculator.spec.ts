import {
  computeFee,
  computeSettlementAmounts,
  DEFAULT_FEE_RATES,
  resolveFeeRates,
} from './fee-calculator';

describe('fee calculator', () => {
  it('applies the default 10% / 5% split', () => {
    expect(computeSettlementAmounts('5200', DEFAULT_FEE_RATES)).toEqual({
      hammerPrice: '5200.00',
      buyerPremium: '520.00',
      sellerCommission: '260.00',
      paymentAmount: '5720.00',
      payoutAmount: '4940.00',
    });
  });

  it('clamps to the minimum and maximum fee', () => {
    expect(computeFee('5.00', '10', '1.00', '1000.00')).toBe('1.00');
    expect(computeFee('50000.00', '10', '1.00', '1000.00')).toBe('1000.00');
    expect(computeFee('50000.00', '10', '1.00', null)).toBe('5000.00');
  });

  it('rounds half up to cents', () => {
    expect(computeFee('10.05', '5', '0.00', null)).toBe('0.50');
    expect(computeFee('10.10', '5', '0.00', null)).toBe('0.51');
  });

  it('prefers session overrides, then the schedule', () => {
    const schedule = { buyerPercentage: '12.00', sellerPercentage: '6.00', minFee: '2.00', maxFee: null };
    expect(resolveFeeRates(null)).toEqual(DEFAULT_FEE_RATES);
    expect(resolveFeeRates(schedule, { sellerFeePercentage: '3.50' })).toEqual({
      buyerPercentage: '12.00',
      sellerPercentage: '3.50',
      minFee: '2.00',
      maxFee: null,
    });
  });
});
