import { Decimal } from 'decimal.js';
import { ValidationError } from '@gemhouse/shared';

/** Up to 13 integer digits and 2 decimals: fits numeric(15,2). */
export const MONEY_PATTERN = /^\d{1,13}(\.\d{1,2})?$/;

export function parseMoney(value: string, field: string): Decimal {
  if (!MONEY_PATTERN.test(value)) {
    throw new ValidationError(`${field} must be a non-negative amount with at most 2 decimals`, {
      field,
    });
  }
  return new Decimal(value);
}

/** Currency precision, round half up. */
export function toMoney(value: Decimal.Value): string {
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2);
}
