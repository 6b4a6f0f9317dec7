/**
 * Tollbooth tax: what an Authority charges on each certified purchase order.
 */
import type { TaxPolicy } from '../config/schema.js';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';

export interface TaxRate {
  rate_percent: number;
  min_sats: number;
  note: string;
}

export const DEFAULT_TAX_POLICY: TaxPolicy = { rate_percent: 2, min_sats: 10 };

export function getTaxRate(policy: TaxPolicy = DEFAULT_TAX_POLICY): TaxRate {
  return {
    rate_percent: policy.rate_percent,
    min_sats: policy.min_sats,
    note:
      `Tax per certification = max(${policy.min_sats}, ceil(amount_sats * ${policy.rate_percent} / 100)). ` +
      'Configurable per-Authority in a future release.',
  };
}

/**
 * Tax in sats for a purchase of `amountSats`.
 */
export function computeTax(amountSats: number, policy: TaxPolicy = DEFAULT_TAX_POLICY): number {
  if (!Number.isSafeInteger(amountSats) || amountSats < 0) {
    throw new ValidationError(
      ErrorCodes.INVALID_AMOUNT,
      `amount_sats must be a non-negative integer, got: ${amountSats}`,
      { amountSats }
    );
  }
  return Math.max(policy.min_sats, Math.ceil((amountSats * policy.rate_percent) / 100));
}
