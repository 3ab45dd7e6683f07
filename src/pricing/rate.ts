import { compareByCodePoint } from '../utils/compare-by-code-point.js';
import {
  decimalFromInteger,
  isNegativeDecimal,
  multiplyDecimal,
  parseDecimal,
  shiftDecimalRight,
  type DecimalAmount,
} from './decimal-amount.js';
import type { Rate, RateKind, Ratecard } from './types.js';

const PER_MILLION_DIGITS = 6;

export type SerializedRatecard = Record<string, Partial<Record<RateKind, string>>>;

/**
 * Builds a rate from its textual form. Returns undefined for anything that is
 * not a non-negative decimal.
 */
export function createRate(kind: RateKind, raw: string): Rate | undefined {
  const value = parseDecimal(raw);

  if (!value || isNegativeDecimal(value)) {
    return undefined;
  }

  return { kind, value, raw };
}

export function computeDimensionCost(quantity: number, rate: Rate): DecimalAmount {
  const quantityAmount = decimalFromInteger(quantity);

  switch (rate.kind) {
    case 'per_1m':
      return multiplyDecimal(shiftDecimalRight(quantityAmount, PER_MILLION_DIGITS), rate.value);
    case 'per_unit':
      return multiplyDecimal(quantityAmount, rate.value);
  }
}

export function serializeRatecard(ratecard: Ratecard): SerializedRatecard {
  const serialized: SerializedRatecard = {};
  const entries = Object.entries(ratecard).sort(([left], [right]) =>
    compareByCodePoint(left, right),
  );

  for (const [dimension, rate] of entries) {
    if (!rate) {
      continue;
    }

    serialized[dimension] = rate.kind === 'per_1m' ? { per_1m: rate.raw } : { per_unit: rate.raw };
  }

  return serialized;
}
