/**
 * Exact fixed-point decimal values backed by `bigint`.
 *
 * A value is `units / 10^scale`. Rates, quantities and costs never pass
 * through binary floating point.
 */
export type DecimalAmount = {
  readonly units: bigint;
  readonly scale: number;
};

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/u;
const MAX_EXPONENT_MAGNITUDE = 1_000;

export const ZERO_AMOUNT: DecimalAmount = { units: 0n, scale: 0 };

function powerOfTen(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

function rescale(value: DecimalAmount, scale: number): bigint {
  return value.units * powerOfTen(scale - value.scale);
}

export function parseDecimal(raw: string): DecimalAmount | undefined {
  const match = DECIMAL_PATTERN.exec(raw.trim());

  if (!match) {
    return undefined;
  }

  const [, sign, integerDigits = '', fractionDigits = '', exponentText] = match;

  if (integerDigits.length + fractionDigits.length === 0) {
    return undefined;
  }

  const exponent = exponentText ? Number.parseInt(exponentText, 10) : 0;

  if (Math.abs(exponent) > MAX_EXPONENT_MAGNITUDE) {
    return undefined;
  }

  let units = BigInt(`${integerDigits}${fractionDigits}`);
  let scale = fractionDigits.length - exponent;

  if (scale < 0) {
    units *= powerOfTen(-scale);
    scale = 0;
  }

  return { units: sign === '-' ? -units : units, scale };
}

export function decimalFromInteger(value: number): DecimalAmount {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Expected a safe integer, received ${value}`);
  }

  return { units: BigInt(value), scale: 0 };
}

export function addDecimal(left: DecimalAmount, right: DecimalAmount): DecimalAmount {
  const scale = Math.max(left.scale, right.scale);
  return { units: rescale(left, scale) + rescale(right, scale), scale };
}

export function multiplyDecimal(left: DecimalAmount, right: DecimalAmount): DecimalAmount {
  return { units: left.units * right.units, scale: left.scale + right.scale };
}

export function shiftDecimalRight(value: DecimalAmount, digits: number): DecimalAmount {
  return { units: value.units, scale: value.scale + digits };
}

export function isNegativeDecimal(value: DecimalAmount): boolean {
  return value.units < 0n;
}

/** Rounds to `digits` fractional digits, halves away from zero. */
export function roundHalfUp(value: DecimalAmount, digits: number): DecimalAmount {
  if (value.scale <= digits) {
    return { units: rescale(value, digits), scale: digits };
  }

  const divisor = powerOfTen(value.scale - digits);
  const magnitude = value.units < 0n ? -value.units : value.units;
  let quotient = magnitude / divisor;

  if ((magnitude % divisor) * 2n >= divisor) {
    quotient += 1n;
  }

  return { units: value.units < 0n ? -quotient : quotient, scale: digits };
}

export function formatFixed(value: DecimalAmount, digits: number): string {
  const rounded = roundHalfUp(value, digits);
  const negative = rounded.units < 0n;
  const digitsText = (negative ? -rounded.units : rounded.units)
    .toString()
    .padStart(digits + 1, '0');
  const sign = negative ? '-' : '';

  if (digits === 0) {
    return `${sign}${digitsText}`;
  }

  const integerPart = digitsText.slice(0, digitsText.length - digits);
  const fractionPart = digitsText.slice(digitsText.length - digits);

  return `${sign}${integerPart}.${fractionPart}`;
}

/** Plain positional text at the value's own scale, never exponent notation. */
export function formatDecimal(value: DecimalAmount): string {
  return formatFixed(value, value.scale);
}
