/**
 * Rounding to a number of fractional digits.
 */

import { HugeNumber } from './HugeNumber.js';
import { MANTISSA_SIGNIFICANT_DIGITS } from './limits.js';
import { absBig, pow10, reduce } from './normalize.js';

export type RoundingMode =
  | 'toEven'
  | 'awayFromZero'
  | 'toZero'
  | 'toNegativeInfinity'
  | 'toPositiveInfinity';

export const ROUNDING_MODES: readonly RoundingMode[] = [
  'toEven',
  'awayFromZero',
  'toZero',
  'toNegativeInfinity',
  'toPositiveInfinity',
];

/**
 * Round to `digits` places after the decimal point. Results that round to zero
 * keep the sign of the input.
 */
export function roundToScale(value: HugeNumber, digits: number, mode: RoundingMode): HugeNumber {
  if (!value.isFinite() || value.isZero()) return value;

  const shift = value.exponent + digits;
  if (shift >= 0 && value.denominator === 1) return value;

  let numerator = value.mantissa;
  let denominator = BigInt(value.denominator);
  if (shift >= 0) {
    numerator *= pow10(shift);
  } else {
    denominator *= pow10(-shift);
  }

  let quotient = numerator / denominator;
  const remainder = numerator % denominator;
  if (remainder === 0n) return value;

  const step = numerator < 0n ? -1n : 1n;
  const twice = absBig(remainder) * 2n;
  switch (mode) {
    case 'toZero':
      break;
    case 'toNegativeInfinity':
      if (step < 0n) quotient -= 1n;
      break;
    case 'toPositiveInfinity':
      if (step > 0n) quotient += 1n;
      break;
    case 'awayFromZero':
      if (twice >= denominator) quotient += step;
      break;
    case 'toEven':
      if (twice > denominator || (twice === denominator && quotient % 2n !== 0n)) quotient += step;
      break;
  }

  if (quotient === 0n) return HugeNumber.signedZero(value.isNegative());
  return HugeNumber.fromNormalized(reduce(quotient, -digits));
}

export function floor(value: HugeNumber): HugeNumber {
  return roundToScale(value, 0, 'toNegativeInfinity');
}

export function ceiling(value: HugeNumber): HugeNumber {
  return roundToScale(value, 0, 'toPositiveInfinity');
}

export function truncate(value: HugeNumber): HugeNumber {
  return roundToScale(value, 0, 'toZero');
}

/**
 * Round to between 0 and 18 fractional digits.
 * @throws RangeError when `digits` is out of range
 */
export function round(value: HugeNumber, digits = 0, mode: RoundingMode = 'toEven'): HugeNumber {
  if (!Number.isInteger(digits) || digits < 0 || digits > MANTISSA_SIGNIFICANT_DIGITS) {
    throw new RangeError(`digits must be an integer between 0 and ${MANTISSA_SIGNIFICANT_DIGITS}, got ${digits}`);
  }
  return roundToScale(value, digits, mode);
}
