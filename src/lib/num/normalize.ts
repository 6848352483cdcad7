/**
 * Canonical-form reduction.
 *
 * Works on raw bigint mantissas and plain exponents so the arithmetic engine can
 * compute with unbounded intermediates and normalize once at the end.
 */

import {
  MANTISSA_SIGNIFICANT_DIGITS,
  MAX_EXPONENT,
  MAX_MANTISSA,
  MIN_EXPONENT,
} from './limits.js';

/** Result of normalizing a raw value */
export type Normalized =
  | { kind: 'finite'; mantissa: bigint; exponent: number; denominator: number }
  | { kind: 'overflow'; negative: boolean }
  | { kind: 'underflow'; negative: boolean };

const POW10_CACHE: bigint[] = [1n];

/** 10^n as a bigint */
export function pow10(n: number): bigint {
  if (n < 0 || !Number.isInteger(n)) {
    throw new RangeError(`pow10 expects a non-negative integer, got ${n}`);
  }
  if (n < 64) {
    while (POW10_CACHE.length <= n) {
      POW10_CACHE.push(POW10_CACHE[POW10_CACHE.length - 1] * 10n);
    }
    return POW10_CACHE[n];
  }
  return 10n ** BigInt(n);
}

export function absBig(value: bigint): bigint {
  return value < 0n ? -value : value;
}

/** Decimal digit count of |value|; 0 for zero */
export function digitCount(value: bigint): number {
  if (value === 0n) return 0;
  return absBig(value).toString().length;
}

/** Number of trailing decimal zeros of a non-zero value */
export function trailingZeros(value: bigint): number {
  if (value === 0n) return 0;
  let count = 0;
  let v = value;
  while (v % 10n === 0n) {
    v /= 10n;
    count++;
  }
  return count;
}

/**
 * Reduce (mantissa, exponent) to canonical form.
 *
 * Positive exponents are pulled into the mantissa while it has room, trailing
 * zeros are pushed out while the exponent is negative, and mantissas wider than
 * eighteen digits are truncated toward zero.
 */
export function reduce(mantissa: bigint, exponent: number): Normalized {
  if (mantissa === 0n) {
    return { kind: 'finite', mantissa: 0n, exponent: 0, denominator: 1 };
  }

  let m = mantissa;
  let e = exponent;
  let digits = digitCount(m);

  // Pull the exponent into the mantissa
  if (digits < MANTISSA_SIGNIFICANT_DIGITS && e > 0) {
    const shift = Math.min(MANTISSA_SIGNIFICANT_DIGITS - digits, e);
    m *= pow10(shift);
    e -= shift;
    digits += shift;
  }

  // Push trailing zeros into the exponent
  while (digits < MANTISSA_SIGNIFICANT_DIGITS && e < 0 && m % 10n === 0n) {
    m /= 10n;
    e++;
    digits--;
  }

  // Truncate to eighteen digits
  if (absBig(m) > MAX_MANTISSA && e < MAX_EXPONENT) {
    const shift = Math.min(digits - MANTISSA_SIGNIFICANT_DIGITS, MAX_EXPONENT - e);
    m /= pow10(shift);
    e += shift;
  }

  while (e < 0 && m % 10n === 0n) {
    m /= 10n;
    e++;
  }

  const negative = m < 0n;
  if (absBig(m) > MAX_MANTISSA || e > MAX_EXPONENT) {
    return { kind: 'overflow', negative };
  }

  if (e < MIN_EXPONENT) {
    const shift = MIN_EXPONENT - e;
    if (shift >= digitCount(m)) {
      return { kind: 'underflow', negative };
    }
    m /= pow10(shift);
    e = MIN_EXPONENT;
    while (e < 0 && m % 10n === 0n) {
      m /= 10n;
      e++;
    }
  }

  return { kind: 'finite', mantissa: m, exponent: e, denominator: 1 };
}
