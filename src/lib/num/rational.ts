/**
 * Exact rational helpers: gcd reduction, terminating-decimal detection and the
 * long-division fallback used when a fraction cannot stay exact.
 */

import {
  LONG_DIVISION_DIGITS,
  MANTISSA_SIGNIFICANT_DIGITS,
  MAX_DENOMINATOR,
  MAX_EXPONENT,
  MAX_MANTISSA,
  MIN_EXPONENT,
} from './limits.js';
import { absBig, digitCount, pow10, reduce, trailingZeros, type Normalized } from './normalize.js';

const BIG_MAX_DENOMINATOR = BigInt(MAX_DENOMINATOR);

export function gcd(a: bigint, b: bigint): bigint {
  let x = absBig(a);
  let y = absBig(b);
  while (y !== 0n) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

export function lcm(a: bigint, b: bigint): bigint {
  if (a === 0n || b === 0n) return 0n;
  return absBig(a / gcd(a, b) * b);
}

/**
 * Smallest k such that 10^k is a multiple of `denominator`, or null when the
 * denominator has a prime factor other than 2 and 5.
 */
export function terminatingScale(denominator: bigint): number | null {
  let d = denominator;
  let twos = 0;
  let fives = 0;
  while (d % 2n === 0n) {
    d /= 2n;
    twos++;
  }
  while (d % 5n === 0n) {
    d /= 5n;
    fives++;
  }
  return d === 1n ? Math.max(twos, fives) : null;
}

/**
 * Approximate numerator / denominator × 10^exponent as a decimal by long division,
 * producing a few more digits than the mantissa keeps and truncating in `reduce`.
 */
export function divideToDecimal(numerator: bigint, denominator: bigint, exponent: number): Normalized {
  if (denominator === 0n) {
    throw new RangeError('denominator must be non-zero');
  }
  if (numerator === 0n) return reduce(0n, 0);

  const negative = (numerator < 0n) !== (denominator < 0n);
  const n = absBig(numerator);
  const d = absBig(denominator);
  const shift = Math.max(0, digitCount(d) - digitCount(n) + LONG_DIVISION_DIGITS);
  const quotient = n * pow10(shift) / d;
  return reduce(negative ? -quotient : quotient, exponent - shift);
}

/**
 * Canonicalize numerator / denominator × 10^exponent.
 *
 * Fractions that terminate within eighteen digits become plain decimals. Others
 * stay exact while the reduced denominator fits in sixteen bits and the
 * numerator in the mantissa bound; anything larger falls back to long division.
 * A positive exponent moves into the numerator and a negative one into the
 * denominator as far as the bounds allow, so each value has one exact form.
 */
export function canonicalFraction(numerator: bigint, denominator: bigint, exponent: number): Normalized {
  if (denominator === 0n) {
    throw new RangeError('denominator must be non-zero');
  }

  let n = denominator < 0n ? -numerator : numerator;
  let d = absBig(denominator);
  let e = exponent;
  if (n === 0n) return reduce(0n, 0);

  for (;;) {
    const g = gcd(n, d);
    if (g !== 1n) {
      n /= g;
      d /= g;
    }
    if (d === 1n) return reduce(n, e);

    const scale = terminatingScale(d);
    if (scale !== null) {
      const m = n * (pow10(scale) / d);
      if (digitCount(m) - trailingZeros(m) <= MANTISSA_SIGNIFICANT_DIGITS) {
        return reduce(m, e - scale);
      }
    }

    if (d > BIG_MAX_DENOMINATOR || absBig(n) > MAX_MANTISSA) {
      return divideToDecimal(n, d, e);
    }

    if (e > 0 && digitCount(n) < MANTISSA_SIGNIFICANT_DIGITS) {
      n *= 10n;
      e--;
      continue;
    }
    break;
  }

  // Fold a negative exponent into the denominator while it stays in range
  while (e < 0) {
    const g = gcd(n, 10n);
    const next = d * (10n / g);
    if (next > BIG_MAX_DENOMINATOR) break;
    n /= g;
    d = next;
    e++;
  }

  if (e > MAX_EXPONENT) return { kind: 'overflow', negative: n < 0n };
  if (e < MIN_EXPONENT) return divideToDecimal(n, d, e);

  return { kind: 'finite', mantissa: n, exponent: e, denominator: Number(d) };
}
