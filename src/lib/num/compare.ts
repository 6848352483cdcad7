/**
 * Total ordering and equality.
 */

import { HugeNumber } from './HugeNumber.js';
import { absBig, digitCount, pow10 } from './normalize.js';

export type Ordering = -1 | 0 | 1;

/** Order of magnitude of the leading digit of a plain decimal */
export function adjustedExponent(value: HugeNumber): number {
  return value.exponent + digitCount(value.mantissa) - 1;
}

/**
 * Order-of-magnitude estimate that also covers fractions: exact for plain
 * decimals, at most one above the true value for rationals.
 */
export function magnitude(value: HugeNumber): number {
  return value.exponent + digitCount(value.mantissa) - digitCount(BigInt(value.denominator));
}

/** Compare |left| and |right| for finite non-zero values */
export function compareMagnitude(left: HugeNumber, right: HugeNumber): Ordering {
  if (left.denominator === 1 && right.denominator === 1) {
    const l = adjustedExponent(left);
    const r = adjustedExponent(right);
    if (l !== r) return l < r ? -1 : 1;
  } else {
    const gap = magnitude(left) - magnitude(right);
    if (gap > 1) return 1;
    if (gap < -1) return -1;
  }

  // Same order of magnitude: compare digits over a common exponent and denominator
  const exponent = Math.min(left.exponent, right.exponent);
  const l = absBig(left.mantissa) * BigInt(right.denominator) * pow10(left.exponent - exponent);
  const r = absBig(right.mantissa) * BigInt(left.denominator) * pow10(right.exponent - exponent);
  if (l === r) return 0;
  return l < r ? -1 : 1;
}

/**
 * Total order: NaN sorts below everything but itself, the infinities bound the
 * finite values, and the two zeros compare equal.
 */
export function compare(left: HugeNumber, right: HugeNumber): Ordering {
  if (left.isNaN()) return right.isNaN() ? 0 : -1;
  if (right.isNaN()) return 1;

  if (left.isPositiveInfinity()) return right.isPositiveInfinity() ? 0 : 1;
  if (left.isNegativeInfinity()) return right.isNegativeInfinity() ? 0 : -1;
  if (right.isPositiveInfinity()) return -1;
  if (right.isNegativeInfinity()) return 1;

  if (left.isZero()) {
    if (right.isZero()) return 0;
    return right.mantissa < 0n ? 1 : -1;
  }
  if (right.isZero()) return left.mantissa < 0n ? -1 : 1;

  const negative = left.mantissa < 0n;
  if (negative !== (right.mantissa < 0n)) return negative ? -1 : 1;

  const order = compareMagnitude(left, right);
  if (!negative || order === 0) return order;
  return order < 0 ? 1 : -1;
}

/** Field equality of canonical values; NaN is never equal */
export function equals(left: HugeNumber, right: HugeNumber): boolean {
  if (left.isNaN() || right.isNaN()) return false;
  return left.mantissa === right.mantissa
    && left.exponent === right.exponent
    && left.denominator === right.denominator;
}

/** Relational less-than; false whenever NaN is involved */
export function lessThan(left: HugeNumber, right: HugeNumber): boolean {
  if (left.isNaN() || right.isNaN()) return false;
  return compare(left, right) < 0;
}

export function lessThanOrEqual(left: HugeNumber, right: HugeNumber): boolean {
  if (left.isNaN() || right.isNaN()) return false;
  return compare(left, right) <= 0;
}

// ============================================================================
// Selection helpers
// ============================================================================

/** Smaller of two values; NaN propagates and -0 wins over 0 */
export function min(a: HugeNumber, b: HugeNumber): HugeNumber {
  if (a.isNaN()) return a;
  if (b.isNaN()) return b;
  const order = compare(a, b);
  if (order === 0) return a.isNegative() ? a : b;
  return order < 0 ? a : b;
}

/** Larger of two values; NaN propagates and 0 wins over -0 */
export function max(a: HugeNumber, b: HugeNumber): HugeNumber {
  if (a.isNaN()) return a;
  if (b.isNaN()) return b;
  const order = compare(a, b);
  if (order === 0) return a.isNegative() ? b : a;
  return order > 0 ? a : b;
}

/** Clamp into [lower, upper]; reversed bounds are swapped */
export function clamp(value: HugeNumber, lower: HugeNumber, upper: HugeNumber): HugeNumber {
  if (value.isNaN()) return value;
  const [lo, hi] = compare(lower, upper) > 0 ? [upper, lower] : [lower, upper];
  if (lessThan(value, lo)) return lo;
  if (lessThan(hi, value)) return hi;
  return value;
}

function compareAbsolute(a: HugeNumber, b: HugeNumber): Ordering {
  if (a.isInfinity()) return b.isInfinity() ? 0 : 1;
  if (b.isInfinity()) return -1;
  if (a.isZero()) return b.isZero() ? 0 : -1;
  if (b.isZero()) return 1;
  return compareMagnitude(a, b);
}

/** Value with the larger absolute value; ties go to `max` */
export function maxMagnitude(a: HugeNumber, b: HugeNumber): HugeNumber {
  if (a.isNaN()) return a;
  if (b.isNaN()) return b;
  const order = compareAbsolute(a, b);
  if (order === 0) return max(a, b);
  return order > 0 ? a : b;
}

/** Value with the smaller absolute value; ties go to `min` */
export function minMagnitude(a: HugeNumber, b: HugeNumber): HugeNumber {
  if (a.isNaN()) return a;
  if (b.isNaN()) return b;
  const order = compareAbsolute(a, b);
  if (order === 0) return min(a, b);
  return order < 0 ? a : b;
}
