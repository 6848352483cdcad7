/**
 * Approximate comparison: unit-in-the-last-place tolerances and snapping.
 */

import { HugeNumber } from './HugeNumber.js';
import { abs, subtract } from './arithmetic.js';
import { adjustedExponent, compare, max } from './compare.js';
import { MANTISSA_SIGNIFICANT_DIGITS, MIN_EXPONENT } from './limits.js';

/** Magnitudes below this count as nearly zero */
export const NEARLY_ZERO = HugeNumber.fromComponents(1, -15);

/**
 * One unit in the eighteenth significant digit of `value`: the smallest step
 * that changes it. Zero gives the smallest positive value, the infinities
 * +Infinity.
 */
export function epsilonOf(value: HugeNumber): HugeNumber {
  if (value.isNaN()) return value;
  if (value.isZero()) return HugeNumber.EPSILON;
  if (value.isInfinity()) return HugeNumber.POSITIVE_INFINITY;
  const exponent = adjustedExponent(value.toDecimal()) - (MANTISSA_SIGNIFICANT_DIGITS - 1);
  return HugeNumber.fromComponents(1, Math.max(exponent, MIN_EXPONENT));
}

/**
 * True when the values compare equal or differ by less than `epsilon`, which
 * defaults to the step of the larger value. NaN is never nearly equal.
 */
export function isNearlyEqual(
  value: HugeNumber,
  other: HugeNumber,
  epsilon: HugeNumber = epsilonOf(max(value, other)),
): boolean {
  if (value.isNaN() || other.isNaN()) return false;
  if (compare(value, other) === 0) return true;
  return compare(abs(subtract(value, other)), epsilon) < 0;
}

export function isNearlyZero(value: HugeNumber): boolean {
  return !value.isNaN() && compare(abs(value), NEARLY_ZERO) < 0;
}

/** `target` when `value` is nearly equal to it, otherwise `value` */
export function snapTo(value: HugeNumber, target: HugeNumber): HugeNumber {
  return isNearlyEqual(value, target) ? target : value;
}

export function snapToZero(value: HugeNumber): HugeNumber {
  return isNearlyZero(value) ? HugeNumber.ZERO : value;
}
