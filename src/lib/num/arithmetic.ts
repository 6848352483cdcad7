/**
 * Arithmetic engine.
 *
 * Multiply and divide first try an exact path on plain integers, keeping the
 * result as a reduced fraction when it fits the sixteen-bit denominator. When
 * that would overflow they fall back to a decimal approximation through a
 * 128-bit intermediate (multiply) or long division (divide).
 */

import { HugeNumber } from './HugeNumber.js';
import { magnitude } from './compare.js';
import {
  INT64_MAX,
  MAX_DENOMINATOR,
  MAX_MANTISSA,
  WIDE_MAX,
  WIDE_RATIONAL_DIGITS,
} from './limits.js';
import { absBig, digitCount, pow10, reduce } from './normalize.js';
import { canonicalFraction, divideToDecimal, gcd } from './rational.js';
import { floor } from './rounding.js';

/** Operands further apart than this many orders of magnitude do not affect each other's sum */
const ADDITION_GAP = 40;

const BIG_MAX_DENOMINATOR = BigInt(MAX_DENOMINATOR);

interface Aligned {
  left: bigint;
  right: bigint;
  denominator: bigint;
  exponent: number;
}

/** Both finite operands as integers over a shared denominator and exponent */
function align(left: HugeNumber, right: HugeNumber): Aligned {
  const exponent = Math.min(left.exponent, right.exponent);
  const ld = BigInt(left.denominator);
  const rd = BigInt(right.denominator);
  return {
    left: left.mantissa * rd * pow10(left.exponent - exponent),
    right: right.mantissa * ld * pow10(right.exponent - exponent),
    denominator: ld * rd,
    exponent,
  };
}

// ============================================================================
// Sign operations
// ============================================================================

export function negate(value: HugeNumber): HugeNumber {
  if (value.isNaN()) return value;
  if (value.isInfinity()) return HugeNumber.signedInfinity(value.isPositive());
  if (value.isZero()) return HugeNumber.signedZero(!value.isNegative());
  return HugeNumber.fromNormalized({
    kind: 'finite',
    mantissa: -value.mantissa,
    exponent: value.exponent,
    denominator: value.denominator,
  });
}

export function abs(value: HugeNumber): HugeNumber {
  return value.isNegative() ? negate(value) : value;
}

/** `value` with the sign of `sign` */
export function copySign(value: HugeNumber, sign: HugeNumber): HugeNumber {
  return value.isNegative() === sign.isNegative() ? value : negate(value);
}

// ============================================================================
// Addition
// ============================================================================

export function add(left: HugeNumber, right: HugeNumber): HugeNumber {
  if (left.isNaN() || right.isNaN()) return HugeNumber.NAN;
  if (left.isInfinity()) {
    return right.isInfinity() && right.mantissa !== left.mantissa ? HugeNumber.NAN : left;
  }
  if (right.isInfinity()) return right;
  if (left.isZero()) {
    return right.isZero() ? HugeNumber.signedZero(left.isNegative() && right.isNegative()) : right;
  }
  if (right.isZero()) return left;

  const gap = magnitude(left) - magnitude(right);
  if (gap > ADDITION_GAP) return left;
  if (gap < -ADDITION_GAP) return right;

  const aligned = align(left, right);
  return HugeNumber.fromNormalized(
    canonicalFraction(aligned.left + aligned.right, aligned.denominator, aligned.exponent),
  );
}

export function subtract(left: HugeNumber, right: HugeNumber): HugeNumber {
  return add(left, negate(right));
}

// ============================================================================
// Multiplication
// ============================================================================

interface WideDecimal {
  mantissa: bigint;
  exponent: number;
}

/** Decimal form for the fallback path; fractions keep a few guard digits */
function widen(value: HugeNumber): WideDecimal {
  if (value.denominator === 1) {
    return { mantissa: value.mantissa, exponent: value.exponent };
  }
  const d = BigInt(value.denominator);
  const shift = WIDE_RATIONAL_DIGITS - digitCount(value.mantissa) + digitCount(d);
  return { mantissa: value.mantissa * pow10(shift) / d, exponent: value.exponent - shift };
}

function shed(value: WideDecimal): WideDecimal {
  return { mantissa: value.mantissa / 10n, exponent: value.exponent + 1 };
}

function multiplyWide(left: HugeNumber, right: HugeNumber): HugeNumber {
  let l = widen(left);
  let r = widen(right);
  while (absBig(l.mantissa * r.mantissa) > WIDE_MAX) {
    if (l.mantissa % 10n === 0n) {
      l = shed(l);
    } else if (r.mantissa % 10n === 0n) {
      r = shed(r);
    } else {
      const ld = digitCount(l.mantissa);
      const rd = digitCount(r.mantissa);
      if (ld >= rd) l = shed(l);
      if (rd >= ld) r = shed(r);
    }
  }
  return HugeNumber.fromNormalized(reduce(l.mantissa * r.mantissa, l.exponent + r.exponent));
}

export function multiply(left: HugeNumber, right: HugeNumber): HugeNumber {
  if (left.isNaN() || right.isNaN()) return HugeNumber.NAN;
  if (left.isInfinity() || right.isInfinity()) {
    return HugeNumber.signedInfinity((left.mantissa < 0n) !== (right.mantissa < 0n));
  }
  // A zero product is negative when exactly one operand has a negative exponent
  if (left.isZero() || right.isZero()) {
    return HugeNumber.signedZero((left.exponent < 0) !== (right.exponent < 0));
  }

  const exponent = left.exponent + right.exponent;
  const product = left.mantissa * right.mantissa;
  if (absBig(product) <= INT64_MAX) {
    const denominator = BigInt(left.denominator) * BigInt(right.denominator);
    const g = gcd(product, denominator);
    const n = product / g;
    const d = denominator / g;
    if (d <= BIG_MAX_DENOMINATOR && absBig(n) <= MAX_MANTISSA) {
      return HugeNumber.fromNormalized(canonicalFraction(n, d, exponent));
    }
  }
  return multiplyWide(left, right);
}

/**
 * x × y + z with a single truncation for plain decimals: the product keeps all
 * of its digits until the sum is taken. Fractions, sentinels and operands too
 * far apart in magnitude go through multiply and add.
 */
export function fusedMultiplyAdd(x: HugeNumber, y: HugeNumber, z: HugeNumber): HugeNumber {
  if (x.isNaN() || y.isNaN() || z.isNaN()) return HugeNumber.NAN;
  const plain = [x, y, z].every((v) => v.isFinite() && !v.isZero() && v.denominator === 1);
  if (!plain) return add(multiply(x, y), z);

  const product = x.mantissa * y.mantissa;
  const productExponent = x.exponent + y.exponent;
  const gap = productExponent + digitCount(product) - (z.exponent + digitCount(z.mantissa));
  if (Math.abs(gap) > ADDITION_GAP) return add(multiply(x, y), z);

  const exponent = Math.min(productExponent, z.exponent);
  const sum = product * pow10(productExponent - exponent) + z.mantissa * pow10(z.exponent - exponent);
  if (sum === 0n) return HugeNumber.ZERO;
  return HugeNumber.fromNormalized(reduce(sum, exponent));
}

/** value × value, without the product's overflow detour for the special values */
export function square(value: HugeNumber): HugeNumber {
  if (value.isNaN()) return value;
  if (value.isInfinity()) return HugeNumber.POSITIVE_INFINITY;
  if (value.isZero()) return HugeNumber.ZERO;
  return multiply(value, value);
}

export function cube(value: HugeNumber): HugeNumber {
  if (!value.isFinite() || value.isZero()) return value;
  return multiply(multiply(value, value), value);
}

// ============================================================================
// Division
// ============================================================================

export function divide(dividend: HugeNumber, divisor: HugeNumber): HugeNumber {
  if (dividend.isNaN() || divisor.isNaN()) return HugeNumber.NAN;
  if (divisor.isZero()) {
    return dividend.isZero() ? HugeNumber.NAN : HugeNumber.signedInfinity(dividend.isNegative());
  }
  const negative = dividend.isNegative() !== divisor.isNegative();
  if (dividend.isInfinity()) {
    return divisor.isInfinity() ? HugeNumber.NAN : HugeNumber.signedInfinity(negative);
  }
  if (divisor.isInfinity() || dividend.isZero()) return HugeNumber.signedZero(negative);

  const numerator = dividend.mantissa * BigInt(divisor.denominator);
  const denominator = BigInt(dividend.denominator) * divisor.mantissa;
  const exponent = dividend.exponent - divisor.exponent;

  if (absBig(numerator) <= INT64_MAX && absBig(denominator) <= INT64_MAX) {
    const g = gcd(numerator, denominator);
    const n = denominator < 0n ? -numerator / g : numerator / g;
    const d = absBig(denominator / g);
    if (d <= BIG_MAX_DENOMINATOR && absBig(n) <= MAX_MANTISSA) {
      return HugeNumber.fromNormalized(canonicalFraction(n, d, exponent));
    }
  }
  return HugeNumber.fromNormalized(divideToDecimal(numerator, denominator, exponent));
}

export function reciprocal(value: HugeNumber): HugeNumber {
  return divide(HugeNumber.ONE, value);
}

// ============================================================================
// Remainders
// ============================================================================

/** Truncating remainder carrying the dividend's sign */
export function mod(dividend: HugeNumber, divisor: HugeNumber): HugeNumber {
  if (dividend.isNaN() || divisor.isNaN()) return HugeNumber.NAN;
  if (divisor.isZero()) return dividend.isZero() ? HugeNumber.NAN : HugeNumber.ZERO;
  if (dividend.isZero() || dividend.isInfinity() || divisor.isInfinity()) return HugeNumber.ZERO;
  if (magnitude(dividend) < magnitude(divisor) - 1) return dividend;

  const aligned = align(dividend, divisor);
  const remainder = aligned.left % aligned.right;
  if (remainder === 0n) return HugeNumber.signedZero(dividend.isNegative());
  return HugeNumber.fromNormalized(canonicalFraction(remainder, aligned.denominator, aligned.exponent));
}

export interface DivRemResult {
  quotient: HugeNumber;
  remainder: HugeNumber;
}

/** Floored quotient and the matching remainder, dividend − quotient × divisor */
export function divRem(dividend: HugeNumber, divisor: HugeNumber): DivRemResult {
  const quotient = floor(divide(dividend, divisor));
  return { quotient, remainder: subtract(dividend, multiply(quotient, divisor)) };
}

/** IEEE 754 remainder: the quotient is rounded half to even */
export function ieeeRemainder(dividend: HugeNumber, divisor: HugeNumber): HugeNumber {
  if (dividend.isNaN() || divisor.isNaN()) return HugeNumber.NAN;
  if (divisor.isZero()) {
    return dividend.isZero() ? HugeNumber.NAN : HugeNumber.signedInfinity(dividend.isNegative());
  }
  if (dividend.isInfinity()) return HugeNumber.NAN;
  if (divisor.isInfinity() || dividend.isZero()) return dividend;
  if (magnitude(dividend) < magnitude(divisor) - 1) return dividend;

  const aligned = align(dividend, divisor);
  let quotient = aligned.left / aligned.right;
  const twice = absBig(aligned.left - quotient * aligned.right) * 2n;
  const span = absBig(aligned.right);
  if (twice > span || (twice === span && quotient % 2n !== 0n)) {
    quotient += (aligned.left < 0n) !== (aligned.right < 0n) ? -1n : 1n;
  }

  const remainder = aligned.left - quotient * aligned.right;
  if (remainder === 0n) return HugeNumber.signedZero(dividend.isNegative());
  return HugeNumber.fromNormalized(canonicalFraction(remainder, aligned.denominator, aligned.exponent));
}
