/**
 * Logarithms, exponentials, powers and roots.
 *
 * Log and Exp are series evaluated in HugeNumber arithmetic until consecutive
 * partial sums are identical; the configured iteration cap stops a series that
 * fails to settle and logs a warning.
 */

import { getConfig } from '../../config/index.js';
import { withScope } from '../../log.js';
import { HugeNumber } from './HugeNumber.js';
import {
  add,
  divide,
  multiply,
  negate,
  reciprocal,
  subtract,
} from './arithmetic.js';
import { compare, compareMagnitude } from './compare.js';
import { MANTISSA_SIGNIFICANT_DIGITS } from './limits.js';
import { digitCount, pow10, reduce } from './normalize.js';
import { floor } from './rounding.js';

/** e^x overflows above roughly (32767 + 18) × ln 10 */
const EXP_LIMIT = 75_500;

/** Largest integer root computed by Newton iteration; beyond it roots go through pow */
const MAX_INTEGER_ROOT = 64;

export function seriesCapReached(fn: string, iterations: number, argument: HugeNumber): void {
  withScope('transcendental').warn(
    { fn, iterations, argument: argument.toString() },
    'series iteration cap reached; returning partial sum',
  );
}

// ============================================================================
// Logarithms
// ============================================================================

/** ln(z) for z in [1, 10) as 2·Σ t^(2k+1)/(2k+1), t = (z-1)/(z+1) */
function lnSeries(z: HugeNumber): HugeNumber {
  const t = divide(subtract(z, HugeNumber.ONE), add(z, HugeNumber.ONE));
  const t2 = multiply(t, t);
  const cap = getConfig().maxSeriesIterations;

  let power = t;
  let sum = HugeNumber.ZERO;
  for (let k = 0; ; k++) {
    if (k >= cap) {
      seriesCapReached('log', cap, z);
      break;
    }
    const next = add(sum, divide(power, HugeNumber.fromNumber(2 * k + 1)));
    if (next.equals(sum)) break;
    sum = next;
    power = multiply(power, t2);
  }
  return multiply(sum, HugeNumber.TWO);
}

/**
 * Natural logarithm. NaN and negative values give NaN; zero gives +Infinity,
 * as does +Infinity.
 */
export function log(value: HugeNumber): HugeNumber {
  if (value.isNaN() || value.mantissa < 0n) return HugeNumber.NAN;
  if (value.isZero() || value.isPositiveInfinity()) return HugeNumber.POSITIVE_INFINITY;
  if (value.equals(HugeNumber.ONE)) return HugeNumber.ZERO;

  const decimal = value.toDecimal();
  const digits = digitCount(decimal.mantissa);
  const scale = decimal.exponent + digits - 1;
  const series = lnSeries(HugeNumber.fromNormalized(reduce(decimal.mantissa, 1 - digits)));
  if (scale === 0) return series;
  return add(multiply(HugeNumber.LN10, HugeNumber.fromNumber(scale)), series);
}

/** Logarithm of `value` in `base` */
export function logBase(value: HugeNumber, base: HugeNumber): HugeNumber {
  if (value.isNaN() || base.isNaN()) return HugeNumber.NAN;
  if (value.mantissa < 0n || base.mantissa < 0n) return HugeNumber.NAN;
  if (base.equals(HugeNumber.ONE)) return HugeNumber.NAN;
  if (base.isZero() || base.isPositiveInfinity()) {
    return value.equals(HugeNumber.ONE) ? HugeNumber.ZERO : HugeNumber.NAN;
  }
  if (value.isPositiveInfinity() || value.isZero()) return HugeNumber.POSITIVE_INFINITY;
  return divide(log(value), log(base));
}

export function log2(value: HugeNumber): HugeNumber {
  return divide(log(value), HugeNumber.LN2);
}

/** Base-10 logarithm; exact for powers of ten */
export function log10(value: HugeNumber): HugeNumber {
  if (value.denominator === 1 && value.mantissa > 0n) {
    const digits = value.mantissa.toString();
    if (/^10*$/.test(digits)) {
      return HugeNumber.fromNumber(value.exponent + digits.length - 1);
    }
  }
  return divide(log(value), HugeNumber.LN10);
}

export function logP1(value: HugeNumber): HugeNumber {
  return log(add(value, HugeNumber.ONE));
}

export function log2P1(value: HugeNumber): HugeNumber {
  return log2(add(value, HugeNumber.ONE));
}

export function log10P1(value: HugeNumber): HugeNumber {
  return log10(add(value, HugeNumber.ONE));
}

// ============================================================================
// Exponentials
// ============================================================================

/** Taylor series of e^r */
function expSeries(r: HugeNumber): HugeNumber {
  const cap = getConfig().maxSeriesIterations;
  let term = HugeNumber.ONE;
  let sum = HugeNumber.ONE;
  for (let n = 1; ; n++) {
    if (n > cap) {
      seriesCapReached('exp', cap, r);
      break;
    }
    term = divide(multiply(term, r), HugeNumber.fromNumber(n));
    const next = add(sum, term);
    if (next.equals(sum)) break;
    sum = next;
  }
  return sum;
}

/**
 * e^value. The argument is reduced to r = value − k·ln 10 with r in [0, ln 10),
 * so the result is e^r × 10^k.
 */
export function exp(value: HugeNumber): HugeNumber {
  if (value.isNaN()) return value;
  if (value.isPositiveInfinity()) return HugeNumber.POSITIVE_INFINITY;
  if (value.isNegativeInfinity()) return HugeNumber.ZERO;
  if (value.isZero()) return HugeNumber.ONE;
  if (value.equals(HugeNumber.ONE)) return HugeNumber.E;

  const limit = HugeNumber.fromNumber(EXP_LIMIT);
  if (compare(value, limit) > 0) return HugeNumber.POSITIVE_INFINITY;
  if (compare(value, negate(limit)) < 0) return HugeNumber.ZERO;

  const k = floor(divide(value, HugeNumber.LN10)).toNumber();
  const r = subtract(value, multiply(HugeNumber.LN10, HugeNumber.fromNumber(k)));
  const series = expSeries(r).toDecimal();
  return HugeNumber.fromNormalized(reduce(series.mantissa, series.exponent + k));
}

export function exp2(value: HugeNumber): HugeNumber {
  if (value.isInteger()) return pow(HugeNumber.TWO, value);
  return exp(multiply(value, HugeNumber.LN2));
}

/** 10^value; exact for integers */
export function exp10(value: HugeNumber): HugeNumber {
  if (value.isInteger()) {
    const limit = HugeNumber.fromNumber(EXP_LIMIT);
    if (compare(value, limit) > 0) return HugeNumber.POSITIVE_INFINITY;
    if (compare(value, negate(limit)) < 0) return HugeNumber.ZERO;
    return HugeNumber.fromComponents(1n, value.toNumber());
  }
  return exp(multiply(value, HugeNumber.LN10));
}

export function expM1(value: HugeNumber): HugeNumber {
  return subtract(exp(value), HugeNumber.ONE);
}

export function exp2M1(value: HugeNumber): HugeNumber {
  return subtract(exp2(value), HugeNumber.ONE);
}

export function exp10M1(value: HugeNumber): HugeNumber {
  return subtract(exp10(value), HugeNumber.ONE);
}

// ============================================================================
// Powers
// ============================================================================

/** Binary exponentiation for a positive integer exponent */
function powInteger(base: HugeNumber, exponent: bigint): HugeNumber {
  let result: HugeNumber | null = null;
  let factor = base;
  let n = exponent;
  while (n > 0n) {
    if ((n & 1n) === 1n) result = result === null ? factor : multiply(result, factor);
    n >>= 1n;
    if (n > 0n) factor = multiply(factor, factor);
  }
  return result ?? HugeNumber.ONE;
}

/**
 * x^y. A zero base of either sign gives +Infinity for a negative exponent and
 * zero otherwise; other special values follow IEEE 754 pow. Negative bases need
 * an integer exponent. Integer exponents go through repeated squaring, the rest
 * through exp(y · ln x).
 */
export function pow(x: HugeNumber, y: HugeNumber): HugeNumber {
  if (y.isZero() || x.equals(HugeNumber.ONE)) return HugeNumber.ONE;
  if (x.isNaN() || y.isNaN()) return HugeNumber.NAN;
  if (y.equals(HugeNumber.ONE)) return x;
  if (x.isZero()) return y.mantissa < 0n ? HugeNumber.POSITIVE_INFINITY : HugeNumber.ZERO;

  if (x.isPositiveInfinity()) return y.mantissa < 0n ? HugeNumber.ZERO : HugeNumber.POSITIVE_INFINITY;
  if (x.isNegativeInfinity()) {
    if (y.mantissa < 0n) return HugeNumber.signedZero(y.isOddInteger());
    return y.isOddInteger() ? HugeNumber.NEGATIVE_INFINITY : HugeNumber.POSITIVE_INFINITY;
  }

  if (y.isInfinity()) {
    const order = compareMagnitude(x, HugeNumber.ONE);
    if (order === 0) return HugeNumber.ONE;
    return (order > 0) === y.isPositiveInfinity() ? HugeNumber.POSITIVE_INFINITY : HugeNumber.ZERO;
  }

  if (x.mantissa < 0n) {
    if (!y.isInteger()) return HugeNumber.NAN;
    const result = pow(negate(x), y);
    return y.isOddInteger() ? negate(result) : result;
  }

  if (y.mantissa < 0n) return reciprocal(pow(x, negate(y)));

  if (y.isInteger() && compare(y, HugeNumber.fromNumber(Number.MAX_SAFE_INTEGER)) <= 0) {
    return powInteger(x, y.toBigInt());
  }
  return exp(multiply(y, log(x)));
}

/** value × 2^n */
export function scaleB(value: HugeNumber, n: number): HugeNumber {
  if (!Number.isSafeInteger(n)) {
    throw new RangeError(`scaleB needs a safe integer power of two, got ${n}`);
  }
  if (n === 0 || !value.isFinite() || value.isZero()) return value;
  return multiply(value, pow(HugeNumber.TWO, HugeNumber.fromNumber(n)));
}

// ============================================================================
// Roots
// ============================================================================

/** floor(n^(1/k)) for n >= 0 by Newton iteration from above */
export function integerRoot(n: bigint, k: number): bigint {
  if (n < 2n) return n;
  const kb = BigInt(k);
  let x = 1n << BigInt(Math.ceil(n.toString(2).length / k));
  for (;;) {
    const y = ((kb - 1n) * x + n / x ** (kb - 1n)) / kb;
    if (y >= x) return x;
    x = y;
  }
}

/** k-th root of a finite positive value, truncated to eighteen digits */
function positiveRoot(value: HugeNumber, k: number): HugeNumber {
  const decimal = value.toDecimal();
  let m = decimal.mantissa;
  let e = decimal.exponent;

  const remainder = ((e % k) + k) % k;
  if (remainder !== 0) {
    m *= pow10(remainder);
    e -= remainder;
  }

  // Enough digits for a root two digits wider than the mantissa
  const deficit = (MANTISSA_SIGNIFICANT_DIGITS + 2) * k - digitCount(m);
  if (deficit > 0) {
    const pad = Math.ceil(deficit / k) * k;
    m *= pow10(pad);
    e -= pad;
  }
  return HugeNumber.fromNormalized(reduce(integerRoot(m, k), e / k));
}

export function sqrt(value: HugeNumber): HugeNumber {
  if (value.isNaN() || value.mantissa < 0n) return HugeNumber.NAN;
  if (value.isZero() || value.isPositiveInfinity()) return value;
  return positiveRoot(value, 2);
}

export function cbrt(value: HugeNumber): HugeNumber {
  if (!value.isFinite() || value.isZero()) return value;
  if (value.mantissa < 0n) return negate(positiveRoot(negate(value), 3));
  return positiveRoot(value, 3);
}

/** n-th root; even roots of negative values are NaN */
export function rootN(value: HugeNumber, n: number): HugeNumber {
  if (!Number.isSafeInteger(n) || n === 0 || value.isNaN()) return HugeNumber.NAN;
  if (n < 0) return reciprocal(rootN(value, -n));
  if (n === 1) return value;

  const odd = n % 2 === 1;
  if (value.isZero()) return value;
  if (value.mantissa < 0n) {
    return odd ? negate(rootN(negate(value), n)) : HugeNumber.NAN;
  }
  if (value.isPositiveInfinity()) return value;
  if (n <= MAX_INTEGER_ROOT) return positiveRoot(value, n);
  return pow(value, HugeNumber.fromFraction(1, n));
}

/** sqrt(x² + y²); an infinite side wins over NaN */
export function hypot(x: HugeNumber, y: HugeNumber): HugeNumber {
  if (x.isInfinity() || y.isInfinity()) return HugeNumber.POSITIVE_INFINITY;
  if (x.isNaN() || y.isNaN()) return HugeNumber.NAN;
  return sqrt(add(multiply(x, x), multiply(y, y)));
}
