/**
 * Circular functions and their inverses.
 *
 * Arguments are reduced modulo 2π and folded into [0, π/4] before the Taylor
 * series runs. The *Pi variants take multiples of π and are exact at the
 * integers, half-integers and quarter points.
 */

import { getConfig } from '../../config/index.js';
import { HugeNumber } from './HugeNumber.js';
import {
  abs,
  add,
  divide,
  mod,
  multiply,
  negate,
  reciprocal,
  square,
  subtract,
} from './arithmetic.js';
import { compare } from './compare.js';
import { HalfPi, Pi, QuarterPi, Tau, ThreeQuartersPi } from './constants.js';
import { seriesCapReached, sqrt } from './transcendental.js';

const HALF = HugeNumber.fromFraction(1, 2);
const THREE_HALVES = HugeNumber.fromFraction(3, 2);
const QUARTER = HugeNumber.fromFraction(1, 4);
const THREE_QUARTERS = HugeNumber.fromFraction(3, 4);

/** tan(π/12); atan halves arguments above it before summing */
const TAN_PI_OVER_12 = subtract(HugeNumber.TWO, sqrt(HugeNumber.fromNumber(3)));

/**
 * Σ (-1)^n r^(2n+offset+1) / (2n+offset+1)!, starting from `first`. Offset 0
 * gives sin r from r, offset -1 gives cos r from 1.
 */
function taylor(fn: string, r: HugeNumber, first: HugeNumber, offset: number): HugeNumber {
  if (r.isZero()) return first;
  const r2 = multiply(r, r);
  const cap = getConfig().maxSeriesIterations;

  let term = first;
  let sum = first;
  for (let n = 1; ; n++) {
    if (n > cap) {
      seriesCapReached(fn, cap, r);
      break;
    }
    const k = 2 * n + offset;
    term = negate(divide(multiply(term, r2), HugeNumber.fromNumber(k * (k + 1))));
    const next = add(sum, term);
    if (next.equals(sum)) break;
    sum = next;
  }
  return sum;
}

function sinSeries(r: HugeNumber): HugeNumber {
  return taylor('sin', r, r, 0);
}

function cosSeries(r: HugeNumber): HugeNumber {
  return taylor('cos', r, HugeNumber.ONE, -1);
}

/** sin r for r in [0, π] */
function sinHalfTurn(r: HugeNumber): HugeNumber {
  const t = compare(r, HalfPi) > 0 ? subtract(Pi, r) : r;
  return compare(t, QuarterPi) > 0 ? cosSeries(subtract(HalfPi, t)) : sinSeries(t);
}

/** cos t for t in [0, π/2] */
function cosQuarterTurn(t: HugeNumber): HugeNumber {
  return compare(t, QuarterPi) > 0 ? sinSeries(subtract(HalfPi, t)) : cosSeries(t);
}

export function sin(value: HugeNumber): HugeNumber {
  if (!value.isFinite()) return HugeNumber.NAN;
  if (value.isZero()) return value;
  if (value.isNegative()) return negate(sin(negate(value)));

  const r = mod(value, Tau);
  if (compare(r, Pi) > 0) return negate(sinHalfTurn(subtract(r, Pi)));
  return sinHalfTurn(r);
}

export function cos(value: HugeNumber): HugeNumber {
  if (!value.isFinite()) return HugeNumber.NAN;
  if (value.isZero()) return HugeNumber.ONE;

  let r = mod(abs(value), Tau);
  if (compare(r, Pi) > 0) r = subtract(Tau, r);
  if (compare(r, HalfPi) > 0) return negate(cosQuarterTurn(subtract(Pi, r)));
  return cosQuarterTurn(r);
}

export function tan(value: HugeNumber): HugeNumber {
  if (!value.isFinite()) return HugeNumber.NAN;
  if (value.isZero()) return value;
  return divide(sin(value), cos(value));
}

// ============================================================================
// Inverses
// ============================================================================

/** x − x³/3 + x⁵/5 − … for 0 < x ≤ tan(π/12) */
function atanSeries(x: HugeNumber): HugeNumber {
  const x2 = multiply(x, x);
  const cap = getConfig().maxSeriesIterations;

  let power = x;
  let sum = x;
  for (let k = 1; ; k++) {
    if (k > cap) {
      seriesCapReached('atan', cap, x);
      break;
    }
    power = negate(multiply(power, x2));
    const next = add(sum, divide(power, HugeNumber.fromNumber(2 * k + 1)));
    if (next.equals(sum)) break;
    sum = next;
  }
  return sum;
}

/** Arctangent in [-π/2, π/2] */
export function atan(value: HugeNumber): HugeNumber {
  if (value.isNaN() || value.isZero()) return value;
  if (value.isInfinity()) return value.isNegative() ? negate(HalfPi) : HalfPi;
  if (value.isNegative()) return negate(atan(negate(value)));

  const order = compare(value, HugeNumber.ONE);
  if (order === 0) return QuarterPi;
  if (order > 0) return subtract(HalfPi, atan(reciprocal(value)));
  if (compare(value, TAN_PI_OVER_12) > 0) {
    // atan x = 2·atan(x / (1 + √(1 + x²)))
    const halved = divide(value, add(HugeNumber.ONE, sqrt(add(HugeNumber.ONE, square(value)))));
    return multiply(HugeNumber.TWO, atan(halved));
  }
  return atanSeries(value);
}

/** Arcsine in [-π/2, π/2]; NaN outside [-1, 1] */
export function asin(value: HugeNumber): HugeNumber {
  if (value.isNaN() || value.isZero()) return value;
  const order = compare(abs(value), HugeNumber.ONE);
  if (order > 0) return HugeNumber.NAN;
  if (order === 0) return value.isNegative() ? negate(HalfPi) : HalfPi;
  return atan(divide(value, sqrt(subtract(HugeNumber.ONE, square(value)))));
}

/** Arccosine in [0, π]; NaN outside [-1, 1] */
export function acos(value: HugeNumber): HugeNumber {
  if (value.isNaN() || compare(abs(value), HugeNumber.ONE) > 0) return HugeNumber.NAN;
  if (value.isZero()) return HalfPi;
  if (compare(value, HugeNumber.ONE) === 0) return HugeNumber.ZERO;
  if (compare(value, HugeNumber.NEG_ONE) === 0) return Pi;
  // acos x = 2·atan(√(1 − x²) / (1 + x))
  const ratio = divide(sqrt(subtract(HugeNumber.ONE, square(value))), add(HugeNumber.ONE, value));
  return multiply(HugeNumber.TWO, atan(ratio));
}

/**
 * Angle of the point (x, y) in (-π, π]. Signed zeros and infinities follow
 * IEEE 754 atan2.
 */
export function atan2(y: HugeNumber, x: HugeNumber): HugeNumber {
  if (y.isNaN() || x.isNaN()) return HugeNumber.NAN;
  const negativeY = y.isNegative();
  const signed = (angle: HugeNumber): HugeNumber => (negativeY ? negate(angle) : angle);

  if (y.isZero()) return x.isNegative() ? signed(Pi) : y;
  if (y.isInfinity()) {
    if (x.isPositiveInfinity()) return signed(QuarterPi);
    if (x.isNegativeInfinity()) return signed(ThreeQuartersPi);
    return signed(HalfPi);
  }
  if (x.isZero()) return signed(HalfPi);
  if (x.isPositiveInfinity()) return HugeNumber.signedZero(negativeY);
  if (x.isNegativeInfinity()) return signed(Pi);

  const angle = atan(divide(y, x));
  if (!x.isNegative()) return angle;
  return negativeY ? subtract(angle, Pi) : add(angle, Pi);
}

// ============================================================================
// Multiples of π
// ============================================================================

const is = (value: HugeNumber, target: HugeNumber): boolean => compare(value, target) === 0;

/** sin(πx) */
export function sinPi(value: HugeNumber): HugeNumber {
  if (!value.isFinite()) return HugeNumber.NAN;
  if (value.isZero()) return value;
  if (value.isNegative()) return negate(sinPi(negate(value)));

  const r = mod(value, HugeNumber.TWO);
  if (r.isZero() || is(r, HugeNumber.ONE)) return HugeNumber.ZERO;
  if (is(r, HALF)) return HugeNumber.ONE;
  if (is(r, THREE_HALVES)) return HugeNumber.NEG_ONE;
  return sin(multiply(r, Pi));
}

/** cos(πx) */
export function cosPi(value: HugeNumber): HugeNumber {
  if (!value.isFinite()) return HugeNumber.NAN;

  const r = mod(abs(value), HugeNumber.TWO);
  if (r.isZero()) return HugeNumber.ONE;
  if (is(r, HugeNumber.ONE)) return HugeNumber.NEG_ONE;
  if (is(r, HALF) || is(r, THREE_HALVES)) return HugeNumber.ZERO;
  return cos(multiply(r, Pi));
}

/** tan(πx); ±Infinity at the odd half-integers */
export function tanPi(value: HugeNumber): HugeNumber {
  if (!value.isFinite()) return HugeNumber.NAN;
  if (value.isZero()) return value;
  if (value.isNegative()) return negate(tanPi(negate(value)));

  const turn = mod(value, HugeNumber.TWO);
  if (turn.isZero()) return HugeNumber.ZERO;
  if (is(turn, HugeNumber.ONE)) return HugeNumber.NEGATIVE_ZERO;
  if (is(turn, HALF)) return HugeNumber.POSITIVE_INFINITY;
  if (is(turn, THREE_HALVES)) return HugeNumber.NEGATIVE_INFINITY;

  const r = mod(value, HugeNumber.ONE);
  if (is(r, QUARTER)) return HugeNumber.ONE;
  if (is(r, THREE_QUARTERS)) return HugeNumber.NEG_ONE;
  return tan(multiply(r, Pi));
}

/** asin(x)/π */
export function asinPi(value: HugeNumber): HugeNumber {
  if (value.isNaN() || value.isZero()) return value;
  const magnitude = abs(value);
  if (compare(magnitude, HugeNumber.ONE) > 0) return HugeNumber.NAN;

  let exact: HugeNumber | null = null;
  if (is(magnitude, HugeNumber.ONE)) exact = HALF;
  else if (is(magnitude, HALF)) exact = HugeNumber.fromFraction(1, 6);
  if (exact === null) return divide(asin(value), Pi);
  return value.isNegative() ? negate(exact) : exact;
}

/** acos(x)/π */
export function acosPi(value: HugeNumber): HugeNumber {
  if (value.isNaN() || compare(abs(value), HugeNumber.ONE) > 0) return HugeNumber.NAN;
  if (value.isZero()) return HALF;
  if (is(value, HugeNumber.ONE)) return HugeNumber.ZERO;
  if (is(value, HugeNumber.NEG_ONE)) return HugeNumber.ONE;
  if (is(value, HALF)) return HugeNumber.fromFraction(1, 3);
  if (is(value, negate(HALF))) return HugeNumber.fromFraction(2, 3);
  return divide(acos(value), Pi);
}

/** atan(x)/π */
export function atanPi(value: HugeNumber): HugeNumber {
  if (value.isNaN() || value.isZero()) return value;
  if (value.isInfinity()) return value.isNegative() ? negate(HALF) : HALF;
  if (is(value, HugeNumber.ONE)) return QUARTER;
  if (is(value, HugeNumber.NEG_ONE)) return negate(QUARTER);
  return divide(atan(value), Pi);
}
