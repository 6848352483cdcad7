/**
 * Hyperbolic functions and their inverses, built on exp and log.
 */

import { getConfig } from '../../config/index.js';
import { HugeNumber } from './HugeNumber.js';
import { abs, add, divide, multiply, negate, reciprocal, square, subtract } from './arithmetic.js';
import { compare } from './compare.js';
import { exp, log, seriesCapReached, sqrt } from './transcendental.js';

const HALF = HugeNumber.fromFraction(1, 2);

/** tanh x rounds to one in eighteen digits past this */
const TANH_SATURATION = HugeNumber.fromNumber(22);

/** x + x³/3! + x⁵/5! + … for |x| < 1, where e^x − e^−x would cancel */
function sinhSeries(x: HugeNumber): HugeNumber {
  const x2 = multiply(x, x);
  const cap = getConfig().maxSeriesIterations;

  let term = x;
  let sum = x;
  for (let n = 1; ; n++) {
    if (n > cap) {
      seriesCapReached('sinh', cap, x);
      break;
    }
    term = divide(multiply(term, x2), HugeNumber.fromNumber(2 * n * (2 * n + 1)));
    const next = add(sum, term);
    if (next.equals(sum)) break;
    sum = next;
  }
  return sum;
}

export function sinh(value: HugeNumber): HugeNumber {
  if (!value.isFinite() || value.isZero()) return value;
  if (value.isNegative()) return negate(sinh(negate(value)));
  if (compare(value, HugeNumber.ONE) < 0) return sinhSeries(value);
  const e = exp(value);
  return multiply(subtract(e, reciprocal(e)), HALF);
}

export function cosh(value: HugeNumber): HugeNumber {
  if (value.isNaN()) return value;
  if (value.isInfinity()) return HugeNumber.POSITIVE_INFINITY;
  if (value.isZero()) return HugeNumber.ONE;
  const e = exp(abs(value));
  return multiply(add(e, reciprocal(e)), HALF);
}

export function tanh(value: HugeNumber): HugeNumber {
  if (value.isNaN() || value.isZero()) return value;
  if (value.isNegative()) return negate(tanh(negate(value)));
  if (value.isInfinity() || compare(value, TANH_SATURATION) > 0) return HugeNumber.ONE;
  return divide(sinh(value), cosh(value));
}

/** ln(x + √(x² + 1)) */
export function asinh(value: HugeNumber): HugeNumber {
  if (!value.isFinite() || value.isZero()) return value;
  if (value.isNegative()) return negate(asinh(negate(value)));
  return log(add(value, sqrt(add(square(value), HugeNumber.ONE))));
}

/** ln(x + √(x² − 1)); NaN below one */
export function acosh(value: HugeNumber): HugeNumber {
  if (value.isNaN()) return value;
  const order = compare(value, HugeNumber.ONE);
  if (order < 0) return HugeNumber.NAN;
  if (order === 0) return HugeNumber.ZERO;
  if (value.isPositiveInfinity()) return value;
  return log(add(value, sqrt(subtract(square(value), HugeNumber.ONE))));
}

/** ln((1 + x) / (1 − x)) / 2; ±Infinity at ±1 and NaN beyond */
export function atanh(value: HugeNumber): HugeNumber {
  if (value.isNaN() || value.isZero()) return value;
  if (value.isNegative()) return negate(atanh(negate(value)));
  const order = compare(value, HugeNumber.ONE);
  if (order > 0) return HugeNumber.NAN;
  if (order === 0) return HugeNumber.POSITIVE_INFINITY;
  const ratio = divide(add(HugeNumber.ONE, value), subtract(HugeNumber.ONE, value));
  return multiply(log(ratio), HALF);
}
