import { HugeNumber } from './HugeNumber.js';
import { add, divide, multiply, subtract } from './arithmetic.js';
import { equals } from './compare.js';

/** first + (second − first) × amount */
export function lerp(first: HugeNumber, second: HugeNumber, amount: HugeNumber): HugeNumber {
  return add(first, multiply(subtract(second, first), amount));
}

/**
 * The amount that `lerp(first, second, amount)` maps to `result`. When the
 * endpoints coincide this is one half if `result` equals them, otherwise NaN.
 */
export function inverseLerp(first: HugeNumber, second: HugeNumber, result: HugeNumber): HugeNumber {
  const difference = subtract(second, first);
  if (difference.isZero()) {
    return equals(result, first) ? HugeNumber.fromFraction(1, 2) : HugeNumber.NAN;
  }
  return divide(subtract(result, first), difference);
}
