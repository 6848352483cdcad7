import { HugeNumber } from './HugeNumber.js';
import { add, divide } from './arithmetic.js';
import { HugeNumberError } from './errors.js';

/** Sum of a sequence; zero when it is empty */
export function sum(values: Iterable<HugeNumber>): HugeNumber {
  let total = HugeNumber.ZERO;
  for (const value of values) total = add(total, value);
  return total;
}

/** Arithmetic mean; throws on an empty sequence */
export function average(values: Iterable<HugeNumber>): HugeNumber {
  let total = HugeNumber.ZERO;
  let count = 0;
  for (const value of values) {
    total = add(total, value);
    count++;
  }
  if (count === 0) throw new HugeNumberError('Cannot average an empty sequence');
  return divide(total, HugeNumber.fromNumber(count));
}
