/**
 * Fixed-width extended-range decimal numbers
 *
 * Eighteen significant digits, exponents from -32768 to 32767, exact fractions
 * with sixteen-bit denominators, signed infinities, negative zero and NaN.
 */

export { HugeNumber } from './HugeNumber.js';
export type { Numeric, HugeNumberKind } from './HugeNumber.js';

export {
  add,
  subtract,
  multiply,
  divide,
  reciprocal,
  mod,
  divRem,
  ieeeRemainder,
  negate,
  abs,
  copySign,
  square,
  cube,
  fusedMultiplyAdd
} from './arithmetic.js';

export type { DivRemResult } from './arithmetic.js';

export {
  compare,
  equals,
  min,
  max,
  clamp,
  maxMagnitude,
  minMagnitude
} from './compare.js';

export type { Ordering } from './compare.js';

export { floor, ceiling, truncate, round, ROUNDING_MODES } from './rounding.js';
export type { RoundingMode } from './rounding.js';

export {
  log,
  logBase,
  log2,
  log10,
  logP1,
  log2P1,
  log10P1,
  exp,
  exp2,
  exp10,
  expM1,
  exp2M1,
  exp10M1,
  pow,
  sqrt,
  cbrt,
  rootN,
  hypot,
  scaleB
} from './transcendental.js';

export {
  sin,
  cos,
  tan,
  asin,
  acos,
  atan,
  atan2,
  sinPi,
  cosPi,
  tanPi,
  asinPi,
  acosPi,
  atanPi
} from './trigonometric.js';

export { sinh, cosh, tanh, asinh, acosh, atanh } from './hyperbolic.js';

export {
  NEARLY_ZERO,
  epsilonOf,
  isNearlyEqual,
  isNearlyZero,
  snapTo,
  snapToZero
} from './tolerance.js';

export { sum, average } from './aggregate.js';

export { lerp, inverseLerp } from './interpolation.js';

export { parse, parseStrict, tryParse } from './parse.js';
export type { ParseResult } from './parse.js';

export { format } from './format.js';

export {
  INVARIANT_FORMAT,
  NUMBER_STYLES,
  createNumberFormat,
  numberFormatForLocale,
  resolveStyles
} from './numberFormat.js';

export type { NumberFormatInfo, NumberStyles } from './numberFormat.js';

export { SUFFIX_TABLE, lookupSuffix, suggestSuffixes } from './suffix.js';
export type { SuffixUnit } from './suffix.js';

export {
  fromJSON,
  fromFields,
  toFields,
  hugeNumberFieldsSchema,
  stringifyWithHugeNumbers,
  parseWithHugeNumbers
} from './json.js';

export type { HugeNumberFields } from './json.js';

export {
  HugeNumberError,
  HugeNumberParseError,
  HugeNumberFormatError,
  HugeNumberSerializationError
} from './errors.js';

export type { ParseFailureCode } from './errors.js';

export * as constants from './constants.js';
export { NAMED_CONSTANTS, constantByName } from './constants.js';

export {
  MANTISSA_SIGNIFICANT_DIGITS,
  MAX_MANTISSA,
  MAX_EXPONENT,
  MIN_EXPONENT,
  MAX_DENOMINATOR
} from './limits.js';
