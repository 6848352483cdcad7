/**
 * Fixed-width extended-range decimal number.
 *
 * A value is mantissa / denominator × 10^exponent with an eighteen-digit signed
 * mantissa, a sixteen-bit exponent and a sixteen-bit denominator. Denominator 1
 * marks a plain decimal, larger denominators an exact fraction, and 0 the NaN and
 * Infinity sentinels. Every instance is canonical, so equality is a field check.
 *
 * Domain errors never throw: division by zero, overflow and invalid logarithms
 * all come back as NaN or a signed Infinity.
 */

import {
  INFINITE_MANTISSA,
  MAX_EXPONENT,
  MAX_MANTISSA,
  MIN_EXPONENT,
  SENTINEL_EXPONENT,
} from './limits.js';
import { digitCount, pow10, reduce, type Normalized } from './normalize.js';
import { canonicalFraction, divideToDecimal } from './rational.js';
import * as arithmetic from './arithmetic.js';
import * as comparison from './compare.js';
import * as rounding from './rounding.js';
import * as transcendental from './transcendental.js';
import { format } from './format.js';
import { parse } from './parse.js';
import { fromJSON, toFields, type HugeNumberFields } from './json.js';
import type { NumberFormatInfo, NumberStyles } from './numberFormat.js';

/** Anything that converts to a HugeNumber */
export type Numeric = HugeNumber | number | bigint | string;

/** Tagged reading of the sentinel encoding */
export type HugeNumberKind = 'nan' | 'positiveInfinity' | 'negativeInfinity' | 'finite';

function assertInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new TypeError(`${name} must be a safe integer, got ${value}`);
  }
}

export class HugeNumber {
  readonly mantissa: bigint;
  readonly exponent: number;
  readonly denominator: number;

  private constructor(mantissa: bigint, exponent: number, denominator: number) {
    this.mantissa = mantissa;
    this.exponent = exponent;
    this.denominator = denominator;
  }

  // ============================================================================
  // Constants
  // ============================================================================

  static readonly NAN = new HugeNumber(0n, SENTINEL_EXPONENT, 0);
  static readonly POSITIVE_INFINITY = new HugeNumber(INFINITE_MANTISSA, SENTINEL_EXPONENT, 0);
  static readonly NEGATIVE_INFINITY = new HugeNumber(-INFINITE_MANTISSA, SENTINEL_EXPONENT, 0);
  static readonly ZERO = new HugeNumber(0n, 0, 1);
  static readonly NEGATIVE_ZERO = new HugeNumber(0n, -1, 1);
  static readonly ONE = new HugeNumber(1n, 0, 1);
  static readonly NEG_ONE = new HugeNumber(-1n, 0, 1);
  static readonly TWO = new HugeNumber(2n, 0, 1);
  static readonly TEN = new HugeNumber(10n, 0, 1);

  /** Largest finite value */
  static readonly MAX_VALUE = new HugeNumber(MAX_MANTISSA, MAX_EXPONENT, 1);
  /** Most negative finite value */
  static readonly MIN_VALUE = new HugeNumber(-MAX_MANTISSA, MAX_EXPONENT, 1);
  /** Smallest positive value */
  static readonly EPSILON = new HugeNumber(1n, MIN_EXPONENT, 1);

  static readonly E = new HugeNumber(271828182845904524n, -17, 1);
  static readonly PI = new HugeNumber(314159265358979324n, -17, 1);
  static readonly TAU = new HugeNumber(628318530717958647n, -17, 1);
  static readonly LN2 = new HugeNumber(693147180559945309n, -18, 1);
  static readonly LN10 = new HugeNumber(230258509299404568n, -17, 1);

  // ============================================================================
  // Construction
  // ============================================================================

  /**
   * Wrap a normalizer result. Finite results must already be canonical.
   * @internal
   */
  static fromNormalized(result: Normalized): HugeNumber {
    switch (result.kind) {
      case 'overflow':
        return HugeNumber.signedInfinity(result.negative);
      case 'underflow':
        return HugeNumber.signedZero(result.negative);
      case 'finite':
        if (result.mantissa === 0n) return HugeNumber.ZERO;
        return new HugeNumber(result.mantissa, result.exponent, result.denominator);
    }
  }

  static signedZero(negative: boolean): HugeNumber {
    return negative ? HugeNumber.NEGATIVE_ZERO : HugeNumber.ZERO;
  }

  static signedInfinity(negative: boolean): HugeNumber {
    return negative ? HugeNumber.NEGATIVE_INFINITY : HugeNumber.POSITIVE_INFINITY;
  }

  /**
   * Build from mantissa / denominator × 10^exponent, normalizing to canonical form.
   * A zero denominator yields NaN for a zero mantissa and a signed Infinity otherwise.
   */
  static fromComponents(mantissa: bigint | number, exponent = 0, denominator: bigint | number = 1): HugeNumber {
    assertInteger(exponent, 'exponent');
    if (typeof denominator === 'number') assertInteger(denominator, 'denominator');
    const d = BigInt(denominator);

    if (typeof mantissa === 'number' && !Number.isSafeInteger(mantissa)) {
      const seeded = HugeNumber.fromNumber(mantissa, exponent);
      return d === 1n ? seeded : arithmetic.divide(seeded, HugeNumber.fromBigInt(d));
    }

    const m = BigInt(mantissa);
    if (d === 0n) {
      if (m === 0n) return HugeNumber.NAN;
      return HugeNumber.signedInfinity(m < 0n);
    }
    return HugeNumber.fromNormalized(d === 1n ? reduce(m, exponent) : canonicalFraction(m, d, exponent));
  }

  /** Exact fraction numerator / denominator × 10^exponent */
  static fromFraction(numerator: bigint | number, denominator: bigint | number, exponent = 0): HugeNumber {
    return HugeNumber.fromComponents(numerator, exponent, denominator);
  }

  static fromBigInt(value: bigint, exponent = 0): HugeNumber {
    assertInteger(exponent, 'exponent');
    return HugeNumber.fromNormalized(reduce(value, exponent));
  }

  /**
   * Build from a floating-point seed times 10^exponent. Non-finite seeds map to
   * the sentinels directly; the seed's shortest round-trip digits are kept.
   */
  static fromNumber(value: number, exponent = 0): HugeNumber {
    if (Number.isNaN(value)) return HugeNumber.NAN;
    if (value === Infinity) return HugeNumber.POSITIVE_INFINITY;
    if (value === -Infinity) return HugeNumber.NEGATIVE_INFINITY;
    if (value === 0) return Object.is(value, -0) ? HugeNumber.NEGATIVE_ZERO : HugeNumber.ZERO;
    assertInteger(exponent, 'exponent');

    const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(value.toExponential());
    if (!match) {
      throw new TypeError(`Cannot decompose ${value}`);
    }
    const [, sign, lead, fraction = '', exp] = match;
    const digits = BigInt(lead + fraction);
    return HugeNumber.fromNormalized(
      reduce(sign ? -digits : digits, Number(exp) - fraction.length + exponent),
    );
  }

  static fromString(text: string, styles?: Partial<NumberStyles>, info?: NumberFormatInfo): HugeNumber {
    return parse(text, styles, info);
  }

  /** Convert any supported numeric type */
  static from(value: Numeric): HugeNumber {
    if (value instanceof HugeNumber) return value;
    switch (typeof value) {
      case 'number':
        return HugeNumber.fromNumber(value);
      case 'bigint':
        return HugeNumber.fromBigInt(value);
      default:
        return parse(value);
    }
  }

  static fromJSON(json: unknown): HugeNumber {
    return fromJSON(json);
  }

  /** Sort comparator */
  static compare(left: Numeric, right: Numeric): number {
    return comparison.compare(HugeNumber.from(left), HugeNumber.from(right));
  }

  // ============================================================================
  // Classification
  // ============================================================================

  get kind(): HugeNumberKind {
    if (this.denominator !== 0) return 'finite';
    if (this.mantissa === 0n) return 'nan';
    return this.mantissa > 0n ? 'positiveInfinity' : 'negativeInfinity';
  }

  /** Decimal digits in the mantissa; 0 for zero and the sentinels */
  get mantissaDigits(): number {
    return this.denominator === 0 ? 0 : digitCount(this.mantissa);
  }

  isNaN(): boolean {
    return this.mantissa === 0n && this.denominator === 0;
  }

  isInfinity(): boolean {
    return this.mantissa !== 0n && this.denominator === 0;
  }

  isPositiveInfinity(): boolean {
    return this.mantissa > 0n && this.denominator === 0;
  }

  isNegativeInfinity(): boolean {
    return this.mantissa < 0n && this.denominator === 0;
  }

  isFinite(): boolean {
    return this.denominator > 0;
  }

  isZero(): boolean {
    return this.mantissa === 0n && this.denominator !== 0;
  }

  /** True for positive zero, values above zero and +Infinity */
  isPositive(): boolean {
    return !this.isNaN() && !this.isNegative();
  }

  /** True for values below zero, negative zero and -Infinity included */
  isNegative(): boolean {
    return this.mantissa < 0n || (this.mantissa === 0n && this.exponent < 0);
  }

  /** -1, 0 or 1; NaN for NaN */
  sign(): number {
    if (this.isNaN()) return NaN;
    if (this.mantissa > 0n) return 1;
    return this.mantissa < 0n ? -1 : 0;
  }

  isInteger(): boolean {
    return this.denominator === 1 && (this.exponent >= 0 || this.mantissa === 0n);
  }

  isEvenInteger(): boolean {
    if (!this.isInteger()) return false;
    return this.exponent > 0 || this.mantissa % 2n === 0n;
  }

  isOddInteger(): boolean {
    return this.isInteger() && this.exponent === 0 && this.mantissa % 2n !== 0n;
  }

  /** Flags values whose digits may already have been truncated */
  isNotRational(): boolean {
    return this.denominator === 0 || (this.denominator === 1 && this.exponent !== 0);
  }

  // ============================================================================
  // Arithmetic
  // ============================================================================

  add(other: Numeric): HugeNumber {
    return arithmetic.add(this, HugeNumber.from(other));
  }

  sub(other: Numeric): HugeNumber {
    return arithmetic.subtract(this, HugeNumber.from(other));
  }

  mul(other: Numeric): HugeNumber {
    return arithmetic.multiply(this, HugeNumber.from(other));
  }

  div(other: Numeric): HugeNumber {
    return arithmetic.divide(this, HugeNumber.from(other));
  }

  /** Truncating remainder; the result takes the sign of this value */
  mod(other: Numeric): HugeNumber {
    return arithmetic.mod(this, HugeNumber.from(other));
  }

  divRem(other: Numeric): arithmetic.DivRemResult {
    return arithmetic.divRem(this, HugeNumber.from(other));
  }

  ieeeRemainder(other: Numeric): HugeNumber {
    return arithmetic.ieeeRemainder(this, HugeNumber.from(other));
  }

  negate(): HugeNumber {
    return arithmetic.negate(this);
  }

  abs(): HugeNumber {
    return arithmetic.abs(this);
  }

  copySign(sign: Numeric): HugeNumber {
    return arithmetic.copySign(this, HugeNumber.from(sign));
  }

  square(): HugeNumber {
    return arithmetic.square(this);
  }

  cube(): HugeNumber {
    return arithmetic.cube(this);
  }

  reciprocal(): HugeNumber {
    return arithmetic.reciprocal(this);
  }

  // ============================================================================
  // Comparison
  // ============================================================================

  cmp(other: Numeric): comparison.Ordering {
    return comparison.compare(this, HugeNumber.from(other));
  }

  /** Field equality; NaN equals nothing */
  equals(other: Numeric): boolean {
    return comparison.equals(this, HugeNumber.from(other));
  }

  eq(other: Numeric): boolean {
    return this.equals(other);
  }

  lt(other: Numeric): boolean {
    return comparison.lessThan(this, HugeNumber.from(other));
  }

  lte(other: Numeric): boolean {
    return comparison.lessThanOrEqual(this, HugeNumber.from(other));
  }

  gt(other: Numeric): boolean {
    return comparison.lessThan(HugeNumber.from(other), this);
  }

  gte(other: Numeric): boolean {
    return comparison.lessThanOrEqual(HugeNumber.from(other), this);
  }

  // ============================================================================
  // Rounding
  // ============================================================================

  floor(): HugeNumber {
    return rounding.floor(this);
  }

  ceil(): HugeNumber {
    return rounding.ceiling(this);
  }

  truncate(): HugeNumber {
    return rounding.truncate(this);
  }

  round(digits = 0, mode: rounding.RoundingMode = 'toEven'): HugeNumber {
    return rounding.round(this, digits, mode);
  }

  // ============================================================================
  // Transcendental
  // ============================================================================

  /** Natural logarithm, or the logarithm in `base` when one is given */
  log(base?: Numeric): HugeNumber {
    return base === undefined
      ? transcendental.log(this)
      : transcendental.logBase(this, HugeNumber.from(base));
  }

  log2(): HugeNumber {
    return transcendental.log2(this);
  }

  log10(): HugeNumber {
    return transcendental.log10(this);
  }

  exp(): HugeNumber {
    return transcendental.exp(this);
  }

  pow(exponent: Numeric): HugeNumber {
    return transcendental.pow(this, HugeNumber.from(exponent));
  }

  sqrt(): HugeNumber {
    return transcendental.sqrt(this);
  }

  cbrt(): HugeNumber {
    return transcendental.cbrt(this);
  }

  rootN(n: number): HugeNumber {
    return transcendental.rootN(this, n);
  }

  // ============================================================================
  // Conversion
  // ============================================================================

  /** Nearest eighteen-digit decimal; plain decimals and sentinels come back unchanged */
  toDecimal(): HugeNumber {
    if (this.denominator <= 1) return this;
    return HugeNumber.fromNormalized(divideToDecimal(this.mantissa, BigInt(this.denominator), this.exponent));
  }

  toNumber(): number {
    switch (this.kind) {
      case 'nan':
        return NaN;
      case 'positiveInfinity':
        return Infinity;
      case 'negativeInfinity':
        return -Infinity;
      case 'finite':
        break;
    }
    if (this.mantissa === 0n) return this.exponent < 0 ? -0 : 0;
    const value = Number(`${this.mantissa}e${this.exponent}`);
    return this.denominator === 1 ? value : value / this.denominator;
  }

  /** Integer part, truncated toward zero */
  toBigInt(): bigint {
    if (!this.isFinite()) {
      throw new RangeError(`Cannot convert ${this.toString()} to a bigint`);
    }
    let numerator = this.mantissa;
    let denominator = BigInt(this.denominator);
    if (this.exponent >= 0) {
      numerator *= pow10(this.exponent);
    } else {
      denominator *= pow10(-this.exponent);
    }
    return numerator / denominator;
  }

  toFields(): HugeNumberFields {
    return toFields(this);
  }

  toString(specifier?: string, info?: NumberFormatInfo): string {
    return format(this, specifier, info);
  }

  toJSON(): string {
    return format(this, 'R');
  }
}
