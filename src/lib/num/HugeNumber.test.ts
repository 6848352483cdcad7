/**
 * Tests for construction, classification and conversion
 */

import { describe, test, expect } from '@jest/globals';
import { HugeNumber } from './HugeNumber.js';

const h = (mantissa: bigint | number, exponent = 0, denominator: bigint | number = 1) =>
  HugeNumber.fromComponents(mantissa, exponent, denominator);

describe('HugeNumber', () => {
  describe('Construction', () => {
    test('pulls the exponent into the mantissa', () => {
      expect(h(5, 2).toFields()).toEqual({ mantissa: '500', exponent: 0, denominator: 1 });
    });

    test('sheds trailing zeros', () => {
      expect(h(123000, -3).toFields()).toEqual({ mantissa: '123', exponent: 0, denominator: 1 });
    });

    test('zero denominator builds the sentinels', () => {
      expect(h(0, 0, 0).isNaN()).toBe(true);
      expect(h(-5, 0, 0)).toBe(HugeNumber.NEGATIVE_INFINITY);
      expect(h(7, 0, 0)).toBe(HugeNumber.POSITIVE_INFINITY);
    });

    test('non-integer number seeds go through fromNumber', () => {
      expect(h(1.5).toFields()).toEqual({ mantissa: '15', exponent: -1, denominator: 1 });
    });

    test('rejects a fractional exponent', () => {
      expect(() => h(1, 0.5)).toThrow(TypeError);
    });

    test('fromNumber keeps the shortest digits', () => {
      expect(HugeNumber.fromNumber(123.456).toFields()).toEqual({ mantissa: '123456', exponent: -3, denominator: 1 });
      expect(HugeNumber.fromNumber(1e300).toFields()).toEqual({
        mantissa: '100000000000000000',
        exponent: 283,
        denominator: 1,
      });
    });

    test('fromNumber maps the IEEE specials', () => {
      expect(HugeNumber.fromNumber(NaN).isNaN()).toBe(true);
      expect(HugeNumber.fromNumber(Infinity)).toBe(HugeNumber.POSITIVE_INFINITY);
      expect(HugeNumber.fromNumber(-Infinity)).toBe(HugeNumber.NEGATIVE_INFINITY);
      expect(HugeNumber.fromNumber(-0)).toBe(HugeNumber.NEGATIVE_ZERO);
      expect(HugeNumber.fromNumber(0)).toBe(HugeNumber.ZERO);
    });

    test('fromBigInt truncates wide integers', () => {
      expect(HugeNumber.fromBigInt(10n ** 30n).toFields()).toEqual({
        mantissa: '100000000000000000',
        exponent: 13,
        denominator: 1,
      });
    });

    test('fromFraction stays exact', () => {
      expect(HugeNumber.fromFraction(2, 6).toFields()).toEqual({ mantissa: '1', exponent: 0, denominator: 3 });
    });

    test('from accepts every numeric type', () => {
      expect(HugeNumber.from('1/3').denominator).toBe(3);
      expect(HugeNumber.from(7n).equals(h(7))).toBe(true);
      expect(HugeNumber.from(2.5).equals(h(25, -1))).toBe(true);
      const x = h(42);
      expect(HugeNumber.from(x)).toBe(x);
    });

    test('negative zero has exponent -1', () => {
      expect(HugeNumber.NEGATIVE_ZERO.toFields()).toEqual({ mantissa: '0', exponent: -1, denominator: 1 });
    });
  });

  describe('Range limits', () => {
    test('sums past the largest value overflow', () => {
      expect(HugeNumber.MAX_VALUE.add(HugeNumber.MAX_VALUE)).toBe(HugeNumber.POSITIVE_INFINITY);
      expect(HugeNumber.MAX_VALUE.mul(10)).toBe(HugeNumber.POSITIVE_INFINITY);
      expect(HugeNumber.MIN_VALUE.mul(10)).toBe(HugeNumber.NEGATIVE_INFINITY);
    });

    test('values below the smallest exponent flush to signed zero', () => {
      expect(HugeNumber.EPSILON.div(10)).toBe(HugeNumber.ZERO);
      expect(HugeNumber.EPSILON.negate().div(10)).toBe(HugeNumber.NEGATIVE_ZERO);
    });
  });

  describe('Classification', () => {
    test('kind', () => {
      expect(HugeNumber.NAN.kind).toBe('nan');
      expect(HugeNumber.POSITIVE_INFINITY.kind).toBe('positiveInfinity');
      expect(HugeNumber.NEGATIVE_INFINITY.kind).toBe('negativeInfinity');
      expect(HugeNumber.fromFraction(1, 3).kind).toBe('finite');
    });

    test('sign predicates', () => {
      expect(HugeNumber.NEGATIVE_ZERO.isNegative()).toBe(true);
      expect(HugeNumber.NEGATIVE_ZERO.isZero()).toBe(true);
      expect(HugeNumber.ZERO.isNegative()).toBe(false);
      expect(HugeNumber.POSITIVE_INFINITY.isPositive()).toBe(true);
      expect(HugeNumber.ZERO.isPositive()).toBe(true);
      expect(HugeNumber.NEGATIVE_ZERO.isPositive()).toBe(false);
      expect(HugeNumber.NEGATIVE_INFINITY.isPositive()).toBe(false);
      expect(HugeNumber.NAN.isPositive()).toBe(false);
      expect(HugeNumber.NAN.isNegative()).toBe(false);
      expect(HugeNumber.NAN.isZero()).toBe(false);
    });

    test('sign', () => {
      expect(h(-3).sign()).toBe(-1);
      expect(HugeNumber.NEGATIVE_ZERO.sign()).toBe(0);
      expect(HugeNumber.POSITIVE_INFINITY.sign()).toBe(1);
      expect(HugeNumber.NAN.sign()).toBeNaN();
    });

    test('integer predicates', () => {
      expect(HugeNumber.NEGATIVE_ZERO.isInteger()).toBe(true);
      expect(h(1, 20).isEvenInteger()).toBe(true);
      expect(h(7).isOddInteger()).toBe(true);
      expect(h(8).isOddInteger()).toBe(false);
      expect(h(25, -1).isInteger()).toBe(false);
      expect(HugeNumber.fromFraction(1, 3).isInteger()).toBe(false);
      expect(HugeNumber.POSITIVE_INFINITY.isInteger()).toBe(false);
    });

    test('isNotRational', () => {
      expect(h(15, -1).isNotRational()).toBe(true);
      expect(HugeNumber.NAN.isNotRational()).toBe(true);
      expect(HugeNumber.ONE.isNotRational()).toBe(false);
      expect(HugeNumber.fromFraction(1, 3).isNotRational()).toBe(false);
    });

    test('mantissaDigits', () => {
      expect(h(123).mantissaDigits).toBe(3);
      expect(HugeNumber.NAN.mantissaDigits).toBe(0);
    });
  });

  describe('Conversion', () => {
    test('toNumber', () => {
      expect(h(15, -1).toNumber()).toBe(1.5);
      expect(HugeNumber.fromFraction(1, 3).toNumber()).toBe(1 / 3);
      expect(Object.is(HugeNumber.NEGATIVE_ZERO.toNumber(), -0)).toBe(true);
      expect(HugeNumber.NEGATIVE_INFINITY.toNumber()).toBe(-Infinity);
      expect(HugeNumber.NAN.toNumber()).toBeNaN();
    });

    test('toBigInt truncates toward zero', () => {
      expect(HugeNumber.fromFraction(10, 3).toBigInt()).toBe(3n);
      expect(h(-75, -1).toBigInt()).toBe(-7n);
      expect(h(1, 20).toBigInt()).toBe(10n ** 20n);
      expect(() => HugeNumber.NAN.toBigInt()).toThrow(RangeError);
    });

    test('toDecimal approximates fractions', () => {
      expect(HugeNumber.fromFraction(1, 3).toDecimal().toFields()).toEqual({
        mantissa: '333333333333333333',
        exponent: -18,
        denominator: 1,
      });
      expect(h(15, -1).toDecimal()).toEqual(h(15, -1));
    });

    test('toString and toJSON', () => {
      expect(HugeNumber.fromFraction(1, 3).toString()).toBe('1/3');
      expect(HugeNumber.NAN.toString()).toBe('NaN');
      expect(JSON.stringify({ x: h(15, -1) })).toBe('{"x":"1.5"}');
    });
  });

  test('compare sorts mixed numeric inputs', () => {
    const sorted = [h(3), h(1), h(2)].sort(HugeNumber.compare);
    expect(sorted.map((x) => x.toString())).toEqual(['1', '2', '3']);
  });
});
