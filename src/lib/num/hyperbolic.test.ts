import { describe, test, expect } from '@jest/globals';
import { HugeNumber } from './HugeNumber.js';
import { acosh, asinh, atanh, cosh, sinh, tanh } from './hyperbolic.js';

const h = (mantissa: bigint | number, exponent = 0) => HugeNumber.fromComponents(mantissa, exponent);
const { NAN, ZERO, NEGATIVE_ZERO, ONE, NEG_ONE, POSITIVE_INFINITY, NEGATIVE_INFINITY } = HugeNumber;

describe('sinh, cosh and tanh', () => {
  test('approximate the hyperbolic functions', () => {
    for (const x of [0.001, 0.5, 1, 2.5, 10]) {
      const value = HugeNumber.fromNumber(x);
      expect(sinh(value).toNumber() / Math.sinh(x)).toBeCloseTo(1, 14);
      expect(cosh(value).toNumber() / Math.cosh(x)).toBeCloseTo(1, 14);
      expect(tanh(value).toNumber()).toBeCloseTo(Math.tanh(x), 14);
    }
  });

  test('symmetry', () => {
    expect(sinh(h(-2)).toNumber()).toBeCloseTo(-Math.sinh(2), 13);
    expect(cosh(h(-2)).toNumber()).toBeCloseTo(Math.cosh(2), 13);
    expect(tanh(h(-5, -1)).toNumber()).toBeCloseTo(-Math.tanh(0.5), 14);
  });

  test('zeros keep their sign where the function is odd', () => {
    expect(sinh(NEGATIVE_ZERO)).toBe(NEGATIVE_ZERO);
    expect(tanh(NEGATIVE_ZERO)).toBe(NEGATIVE_ZERO);
    expect(cosh(NEGATIVE_ZERO)).toBe(ONE);
  });

  test('infinities', () => {
    expect(sinh(NEGATIVE_INFINITY)).toBe(NEGATIVE_INFINITY);
    expect(cosh(NEGATIVE_INFINITY)).toBe(POSITIVE_INFINITY);
    expect(tanh(POSITIVE_INFINITY)).toBe(ONE);
    expect(tanh(NEGATIVE_INFINITY).equals(NEG_ONE)).toBe(true);
  });

  test('tanh saturates to one', () => {
    expect(tanh(h(30))).toBe(ONE);
  });

  test('large arguments overflow', () => {
    expect(sinh(h(1, 6))).toBe(POSITIVE_INFINITY);
    expect(cosh(h(-1, 6))).toBe(POSITIVE_INFINITY);
  });

  test('NaN', () => {
    for (const fn of [sinh, cosh, tanh, asinh, acosh, atanh]) {
      expect(fn(NAN).isNaN()).toBe(true);
    }
  });
});

describe('inverse hyperbolic functions', () => {
  test('asinh', () => {
    expect(asinh(ONE).toNumber()).toBeCloseTo(Math.asinh(1), 14);
    expect(asinh(h(-3)).toNumber()).toBeCloseTo(Math.asinh(-3), 14);
    expect(asinh(NEGATIVE_INFINITY)).toBe(NEGATIVE_INFINITY);
    expect(asinh(ZERO)).toBe(ZERO);
  });

  test('acosh', () => {
    expect(acosh(h(2)).toNumber()).toBeCloseTo(Math.acosh(2), 14);
    expect(acosh(ONE)).toBe(ZERO);
    expect(acosh(h(5, -1)).isNaN()).toBe(true);
    expect(acosh(POSITIVE_INFINITY)).toBe(POSITIVE_INFINITY);
  });

  test('atanh', () => {
    expect(atanh(h(5, -1)).toNumber()).toBeCloseTo(Math.atanh(0.5), 14);
    expect(atanh(h(-5, -1)).toNumber()).toBeCloseTo(-Math.atanh(0.5), 14);
    expect(atanh(ONE)).toBe(POSITIVE_INFINITY);
    expect(atanh(NEG_ONE)).toBe(NEGATIVE_INFINITY);
    expect(atanh(h(2)).isNaN()).toBe(true);
  });

  test('round trips', () => {
    expect(asinh(sinh(h(3))).toNumber()).toBeCloseTo(3, 13);
    expect(atanh(tanh(h(5, -1))).toNumber()).toBeCloseTo(0.5, 13);
  });
});
