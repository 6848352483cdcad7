import { describe, test, expect } from '@jest/globals';
import { digitCount, pow10, reduce, trailingZeros } from './normalize.js';

describe('pow10', () => {
  test('small and large powers', () => {
    expect(pow10(0)).toBe(1n);
    expect(pow10(3)).toBe(1000n);
    expect(pow10(70)).toBe(10n ** 70n);
  });

  test('rejects negative exponents', () => {
    expect(() => pow10(-1)).toThrow(RangeError);
  });
});

describe('digit helpers', () => {
  test('digitCount ignores sign', () => {
    expect(digitCount(-12345n)).toBe(5);
    expect(digitCount(0n)).toBe(0);
  });

  test('trailingZeros', () => {
    expect(trailingZeros(1200n)).toBe(2);
    expect(trailingZeros(7n)).toBe(0);
    expect(trailingZeros(0n)).toBe(0);
  });
});

describe('reduce', () => {
  test('zero is canonical regardless of exponent', () => {
    expect(reduce(0n, 5)).toEqual({ kind: 'finite', mantissa: 0n, exponent: 0, denominator: 1 });
  });

  test('pulls positive exponents into the mantissa', () => {
    expect(reduce(1n, 3)).toEqual({ kind: 'finite', mantissa: 1000n, exponent: 0, denominator: 1 });
    expect(reduce(1n, 50)).toEqual({ kind: 'finite', mantissa: 10n ** 17n, exponent: 33, denominator: 1 });
  });

  test('pushes trailing zeros out while the exponent is negative', () => {
    expect(reduce(1500n, -2)).toEqual({ kind: 'finite', mantissa: 15n, exponent: 0, denominator: 1 });
    expect(reduce(123n, -5)).toEqual({ kind: 'finite', mantissa: 123n, exponent: -5, denominator: 1 });
  });

  test('truncates wide mantissas toward zero', () => {
    expect(reduce(1234567890123456789012n, 0)).toEqual({
      kind: 'finite',
      mantissa: 123456789012345678n,
      exponent: 4,
      denominator: 1,
    });
    expect(reduce(-1234567890123456789019n, 0)).toEqual({
      kind: 'finite',
      mantissa: -123456789012345678n,
      exponent: 4,
      denominator: 1,
    });
  });

  test('largest exponent is still finite', () => {
    expect(reduce(1n, 32_767 + 17)).toEqual({ kind: 'finite', mantissa: 10n ** 17n, exponent: 32_767, denominator: 1 });
  });

  test('reports overflow with its sign', () => {
    expect(reduce(1n, 32_767 + 18)).toEqual({ kind: 'overflow', negative: false });
    expect(reduce(-1n, 32_767 + 18)).toEqual({ kind: 'overflow', negative: true });
  });

  test('reports underflow when every digit is shifted out', () => {
    expect(reduce(1n, -32_769)).toEqual({ kind: 'underflow', negative: false });
    expect(reduce(-1n, -32_769)).toEqual({ kind: 'underflow', negative: true });
  });

  test('keeps the leading digits of a partially underflowing value', () => {
    expect(reduce(123n, -32_770)).toEqual({ kind: 'finite', mantissa: 1n, exponent: -32_768, denominator: 1 });
    expect(reduce(120n, -32_769)).toEqual({ kind: 'finite', mantissa: 12n, exponent: -32_768, denominator: 1 });
  });
});
