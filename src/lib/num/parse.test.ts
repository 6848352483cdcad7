/**
 * Tests for text parsing
 */

import { describe, test, expect } from '@jest/globals';
import { HugeNumber } from './HugeNumber.js';
import { HugeNumberParseError } from './errors.js';
import { NUMBER_STYLES, createNumberFormat } from './numberFormat.js';
import { parse, parseStrict, tryParse } from './parse.js';

const h = (mantissa: bigint | number, exponent = 0) => HugeNumber.fromComponents(mantissa, exponent);

describe('parse', () => {
  describe('Decimals', () => {
    test('plain and grouped', () => {
      expect(parse('123.45').toFields()).toEqual({ mantissa: '12345', exponent: -2, denominator: 1 });
      expect(parse('1,234.5').toFields()).toEqual({ mantissa: '12345', exponent: -1, denominator: 1 });
      expect(parse('  42  ').equals(h(42))).toBe(true);
    });

    test('scientific notation', () => {
      expect(parse('3.14e-5').toFields()).toEqual({ mantissa: '314', exponent: -7, denominator: 1 });
      expect(parse('1E+50').equals(h(1, 50))).toBe(true);
    });

    test('wide inputs are truncated to eighteen digits', () => {
      expect(parse('123456789012345678901234').toFields()).toEqual({
        mantissa: '123456789012345678',
        exponent: 6,
        denominator: 1,
      });
    });

    test('out-of-range exponents saturate', () => {
      expect(parse('1e99999')).toBe(HugeNumber.POSITIVE_INFINITY);
      expect(parse('-1e99999')).toBe(HugeNumber.NEGATIVE_INFINITY);
      expect(parse('1e-99999')).toBe(HugeNumber.ZERO);
    });

    test('negative zero', () => {
      expect(parse('-0')).toBe(HugeNumber.NEGATIVE_ZERO);
      expect(parse('0.000')).toBe(HugeNumber.ZERO);
    });
  });

  describe('Signs and symbols', () => {
    test('parentheses, trailing sign and currency', () => {
      expect(parse('(5)').equals(h(-5))).toBe(true);
      expect(parse('5-').equals(h(-5))).toBe(true);
      expect(parse('¤5').equals(h(5))).toBe(true);
      expect(parse('-¤5').equals(h(-5))).toBe(true);
    });

    test('conflicting signs', () => {
      const result = tryParse('-5-');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.code).toBe('bad_sign');
    });

    test('NaN and infinity symbols', () => {
      expect(parse('NaN').isNaN()).toBe(true);
      expect(parse('infinity')).toBe(HugeNumber.POSITIVE_INFINITY);
      expect(parse('-Infinity')).toBe(HugeNumber.NEGATIVE_INFINITY);
      expect(parse('+Infinity')).toBe(HugeNumber.POSITIVE_INFINITY);
    });

    test('culture-specific separators', () => {
      const info = createNumberFormat({ decimalSeparator: ',', groupSeparator: '.' });
      expect(parse('1.234,5', undefined, info).equals(h(12345, -1))).toBe(true);
    });
  });

  describe('Fractions', () => {
    test('stay exact', () => {
      expect(parse('1/3').toFields()).toEqual({ mantissa: '1', exponent: 0, denominator: 3 });
      expect(parse('-2/6').toFields()).toEqual({ mantissa: '-1', exponent: 0, denominator: 3 });
    });

    test('reject a bad denominator', () => {
      for (const text of ['1/0', '1/70000', '1/x']) {
        const result = tryParse(text);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.code).toBe('bad_denominator');
      }
    });

    test('can be switched off', () => {
      expect(parse('1/2', { allowFraction: false }).isNaN()).toBe(true);
    });
  });

  describe('Suffixes', () => {
    test('short codes and words', () => {
      expect(parse('1.5k', NUMBER_STYLES.amount).equals(h(1500))).toBe(true);
      expect(parse('2qa', NUMBER_STYLES.amount).equals(h(2, 15))).toBe(true);
      expect(parse('1.5 million', NUMBER_STYLES.amount).equals(h(15, 5))).toBe(true);
    });

    test('are off by default', () => {
      expect(parse('1.5k').isNaN()).toBe(true);
    });

    test('unknown suffixes come with suggestions', () => {
      const result = tryParse('12millon', NUMBER_STYLES.amount);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.code).toBe('bad_suffix');
        expect(result.suggestions[0]).toBe('million');
      }
    });
  });

  describe('Failures', () => {
    test('empty input', () => {
      for (const text of ['', '   ']) {
        const result = tryParse(text);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.code).toBe('empty');
      }
    });

    test('malformed numbers yield NaN', () => {
      const result = tryParse('abc');
      expect(result.ok).toBe(false);
      expect(result.value.isNaN()).toBe(true);
      if (!result.ok) expect(result.code).toBe('bad_number');
    });

    test('malformed exponent', () => {
      const result = tryParse('1e');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.code).toBe('bad_exponent');
    });

    test('styles restrict the accepted forms', () => {
      expect(parse('1.5', NUMBER_STYLES.integer).isNaN()).toBe(true);
      expect(parse('15', NUMBER_STYLES.integer).equals(h(15))).toBe(true);
    });

    test('parseStrict throws', () => {
      expect(() => parseStrict('abc')).toThrow(HugeNumberParseError);
      try {
        parseStrict('abc');
      } catch (e) {
        expect(e).toBeInstanceOf(HugeNumberParseError);
        if (e instanceof HugeNumberParseError) {
          expect(e.code).toBe('bad_number');
          expect(e.input).toBe('abc');
        }
      }
      expect(parseStrict('5').equals(h(5))).toBe(true);
    });
  });
});
