import { describe, test, expect } from '@jest/globals';
import { HugeNumber } from './HugeNumber.js';
import { HugeNumberSerializationError } from './errors.js';
import { fromFields, fromJSON, parseWithHugeNumbers, stringifyWithHugeNumbers, toFields } from './json.js';

const h = (mantissa: bigint | number, exponent = 0) => HugeNumber.fromComponents(mantissa, exponent);

describe('fields', () => {
  test('toFields writes the mantissa as a string', () => {
    expect(toFields(HugeNumber.fromFraction(1, 3))).toEqual({ mantissa: '1', exponent: 0, denominator: 3 });
  });

  test('fromFields restores the sentinels and negative zero', () => {
    expect(fromFields({ mantissa: '0', exponent: 32768, denominator: 0 }).isNaN()).toBe(true);
    expect(fromFields({ mantissa: '-1000000000000000000', exponent: 32768, denominator: 0 }))
      .toBe(HugeNumber.NEGATIVE_INFINITY);
    expect(fromFields({ mantissa: '0', exponent: -1, denominator: 1 })).toBe(HugeNumber.NEGATIVE_ZERO);
  });

  test('fromFields canonicalizes', () => {
    expect(fromFields({ mantissa: '1500', exponent: -3, denominator: 1 }).toFields())
      .toEqual({ mantissa: '15', exponent: -1, denominator: 1 });
  });
});

describe('fromJSON', () => {
  test('accepts text, numbers and field objects', () => {
    expect(fromJSON('1/3').equals(HugeNumber.fromFraction(1, 3))).toBe(true);
    expect(fromJSON(2.5).equals(h(25, -1))).toBe(true);
    expect(fromJSON({ mantissa: '15', exponent: -1, denominator: 1 }).equals(h(15, -1))).toBe(true);
  });

  test('malformed text decodes to NaN', () => {
    expect(fromJSON('garbage').isNaN()).toBe(true);
  });

  test('rejects other shapes', () => {
    expect(() => fromJSON(true)).toThrow(HugeNumberSerializationError);
    let caught: unknown;
    try {
      fromJSON({ mantissa: 15, exponent: -1, denominator: 1 });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(HugeNumberSerializationError);
    if (caught instanceof HugeNumberSerializationError) {
      expect(caught.issues[0]).toMatch(/^mantissa: /);
    }
  });

  test('rejects an out-of-range denominator', () => {
    expect(() => fromJSON({ mantissa: '1', exponent: 0, denominator: 70000 })).toThrow(HugeNumberSerializationError);
  });

  test('round-trips through JSON text', () => {
    const values = [h(-12345, -40), HugeNumber.fromFraction(2, 7), HugeNumber.NEGATIVE_ZERO, HugeNumber.POSITIVE_INFINITY];
    for (const value of values) {
      const decoded = HugeNumber.fromJSON(JSON.parse(JSON.stringify(value)));
      expect(decoded.toFields()).toEqual(value.toFields());
    }
  });
});

describe('documents', () => {
  test('stringifyWithHugeNumbers writes bigints and HugeNumbers as strings', () => {
    expect(stringifyWithHugeNumbers({ a: h(15, -1), b: 5n })).toBe('{"a":"1.5","b":"5"}');
  });

  test('parseWithHugeNumbers decodes the named keys only', () => {
    const parsed = parseWithHugeNumbers('{"price":"1/3","qty":2,"note":"x"}', ['price', 'qty']);
    expect(parsed).toEqual({ price: HugeNumber.fromFraction(1, 3), qty: h(2), note: 'x' });
  });
});
