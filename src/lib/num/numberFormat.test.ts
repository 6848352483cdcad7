import { describe, test, expect } from '@jest/globals';
import { ZodError } from 'zod';
import {
  INVARIANT_FORMAT,
  NUMBER_STYLES,
  createNumberFormat,
  numberFormatForLocale,
  resolveStyles,
} from './numberFormat.js';

describe('NumberFormatInfo', () => {
  test('invariant settings are frozen', () => {
    expect(Object.isFrozen(INVARIANT_FORMAT)).toBe(true);
    expect(INVARIANT_FORMAT.decimalSeparator).toBe('.');
  });

  test('overrides are validated', () => {
    expect(createNumberFormat({ currencySymbol: '$' }).currencySymbol).toBe('$');
    expect(() => createNumberFormat({ decimalSeparator: ',' })).toThrow(ZodError);
    expect(() => createNumberFormat({ nanSymbol: '' })).toThrow(ZodError);
  });

  test('locale symbols', () => {
    const de = numberFormatForLocale('de-DE');
    expect(de.decimalSeparator).toBe(',');
    expect(de.groupSeparator).toBe('.');
    expect(numberFormatForLocale('en-US').decimalSeparator).toBe('.');
  });
});

describe('NumberStyles', () => {
  test('partial styles extend the any preset', () => {
    const styles = resolveStyles({ allowSuffix: true });
    expect(styles.allowSuffix).toBe(true);
    expect(styles.allowExponent).toBe(true);
  });

  test('presets', () => {
    expect(NUMBER_STYLES.integer.allowDecimalPoint).toBe(false);
    expect(NUMBER_STYLES.amount.allowSuffix).toBe(true);
    expect(NUMBER_STYLES.any.allowSuffix).toBe(false);
  });
});
