import { describe, test, expect } from '@jest/globals';
import { SUFFIX_TABLE, lookupSuffix, suffixFor, suggestSuffixes } from './suffix.js';

describe('suffix table', () => {
  test('runs from thousand to centillion', () => {
    expect(SUFFIX_TABLE).toHaveLength(101);
    expect(SUFFIX_TABLE[0]).toEqual({ power: 3, code: 'k', word: 'thousand' });
    expect(SUFFIX_TABLE[SUFFIX_TABLE.length - 1]).toEqual({ power: 303, code: 'ce', word: 'centillion' });
  });

  test('an n-illion is ten to the 3n + 3', () => {
    expect(lookupSuffix('de')?.power).toBe(33);
    expect(lookupSuffix('ude')?.power).toBe(36);
    expect(lookupSuffix('vigintillion')?.power).toBe(63);
    expect(lookupSuffix('uvg')?.power).toBe(66);
  });

  test('lookup ignores case', () => {
    expect(lookupSuffix('QA')?.power).toBe(15);
    expect(lookupSuffix('Million')?.code).toBe('m');
    expect(lookupSuffix('zz')).toBeUndefined();
  });

  test('suffixFor picks the largest unit not above the power', () => {
    expect(suffixFor(5)?.code).toBe('k');
    expect(suffixFor(2)).toBeUndefined();
    expect(suffixFor(1000)?.code).toBe('ce');
  });
});

describe('suggestSuffixes', () => {
  test('closest names first', () => {
    expect(suggestSuffixes('millon')[0]).toBe('million');
  });

  test('nothing within reach', () => {
    expect(suggestSuffixes('zzzzzzzz')).toEqual([]);
  });
});
