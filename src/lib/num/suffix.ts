/**
 * Short-scale suffixes (k → centillion) for compact input and output.
 */

export interface SuffixUnit {
  /** Power of 10 (e.g., 3 for thousand, 303 for centillion) */
  power: number;
  /** Short code (e.g., "k", "qa", "ce") */
  code: string;
  /** Full word (e.g., "thousand", "quadrillion") */
  word: string;
}

const BASIC: Array<[string, string]> = [
  ['k', 'thousand'],
  ['m', 'million'],
  ['b', 'billion'],
  ['t', 'trillion'],
  ['qa', 'quadrillion'],
  ['qi', 'quintillion'],
  ['sx', 'sextillion'],
  ['sp', 'septillion'],
  ['oc', 'octillion'],
  ['no', 'nonillion'],
];

// Latin prefixes for the ones place of an -illion index
const ONES: Array<[string, string]> = [
  ['u', 'un'],
  ['d', 'duo'],
  ['t', 'tre'],
  ['qa', 'quattuor'],
  ['qi', 'quin'],
  ['sx', 'sex'],
  ['sp', 'septen'],
  ['o', 'octo'],
  ['n', 'novem'],
];

// Tens place: decillion (10) through nonagintillion (90)
const TENS: Array<[string, string]> = [
  ['de', 'decillion'],
  ['vg', 'vigintillion'],
  ['tg', 'trigintillion'],
  ['qag', 'quadragintillion'],
  ['qig', 'quinquagintillion'],
  ['sxg', 'sexagintillion'],
  ['spg', 'septuagintillion'],
  ['ocg', 'octogintillion'],
  ['nog', 'nonagintillion'],
];

/** The n-illion is 10^(3n + 3) */
function buildSuffixTable(): SuffixUnit[] {
  const units: SuffixUnit[] = BASIC.map(([code, word], i) => ({ power: 3 * i + 3, code, word }));

  TENS.forEach(([tensCode, tensWord], t) => {
    const base = (t + 1) * 10;
    units.push({ power: 3 * base + 3, code: tensCode, word: tensWord });
    ONES.forEach(([onesCode, onesWord], o) => {
      units.push({ power: 3 * (base + o + 1) + 3, code: onesCode + tensCode, word: onesWord + tensWord });
    });
  });

  units.push({ power: 303, code: 'ce', word: 'centillion' });
  return units.sort((a, b) => a.power - b.power);
}

export const SUFFIX_TABLE: readonly SuffixUnit[] = buildSuffixTable();

const BY_NAME = new Map<string, SuffixUnit>();
for (const u of SUFFIX_TABLE) {
  BY_NAME.set(u.code, u);
  BY_NAME.set(u.word, u);
}

/** Case-insensitive lookup by code or word */
export function lookupSuffix(name: string): SuffixUnit | undefined {
  return BY_NAME.get(name.toLowerCase());
}

/** Largest unit whose power does not exceed `power` */
export function suffixFor(power: number): SuffixUnit | undefined {
  let best: SuffixUnit | undefined;
  for (const u of SUFFIX_TABLE) {
    if (u.power > power) break;
    best = u;
  }
  return best;
}

/**
 * Levenshtein distance for typo detection
 */
function levenshtein(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row.push(Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + cost));
    }
    prev = row;
  }
  return prev[b.length];
}

/** Codes and words within three edits of `input`, closest first */
export function suggestSuffixes(input: string, limit = 5): string[] {
  const needle = input.toLowerCase();
  return [...BY_NAME.keys()]
    .map((w) => ({ w, dist: levenshtein(needle, w) }))
    .filter((x) => x.dist <= 3)
    .sort((a, b) => a.dist - b.dist || a.w.length - b.w.length || a.w.localeCompare(b.w))
    .slice(0, limit)
    .map((x) => x.w);
}
