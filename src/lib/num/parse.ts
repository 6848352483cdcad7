/**
 * Text → HugeNumber.
 *
 * Accepts plain and grouped decimals ("1,234.5"), scientific notation ("3.14e-5"),
 * exact fractions ("1/3"), short-scale suffixes ("1.5k", "2qa") and the NaN and
 * Infinity symbols of the active format. Which of those are allowed is set by
 * {@link NumberStyles}.
 */

import { HugeNumber } from './HugeNumber.js';
import { HugeNumberParseError, type ParseFailureCode } from './errors.js';
import { MAX_DENOMINATOR } from './limits.js';
import {
  INVARIANT_FORMAT,
  resolveStyles,
  type NumberFormatInfo,
  type NumberStyles,
} from './numberFormat.js';
import { lookupSuffix, suggestSuffixes } from './suffix.js';

export type ParseResult =
  | { ok: true; value: HugeNumber }
  | {
      ok: false;
      /** Always NaN */
      value: HugeNumber;
      code: ParseFailureCode;
      message: string;
      suggestions: string[];
    };

interface Body {
  mantissa: bigint;
  exponent: number;
  denominator: bigint;
}

class Failure {
  constructor(
    readonly code: ParseFailureCode,
    readonly message: string,
    readonly suggestions: string[] = [],
  ) {}
}

function sameText(a: string, b: string): boolean {
  return a.localeCompare(b, undefined, { sensitivity: 'accent' }) === 0;
}

function stripPrefix(text: string, prefix: string): string | null {
  return text.startsWith(prefix) ? text.slice(prefix.length) : null;
}

function stripSuffix(text: string, suffix: string): string | null {
  return text.endsWith(suffix) ? text.slice(0, text.length - suffix.length) : null;
}

function parseExponent(text: string, info: NumberFormatInfo): number | Failure {
  let normalized = text;
  if (normalized.startsWith(info.negativeSign)) normalized = '-' + normalized.slice(info.negativeSign.length);
  else if (normalized.startsWith(info.positiveSign)) normalized = normalized.slice(info.positiveSign.length);
  if (!/^[+-]?\d+$/.test(normalized)) {
    return new Failure('bad_exponent', `Invalid exponent "${text}"`);
  }
  const exponent = Number(normalized);
  if (!Number.isSafeInteger(exponent)) {
    return new Failure('bad_exponent', `Exponent "${text}" is out of range`);
  }
  return exponent;
}

/** Digits, separators, exponent, suffix and fraction; signs are already gone */
function parseBody(text: string, styles: NumberStyles, info: NumberFormatInfo): Body | Failure {
  let numerator = text;
  let denominator = 1n;

  if (styles.allowFraction) {
    const slash = text.indexOf('/');
    if (slash >= 0) {
      const denText = text.slice(slash + 1).trim();
      if (!/^\d+$/.test(denText)) {
        return new Failure('bad_denominator', `Invalid denominator "${denText}"`);
      }
      denominator = BigInt(denText);
      if (denominator === 0n || denominator > BigInt(MAX_DENOMINATOR)) {
        return new Failure('bad_denominator', `Denominator must be between 1 and ${MAX_DENOMINATOR}`);
      }
      numerator = text.slice(0, slash).trim();
    }
  }

  let exponent = 0;

  if (styles.allowSuffix) {
    const match = /^(.*\d)\s*([a-z]+)$/i.exec(numerator);
    if (match) {
      const unit = lookupSuffix(match[2]);
      if (!unit) {
        return new Failure('bad_suffix', `Unknown suffix "${match[2]}"`, suggestSuffixes(match[2]));
      }
      exponent += unit.power;
      numerator = match[1];
    }
  }

  if (styles.allowExponent) {
    const marker = numerator.search(/e/i);
    if (marker >= 0) {
      const parsed = parseExponent(numerator.slice(marker + 1), info);
      if (parsed instanceof Failure) return parsed;
      exponent += parsed;
      numerator = numerator.slice(0, marker);
    }
  }

  let integer = numerator;
  let fraction = '';
  if (styles.allowDecimalPoint) {
    const point = numerator.indexOf(info.decimalSeparator);
    if (point >= 0) {
      integer = numerator.slice(0, point);
      fraction = numerator.slice(point + info.decimalSeparator.length);
    }
  }
  if (styles.allowThousands) {
    integer = integer.split(info.groupSeparator).join('');
  }

  if (!/^\d*$/.test(integer) || !/^\d*$/.test(fraction) || integer.length + fraction.length === 0) {
    return new Failure('bad_number', `Invalid number "${text}"`);
  }

  return {
    mantissa: BigInt(integer + fraction),
    exponent: exponent - fraction.length,
    denominator,
  };
}

function fail(failure: Failure): ParseResult {
  return { ok: false, value: HugeNumber.NAN, ...failure };
}

/**
 * Parse without throwing. Failures carry a reason code and come back with a NaN value.
 */
export function tryParse(
  input: string,
  styles?: Partial<NumberStyles>,
  info: NumberFormatInfo = INVARIANT_FORMAT,
): ParseResult {
  const style = resolveStyles(styles);
  let text = input;
  if (style.allowLeadingWhite) text = text.replace(/^\s+/, '');
  if (style.allowTrailingWhite) text = text.replace(/\s+$/, '');
  if (!text) return fail(new Failure('empty', 'Empty input'));

  if (sameText(text, info.nanSymbol)) return { ok: true, value: HugeNumber.NAN };
  if (sameText(text, info.negativeInfinitySymbol)) return { ok: true, value: HugeNumber.NEGATIVE_INFINITY };
  if (sameText(text, info.positiveInfinitySymbol)) return { ok: true, value: HugeNumber.POSITIVE_INFINITY };

  let negative = false;
  let signed = false;

  if (style.allowParentheses && text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    signed = true;
    text = text.slice(1, -1);
  }

  if (style.allowCurrencySymbol) text = stripPrefix(text, info.currencySymbol) ?? text;

  if (style.allowLeadingSign) {
    const minus = stripPrefix(text, info.negativeSign);
    const plus = minus === null ? stripPrefix(text, info.positiveSign) : null;
    if (minus !== null || plus !== null) {
      if (signed) return fail(new Failure('bad_sign', `Conflicting signs in "${input}"`));
      negative = minus !== null;
      signed = true;
      text = minus ?? plus ?? text;
    }
  }

  if (style.allowCurrencySymbol) text = stripPrefix(text, info.currencySymbol) ?? text;

  if (style.allowTrailingSign) {
    const minus = stripSuffix(text, info.negativeSign);
    const plus = minus === null ? stripSuffix(text, info.positiveSign) : null;
    if (minus !== null || plus !== null) {
      if (signed) return fail(new Failure('bad_sign', `Conflicting signs in "${input}"`));
      negative = minus !== null;
      text = minus ?? plus ?? text;
    }
  }

  if (style.allowCurrencySymbol) text = stripSuffix(text, info.currencySymbol) ?? text;

  if (sameText(text, info.positiveInfinitySymbol)) {
    return { ok: true, value: HugeNumber.signedInfinity(negative) };
  }

  const body = parseBody(text, style, info);
  if (body instanceof Failure) return fail(body);

  if (body.mantissa === 0n) {
    return { ok: true, value: HugeNumber.signedZero(negative) };
  }
  return {
    ok: true,
    value: HugeNumber.fromComponents(negative ? -body.mantissa : body.mantissa, body.exponent, body.denominator),
  };
}

/** Parse, returning NaN for malformed input */
export function parse(input: string, styles?: Partial<NumberStyles>, info?: NumberFormatInfo): HugeNumber {
  return tryParse(input, styles, info).value;
}

/**
 * Parse, throwing on malformed input.
 * @throws HugeNumberParseError with suffix suggestions where they apply
 */
export function parseStrict(input: string, styles?: Partial<NumberStyles>, info?: NumberFormatInfo): HugeNumber {
  const result = tryParse(input, styles, info);
  if (!result.ok) {
    throw new HugeNumberParseError(result.message, result.code, input, result.suggestions);
  }
  return result.value;
}
