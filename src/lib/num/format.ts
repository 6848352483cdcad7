/**
 * HugeNumber → text.
 *
 * Specifiers (case of the letter sets the exponent marker case):
 * - G: general, shortest round-trip text; fractions print as "numerator/denominator"
 * - R: round-trip without switching small and mid-sized values to scientific form
 * - E: scientific with `precision` fraction digits (default 6)
 * - F: fixed-point (default 2), N: fixed with group separators (default 2)
 * - P: percent (default 2), C: currency (default 2)
 * - S: short-scale suffix ("1.23qa"), `precision` significant figures (default 3)
 */

import { HugeNumber } from './HugeNumber.js';
import { HugeNumberFormatError } from './errors.js';
import { MANTISSA_SIGNIFICANT_DIGITS } from './limits.js';
import { INVARIANT_FORMAT, type NumberFormatInfo } from './numberFormat.js';
import { roundToScale } from './rounding.js';
import { suffixFor } from './suffix.js';

interface Digits {
  negative: boolean;
  /** |mantissa| as decimal digits */
  digits: string;
  exponent: number;
}

function decimalDigits(value: HugeNumber): Digits {
  const decimal = value.toDecimal();
  const magnitude = decimal.mantissa < 0n ? -decimal.mantissa : decimal.mantissa;
  return {
    negative: value.isNegative(),
    digits: magnitude.toString(),
    exponent: decimal.isZero() ? 0 : decimal.exponent,
  };
}

/**
 * Insert a group separator every three digits
 */
function addThousandsSeparators(s: string, separator: string): string {
  return s.replace(/\B(?=(\d{3})+(?!\d))/g, separator);
}

/** Keep `keep` significant digits, rounding half away from zero */
function roundDigits(d: Digits, keep: number): Digits {
  if (d.digits.length <= keep) return d;
  let head = BigInt(d.digits.slice(0, keep));
  if (d.digits.charCodeAt(keep) >= 53 /* '5' */) head += 1n;
  let exponent = d.exponent + d.digits.length - keep;
  let digits = head.toString();
  if (digits.length > keep) {
    // 999 rounded up to 1000
    digits = digits.slice(0, keep);
    exponent++;
  }
  const trimmed = digits.replace(/0+$/, '');
  return { negative: d.negative, digits: trimmed, exponent: exponent + digits.length - trimmed.length };
}

function fixed(digits: string, exponent: number, info: NumberFormatInfo, grouped: boolean, minFraction = 0): string {
  let integer: string;
  let fraction: string;
  if (exponent >= 0) {
    integer = digits + '0'.repeat(exponent);
    fraction = '';
  } else {
    const point = digits.length + exponent;
    integer = point > 0 ? digits.slice(0, point) : '0';
    fraction = point > 0 ? digits.slice(point) : '0'.repeat(-point) + digits;
  }
  if (grouped) integer = addThousandsSeparators(integer, info.groupSeparator);
  fraction = fraction.padEnd(minFraction, '0');
  return fraction ? `${integer}${info.decimalSeparator}${fraction}` : integer;
}

function scientific(digits: string, adjusted: number, marker: string, info: NumberFormatInfo, minExponentDigits = 1, minFraction = 0): string {
  const lead = digits[0];
  const rest = digits.slice(1).padEnd(minFraction, '0');
  const mantissa = rest ? `${lead}${info.decimalSeparator}${rest}` : lead;
  const sign = adjusted < 0 ? info.negativeSign : info.positiveSign;
  return `${mantissa}${marker}${sign}${String(Math.abs(adjusted)).padStart(minExponentDigits, '0')}`;
}

function general(d: Digits, marker: string, info: NumberFormatInfo, roundTrip: boolean): string {
  const adjusted = d.exponent + d.digits.length - 1;
  const useScientific = roundTrip
    ? d.exponent > 0 || d.exponent < -MANTISSA_SIGNIFICANT_DIGITS
    : d.exponent > 0 || adjusted < -5;
  const sign = d.negative ? info.negativeSign : '';
  if (useScientific) return sign + scientific(d.digits.replace(/(\d)0+$/, '$1'), adjusted, marker, info);
  return sign + fixed(d.digits, d.exponent, info, false);
}

function generalWithFraction(value: HugeNumber, marker: string, info: NumberFormatInfo, roundTrip: boolean): string {
  const magnitude = value.mantissa < 0n ? -value.mantissa : value.mantissa;
  const numerator = general(
    { negative: value.isNegative(), digits: magnitude.toString(), exponent: value.isZero() ? 0 : value.exponent },
    marker,
    info,
    roundTrip,
  );
  return value.denominator === 1 ? numerator : `${numerator}/${value.denominator}`;
}

function fixedPoint(value: HugeNumber, precision: number, info: NumberFormatInfo, grouped: boolean): string {
  const rounded = roundToScale(value, precision, 'awayFromZero');
  const d = decimalDigits(rounded);
  const sign = d.negative ? info.negativeSign : '';
  if (rounded.isZero()) return sign + fixed('0', 0, info, grouped, precision);
  return sign + fixed(d.digits, d.exponent, info, grouped, precision);
}

function shortScale(value: HugeNumber, sigFigs: number, info: NumberFormatInfo): string {
  if (value.isZero()) return '0';
  const d = decimalDigits(value);
  const sign = d.negative ? info.negativeSign : '';
  const adjusted = d.exponent + d.digits.length - 1;
  const unit = suffixFor(adjusted);

  if (!unit) {
    // Below one thousand: at most two decimals
    const small = decimalDigits(roundToScale(value.abs(), 2, 'awayFromZero'));
    return sign + fixed(small.digits, small.exponent, info, false);
  }
  if (adjusted - unit.power >= 3) {
    // Past the last suffix
    const r = roundDigits(d, sigFigs);
    return sign + scientific(r.digits, r.exponent + r.digits.length - 1, 'e', info);
  }

  const quotient = Number(`${d.digits}e${d.exponent - unit.power}`);
  let decimals: number;
  if (quotient < 10) {
    decimals = Math.min(sigFigs - 1, 2);
  } else if (quotient < 100) {
    decimals = Math.min(sigFigs - 2, 1);
  } else {
    decimals = 0;
  }
  const text = quotient.toFixed(Math.max(0, decimals)).replace('.', info.decimalSeparator);
  return sign + text + unit.code;
}

const SPECIFIER = /^([A-Za-z])(\d{0,2})$/;

/**
 * Format `value` with a specifier such as "G", "E10" or "N2".
 * @throws HugeNumberFormatError for an unknown specifier
 */
export function format(value: HugeNumber, specifier = 'G', info: NumberFormatInfo = INVARIANT_FORMAT): string {
  const match = SPECIFIER.exec(specifier);
  if (!match) {
    throw new HugeNumberFormatError(`Invalid format specifier "${specifier}"`, specifier);
  }
  const letter = match[1];
  const precision = match[2] === '' ? undefined : Number(match[2]);
  const marker = letter === letter.toUpperCase() ? 'E' : 'e';

  switch (value.kind) {
    case 'nan':
      return info.nanSymbol;
    case 'positiveInfinity':
      return info.positiveInfinitySymbol;
    case 'negativeInfinity':
      return info.negativeInfinitySymbol;
    case 'finite':
      break;
  }

  switch (letter.toUpperCase()) {
    case 'G':
      if (precision === undefined) return generalWithFraction(value, marker, info, false);
      return general(roundDigits(decimalDigits(value), Math.max(1, precision)), marker, info, false);
    case 'R':
      return generalWithFraction(value, marker, info, true);
    case 'E': {
      const keep = (precision ?? 6) + 1;
      const d = roundDigits(decimalDigits(value), keep);
      const adjusted = d.exponent + d.digits.length - 1;
      const sign = d.negative ? info.negativeSign : '';
      return sign + scientific(d.digits, adjusted, marker, info, 3, keep - 1);
    }
    case 'F':
      return fixedPoint(value, precision ?? 2, info, false);
    case 'N':
      return fixedPoint(value, precision ?? 2, info, true);
    case 'P':
      return fixedPoint(value.mul(100), precision ?? 2, info, true) + info.percentSymbol;
    case 'C': {
      const body = fixedPoint(value.abs(), precision ?? 2, info, true);
      return (value.isNegative() ? info.negativeSign : '') + info.currencySymbol + body;
    }
    case 'S':
      return shortScale(value, Math.max(1, precision ?? 3), info);
    default:
      throw new HugeNumberFormatError(`Unknown format specifier "${specifier}"`, specifier);
  }
}
