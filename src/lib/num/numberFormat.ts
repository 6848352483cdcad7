/**
 * Culture bundle and style flags shared by parsing and formatting.
 */

import { z } from 'zod';

export interface NumberFormatInfo {
  negativeSign: string;
  positiveSign: string;
  decimalSeparator: string;
  groupSeparator: string;
  currencySymbol: string;
  percentSymbol: string;
  nanSymbol: string;
  positiveInfinitySymbol: string;
  negativeInfinitySymbol: string;
}

const formatInfoSchema = z
  .object({
    negativeSign: z.string().min(1),
    positiveSign: z.string().min(1),
    decimalSeparator: z.string().min(1),
    groupSeparator: z.string().min(1),
    currencySymbol: z.string().min(1),
    percentSymbol: z.string().min(1),
    nanSymbol: z.string().min(1),
    positiveInfinitySymbol: z.string().min(1),
    negativeInfinitySymbol: z.string().min(1),
  })
  .strict()
  .refine((info) => info.decimalSeparator !== info.groupSeparator, {
    message: 'decimal and group separators must differ',
    path: ['groupSeparator'],
  });

export const INVARIANT_FORMAT: Readonly<NumberFormatInfo> = Object.freeze({
  negativeSign: '-',
  positiveSign: '+',
  decimalSeparator: '.',
  groupSeparator: ',',
  currencySymbol: '¤',
  percentSymbol: '%',
  nanSymbol: 'NaN',
  positiveInfinitySymbol: 'Infinity',
  negativeInfinitySymbol: '-Infinity',
});

/**
 * Invariant settings with `overrides` applied.
 * @throws ZodError when a symbol is empty or the separators collide
 */
export function createNumberFormat(overrides: Partial<NumberFormatInfo> = {}): NumberFormatInfo {
  return formatInfoSchema.parse({ ...INVARIANT_FORMAT, ...overrides });
}

function partOf(locale: string, value: number, type: Intl.NumberFormatPartTypes, options?: Intl.NumberFormatOptions): string | undefined {
  return new Intl.NumberFormat(locale, options).formatToParts(value).find((p) => p.type === type)?.value;
}

/** Symbols for a BCP 47 locale, read from Intl.NumberFormat */
export function numberFormatForLocale(locale: string): NumberFormatInfo {
  const negativeSign = partOf(locale, -1, 'minusSign') ?? INVARIANT_FORMAT.negativeSign;
  const infinity = partOf(locale, Infinity, 'infinity') ?? INVARIANT_FORMAT.positiveInfinitySymbol;
  return createNumberFormat({
    negativeSign,
    positiveSign: partOf(locale, 1, 'plusSign', { signDisplay: 'always' }) ?? INVARIANT_FORMAT.positiveSign,
    decimalSeparator: partOf(locale, 1.5, 'decimal') ?? INVARIANT_FORMAT.decimalSeparator,
    groupSeparator: partOf(locale, 1234567, 'group', { useGrouping: true }) ?? INVARIANT_FORMAT.groupSeparator,
    percentSymbol: partOf(locale, 0.5, 'percentSign', { style: 'percent' }) ?? INVARIANT_FORMAT.percentSymbol,
    nanSymbol: partOf(locale, NaN, 'nan') ?? INVARIANT_FORMAT.nanSymbol,
    positiveInfinitySymbol: infinity,
    negativeInfinitySymbol: `${negativeSign}${infinity}`,
  });
}

// ============================================================================
// Styles
// ============================================================================

export interface NumberStyles {
  allowLeadingWhite: boolean;
  allowTrailingWhite: boolean;
  allowLeadingSign: boolean;
  allowTrailingSign: boolean;
  allowParentheses: boolean;
  allowDecimalPoint: boolean;
  allowThousands: boolean;
  allowExponent: boolean;
  allowCurrencySymbol: boolean;
  /** `numerator/denominator` with a denominator up to 65535 */
  allowFraction: boolean;
  /** Short-scale suffixes such as k, m, qa and ce */
  allowSuffix: boolean;
}

const NONE: NumberStyles = {
  allowLeadingWhite: false,
  allowTrailingWhite: false,
  allowLeadingSign: false,
  allowTrailingSign: false,
  allowParentheses: false,
  allowDecimalPoint: false,
  allowThousands: false,
  allowExponent: false,
  allowCurrencySymbol: false,
  allowFraction: false,
  allowSuffix: false,
};

const INTEGER: NumberStyles = {
  ...NONE,
  allowLeadingWhite: true,
  allowTrailingWhite: true,
  allowLeadingSign: true,
};

const FLOAT: NumberStyles = {
  ...INTEGER,
  allowDecimalPoint: true,
  allowExponent: true,
  allowFraction: true,
};

export const NUMBER_STYLES = {
  none: NONE,
  integer: INTEGER,
  float: FLOAT,
  number: { ...INTEGER, allowTrailingSign: true, allowDecimalPoint: true, allowThousands: true, allowFraction: true },
  currency: {
    ...INTEGER,
    allowTrailingSign: true,
    allowParentheses: true,
    allowDecimalPoint: true,
    allowThousands: true,
    allowCurrencySymbol: true,
  },
  any: {
    ...FLOAT,
    allowTrailingSign: true,
    allowParentheses: true,
    allowThousands: true,
    allowCurrencySymbol: true,
  },
  amount: { ...FLOAT, allowThousands: true, allowSuffix: true },
} satisfies Record<string, NumberStyles>;

/** `styles` over the `any` preset */
export function resolveStyles(styles: Partial<NumberStyles> = {}): NumberStyles {
  return { ...NUMBER_STYLES.any, ...styles };
}
