/**
 * Representation bounds shared by the normalizer and the arithmetic engine.
 */

/** Significant decimal digits a mantissa may hold */
export const MANTISSA_SIGNIFICANT_DIGITS = 18;

/** Largest mantissa magnitude (eighteen nines) */
export const MAX_MANTISSA = 999_999_999_999_999_999n;

export const MAX_EXPONENT = 32_767;
export const MIN_EXPONENT = -32_768;

/** Largest denominator an exact rational may carry */
export const MAX_DENOMINATOR = 65_535;

/** Exponent shared by the NaN and Infinity sentinels; outside the finite range */
export const SENTINEL_EXPONENT = MAX_EXPONENT + 1;

/** Mantissa of +Infinity; one past the largest legal mantissa */
export const INFINITE_MANTISSA = MAX_MANTISSA + 1n;

/** Products of two mantissas must stay under this for the exact path */
export const INT64_MAX = 9_223_372_036_854_775_807n;

/** Range of the 128-bit intermediate used by the decimal fallback path */
export const WIDE_MAX = (1n << 128n) - 1n;

/** Significant digits kept when a rational is widened for the fallback path */
export const WIDE_RATIONAL_DIGITS = 20;

/** Extra quotient digits produced by long division before truncation */
export const LONG_DIVISION_DIGITS = 20;
