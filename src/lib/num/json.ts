/**
 * JSON encoding.
 *
 * `HugeNumber.prototype.toJSON` writes the round-trip text form. Readers also
 * accept plain JSON numbers and the raw field triple.
 */

import { z } from 'zod';
import { HugeNumber } from './HugeNumber.js';
import { HugeNumberSerializationError } from './errors.js';
import { MAX_DENOMINATOR } from './limits.js';
import { parse } from './parse.js';

/** Stored fields with the mantissa as a decimal string */
export interface HugeNumberFields {
  mantissa: string;
  exponent: number;
  denominator: number;
}

export const hugeNumberFieldsSchema = z
  .object({
    mantissa: z.string().regex(/^-?\d+$/, 'mantissa must be an integer string'),
    exponent: z.number().int(),
    denominator: z.number().int().min(0).max(MAX_DENOMINATOR),
  })
  .strict();

export function toFields(value: HugeNumber): HugeNumberFields {
  return {
    mantissa: value.mantissa.toString(),
    exponent: value.exponent,
    denominator: value.denominator,
  };
}

/**
 * Rebuild from stored fields. Denominator 0 restores the sentinel named by the
 * mantissa sign; a zero mantissa with a negative exponent is negative zero.
 */
export function fromFields(fields: HugeNumberFields): HugeNumber {
  const mantissa = BigInt(fields.mantissa);
  if (fields.denominator === 0) {
    return mantissa === 0n ? HugeNumber.NAN : HugeNumber.signedInfinity(mantissa < 0n);
  }
  if (mantissa === 0n) return HugeNumber.signedZero(fields.exponent < 0);
  return HugeNumber.fromComponents(mantissa, fields.exponent, fields.denominator);
}

/**
 * Decode a JSON value: round-trip text, a JSON number or a field triple.
 * Malformed text decodes to NaN, like `parse`.
 * @throws HugeNumberSerializationError for any other shape
 */
export function fromJSON(json: unknown): HugeNumber {
  if (json instanceof HugeNumber) return json;
  if (typeof json === 'string') return parse(json);
  if (typeof json === 'number') return HugeNumber.fromNumber(json);

  const result = hugeNumberFieldsSchema.safeParse(json);
  if (!result.success) {
    throw new HugeNumberSerializationError(
      'Invalid HugeNumber JSON',
      result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return fromFields(result.data);
}

/**
 * JSON.stringify that also writes bigints, as decimal strings
 */
export function stringifyWithHugeNumbers(value: unknown, space?: number): string {
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v), space);
}

/** JSON.parse that decodes the properties named in `keys` as HugeNumbers */
export function parseWithHugeNumbers(text: string, keys: readonly string[]): unknown {
  const wanted = new Set(keys);
  return JSON.parse(text, (key, v: unknown) => (wanted.has(key) && v !== null ? fromJSON(v) : v));
}
