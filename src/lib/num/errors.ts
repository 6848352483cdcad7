/**
 * Errors thrown by the text and JSON collaborators and by `average` on an empty
 * sequence. Numeric operations never throw; they return NaN or a signed
 * Infinity instead.
 */

export class HugeNumberError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HugeNumberError';
  }
}

export type ParseFailureCode =
  | 'empty'
  | 'bad_number'
  | 'bad_exponent'
  | 'bad_denominator'
  | 'bad_suffix'
  | 'bad_sign';

export class HugeNumberParseError extends HugeNumberError {
  constructor(
    message: string,
    public readonly code: ParseFailureCode,
    public readonly input: string,
    public readonly suggestions: string[] = [],
  ) {
    super(message);
    this.name = 'HugeNumberParseError';
  }
}

export class HugeNumberFormatError extends HugeNumberError {
  constructor(message: string, public readonly specifier: string) {
    super(message);
    this.name = 'HugeNumberFormatError';
  }
}

export class HugeNumberSerializationError extends HugeNumberError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'HugeNumberSerializationError';
  }
}
