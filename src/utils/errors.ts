// src/utils/errors.ts
import { HugeNumberError, HugeNumberParseError } from '../lib/num/errors.js';

export interface ErrorRecord {
  name: string;
  message: string;
  stack: string;
}

export function shortStack(err: unknown, lines = 3): string {
  const st = err instanceof Error && err.stack ? err.stack : '';
  if (!st) return '';
  return st.split('\n').slice(0, lines + 1).join('\n');
}

export function normalizeError(err: unknown): ErrorRecord {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}

/**
 * One-paragraph description for terminal output. Library errors print their
 * message alone; anything else gets its type and, when verbose, a short stack.
 */
export function formatUserError(command: string, err: unknown, verbose = false): string {
  if (err instanceof HugeNumberParseError) {
    const hint = err.suggestions.length ? `\nDid you mean: ${err.suggestions.join(', ')}?` : '';
    return `${command} failed: ${err.message}${hint}`;
  }
  if (err instanceof HugeNumberError) return `${command} failed: ${err.message}`;

  const info = normalizeError(err);
  const base = `${command} failed (${info.name}): ${info.message}`;
  const stack = verbose ? shortStack(err, 6) : '';
  return stack ? `${base}\n${stack.replaceAll(process.cwd(), '.')}` : base;
}
