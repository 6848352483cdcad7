import { HugeNumber } from '../lib/num/HugeNumber.js';
import * as arithmetic from '../lib/num/arithmetic.js';
import * as comparison from '../lib/num/compare.js';
import * as rounding from '../lib/num/rounding.js';
import * as transcendental from '../lib/num/transcendental.js';
import * as trigonometric from '../lib/num/trigonometric.js';
import * as hyperbolic from '../lib/num/hyperbolic.js';
import { NAMED_CONSTANTS, constantByName } from '../lib/num/constants.js';
import { format } from '../lib/num/format.js';
import { parseStrict } from '../lib/num/parse.js';
import { INVARIANT_FORMAT, NUMBER_STYLES, numberFormatForLocale, type NumberFormatInfo } from '../lib/num/numberFormat.js';
import { loadConfig } from '../config/index.js';
import { withScope } from '../log.js';
import { formatUserError } from '../utils/errors.js';
import { getPalette } from './theme.js';
import { createUi, type Ui } from './ui.js';

export interface CliResult {
  code: number;
  stdout: string;
  stderr: string;
}

interface Flags {
  format?: string;
  locale?: string;
  theme?: string;
  noColor: boolean;
  verbose: boolean;
  help: boolean;
}

type Unary = (a: HugeNumber) => HugeNumber;
type Binary = (a: HugeNumber, b: HugeNumber) => HugeNumber;

const UNARY: Record<string, Unary> = {
  neg: arithmetic.negate,
  abs: arithmetic.abs,
  square: arithmetic.square,
  cube: arithmetic.cube,
  recip: arithmetic.reciprocal,
  sqrt: transcendental.sqrt,
  cbrt: transcendental.cbrt,
  exp: transcendental.exp,
  exp2: transcendental.exp2,
  exp10: transcendental.exp10,
  ln: transcendental.log,
  log2: transcendental.log2,
  log10: transcendental.log10,
  sin: trigonometric.sin,
  cos: trigonometric.cos,
  tan: trigonometric.tan,
  asin: trigonometric.asin,
  acos: trigonometric.acos,
  atan: trigonometric.atan,
  sinh: hyperbolic.sinh,
  cosh: hyperbolic.cosh,
  tanh: hyperbolic.tanh,
  asinh: hyperbolic.asinh,
  acosh: hyperbolic.acosh,
  atanh: hyperbolic.atanh,
  floor: rounding.floor,
  ceil: rounding.ceiling,
  trunc: rounding.truncate,
  decimal: (a) => a.toDecimal(),
};

const BINARY: Record<string, Binary> = {
  add: arithmetic.add,
  sub: arithmetic.subtract,
  mul: arithmetic.multiply,
  div: arithmetic.divide,
  mod: arithmetic.mod,
  rem: arithmetic.ieeeRemainder,
  pow: transcendental.pow,
  hypot: transcendental.hypot,
  atan2: trigonometric.atan2,
  min: comparison.min,
  max: comparison.max,
};

const USAGE = [
  'Usage: hugenum <op> <a> [b] [--format=G] [--locale=xx] [--theme=neo] [--no-color]',
  '       hugenum const [name]',
  '       hugenum fields <a>',
  '',
  `Unary:  ${Object.keys(UNARY).join(' ')}`,
  `Binary: ${Object.keys(BINARY).join(' ')}`,
  'Other:  log <a> [base]  round <a> [digits]  root <a> <n>  cmp <a> <b>  divrem <a> <b>',
];

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function splitArgs(argv: readonly string[]): { positional: string[]; flags: Flags } {
  const positional: string[] = [];
  const flags: Flags = { noColor: false, verbose: false, help: false };
  for (const arg of argv) {
    if (arg === '-h' || arg === '--help') flags.help = true;
    else if (arg === '--no-color') flags.noColor = true;
    else if (arg === '--verbose') flags.verbose = true;
    else if (arg.startsWith('--format=')) flags.format = arg.slice('--format='.length);
    else if (arg.startsWith('--locale=')) flags.locale = arg.slice('--locale='.length);
    else if (arg.startsWith('--theme=')) flags.theme = arg.slice('--theme='.length);
    else if (arg.startsWith('--')) throw new UsageError(`Unknown option ${arg}`);
    else positional.push(arg);
  }
  return { positional, flags };
}

function integerArg(text: string | undefined, label: string): number {
  const n = Number(text);
  if (text === undefined || !Number.isInteger(n)) throw new UsageError(`${label} must be an integer`);
  return n;
}

function operand(positional: readonly string[], index: number, info: NumberFormatInfo): HugeNumber {
  const text = positional[index];
  if (text === undefined) throw new UsageError(`Missing operand ${index}`);
  return parseStrict(text, NUMBER_STYLES.amount, info);
}

function execute(op: string, positional: readonly string[], info: NumberFormatInfo, specifier: string, ui: Ui): void {
  const show = (value: HugeNumber) => ui.say(format(value, specifier, info));
  const arity = positional.length - 1;

  switch (op) {
    case 'const': {
      const name = positional[1];
      if (name === undefined) {
        ui.table([...NAMED_CONSTANTS].map(([key, value]) => ({ name: key, value: format(value, specifier, info) })));
        return;
      }
      const value = constantByName(name);
      if (!value) throw new UsageError(`Unknown constant "${name}"`);
      show(value);
      return;
    }
    case 'fields': {
      const value = operand(positional, 1, info);
      const fields = value.toFields();
      ui.table([{ mantissa: fields.mantissa, exponent: fields.exponent, denominator: fields.denominator, kind: value.kind }]);
      return;
    }
    case 'log':
      show(arity >= 2
        ? transcendental.logBase(operand(positional, 1, info), operand(positional, 2, info))
        : transcendental.log(operand(positional, 1, info)));
      return;
    case 'round':
      show(rounding.round(operand(positional, 1, info), arity >= 2 ? integerArg(positional[2], 'digits') : 0));
      return;
    case 'root':
      show(transcendental.rootN(operand(positional, 1, info), integerArg(positional[2], 'n')));
      return;
    case 'cmp':
      ui.say(String(comparison.compare(operand(positional, 1, info), operand(positional, 2, info))));
      return;
    case 'divrem': {
      const { quotient, remainder } = arithmetic.divRem(operand(positional, 1, info), operand(positional, 2, info));
      show(quotient);
      show(remainder);
      return;
    }
  }

  const unary = UNARY[op];
  if (unary) {
    show(unary(operand(positional, 1, info)));
    return;
  }
  const binary = BINARY[op];
  if (binary) {
    show(binary(operand(positional, 1, info), operand(positional, 2, info)));
    return;
  }
  throw new UsageError(`Unknown operation "${op}"`);
}

/** Run one command; output is returned, not written */
export function run(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliResult {
  const log = withScope('cli');
  let parsed: ReturnType<typeof splitArgs>;
  try {
    parsed = splitArgs(argv);
  } catch (e) {
    const ui = createUi(getPalette(true));
    ui.say(formatUserError('hugenum', e), 'error');
    return { code: 1, stdout: '', stderr: ui.err.join('\n') };
  }

  const { positional, flags } = parsed;
  const noColor = flags.noColor || !!env.NO_COLOR;
  const ui = createUi(getPalette(noColor, flags.theme ?? env.HUGENUM_THEME));
  const done = (code: number): CliResult => ({ code, stdout: ui.out.join('\n'), stderr: ui.err.join('\n') });

  const op = positional[0];
  if (flags.help || op === undefined) {
    for (const line of USAGE) ui.say(line, 'dim');
    return done(flags.help ? 0 : 1);
  }

  try {
    const config = loadConfig(env);
    const info = flags.locale ? numberFormatForLocale(flags.locale) : INVARIANT_FORMAT;
    const specifier = flags.format ?? config.defaultFormat;
    log.debug({ op, args: positional.slice(1), format: specifier }, 'cli command');
    execute(op, positional, info, specifier, ui);
    return done(0);
  } catch (e) {
    log.debug({ op, err: e }, 'cli command failed');
    ui.say(formatUserError(op, e, flags.verbose), 'error');
    return done(1);
  }
}
