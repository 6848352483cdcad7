import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const configSchema = z.object({
  logLevel: z.enum(LOG_LEVELS),
  logPretty: z.boolean(),
  /** Safety valve for the logarithm and exponential series */
  maxSeriesIterations: z.number().int().positive().max(10_000_000),
  /** Format specifier the CLI prints results with */
  defaultFormat: z.string().regex(/^[A-Za-z]\d{0,2}$/, 'format must be a letter and an optional precision'),
}).strict();

export type RuntimeConfig = z.infer<typeof configSchema>;

const DEFAULTS: RuntimeConfig = {
  logLevel: 'info',
  logPretty: false,
  maxSeriesIterations: 100_000,
  defaultFormat: 'G',
};

const boolFromEnv = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off'])
  .transform((v) => v === '1' || v === 'true' || v === 'yes' || v === 'on');

const envSchema = z.object({
  HUGENUM_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional().catch(undefined),
  HUGENUM_LOG_PRETTY: boolFromEnv.optional(),
  HUGENUM_MAX_SERIES_ITERATIONS: z.coerce.number().int().positive().optional(),
  HUGENUM_FORMAT: z.string().optional(),
  HUGENUM_CONFIG: z.string().optional(),
});

let cfg: RuntimeConfig | null = null;
let overrides: Partial<RuntimeConfig> = {};

function readFileConfig(file: string): Partial<RuntimeConfig> {
  const resolved = path.resolve(process.cwd(), file);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  return configSchema.partial().parse(raw);
}

/**
 * Resolve configuration from defaults, an optional JSON file named by
 * HUGENUM_CONFIG, HUGENUM_* variables and programmatic overrides, in that order.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const vars = envSchema.parse(env);
  const fromFile = vars.HUGENUM_CONFIG ? readFileConfig(vars.HUGENUM_CONFIG) : {};
  const fromEnv: Partial<RuntimeConfig> = {};
  const level = vars.HUGENUM_LOG_LEVEL ?? vars.LOG_LEVEL;
  if (level) fromEnv.logLevel = level;
  if (vars.HUGENUM_LOG_PRETTY !== undefined) fromEnv.logPretty = vars.HUGENUM_LOG_PRETTY;
  if (vars.HUGENUM_MAX_SERIES_ITERATIONS !== undefined) {
    fromEnv.maxSeriesIterations = vars.HUGENUM_MAX_SERIES_ITERATIONS;
  }
  if (vars.HUGENUM_FORMAT) fromEnv.defaultFormat = vars.HUGENUM_FORMAT;

  return configSchema.parse({ ...DEFAULTS, ...fromFile, ...fromEnv, ...overrides });
}

/** Cached configuration */
export function getConfig(): RuntimeConfig {
  if (!cfg) cfg = loadConfig();
  return cfg;
}

/** Override settings for the rest of the process */
export function configure(partial: Partial<RuntimeConfig>): RuntimeConfig {
  overrides = { ...overrides, ...configSchema.partial().parse(partial) };
  cfg = null;
  return getConfig();
}

// For testing: drop overrides and the cache
export function resetConfigCache(): void {
  cfg = null;
  overrides = {};
}
