import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ZodError } from 'zod';
import { configure, getConfig, loadConfig, resetConfigCache } from '../src/config/index.js';

const TEST_CONFIG_FILE = path.join(os.tmpdir(), `hugenum-config-${process.pid}.json`);

describe('Runtime config', () => {
  beforeEach(() => {
    resetConfigCache();
  });

  afterEach(() => {
    resetConfigCache();
    if (fs.existsSync(TEST_CONFIG_FILE)) {
      fs.unlinkSync(TEST_CONFIG_FILE);
    }
  });

  it('defaults with an empty environment', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'info',
      logPretty: false,
      maxSeriesIterations: 100_000,
      defaultFormat: 'G',
    });
  });

  it('reads HUGENUM_* variables', () => {
    const config = loadConfig({
      HUGENUM_LOG_LEVEL: 'debug',
      HUGENUM_LOG_PRETTY: 'yes',
      HUGENUM_MAX_SERIES_ITERATIONS: '500',
      HUGENUM_FORMAT: 'E3',
    });
    expect(config.logLevel).toBe('debug');
    expect(config.logPretty).toBe(true);
    expect(config.maxSeriesIterations).toBe(500);
    expect(config.defaultFormat).toBe('E3');
  });

  it('falls back to LOG_LEVEL and ignores a bad one', () => {
    expect(loadConfig({ LOG_LEVEL: 'warn' }).logLevel).toBe('warn');
    expect(loadConfig({ LOG_LEVEL: 'chatty' }).logLevel).toBe('info');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ HUGENUM_MAX_SERIES_ITERATIONS: '-3' })).toThrow(ZodError);
    expect(() => loadConfig({ HUGENUM_FORMAT: 'bad!' })).toThrow(ZodError);
    expect(() => loadConfig({ HUGENUM_LOG_PRETTY: 'maybe' })).toThrow(ZodError);
  });

  it('layers the config file under the environment', () => {
    fs.writeFileSync(TEST_CONFIG_FILE, JSON.stringify({ defaultFormat: 'F2', maxSeriesIterations: 42 }));
    const config = loadConfig({ HUGENUM_CONFIG: TEST_CONFIG_FILE, HUGENUM_FORMAT: 'N0' });
    expect(config.defaultFormat).toBe('N0');
    expect(config.maxSeriesIterations).toBe(42);
  });

  it('rejects unknown keys in the config file', () => {
    fs.writeFileSync(TEST_CONFIG_FILE, JSON.stringify({ precision: 40 }));
    expect(() => loadConfig({ HUGENUM_CONFIG: TEST_CONFIG_FILE })).toThrow(ZodError);
  });

  it('configure overrides until reset', () => {
    expect(configure({ maxSeriesIterations: 7 }).maxSeriesIterations).toBe(7);
    expect(getConfig().maxSeriesIterations).toBe(7);
    resetConfigCache();
    expect(getConfig().maxSeriesIterations).toBe(100_000);
  });

  it('configure validates', () => {
    expect(() => configure({ maxSeriesIterations: 0 })).toThrow(ZodError);
  });
});
