import { describe, it, expect, afterEach } from 'vitest';
import path from 'path';
import { loadRuntimeConfig, parseBooleanEnv, reloadRuntimeConfig, getRuntimeConfig } from '../config/runtimeConfig';

describe('runtime config', () => {
  afterEach(() => {
    delete process.env.HARVEST_LOG_LEVEL;
    delete process.env.HARVEST_LOG_JSON;
    delete process.env.HARVEST_LOG_FILE;
    delete process.env.HARVEST_LOG_SYNC;
    reloadRuntimeConfig();
  });

  it('parses boolean env values', () => {
    expect(parseBooleanEnv('YES')).toBe(true);
    expect(parseBooleanEnv(' off ')).toBe(false);
    expect(parseBooleanEnv('maybe', true)).toBe(true);
    expect(parseBooleanEnv(undefined)).toBe(false);
  });

  it('defaults to human readable info logging without a file', () => {
    expect(loadRuntimeConfig().logging).toEqual({ level: 'info', json: false, sync: false, file: undefined });
  });

  it('reads the logging environment', () => {
    process.env.HARVEST_LOG_LEVEL = 'Debug';
    process.env.HARVEST_LOG_JSON = 'true';
    process.env.HARVEST_LOG_SYNC = '1';
    process.env.HARVEST_LOG_FILE = 'logs/run.log';
    expect(loadRuntimeConfig().logging).toEqual({
      level: 'debug',
      json: true,
      sync: true,
      file: path.resolve(process.cwd(), 'logs/run.log'),
    });
  });

  it('falls back to info for an unknown level', () => {
    process.env.HARVEST_LOG_LEVEL = 'verbose';
    expect(loadRuntimeConfig().logging.level).toBe('info');
  });

  it('caches until reloaded', () => {
    const first = getRuntimeConfig();
    process.env.HARVEST_LOG_JSON = '1';
    expect(getRuntimeConfig()).toBe(first);
    expect(reloadRuntimeConfig().logging.json).toBe(true);
  });
});
