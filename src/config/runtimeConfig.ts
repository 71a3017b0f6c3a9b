/**
 * Runtime configuration loader.
 *
 * Pipeline behaviour is configured only through command-line options (see
 * pipelineDefaults.ts and the cli/ entry points). The environment governs
 * ambient concerns only:
 *
 *  - HARVEST_LOG_LEVEL  error | warn | info | debug (default info)
 *  - HARVEST_LOG_JSON   emit one JSON object per log line (default off)
 *  - HARVEST_LOG_FILE   append log lines to this file as well as stderr
 *  - HARVEST_LOG_SYNC   fsync the log file after every line (default off)
 */
import path from 'path';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggingConfig {
  level: LogLevel;
  json: boolean;
  sync: boolean;
  file?: string;
}

export interface RuntimeConfig {
  logging: LoggingConfig;
}

/**
 * Parse a boolean environment value.
 * Truthy: "1", "true", "yes", "on"; falsy: "0", "false", "no", "off" (case insensitive).
 * Anything else, including an unset variable, yields the default.
 */
export function parseBooleanEnv(envVar: string | undefined, defaultValue = false): boolean {
  if(!envVar) return defaultValue;
  const normalized = envVar.toLowerCase().trim();
  if(['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if(['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return defaultValue;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const value = (raw || '').toLowerCase().trim();
  return isLogLevel(value) ? value : 'info';
}

function parseLoggingConfig(): LoggingConfig {
  const rawFile = process.env.HARVEST_LOG_FILE;
  const file = rawFile && rawFile.trim().length ? path.resolve(process.cwd(), rawFile.trim()) : undefined;
  return {
    level: parseLogLevel(process.env.HARVEST_LOG_LEVEL),
    json: parseBooleanEnv(process.env.HARVEST_LOG_JSON),
    sync: parseBooleanEnv(process.env.HARVEST_LOG_SYNC),
    file,
  };
}

export function loadRuntimeConfig(): RuntimeConfig {
  return {
    logging: parseLoggingConfig(),
  };
}

let _cached: RuntimeConfig | undefined;
export function getRuntimeConfig(): RuntimeConfig {
  if(!_cached) _cached = loadRuntimeConfig();
  return _cached;
}

export function reloadRuntimeConfig(): RuntimeConfig {
  _cached = loadRuntimeConfig();
  return _cached;
}

/** Numeric rank of a level; lower is more severe. */
export function logLevelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}
