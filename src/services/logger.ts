import fs from 'fs';
import path from 'path';
import { getRuntimeConfig, logLevelRank, LogLevel } from '../config/runtimeConfig';

export interface LogRecord {
  ts: string; // ISO timestamp
  level: LogLevel;
  evt: string; // short event key
  msg?: string;
  url?: string;
  ms?: number;
  data?: unknown;
}

let logFileHandle: fs.WriteStream | null = null;
// Set once the log file has failed; later records go to stderr only.
let fileLoggingDisabled = false;

function loggingCfg(){
  return getRuntimeConfig().logging;
}

// Opened lazily on the first emitted record when HARVEST_LOG_FILE is set.
function initializeFileLogging(): void {
  const logFile = loggingCfg().file;
  if(!logFile || logFileHandle || fileLoggingDisabled) return;

  try {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
    const stream = fs.createWriteStream(logFile, { flags: 'a', encoding: 'utf8' });
    // open and write failures arrive asynchronously
    stream.on('error', err => {
      console.error(`[logger] log file write failed: ${err}`);
      fileLoggingDisabled = true;
      if(logFileHandle === stream) logFileHandle = null;
    });
    logFileHandle = stream;
    logFileHandle.write(`\n=== Harvester session started: ${new Date().toISOString()} pid=${process.pid} ===\n`);

    process.on('exit', () => {
      if(logFileHandle && !logFileHandle.destroyed){
        logFileHandle.write(`=== Session ended: ${new Date().toISOString()} ===\n\n`);
        logFileHandle.end();
      }
    });
  } catch(error){
    console.error(`[logger] Failed to initialize file logging to ${logFile}: ${error}`);
    fileLoggingDisabled = true;
  }
}

export function formatRecord(rec: LogRecord, json: boolean): string {
  if(json) return JSON.stringify(rec);
  const parts = [rec.ts, rec.level.toUpperCase(), rec.evt, rec.msg || ''];
  if(rec.url) parts.push(`[${rec.url}]`);
  if(rec.ms !== undefined) parts.push(`${rec.ms}ms`);
  if(rec.data !== undefined) parts.push(JSON.stringify(rec.data));
  return parts.filter(Boolean).join(' ');
}

function emit(rec: LogRecord){
  const cfg = loggingCfg();
  if(logLevelRank(rec.level) > logLevelRank(cfg.level)) return;
  if(!logFileHandle && cfg.file && !fileLoggingDisabled) initializeFileLogging();

  const line = formatRecord(rec, cfg.json);
  // stdout is reserved for operator-facing results
  console.error(line);

  if(logFileHandle && !logFileHandle.destroyed){
    try {
      logFileHandle.write(line + '\n');
      if(cfg.sync){
        const fd = (logFileHandle as unknown as { fd?: number }).fd;
        if(typeof fd === 'number') fs.fsyncSync(fd);
      }
    } catch(err){
      console.error(`[logger] log file write failed: ${err}`);
    }
  }
}

export function log(level: LogLevel, evt: string, fields: Omit<LogRecord, 'level' | 'evt' | 'ts'> = {}){
  emit({ ts: new Date().toISOString(), level, evt, ...fields });
}

export const logDebug = (evt: string, f?: unknown) => log('debug', evt, { data: f });
export const logInfo = (evt: string, f?: unknown) => log('info', evt, { data: f });
export const logWarn = (evt: string, f?: unknown) => log('warn', evt, { data: f });
export const logError = (evt: string, f?: unknown) => log('error', evt, { data: f });
