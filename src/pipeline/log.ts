/* Lightweight structured logger with step timing & ETA */
import { performance } from 'perf_hooks';
import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';
export type LogMeta = Record<string, unknown>;

interface InternalConfig {
  format: LogFormat;
  progressIntervalMs: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';
const config: InternalConfig = {
  format: 'json',
  progressIntervalMs: 1500,
};

export function setLogLevel(l: LogLevel) {
  currentLevel = l;
}

export function setLogFormat(f: LogFormat) {
  config.format = f;
}

export function isLogLevel(s: string): s is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, s);
}

export function levelOrder(l: LogLevel): number {
  return LEVEL_ORDER[l];
}

function ts() { return new Date().toISOString(); }

export interface StepTimer {
  end: () => void;
  eta: (done: number, total: number) => void;
}

function color(level: LogLevel, s: string) {
  if (config.format !== 'pretty') return s;
  const map: Record<LogLevel, string> = {
    debug: '\u001b[90m',
    info: '\u001b[36m',
    warn: '\u001b[33m',
    error: '\u001b[31m',
  };
  const reset = '\u001b[0m';
  return map[level] + s + reset;
}

const lastProgress: Record<string, number> = {};
let logFileFd: number | null = null;

/**
 * Mirror every emitted line (as JSON) into `filePath`. Replaces any previous file.
 */
export function setLogFile(filePath: string) {
  closeLogFile();
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    logFileFd = fs.openSync(filePath, 'a');
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error('Failed to open log file', filePath, e);
  }
}

export function closeLogFile() {
  if (logFileFd !== null) {
    fs.closeSync(logFileFd);
    logFileFd = null;
  }
}

export function log(level: LogLevel, msg: string, meta?: LogMeta) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  const payload: LogMeta = { t: ts(), level, msg, ...(meta || {}) };
  const line = JSON.stringify(payload);
  if (config.format === 'json') {
    // eslint-disable-next-line no-console
    console.log(line);
  } else {
    const base = `${payload.t} ${level.toUpperCase()} ${msg}`;
    const metaStr = meta && Object.keys(meta).length ? ' ' + JSON.stringify(meta) : '';
    // eslint-disable-next-line no-console
    console.log(color(level, base) + metaStr);
  }
  if (logFileFd !== null) {
    fs.writeSync(logFileFd, line + '\n');
  }
}

export function shouldEmitProgress(key: string) {
  const now = performance.now();
  const last = lastProgress[key] || 0;
  if (now - last < config.progressIntervalMs) return false;
  lastProgress[key] = now;
  return true;
}

export function debug(msg: string, meta?: LogMeta) {
  log('debug', msg, meta);
}
export function info(msg: string, meta?: LogMeta) {
  log('info', msg, meta);
}
export function warn(msg: string, meta?: LogMeta) {
  log('warn', msg, meta);
}
export function error(msg: string, meta?: LogMeta) {
  log('error', msg, meta);
}

export function startStep(name: string, meta?: LogMeta): StepTimer {
  const start = performance.now();
  info(`start:${name}`, meta);
  return {
    end: () => {
      const durMs = performance.now() - start;
      info(`end:${name}`, { ms: Math.round(durMs), ...meta });
    },
    eta: (done: number, total: number) => {
      if (total <= 0) return;
      const elapsed = performance.now() - start;
      const rate = done > 0 ? elapsed / done : 0;
      const remaining = done > 0 ? rate * (total - done) : 0;
      if (done === total || shouldEmitProgress(name)) {
        info(`progress:${name}`, {
          done,
          total,
          pct: Number(((done / total) * 100).toFixed(2)),
          etaMs: Math.round(remaining),
        });
      }
    },
  };
}
