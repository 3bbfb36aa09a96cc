/* Structured logger with step timing & per-chunk progress */
import { performance } from 'perf_hooks';
import fs from 'fs';
import path from 'path';

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = 'json' | 'pretty';
export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === 'string' && v in LEVEL_ORDER;
}

interface InternalConfig {
  format: LogFormat;
  progressIntervalMs: number;
}

const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
const config: InternalConfig = {
  format: process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
  progressIntervalMs: Number(process.env.PROGRESS_INTERVAL_MS || 1500),
};

export function setLogLevel(l: LogLevel) {
  currentLevel = l;
}

export function setLogFormat(f: LogFormat) {
  config.format = f;
}

function ts() { return new Date().toISOString(); }

export interface StepTimer {
  end: (extra?: LogMeta) => void;
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
  const payload = { t: ts(), level, msg, ...(meta || {}) };
  const line = JSON.stringify(payload);
  if (config.format === 'json') {
    // Keep stdout free for command output; log lines go to stderr
    process.stderr.write(line + '\n');
  } else {
    const base = `${payload.t} ${level.toUpperCase()} ${msg}`;
    const metaStr = meta && Object.keys(meta).length ? ' ' + JSON.stringify(meta) : '';
    process.stderr.write(color(level, base) + metaStr + '\n');
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
  log("debug", msg, meta);
}
export function info(msg: string, meta?: LogMeta) {
  log("info", msg, meta);
}
export function warn(msg: string, meta?: LogMeta) {
  log("warn", msg, meta);
}
export function error(msg: string, meta?: LogMeta) {
  log("error", msg, meta);
}

export function startStep(name: string, meta?: LogMeta): StepTimer {
  const start = performance.now();
  info(`start:${name}`, meta);
  return {
    end: (extra?: LogMeta) => {
      const durMs = performance.now() - start;
      info(`end:${name}`, { ms: Math.round(durMs), ...meta, ...extra });
    },
    eta: (done: number, total: number) => {
      if (total <= 0) return;
      const elapsed = performance.now() - start;
      const rate = done > 0 ? elapsed / done : 0;
      const remaining = done > 0 ? rate * (total - done) : 0;
      if (shouldEmitProgress(name)) {
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
