import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type Level = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_RANK: Record<Level, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

const testMode = process.env.NODE_ENV === 'test';
const consoleEnabled = testMode ? false : process.env.DEBUG_EDITOR !== '0';
const fileEnabled = testMode ? false : process.env.LOG_TO_FILE !== '0';
const logFile = process.env.LOG_FILE ?? 'logs/editor.log';
const threshold = parseLevel(process.env.LOG_LEVEL) ?? 'DEBUG';
let fileReady = false;

export function parseLevel(raw: string | undefined): Level | undefined {
  const upper = raw?.trim().toUpperCase();
  switch (upper) {
    case 'DEBUG':
    case 'INFO':
    case 'WARN':
    case 'ERROR':
      return upper;
    default:
      return undefined;
  }
}

export function enabled(level: Level, min: Level): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[min];
}

function pad(num: number, size = 2) {
  return num.toString().padStart(size, '0');
}

function localTs() {
  const d = new Date();
  const date = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
  return `${date} ${time}`;
}

function color(level: Level) {
  const reset = '\x1b[0m';
  const colors: Record<Level, string> = {
    INFO: '\x1b[34m', // blue
    DEBUG: '\x1b[95m', // bright magenta
    WARN: '\x1b[33m', // yellow
    ERROR: '\x1b[31m' // red
  };
  return `${colors[level]}[${level}]${reset}`;
}

function serialize(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.stack ?? value.message;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/** One uncolored log line, as written to the log file. */
export function formatFileLine(ts: string, level: Level, scope: string | undefined, args: unknown[]): string {
  const tag = scope ? `[${level}] [${scope}]` : `[${level}]`;
  return `[${ts}] ${tag} ${args.map(serialize).join(' ')}`;
}

function emit(level: Level, scope: string | undefined, args: unknown[]) {
  if (!enabled(level, threshold)) return;
  const ts = localTs();
  if (consoleEnabled) {
    const head = scope ? `[${ts}] ${color(level)} [${scope}]` : `[${ts}] ${color(level)}`;
    const sink = level === 'ERROR' ? console.error : level === 'WARN' ? console.warn : console.log;
    sink(head, ...args);
  }
  if (fileEnabled) {
    if (!fileReady) {
      mkdirSync(dirname(logFile), { recursive: true });
      fileReady = true;
    }
    appendFileSync(logFile, `${formatFileLine(ts, level, scope, args)}\n`, 'utf8');
  }
}

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  /** Logger whose lines carry `[scope]` after the level tag. */
  child: (scope: string) => Logger;
};

function createLogger(scope?: string): Logger {
  return {
    debug: (...args) => emit('DEBUG', scope, args),
    info: (...args) => emit('INFO', scope, args),
    warn: (...args) => emit('WARN', scope, args),
    error: (...args) => emit('ERROR', scope, args),
    child: (name) => createLogger(scope ? `${scope}:${name}` : name)
  };
}

export const logger = createLogger();
