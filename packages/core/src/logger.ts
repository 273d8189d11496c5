/**
 * Simple structured console logger.
 *
 * Call shape follows pino: `logger.info({ plugin: 'x' }, 'message')`.
 * Entries are also kept in a ring buffer and re-emitted on `logEmitter`
 * so an operator surface can stream them.
 */
import { EventEmitter } from 'node:events';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  data: unknown;
  timestamp: string;
}

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_BUFFER_SIZE = 200;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(levels, value);
}

const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

const logBuffer: LogEntry[] = [];

export const logEmitter = new EventEmitter();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function getLogBuffer(): LogEntry[] {
  return [...logBuffer];
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[currentLevel];
}

const SENSITIVE_KEYS = /key|token|secret|password|credential|auth/i;

function maskSensitiveData(obj: unknown): unknown {
  if (typeof obj !== 'object' || obj === null) return obj;
  if (obj instanceof Error) {
    return { name: obj.name, message: obj.message, stack: obj.stack };
  }
  if (Array.isArray(obj)) return obj.map(maskSensitiveData);
  const masked: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (SENSITIVE_KEYS.test(k) && typeof v === 'string') {
      masked[k] = '[REDACTED]';
    } else {
      masked[k] = maskSensitiveData(v);
    }
  }
  return masked;
}

export function formatData(data: unknown): string {
  if (typeof data === 'string') return data;
  if (typeof data === 'object') return JSON.stringify(maskSensitiveData(data));
  return String(data);
}

function record(level: LogLevel, data: unknown, msg?: string): void {
  const entry: LogEntry = {
    level,
    message: msg ?? '',
    data: maskSensitiveData(data),
    timestamp: new Date().toISOString(),
  };
  if (logBuffer.length >= LOG_BUFFER_SIZE) {
    logBuffer.shift();
  }
  logBuffer.push(entry);
  logEmitter.emit('log', entry);
}

export const logger = {
  debug: (data: unknown, msg?: string) => {
    if (shouldLog('debug')) {
      record('debug', data, msg);
      console.log(`[DEBUG] ${msg || ''} ${formatData(data)}`);
    }
  },
  info: (data: unknown, msg?: string) => {
    if (shouldLog('info')) {
      record('info', data, msg);
      console.log(`[INFO] ${msg || ''} ${formatData(data)}`);
    }
  },
  warn: (data: unknown, msg?: string) => {
    if (shouldLog('warn')) {
      record('warn', data, msg);
      console.warn(`[WARN] ${msg || ''} ${formatData(data)}`);
    }
  },
  error: (data: unknown, msg?: string) => {
    if (shouldLog('error')) {
      record('error', data, msg);
      console.error(`[ERROR] ${msg || ''} ${formatData(data)}`);
    }
  },
};

export type Logger = typeof logger;
