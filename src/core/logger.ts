import { maskSecrets } from './secrets.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

/** JSON lines on stderr; stdout carries the command result only. */
const stderrHandler: LogHandler = (entry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context
  });
  process.stderr.write(`${maskSecrets(line)}\n`);
};

let currentHandler: LogHandler = stderrHandler;
let currentMinLevel: LogLevel = 'info';

export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

export function resetLogHandler(): void {
  currentHandler = stderrHandler;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(levelPriority, value);
}

function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (levelPriority[level] < levelPriority[currentMinLevel]) {
    return;
  }
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString()
  });
}

export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (message, context) => log('debug', message, { ...baseContext, ...context }),
    info: (message, context) => log('info', message, { ...baseContext, ...context }),
    warn: (message, context) => log('warn', message, { ...baseContext, ...context }),
    error: (message, context) => log('error', message, { ...baseContext, ...context }),
    child: (context) => createLogger({ ...baseContext, ...context })
  };
}

export const logger = createLogger({ component: 'doc-publish' });
