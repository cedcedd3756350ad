/**
 * AdFeed — Logger
 *
 * Structured logging for the poller and the HTTP layer.
 * JSON lines in production, a compact human format otherwise.
 * Entries go to the console and, once configured, to an append-only log file.
 */

import { createWriteStream, mkdirSync, type WriteStream } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (context: LogContext) => Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

// Get log level from environment, default to 'info'
const envLevel = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
let currentLevelNum = isLogLevel(envLevel) ? LOG_LEVELS[envLevel] : LOG_LEVELS.info;

let fileStream: WriteStream | null = null;

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= currentLevelNum;
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  };

  const formatted = formatEntry(entry);

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }

  // The file always gets JSON so it can be grepped and parsed regardless of NODE_ENV
  fileStream?.write(`${JSON.stringify(entry)}\n`);
}

function bind(defaultContext?: LogContext): Logger {
  const merge = (context?: LogContext) =>
    defaultContext ? { ...defaultContext, ...context } : context;

  return {
    debug: (message, context) => log('debug', message, merge(context)),
    info: (message, context) => log('info', message, merge(context)),
    warn: (message, context) => log('warn', message, merge(context)),
    error: (message, context) => log('error', message, merge(context)),
    child: (context: LogContext) => bind({ ...defaultContext, ...context }),
  };
}

/**
 * Logger interface.
 */
export const logger = bind();

/**
 * Override the level picked up from LOG_LEVEL.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevelNum = LOG_LEVELS[level];
}

/**
 * Start mirroring log entries to a file. Called once at start-up;
 * changing the destination later requires a restart.
 */
export function attachLogFile(path: string): void {
  if (fileStream) {
    logger.warn('Log file already attached, ignoring', { path });
    return;
  }
  mkdirSync(dirname(path), { recursive: true });
  fileStream = createWriteStream(path, { flags: 'a' });
  fileStream.on('error', (err) => {
    fileStream = null;
    console.error(`Log file ${path} unavailable: ${err.message}`);
  });
}

/**
 * Flush and close the log file, if any.
 */
export function detachLogFile(): Promise<void> {
  const stream = fileStream;
  fileStream = null;
  if (!stream) return Promise.resolve();
  return new Promise((resolve) => stream.end(resolve));
}

/**
 * Performance timing utility.
 */
export async function timeOperation<T>(name: string, operation: () => Promise<T>): Promise<T> {
  const start = performance.now();
  try {
    return await operation();
  } finally {
    logger.debug(`${name} completed`, { durationMs: Math.round(performance.now() - start) });
  }
}

/**
 * Normalize an unknown thrown value to a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
