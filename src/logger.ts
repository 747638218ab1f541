// SPDX-License-Identifier: MIT
/**
 * Logging for the client and CLI. Everything goes to stderr so that
 * stdout stays clean for query output and exported data.
 */
import { appendFileSync } from 'node:fs';
import process from 'node:process';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export type LogCallback = (entry: LogEntry) => void;

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const PREFIX = '[vm-cli]';

const callbacks: Set<LogCallback> = new Set();

let currentLevel: LogLevel = levelFromEnv(process.env);
let consoleEnabled = true;

/**
 * Level implied by `VM_LOG_LEVEL` and `VM_VERBOSE`.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  const verbose = env['VM_VERBOSE'];
  if (verbose === '1' || verbose === 'true') {
    return 'debug';
  }
  const level = env['VM_LOG_LEVEL']?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'info';
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Turn stderr output on or off. Callbacks still receive entries.
 */
export function setConsoleOutput(enabled: boolean): void {
  consoleEnabled = enabled;
}

/**
 * Register a callback for every emitted entry.
 *
 * @returns A function that unregisters the callback.
 */
export function onLog(cb: LogCallback): () => void {
  callbacks.add(cb);
  return () => {
    callbacks.delete(cb);
  };
}

/**
 * Append every emitted entry to `path` as a JSON line.
 */
export function attachLogFile(path: string): () => void {
  return onLog((entry) => {
    appendFileSync(path, `${JSON.stringify(entry)}\n`);
  });
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[currentLevel];
}

function log(level: LogEntry['level'], message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
  };
  if (data !== undefined) {
    entry.data = data;
  }

  if (consoleEnabled) {
    const dataStr = data ? ` ${JSON.stringify(data)}` : '';
    process.stderr.write(`${PREFIX} ${level.toUpperCase()} ${message}${dataStr}\n`);
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      process.stderr.write(`${PREFIX} log callback failed: ${String(e)}\n`);
    }
  }
}

export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

/**
 * Something unexpected but handled.
 */
export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('error', message, data);
}

/**
 * Measures the duration of an operation.
 */
export class Timer {
  private readonly startTime: number;
  private readonly label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  /** Milliseconds since the timer started. */
  elapsed(): number {
    return performance.now() - this.startTime;
  }

  /**
   * Log the elapsed time at debug level and return it.
   */
  end(data?: Record<string, unknown>): number {
    const ms = this.elapsed();
    debug(`${this.label} took ${ms.toFixed(1)}ms`, data);
    return ms;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}
