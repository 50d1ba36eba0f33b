/**
 * DebugLogger - Centralized logging for Laneway packages
 *
 * - Log levels (DEBUG, INFO, WARN, ERROR)
 * - Timestamp formatting
 * - Environment-based filtering (LANEWAY_LOG_LEVEL)
 * - Module/context tagging
 *
 * Output goes to stderr so stdout stays free for adapters that speak a
 * protocol over it.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'NONE';

const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  NONE: 4,
};

/** Process-wide override set from configuration (wins over the env var) */
let levelOverride: LogLevel | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Override the log level for every DebugLogger instance.
 * Pass null to fall back to LANEWAY_LOG_LEVEL.
 */
export function setLogLevel(level: LogLevel | string | null): void {
  if (level === null) {
    levelOverride = null;
    return;
  }
  const normalized = level.toUpperCase();
  levelOverride = isLogLevel(normalized) ? normalized : null;
}

export function getLogLevel(): LogLevel {
  if (levelOverride) {
    return levelOverride;
  }
  const env = (process.env.LANEWAY_LOG_LEVEL || 'ERROR').toUpperCase();
  return isLogLevel(env) ? env : 'ERROR';
}

/**
 * Minimal logger shape accepted by components that allow injection
 */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export class DebugLogger implements Logger {
  private context: string;

  constructor(context = 'Laneway') {
    this.context = context;
  }

  private _shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()];
  }

  private _formatMessage(level: LogLevel, ...args: unknown[]): unknown[] {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${this.context}] [${level}]`;
    return [prefix, ...args];
  }

  debug(...args: unknown[]): void {
    if (!this._shouldLog('DEBUG')) {
      return;
    }
    console.error(...this._formatMessage('DEBUG', ...args));
  }

  info(...args: unknown[]): void {
    if (!this._shouldLog('INFO')) {
      return;
    }
    console.error(...this._formatMessage('INFO', ...args));
  }

  warn(...args: unknown[]): void {
    if (!this._shouldLog('WARN')) {
      return;
    }
    console.warn(...this._formatMessage('WARN', ...args));
  }

  error(...args: unknown[]): void {
    if (!this._shouldLog('ERROR')) {
      return;
    }
    console.error(...this._formatMessage('ERROR', ...args));
  }
}

/** Logger that drops everything (tests, embedded use) */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const logger = new DebugLogger('Laneway');

export const debug = (...args: unknown[]): void => logger.debug(...args);
export const info = (...args: unknown[]): void => logger.info(...args);
export const warn = (...args: unknown[]): void => logger.warn(...args);
export const error = (...args: unknown[]): void => logger.error(...args);

export default logger;
