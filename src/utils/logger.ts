/**
 * Console logger with a level threshold.
 *
 * LOG_LEVEL picks the threshold (debug, info, warn, error). Without it,
 * development builds log everything and other builds start at info.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function currentThreshold(): number {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  if (isLogLevel(configured)) {
    return LEVEL_ORDER[configured];
  }
  return process.env.NODE_ENV === 'development' ? LEVEL_ORDER.debug : LEVEL_ORDER.info;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= currentThreshold();
}

export const logger = {
  debug: (...args: unknown[]): void => {
    if (enabled('debug')) {
      console.log('[DEBUG]', ...args);
    }
  },
  info: (...args: unknown[]): void => {
    if (enabled('info')) {
      console.log('[INFO]', ...args);
    }
  },
  warn: (...args: unknown[]): void => {
    if (enabled('warn')) {
      console.warn('[WARN]', ...args);
    }
  },
  error: (...args: unknown[]): void => {
    console.error('[ERROR]', ...args);
  }
};
