/**
 * Structured Logger
 *
 * JSON-formatted logging with levels: debug, info, warn, error
 *
 * - Debug logs only emit when LOG_LEVEL=debug or NODE_ENV !== 'production'
 * - LOG_LEVEL=silent mutes everything (used by the test setup)
 * - child() returns a logger that stamps extra fields on every entry
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Context = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLevel(value: string | undefined): value is LogLevel | 'silent' {
  return value !== undefined && value in LEVEL_PRIORITY;
}

function getMinLevel(): LogLevel | 'silent' {
  const envLevel = process.env.LOG_LEVEL;
  if (isLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getMinLevel()];
}

function formatEntry(level: LogLevel, message: string, bindings: Context, context?: Context) {
  return JSON.stringify({
    level,
    msg: message,
    ts: new Date().toISOString(),
    ...bindings,
    ...context,
  });
}

export interface Logger {
  debug(message: string, context?: Context): void;
  info(message: string, context?: Context): void;
  warn(message: string, context?: Context): void;
  error(message: string, context?: Context): void;
  child(bindings: Context): Logger;
}

function createLogger(bindings: Context): Logger {
  return {
    debug(message, context) {
      if (!shouldLog('debug')) return;
      console.debug(formatEntry('debug', message, bindings, context));
    },

    info(message, context) {
      if (!shouldLog('info')) return;
      console.info(formatEntry('info', message, bindings, context));
    },

    warn(message, context) {
      if (!shouldLog('warn')) return;
      console.warn(formatEntry('warn', message, bindings, context));
    },

    error(message, context) {
      if (!shouldLog('error')) return;
      console.error(formatEntry('error', message, bindings, context));
    },

    child(extra) {
      return createLogger({ ...bindings, ...extra });
    },
  };
}

export const logger = createLogger({});
