/**
 * Logger Utility
 *
 * Leveled console logging for the translation runtime.
 *
 * LOG LEVELS (in order of verbosity):
 *   - DEBUG (0): file discovery, per-file load results, locale negotiation
 *   - INFO  (1): service initialization summaries. Default level.
 *   - WARN  (2): recoverable conditions, such as an unparseable X-Locale header
 *   - ERROR (3): failures that abort an operation
 *
 * Set LOG_LEVEL (debug | info | warn | error) or call setLogLevel() at runtime.
 *
 * OUTPUT FORMAT:
 *   [ISO_TIMESTAMP] LEVEL [PREFIX] Message key=value key=value
 *
 *   Example:
 *   [2024-01-15T10:30:45.123Z] INFO  [LOADER] Catalogues loaded locales=3 files=7
 *
 * USAGE:
 *   import { createLogger } from '../utils/logger';
 *   const log = createLogger('LOADER');
 *   log.debug('Reading file', { path });
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogContext = Record<string, unknown>;

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

// Get log level from environment, default to INFO
const getLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return envLevel && LOG_LEVEL_MAP[envLevel] !== undefined
    ? LOG_LEVEL_MAP[envLevel]
    : LogLevel.INFO;
};

let currentLogLevel = getLogLevel();

// ANSI escape codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

const getTimestamp = (): string => {
  return new Date().toISOString();
};

/**
 * Format context object as key=value pairs
 * Objects are JSON stringified, primitives are converted to strings
 */
export const formatContext = (context?: LogContext): string => {
  if (!context || Object.keys(context).length === 0) return '';

  return Object.entries(context)
    .map(([key, value]) => {
      if (value === undefined || value === null) {
        return `${key}=null`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');
};

const log = (
  level: LogLevel,
  levelName: string,
  color: string,
  prefix: string,
  message: string,
  context?: LogContext
): void => {
  if (level < currentLogLevel) return;

  const formatted = formatContext(context);
  const contextStr = formatted ? ` ${colors.dim}${formatted}${colors.reset}` : '';

  console.log(
    `${colors.gray}[${getTimestamp()}]${colors.reset} ${color}${levelName}${colors.reset} ${colors.cyan}[${prefix}]${colors.reset} ${message}${contextStr}`
  );
};

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

/**
 * Create a logger instance with a specific prefix/module name
 *
 * @param prefix - Module identifier shown in log output (e.g., 'LOADER', 'I18N')
 *
 * @example
 * const log = createLogger('LOADER');
 * log.info('Catalogues loaded', { locales: 3 });
 */
export const createLogger = (prefix: string): Logger => {
  return {
    debug: (message: string, context?: LogContext) => {
      log(LogLevel.DEBUG, 'DEBUG', colors.gray, prefix, message, context);
    },

    info: (message: string, context?: LogContext) => {
      log(LogLevel.INFO, 'INFO ', colors.blue, prefix, message, context);
    },

    warn: (message: string, context?: LogContext) => {
      log(LogLevel.WARN, 'WARN ', colors.yellow, prefix, message, context);
    },

    error: (message: string, context?: LogContext) => {
      log(LogLevel.ERROR, 'ERROR', colors.red, prefix, message, context);
    },
  };
};

/**
 * Default logger instance with 'APP' prefix
 */
export const logger = createLogger('APP');

/**
 * Update log level at runtime. Unknown level names are ignored.
 *
 * @example
 * setLogLevel('debug');
 * setLogLevel(LogLevel.WARN);
 */
export const setLogLevel = (level: LogLevel | string): void => {
  if (typeof level === 'string') {
    const parsedLevel = LOG_LEVEL_MAP[level.toLowerCase()];
    if (parsedLevel !== undefined) {
      currentLogLevel = parsedLevel;
      logger.info('Log level changed', { level: level.toLowerCase() });
    }
  } else {
    currentLogLevel = level;
  }
};

/**
 * Current log level name ('debug', 'info', 'warn', or 'error')
 */
export const getConfiguredLogLevel = (): string => {
  const current = Object.entries(LOG_LEVEL_MAP).find(([, value]) => value === currentLogLevel);
  return current ? current[0] : 'info';
};

/**
 * Extract error information in a standardized format for logging
 *
 * @example
 * try {
 *   await loadCatalogueBag(dir);
 * } catch (error) {
 *   log.error('Loading failed', extractError(error));
 * }
 */
export function extractError(error: unknown): { error: string; errorName?: string } {
  if (error instanceof Error) {
    return {
      error: error.message,
      ...(error.name && error.name !== 'Error' ? { errorName: error.name } : {}),
    };
  }
  return { error: String(error) };
}

export interface Timer {
  /** Elapsed time in milliseconds */
  elapsed(): number;
  /** Elapsed time as "1.23s" or "456ms" */
  elapsedFormatted(): string;
  /** End timer and log completion (if logger provided) */
  end(context?: LogContext): number;
}

/**
 * Create a timer for measuring operation duration
 *
 * @example
 * const timer = createTimer('load-catalogues', log);
 * await loadCatalogueBag(dir);
 * timer.end({ dir }); // Logs: "load-catalogues completed" with duration
 */
export function createTimer(operationName?: string, timerLogger?: Logger): Timer {
  const startTime = Date.now();

  const elapsed = (): number => {
    return Date.now() - startTime;
  };

  const elapsedFormatted = (): string => {
    const ms = elapsed();
    if (ms >= 1000) {
      return `${(ms / 1000).toFixed(2)}s`;
    }
    return `${ms}ms`;
  };

  const end = (context?: LogContext): number => {
    const duration = elapsed();
    if (operationName && timerLogger) {
      timerLogger.info(`${operationName} completed`, {
        ...context,
        duration: elapsedFormatted(),
        durationMs: duration,
      });
    }
    return duration;
  };

  return { elapsed, elapsedFormatted, end };
}

export default logger;
