/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Destination of formatted log lines. Defaults to the console.
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Logger options
 */
export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  context?: Record<string, unknown>;
  sink?: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

/**
 * Create a leveled logger.
 *
 * Lines look like `[2024-01-15T10:00:00.000Z] [INFO] [bibkit] message {"path":"refs.bib"}`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const prefix = options.prefix ?? 'bibkit';
  const baseContext = options.context ?? {};
  const sink = options.sink ?? consoleSink;

  const formatMessage = (level: LogLevel, message: string, context?: Record<string, unknown>): string => {
    const timestamp = new Date().toISOString();
    const mergedContext = { ...baseContext, ...context };
    const contextStr = Object.keys(mergedContext).length > 0
      ? ` ${JSON.stringify(mergedContext)}`
      : '';

    return `[${timestamp}] [${level.toUpperCase()}] [${prefix}] ${message}${contextStr}`;
  };

  const emit = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVELS[level] >= minLevel) {
      sink(level, formatMessage(level, message, context));
    }
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),

    child(context: Record<string, unknown>): Logger {
      const childOptions: LoggerOptions = {
        prefix,
        sink,
        context: { ...baseContext, ...context },
      };
      if (options.level !== undefined) {
        childOptions.level = options.level;
      }
      return createLogger(childOptions);
    },
  };
}
