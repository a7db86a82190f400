/**
 * Logger - small structured logging interface passed to services and
 * middleware instead of reaching for a process-wide console.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHTS, value);
}

/**
 * Console-backed logger. Messages below `level` are discarded.
 */
export function createLogger(level: LogLevel = 'info', scope?: string): Logger {
  const threshold = LEVEL_WEIGHTS[level];
  const prefix = scope ? `[${scope}] ` : '';

  const write = (messageLevel: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext) => {
    if (LEVEL_WEIGHTS[messageLevel] < threshold) {
      return;
    }
    const line = `${new Date().toISOString()} ${messageLevel.toUpperCase()} ${prefix}${message}`;
    const sink = messageLevel === 'error' ? console.error : messageLevel === 'warn' ? console.warn : console.log;
    if (context && Object.keys(context).length > 0) {
      sink(line, context);
    } else {
      sink(line);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}

export const silentLogger: Logger = createLogger('silent');
