/**
 * Structured logging for the backend
 */

export interface LogContext {
  correlation_id?: string;
  session_id?: string;
  catalog_id?: string;
  record_name?: string;
  duration_ms?: number;
  action?: string;
  result?: string;
  [key: string]: unknown;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` ${JSON.stringify(context)}` : '';
  return `[${timestamp}] ${level.toUpperCase()}: ${message}${contextStr}`;
}

export const logger: Logger = {
  debug(message: string, context?: LogContext) {
    if (process.env.NODE_ENV === 'development') {
      console.debug(formatLog('debug', message, context));
    }
  },

  info(message: string, context?: LogContext) {
    console.log(formatLog('info', message, context));
  },

  warn(message: string, context?: LogContext) {
    console.warn(formatLog('warn', message, context));
  },

  error(message: string, context?: LogContext) {
    console.error(formatLog('error', message, context));
  },
};

/**
 * Creates a child logger with preset context
 */
export function createChildLogger(baseContext: LogContext, parent: Logger = logger): Logger {
  return {
    debug(message: string, context?: LogContext) {
      parent.debug(message, { ...baseContext, ...context });
    },
    info(message: string, context?: LogContext) {
      parent.info(message, { ...baseContext, ...context });
    },
    warn(message: string, context?: LogContext) {
      parent.warn(message, { ...baseContext, ...context });
    },
    error(message: string, context?: LogContext) {
      parent.error(message, { ...baseContext, ...context });
    },
  };
}

/**
 * Logger that drops everything (tests, dry runs piped to stdout)
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
