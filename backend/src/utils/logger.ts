import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && LOG_LEVELS.some(level => level === value);

const resolveLevel = (): LogLevel => {
  if (process.env.NODE_ENV === 'test') {
    return 'silent';
  }
  return isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';
};

const baseLogger = pino({
  level: resolveLevel(),
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
});

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

/**
 * Create a logger bound to one backend component
 */
export function createLogger(service: string): Logger {
  const child = baseLogger.child({ service });

  return {
    debug: (message, data) => (data ? child.debug(data, message) : child.debug(message)),
    info: (message, data) => (data ? child.info(data, message) : child.info(message)),
    warn: (message, data) => (data ? child.warn(data, message) : child.warn(message)),
    error: (message, data) => (data ? child.error(data, message) : child.error(message)),
  };
}

export const logger = createLogger('api');
