import pino, { type Logger, type LoggerOptions } from 'pino';

export interface LogContext {
  requestId?: string;
  activity?: string;
  [key: string]: unknown;
}

export const REDACT_PATHS = [
  'token',
  'apiKey',
  'secret',
  'authorization',
  'cookie',
  'metricsToken',
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-metrics-token"]',
];

const defaultOptions: LoggerOptions = {
  level: process.env['LOG_LEVEL'] || 'info',
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings['pid'],
      host: bindings['hostname'],
    }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: REDACT_PATHS,
    remove: true,
  },
};

// Pretty print in development
const devOptions: LoggerOptions = {
  ...defaultOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  },
};

/**
 * Create a logger instance
 */
export function createLogger(name: string, options?: LoggerOptions): Logger {
  const isDev = process.env['NODE_ENV'] === 'development';
  const baseOptions = isDev ? devOptions : defaultOptions;

  return pino({
    ...baseOptions,
    ...options,
    name,
  });
}

/**
 * Create a child logger with context
 */
export function createChildLogger(logger: Logger, context: LogContext): Logger {
  return logger.child(context);
}

/**
 * Root logger instance
 */
export const logger = createLogger('mergington');

export { pino };
export type { Logger, LoggerOptions };
