import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  // Tests stay quiet unless LOG_LEVEL asks otherwise
  const defaultLevel = nodeEnv === 'test' ? 'silent' : isDevelopment ? 'debug' : 'info';
  const logLevel = process.env.LOG_LEVEL || defaultLevel;

  return pino({
    level: logLevel,
    base: {
      env: nodeEnv,
      service: 'lot-occupancy',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && process.env.LOG_PRETTY !== 'false' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
