import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for request context (dataset ID, sample mode, etc.)
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current request context
 */
export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() || {};
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Level for the root logger. An unknown LOG_LEVEL falls back to `info`;
 * config/env.ts reports it when the environment is validated.
 */
export function resolveLevel(nodeEnv: string, logLevel: string | undefined): string {
  if (logLevel) return LOG_LEVELS.includes(logLevel) ? logLevel : 'info';
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'development' ? 'debug' : 'info';
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  const baseLogger = pino({
    level: resolveLevel(nodeEnv, process.env.LOG_LEVEL),
    base: {
      env: nodeEnv,
      service: 'deposit-agreement',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
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

  return baseLogger.child(getRequestContext());
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getRequestContext(), ...additionalContext };
  return logger.child(context);
}

/**
 * Run a callback with the given request context bound for every logger created inside it
 */
export function withRequestContext<T>(context: Record<string, unknown>, callback: () => T): T {
  return requestContext.run(context, callback);
}
