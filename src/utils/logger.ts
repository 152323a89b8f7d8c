import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { cfg } from '../config/index.js';
import type { AppConfig } from '../config/index.js';
import { extractErrorDetails } from '../errors/base.js';

/**
 * Logger configuration and setup for instance-forest
 *
 * - JSON to stderr in production
 * - pino-pretty in development
 * - warn and above only under test
 */

/**
 * Create logger options based on environment and configuration
 */
export function createLoggerOptions(appConfig: AppConfig): LoggerOptions {
  const baseOptions: LoggerOptions = {
    level: appConfig.LOG_LEVEL,
    base: {
      pid: process.pid,
      hostname: process.env.HOSTNAME || 'unknown',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  // Test environment: minimal output
  if (appConfig.NODE_ENV === 'test') {
    return {
      ...baseOptions,
      level: 'warn', // Reduce noise in tests
    };
  }

  // Development environment: pretty printing
  if (appConfig.NODE_ENV === 'development') {
    return {
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'yyyy-mm-dd HH:MM:ss',
          ignore: 'pid,hostname',
          singleLine: false,
          destination: 2, // stderr
        },
      },
    };
  }

  return baseOptions;
}

function createRootLogger(appConfig: AppConfig): Logger {
  const options = createLoggerOptions(appConfig);
  // A transport owns its own destination; plain JSON goes to stderr so stdout stays clean
  return options.transport ? pino(options) : pino(options, process.stderr);
}

/**
 * Main application logger instance
 */
export const logger: Logger = createRootLogger(cfg);

/**
 * Create a child logger with additional context
 *
 * @example
 * ```typescript
 * const forestLogger = createLogger({ module: 'forest', forest: 'workspace' });
 * forestLogger.debug('Subtree removed');
 * ```
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Create a module-specific logger
 */
export function createModuleLogger(moduleName: string): Logger {
  return createLogger({ module: moduleName });
}

/**
 * Performance timing logger utility
 *
 * @param operation - Name of the operation being timed
 * @returns Function to call when operation completes
 *
 * @example
 * ```typescript
 * const endTimer = startTimer(logger, 'fromSnapshot');
 * // ... perform operation
 * endTimer({ instanceCount: 42 });
 * ```
 */
export function startTimer(
  logger: Logger,
  operation: string
): (result?: Record<string, unknown>) => void {
  const start = process.hrtime.bigint();

  return (result: Record<string, unknown> = {}) => {
    const duration = Number(process.hrtime.bigint() - start) / 1_000_000; // Convert to milliseconds

    logger.debug(
      {
        operation,
        duration: `${duration.toFixed(2)}ms`,
        ...result,
      },
      `${operation} completed in ${duration.toFixed(2)}ms`
    );
  };
}

/**
 * Error logging utility with stack trace handling
 *
 * Forest errors contribute their module, operation and context to the log line.
 */
export function logError(
  logger: Logger,
  error: Error | string,
  context: Record<string, unknown> = {}
): void {
  if (typeof error === 'string') {
    logger.error(context, error);
    return;
  }

  const errorInfo: Record<string, unknown> = {
    name: error.name,
    ...extractErrorDetails(error),
  };

  if ('cause' in error && error.cause !== undefined) {
    errorInfo.cause = error.cause;
  }

  logger.error(
    {
      ...context,
      error: errorInfo,
    },
    error.message
  );
}

export default logger;
