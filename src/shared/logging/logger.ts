/**
 * Logger Configuration
 *
 * Configures pino logger with environment-aware formatting:
 * - Development: pretty-printed colorized output
 * - Production: JSON output for log aggregation
 * - Test: silent unless LOG_LEVEL says otherwise
 *
 * Usage:
 *   import { loggers } from '../logging';
 *   loggers.llm.info({ provider: 'anthropic' }, 'Provider selected');
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { config } from '../config';

// =============================================================================
// Configuration
// =============================================================================

const baseOptions: LoggerOptions = {
  level: config.server.logLevel,
  base: {
    pid: process.pid,
    env: config.server.nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Credentials and generated personal data never reach the log sink
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'apiKey',
      'token',
      'secret',
      '*.apiKey',
      '*.token',
      '*.secret',
    ],
    remove: true,
  },
};

const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '{msg}',
      singleLine: false,
    },
  },
};

const productionOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      env: config.server.nodeEnv,
    }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

export const logger: Logger = pino(
  config.server.isDevelopment ? developmentOptions : productionOptions
);

/**
 * Create a child logger for a specific component/module
 *
 * @example
 * const storeLogger = createComponentLogger('store');
 * storeLogger.debug({ id }, 'Resume saved');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

export const loggers = {
  /** HTTP request/response logging */
  http: createComponentLogger('http'),
  /** SQLite store */
  db: createComponentLogger('db'),
  /** Provider clients and the unified client */
  llm: createComponentLogger('llm'),
  /** Content generators */
  generation: createComponentLogger('generation'),
  /** Route handlers */
  api: createComponentLogger('api'),
  /** Error log sink */
  errors: createComponentLogger('errors'),
};

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Serialize an error for structured logging
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const extras: Record<string, unknown> = {};
    for (const key of Object.getOwnPropertyNames(err)) {
      if (!['name', 'message', 'stack'].includes(key)) {
        extras[key] = Reflect.get(err, key);
      }
    }
    return {
      type: err.constructor.name,
      message: err.message,
      stack: config.server.isDevelopment ? err.stack : undefined,
      ...extras,
    };
  }
  return { message: String(err) };
}

export default logger;
