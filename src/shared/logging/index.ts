/**
 * Logging Module
 *
 * pino logger, component child loggers and error serialization.
 */

export * from './logger';
