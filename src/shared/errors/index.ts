/**
 * Errors Module
 *
 * Standardized error types, factories and logging.
 */

export * from './handler';
export * from './types';
export * from './logger';
