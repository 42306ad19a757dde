/**
 * Validation Module
 *
 * Zod schemas and validation helpers.
 */

export * from './types';
export * from './schemas';
export * from './validator';
