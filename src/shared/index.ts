/**
 * Shared Core
 *
 * Modules:
 * - config: Environment configuration
 * - logging: pino loggers
 * - errors: Error categories, AppError and the error log
 * - types: Resume snapshot and stored record types
 * - validation: Zod schemas and validators
 * - llm: Provider clients, the unified generation client, prompts and sanitizing
 * - generation: Resume and cover letter content generators
 * - storage: SQLite persistence
 */

export * from './config';
export * from './logging';
export * from './errors';
export * from './types';
export * from './validation';
export * from './llm';
export * from './generation';
export * from './storage';
