/**
 * LLM Module
 *
 * Provider clients, the unified generation client, retry policy, prompt
 * templates and output sanitizing.
 */

export * from './types';
export * from './errors';
export * from './retry';
export * from './providers';
export * from './client';
export * from './prompts';
export * from './sanitize';
