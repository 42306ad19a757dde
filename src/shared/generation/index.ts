/**
 * Generation Module
 *
 * Resume and cover-letter content generators.
 */

export * from './types';
export * from './contentGenerator';
