/**
 * Storage Module
 *
 * SQLite persistence for resumes and cover letters.
 */

export * from './interface';
export * from './databaseStorage';
