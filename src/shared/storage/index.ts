/**
 * Storage Module
 *
 * Backend-agnostic record persistence.
 * Supports two backends: memory (testing) and SQLite.
 */

export * from './interface';
export * from './errors';
export * from './memoryStorage';
export * from './databaseStorage';
