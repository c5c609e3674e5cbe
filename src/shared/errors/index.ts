/**
 * Errors Module
 *
 * Standardized error types, retry/timeout helpers and error logging.
 */

export * from './handler';
export * from './types';
export * from './logger';
