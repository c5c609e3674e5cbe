/**
 * Validation Module
 *
 * Zod schemas for pipeline records and helpers to validate them at
 * component boundaries.
 */

export * from './validator';
export * from './schemas';
export * from './types';
