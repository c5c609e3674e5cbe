/**
 * Review Pipeline
 *
 * Event-driven lifecycle for enhancement proposals: generation, multi-reviewer
 * validation, consensus and a hash-chained audit trail.
 */

export * from './types';
export * from './config';
export * from './errors';
export * from './events';
export * from './audit';
export * from './store';
export * from './capability';
export * from './generator';
export * from './reviewers';
export * from './orchestrator';
