/**
 * Shared Infrastructure
 *
 * Building blocks used by the review pipeline and the service layer.
 *
 * Modules:
 * - llm: Unified LLM client (Anthropic + OpenAI)
 * - storage: Record store abstraction (memory, SQLite)
 * - validation: Zod schemas and validation helpers
 * - errors: Error types, retry/timeout helpers and error logging
 */

export * from './llm';
export * from './storage';
export * from './validation';
export * from './errors';
