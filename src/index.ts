/**
 * Standards Review Pipeline
 *
 * Library entry point. The CLI lives in main.ts.
 */

export * from './pipeline';
export {
  AppError,
  ConfigurationError,
  DatabaseRecordStore,
  ErrorCategory,
  ErrorHandler,
  ErrorSeverity,
  LLMClient,
  MemoryRecordStore
} from './shared';
export type { LLMConfig, RecordStore, StoredRecord } from './shared';
export { createContentGenerator, createPipeline, createRecordStore } from './service';
export type { CreatePipelineOptions, Pipeline } from './service';
export { loadConfig } from './service/config';
export type { AppConfig } from './service/config';
