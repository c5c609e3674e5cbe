/**
 * Storage Errors
 *
 * Failures raised by record store backends. Errors thrown by an `update`
 * mutator pass through untouched; only backend faults are wrapped.
 */

import { AppError, ErrorCategory, ErrorSeverity } from '../errors/types';

export enum StorageErrorCode {
  DUPLICATE_KEY = 'DUPLICATE_KEY',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE'
}

/**
 * Base class for record store failures
 */
export class StorageError extends AppError {
  public readonly code: StorageErrorCode;

  constructor(
    code: StorageErrorCode,
    userMessage: string,
    technicalDetails: string,
    options: {
      category: ErrorCategory;
      severity: ErrorSeverity;
      recoverable: boolean;
      context?: Record<string, unknown>;
      suggestedAction?: string;
      cause?: unknown;
    }
  ) {
    super({
      category: options.category,
      severity: options.severity,
      userMessage,
      technicalDetails,
      timestamp: new Date(),
      context: options.context,
      recoverable: options.recoverable,
      suggestedAction: options.suggestedAction,
      cause: options.cause
    });
    this.name = 'StorageError';
    this.code = code;
  }
}

/**
 * A record with the same key already exists in the collection
 */
export class DuplicateKeyError extends StorageError {
  constructor(collection: string, key: string) {
    super(
      StorageErrorCode.DUPLICATE_KEY,
      `Record already exists: ${collection}/${key}`,
      `insert into "${collection}" rejected because key "${key}" is taken`,
      {
        category: ErrorCategory.CONCURRENCY,
        severity: ErrorSeverity.LOW,
        recoverable: false,
        context: { collection, key }
      }
    );
    this.name = 'DuplicateKeyError';
  }
}

/**
 * The backend could not complete the operation
 */
export class StoreUnavailableError extends StorageError {
  constructor(operation: string, collection: string, cause: unknown) {
    const details = cause instanceof Error ? cause.message : String(cause);
    super(
      StorageErrorCode.STORE_UNAVAILABLE,
      'Record store is unavailable',
      `${operation} on "${collection}" failed: ${details}`,
      {
        category: ErrorCategory.STORAGE,
        severity: ErrorSeverity.CRITICAL,
        recoverable: false,
        context: { operation, collection },
        suggestedAction: 'Check the database file and its permissions.',
        cause
      }
    );
    this.name = 'StoreUnavailableError';
  }
}
