/**
 * Error Types
 *
 * Type definitions for error codes and error structures.
 * Shared by the pipeline core, the storage backends and the service layer.
 */

/**
 * Error categories for different types of failures
 */
export enum ErrorCategory {
  STORAGE = 'STORAGE',
  VALIDATION = 'VALIDATION',
  NETWORK = 'NETWORK',
  CONCURRENCY = 'CONCURRENCY',
  INTEGRITY = 'INTEGRITY',
  UNEXPECTED = 'UNEXPECTED'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  userMessage: string;
  technicalDetails: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  recoverable: boolean;
  suggestedAction?: string;
  cause?: unknown;
}

/**
 * Custom error class with additional context
 */
export class AppError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly userMessage: string;
  public readonly technicalDetails: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly recoverable: boolean;
  public readonly suggestedAction?: string;

  constructor(info: ErrorInfo) {
    super(info.userMessage, info.cause === undefined ? undefined : { cause: info.cause });
    this.name = 'AppError';
    this.category = info.category;
    this.severity = info.severity;
    this.userMessage = info.userMessage;
    this.technicalDetails = info.technicalDetails;
    this.timestamp = info.timestamp;
    this.context = info.context;
    this.recoverable = info.recoverable;
    this.suggestedAction = info.suggestedAction;
  }

  /**
   * Flatten to a plain object for structured logs and audit payloads
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      severity: this.severity,
      message: this.userMessage,
      details: this.technicalDetails,
      recoverable: this.recoverable,
      context: this.context
    };
  }
}

/**
 * Raised when configuration cannot be loaded or fails validation.
 * Thrown at startup, never mid-pipeline.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.CRITICAL,
      userMessage: message,
      technicalDetails: message,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Check your .env file or environment variables.'
    });
    this.name = 'ConfigurationError';
  }
}
