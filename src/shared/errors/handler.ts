/**
 * Error Handler
 *
 * Standardized error handling utilities: retry with exponential backoff,
 * timeouts with cancellation, and logging.
 */

import { AppError, ErrorCategory, ErrorSeverity } from './types';
import { ErrorLogger } from './logger';

/**
 * Options for {@link ErrorHandler.retry}
 */
export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: Error) => boolean;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Error handler class for managing errors throughout the application
 */
export class ErrorHandler {
  /**
   * Create an unexpected error
   */
  static createUnexpectedError(
    error: unknown,
    context?: Record<string, unknown>
  ): AppError {
    const message = error instanceof Error ? error.message : String(error);
    return new AppError({
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL,
      userMessage: 'An unexpected error occurred.',
      technicalDetails: message,
      timestamp: new Date(),
      context,
      recoverable: false,
      cause: error
    });
  }

  /**
   * Normalize any thrown value into an Error
   */
  static toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error, context?: Record<string, unknown>): void {
    ErrorLogger.logError(error, context);
  }

  /**
   * Retry logic for transient failures
   */
  static async retry<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
  ): Promise<T> {
    const {
      maxAttempts = 3,
      delayMs = 1000,
      backoffMultiplier = 2,
      shouldRetry = () => true,
      onRetry
    } = options;

    let currentDelay = delayMs;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        const lastError = this.toError(error);

        // Don't retry if we've exhausted attempts or if error is not retryable
        if (attempt >= maxAttempts || !shouldRetry(lastError)) {
          throw lastError;
        }

        onRetry?.(attempt, lastError, currentDelay);
        await this.sleep(currentDelay);
        currentDelay *= backoffMultiplier;
      }
    }
  }

  /**
   * Run an operation under a deadline. The operation receives a signal that
   * is aborted when the deadline passes; the returned promise rejects with
   * the error built by `createTimeoutError`.
   */
  static async withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    createTimeoutError: () => Error
  ): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const timeoutError = createTimeoutError();
        controller.abort(timeoutError);
        reject(timeoutError);
      }, timeoutMs);
    });

    try {
      return await Promise.race([operation(controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Determine if an error is retryable
   */
  static isRetryable(error: Error | AppError): boolean {
    if (error instanceof AppError) {
      return error.recoverable && error.category === ErrorCategory.NETWORK;
    }

    // Check for common retryable error patterns
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('network') ||
      message.includes('rate limit') ||
      message.includes('temporary') ||
      message.includes('econnreset')
    );
  }

  private static sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
