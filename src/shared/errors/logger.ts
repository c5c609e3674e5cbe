/**
 * Error Logger
 *
 * Structured error logging through pino, plus a bounded in-memory tail of
 * recent errors for diagnostics.
 */

import type { Logger } from 'pino';
import { createComponentLogger, serializeError } from '../../service/logger';
import { ErrorInfo, AppError, ErrorCategory, ErrorSeverity } from './types';

/**
 * Error logger class for managing error logs
 */
export class ErrorLogger {
  private static logs: ErrorInfo[] = [];
  private static maxLogs = 1000;
  private static sink: Logger = createComponentLogger('errors');

  /**
   * Log an error with technical details.
   * Non-AppErrors are recorded as unexpected.
   */
  static logError(error: AppError | Error, context?: Record<string, unknown>, logger?: Logger): void {
    const errorInfo: ErrorInfo = error instanceof AppError
      ? {
          category: error.category,
          severity: error.severity,
          userMessage: error.userMessage,
          technicalDetails: error.technicalDetails,
          timestamp: error.timestamp,
          context: { ...error.context, ...context },
          recoverable: error.recoverable,
          suggestedAction: error.suggestedAction
        }
      : {
          category: ErrorCategory.UNEXPECTED,
          severity: ErrorSeverity.CRITICAL,
          userMessage: 'An unexpected error occurred',
          technicalDetails: error.message,
          timestamp: new Date(),
          context,
          recoverable: false
        };

    this.logs.push(errorInfo);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const target = logger ?? this.sink;
    const fields = {
      err: serializeError(error),
      category: errorInfo.category,
      severity: errorInfo.severity,
      ...context
    };
    if (errorInfo.severity === ErrorSeverity.LOW) {
      target.warn(fields, errorInfo.userMessage);
    } else {
      target.error(fields, errorInfo.userMessage);
    }
  }

  /**
   * Get all logged errors
   */
  static getLogs(): ErrorInfo[] {
    return [...this.logs];
  }

  /**
   * Clear error logs
   */
  static clearLogs(): void {
    this.logs = [];
  }
}
