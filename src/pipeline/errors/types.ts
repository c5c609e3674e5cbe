/**
 * Pipeline Error Types
 *
 * Error codes and classes raised by the proposal lifecycle.
 * Extends shared error types from src/shared/errors/types.ts; storage
 * failures (duplicate keys, unavailable backends) come from the storage
 * module and are re-exported here.
 */

import { AppError, ErrorCategory, ErrorSeverity } from '../../shared/errors/types';
import type { ValidationError } from '../../shared/validation/types';
import { formatValidationErrors } from '../../shared/validation/validator';

export { DuplicateKeyError, StoreUnavailableError, StorageError, StorageErrorCode } from '../../shared/storage/errors';

/**
 * Pipeline-specific error codes
 */
export enum PipelineErrorCode {
  // Capability errors
  CAPABILITY_TRANSIENT = 'CAPABILITY_TRANSIENT',
  CAPABILITY_TIMEOUT = 'CAPABILITY_TIMEOUT',
  CAPABILITY_PERMANENT = 'CAPABILITY_PERMANENT',
  GENERATION_FAILED = 'GENERATION_FAILED',

  // Boundary validation
  INVALID_PROPOSAL = 'INVALID_PROPOSAL',
  INVALID_RECORD = 'INVALID_RECORD',

  // Lifecycle
  CONFLICT = 'CONFLICT',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  NOT_FOUND = 'NOT_FOUND',
  QUORUM_NOT_MET = 'QUORUM_NOT_MET',

  // Audit
  AUDIT_WRITE_FAILED = 'AUDIT_WRITE_FAILED',
  CHAIN_INTEGRITY = 'CHAIN_INTEGRITY'
}

interface PipelineErrorOptions {
  category: ErrorCategory;
  severity: ErrorSeverity;
  context?: Record<string, unknown>;
  retryable?: boolean;
  suggestedAction?: string;
  cause?: unknown;
}

/**
 * Base class for pipeline errors
 */
export class PipelineError extends AppError {
  public readonly code: PipelineErrorCode;
  public readonly retryable: boolean;

  constructor(
    code: PipelineErrorCode,
    userMessage: string,
    technicalDetails: string,
    options: PipelineErrorOptions
  ) {
    super({
      category: options.category,
      severity: options.severity,
      userMessage,
      technicalDetails,
      timestamp: new Date(),
      context: options.context,
      recoverable: options.retryable ?? false,
      suggestedAction: options.suggestedAction,
      cause: options.cause
    });

    this.name = 'PipelineError';
    this.code = code;
    this.retryable = options.retryable ?? false;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), code: this.code };
  }
}

// ============================================================================
// Capability
// ============================================================================

/**
 * Network failure, rate limit or overload; safe to retry
 */
export class TransientCapabilityError extends PipelineError {
  constructor(details: string, options: { status?: number; cause?: unknown } = {}) {
    super(PipelineErrorCode.CAPABILITY_TRANSIENT, 'Content generator temporarily unavailable', details, {
      category: ErrorCategory.NETWORK,
      severity: ErrorSeverity.MEDIUM,
      context: options.status === undefined ? undefined : { status: options.status },
      retryable: true,
      suggestedAction: 'Wait before retrying',
      cause: options.cause
    });
    this.name = 'TransientCapabilityError';
  }
}

/**
 * An attempt exceeded its deadline
 */
export class CapabilityTimeoutError extends PipelineError {
  constructor(operation: string, timeoutMs: number) {
    super(
      PipelineErrorCode.CAPABILITY_TIMEOUT,
      `${operation} timed out`,
      `No response received within ${timeoutMs}ms`,
      {
        category: ErrorCategory.NETWORK,
        severity: ErrorSeverity.MEDIUM,
        context: { operation, timeoutMs },
        retryable: true,
        suggestedAction: 'Retry the operation or increase timeout'
      }
    );
    this.name = 'CapabilityTimeoutError';
  }
}

/**
 * Rejected request (authentication, bad input, unparseable reply); never retried
 */
export class PermanentCapabilityError extends PipelineError {
  constructor(details: string, options: { status?: number; cause?: unknown } = {}) {
    super(PipelineErrorCode.CAPABILITY_PERMANENT, 'Content generator rejected the request', details, {
      category: ErrorCategory.NETWORK,
      severity: ErrorSeverity.HIGH,
      context: options.status === undefined ? undefined : { status: options.status },
      retryable: false,
      suggestedAction: 'Check credentials and request payload',
      cause: options.cause
    });
    this.name = 'PermanentCapabilityError';
  }
}

export class GenerationFailedError extends PipelineError {
  public readonly attempts: number;

  constructor(sectionKey: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      PipelineErrorCode.GENERATION_FAILED,
      `Failed to generate a proposal for ${sectionKey}`,
      `Gave up after ${attempts} attempt(s): ${reason}`,
      {
        category: ErrorCategory.NETWORK,
        severity: ErrorSeverity.HIGH,
        context: { section: sectionKey, attempts },
        retryable: false,
        cause
      }
    );
    this.name = 'GenerationFailedError';
    this.attempts = attempts;
  }
}

// ============================================================================
// Boundary validation
// ============================================================================

export class InvalidProposalError extends PipelineError {
  public readonly validationErrors: ValidationError[];

  constructor(validationErrors: ValidationError[], context?: Record<string, unknown>) {
    super(
      PipelineErrorCode.INVALID_PROPOSAL,
      'Proposal validation failed',
      formatValidationErrors(validationErrors),
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        context,
        suggestedAction: 'Regenerate the proposal from the section'
      }
    );
    this.name = 'InvalidProposalError';
    this.validationErrors = validationErrors;
  }
}

/**
 * A record or event payload failed its schema
 */
export class InvalidRecordError extends PipelineError {
  public readonly validationErrors: ValidationError[];

  constructor(recordType: string, validationErrors: ValidationError[], context?: Record<string, unknown>) {
    super(
      PipelineErrorCode.INVALID_RECORD,
      `Invalid ${recordType} record`,
      formatValidationErrors(validationErrors),
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        context: { recordType, ...context },
        suggestedAction: 'Check the record against its schema'
      }
    );
    this.name = 'InvalidRecordError';
    this.validationErrors = validationErrors;
  }
}

// ============================================================================
// Lifecycle
// ============================================================================

/**
 * The stored status is not the one the caller expected
 */
export class ConflictError extends PipelineError {
  constructor(proposalId: string, expected: string, actual: string) {
    super(
      PipelineErrorCode.CONFLICT,
      `Proposal ${proposalId} is no longer ${expected}`,
      `Expected status "${expected}" but found "${actual}"`,
      {
        category: ErrorCategory.CONCURRENCY,
        severity: ErrorSeverity.LOW,
        context: { proposalId, expected, actual }
      }
    );
    this.name = 'ConflictError';
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(proposalId: string, from: string, to: string, allowed: readonly string[]) {
    super(
      PipelineErrorCode.INVALID_TRANSITION,
      `Transition ${from} -> ${to} is not allowed`,
      `Proposal ${proposalId} cannot move from "${from}" to "${to}" (allowed: ${allowed.join(', ') || 'none'})`,
      {
        category: ErrorCategory.STORAGE,
        severity: ErrorSeverity.HIGH,
        context: { proposalId, from, to, allowed: [...allowed] }
      }
    );
    this.name = 'InvalidTransitionError';
  }
}

export class NotFoundError extends PipelineError {
  constructor(recordType: string, id: string) {
    super(
      PipelineErrorCode.NOT_FOUND,
      `${recordType} not found`,
      `${recordType} with id ${id} does not exist`,
      {
        category: ErrorCategory.STORAGE,
        severity: ErrorSeverity.MEDIUM,
        context: { recordType, id }
      }
    );
    this.name = 'NotFoundError';
  }
}

export class QuorumNotMetError extends PipelineError {
  public readonly succeeded: number;
  public readonly required: number;

  constructor(proposalId: string, succeeded: number, required: number, context?: Record<string, unknown>) {
    super(
      PipelineErrorCode.QUORUM_NOT_MET,
      'Not enough reviewers completed',
      `${succeeded} of the required ${required} evaluations succeeded for proposal ${proposalId}`,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        context: { proposalId, succeeded, required, ...context },
        suggestedAction: 'The proposal is requeued for another review round'
      }
    );
    this.name = 'QuorumNotMetError';
    this.succeeded = succeeded;
    this.required = required;
  }
}

// ============================================================================
// Audit
// ============================================================================

export class AuditWriteError extends PipelineError {
  constructor(eventType: string, subjectId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      PipelineErrorCode.AUDIT_WRITE_FAILED,
      'Audit record could not be written',
      `Appending ${eventType} for ${subjectId} failed: ${reason}`,
      {
        category: ErrorCategory.STORAGE,
        severity: ErrorSeverity.CRITICAL,
        context: { eventType, subjectId },
        suggestedAction: 'Restore the audit store before resuming the pipeline',
        cause
      }
    );
    this.name = 'AuditWriteError';
  }
}

export class ChainIntegrityError extends PipelineError {
  public readonly seq: number;

  constructor(seq: number, reason: string) {
    super(
      PipelineErrorCode.CHAIN_INTEGRITY,
      `Audit chain broken at seq ${seq}`,
      reason,
      {
        category: ErrorCategory.INTEGRITY,
        severity: ErrorSeverity.CRITICAL,
        context: { seq },
        suggestedAction: 'Investigate the audit store for tampering'
      }
    );
    this.name = 'ChainIntegrityError';
    this.seq = seq;
  }
}
