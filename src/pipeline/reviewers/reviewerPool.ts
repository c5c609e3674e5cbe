/**
 * Reviewer Pool
 *
 * Dispatches N independent reviewers for one proposal concurrently. Each
 * reviewer gets its own deadline per attempt and retries transient
 * failures with exponential backoff. A reviewer that still fails, or whose
 * reply is malformed, is excluded from this round.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { createComponentLogger } from '../../service/logger';
import { ErrorHandler } from '../../shared/errors/handler';
import { GeneratedEvaluationSchema, REVIEW_CRITERIA } from '../../shared/validation/schemas';
import { parseWithSchema } from '../../shared/validation/validator';
import type { ContentGenerator } from '../capability/contentGenerator';
import type { RetrySettings, ReviewerSettings } from '../config';
import { CapabilityTimeoutError, InvalidRecordError, QuorumNotMetError } from '../errors';
import type { Evaluation, ExcludedReviewer, Proposal } from '../types';

export interface ReviewerPoolOptions {
  settings: ReviewerSettings;
  retry: RetrySettings;
  logger?: Logger;
}

export interface ReviewRound {
  proposal_id: string;
  requested: number;
  evaluations: Evaluation[];
  excluded: ExcludedReviewer[];
}

class ReviewerFailure extends Error {
  constructor(readonly reviewerId: string, readonly attempts: number, readonly reason: Error) {
    super(reason.message);
    this.name = 'ReviewerFailure';
  }
}

export class ReviewerPool {
  private logger: Logger;

  constructor(private readonly capability: ContentGenerator, private readonly options: ReviewerPoolOptions) {
    this.logger = options.logger ?? createComponentLogger('reviewer-pool');
  }

  reviewerIds(): string[] {
    return Array.from({ length: this.options.settings.count }, (_, index) => `reviewer-${index + 1}`);
  }

  /**
   * Run one review round
   * @throws QuorumNotMetError when fewer than quorum reviewers succeed
   */
  async review(proposal: Proposal): Promise<ReviewRound> {
    const reviewers = this.reviewerIds();
    const settled = await Promise.allSettled(
      reviewers.map(reviewerId => this.runReviewer(reviewerId, proposal))
    );

    const evaluations: Evaluation[] = [];
    const excluded: ExcludedReviewer[] = [];

    settled.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        evaluations.push(result.value);
        return;
      }
      const failure: unknown = result.reason;
      excluded.push(
        failure instanceof ReviewerFailure
          ? { reviewer_id: failure.reviewerId, reason: failure.reason.message, attempts: failure.attempts }
          : { reviewer_id: reviewers[index] ?? `reviewer-${index + 1}`, reason: ErrorHandler.toError(failure).message, attempts: 0 }
      );
    });

    const round: ReviewRound = {
      proposal_id: proposal.id,
      requested: reviewers.length,
      evaluations,
      excluded
    };

    this.logger.info(
      { proposalId: proposal.id, succeeded: evaluations.length, excluded: excluded.length },
      'Review round finished'
    );

    const { quorum } = this.options.settings;
    if (evaluations.length < quorum) {
      throw new QuorumNotMetError(proposal.id, evaluations.length, quorum, {
        excluded_reviewers: excluded
      });
    }

    return round;
  }

  private async runReviewer(reviewerId: string, proposal: Proposal): Promise<Evaluation> {
    const { timeoutMs, maxAttempts } = this.options.settings;
    let attempts = 0;

    try {
      return await ErrorHandler.retry(
        async attempt => {
          attempts = attempt;
          const reply = await ErrorHandler.withTimeout(
            signal => this.capability.evaluateProposal(
              { proposal, reviewer_id: reviewerId, criteria: REVIEW_CRITERIA },
              { signal, timeoutMs, invocationId: randomUUID(), attempt }
            ),
            timeoutMs,
            () => new CapabilityTimeoutError(`Review by ${reviewerId}`, timeoutMs)
          );
          return this.toEvaluation(reviewerId, proposal.id, reply);
        },
        {
          maxAttempts,
          delayMs: this.options.retry.baseDelayMs,
          backoffMultiplier: this.options.retry.backoffMultiplier,
          shouldRetry: error => ErrorHandler.isRetryable(error),
          onRetry: (attempt, error, delayMs) => {
            this.logger.warn(
              { proposalId: proposal.id, reviewerId, attempt, delayMs, err: error.message },
              'Reviewer failed, retrying'
            );
          }
        }
      );
    } catch (error) {
      const reason = ErrorHandler.toError(error);
      this.logger.warn(
        { proposalId: proposal.id, reviewerId, attempts, err: reason.message },
        'Reviewer excluded from round'
      );
      throw new ReviewerFailure(reviewerId, attempts, reason);
    }
  }

  private toEvaluation(reviewerId: string, proposalId: string, reply: unknown): Evaluation {
    const parsed = parseWithSchema(GeneratedEvaluationSchema, reply);
    if (!parsed.success) {
      throw new InvalidRecordError('evaluation', parsed.errors, { reviewerId, proposalId });
    }
    return { ...parsed.data, reviewer_id: reviewerId, proposal_id: proposalId };
  }
}
