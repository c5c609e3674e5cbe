/**
 * Content Generator
 *
 * The black-box capability that drafts proposals and acts as a reviewer.
 * Replies are returned unparsed; callers validate them at the boundary.
 *
 * Implementations must throw TransientCapabilityError for failures worth
 * retrying and PermanentCapabilityError for everything else, and must stop
 * work when the signal aborts.
 */

import type {
  Proposal,
  ProposalCategory,
  ReviewCriterion,
  Section,
  SectionIssue
} from '../types';

export interface InvocationOptions {
  /** Aborted when the attempt's deadline passes */
  signal: AbortSignal;
  timeoutMs: number;
  /** Unique per attempt, so no two calls share a cached reply */
  invocationId: string;
  attempt: number;
}

export interface DraftRequest {
  section: Section;
  issues: SectionIssue[];
  /** Category derived from the dominant issue type */
  suggested_category: ProposalCategory;
}

export interface EvaluationRequest {
  proposal: Proposal;
  reviewer_id: string;
  criteria: readonly ReviewCriterion[];
}

export interface ContentGenerator {
  /**
   * Resolves with `{proposed_text, rationale, category?, metadata}`
   */
  draftProposal(request: DraftRequest, options: InvocationOptions): Promise<unknown>;

  /**
   * Resolves with `{criterion_scores, overall_score, recommendation, feedback}`
   */
  evaluateProposal(request: EvaluationRequest, options: InvocationOptions): Promise<unknown>;
}
