/**
 * Pipeline Types
 *
 * Record types are inferred from the zod schemas so the runtime checks and
 * the static types cannot drift apart.
 */

import type { z } from 'zod';
import type {
  AuditRecordSchema,
  ConsensusDetailSchema,
  CriterionScoresSchema,
  EvaluationSchema,
  ExcludedReviewerSchema,
  GeneratedEvaluationSchema,
  GeneratedProposalSchema,
  ProposalCategorySchema,
  ProposalSchema,
  ProposalStatusSchema,
  RecommendationSchema,
  ReviewCriterionSchema,
  SectionIssueSchema,
  SectionSchema,
  TerminalStatusSchema,
  ValidationSchema
} from '../shared/validation/schemas';

// ============================================================================
// Records
// ============================================================================

export type SectionIssue = z.infer<typeof SectionIssueSchema>;
export type Section = z.infer<typeof SectionSchema>;

export type ProposalStatus = z.infer<typeof ProposalStatusSchema>;
export type TerminalStatus = z.infer<typeof TerminalStatusSchema>;
export type ProposalCategory = z.infer<typeof ProposalCategorySchema>;
export type Proposal = z.infer<typeof ProposalSchema>;
export type GeneratedProposal = z.infer<typeof GeneratedProposalSchema>;

export type ReviewCriterion = z.infer<typeof ReviewCriterionSchema>;
export type CriterionScores = z.infer<typeof CriterionScoresSchema>;
export type Recommendation = z.infer<typeof RecommendationSchema>;
export type GeneratedEvaluation = z.infer<typeof GeneratedEvaluationSchema>;
export type Evaluation = z.infer<typeof EvaluationSchema>;
export type ExcludedReviewer = z.infer<typeof ExcludedReviewerSchema>;
export type ConsensusDetail = z.infer<typeof ConsensusDetailSchema>;
export type Validation = z.infer<typeof ValidationSchema>;

export type AuditRecord = z.infer<typeof AuditRecordSchema>;

// ============================================================================
// Events
// ============================================================================

export interface ProposalCreatedPayload {
  proposal_id: string;
  standard_id: string;
  section_id: string;
  /** Set when a requeued proposal is replayed */
  replay?: boolean;
}

export interface ProposalValidatedPayload {
  proposal_id: string;
  validation_id: string;
  status: TerminalStatus;
  overall_score: number;
  needs_escalation: boolean;
}

export interface ProposalRequeuedPayload {
  proposal_id: string;
  succeeded: number;
  required: number;
}

export interface ProposalGenerationFailedPayload {
  standard_id: string;
  section_id: string;
  error: string;
  message: string;
}

export interface PipelineFailedPayload {
  stage: 'processSection' | 'reviewProposal';
  subject_id: string;
  error: string;
  message: string;
}

/**
 * Topics carried by the pipeline bus and their payloads
 */
export interface PipelineEvents {
  SectionIngested: Section;
  ProposalCreated: ProposalCreatedPayload;
  ProposalValidated: ProposalValidatedPayload;
  ProposalRequeued: ProposalRequeuedPayload;
  ProposalGenerationFailed: ProposalGenerationFailedPayload;
  PipelineFailed: PipelineFailedPayload;
}

export type PipelineTopic = keyof PipelineEvents;

// ============================================================================
// Outcomes
// ============================================================================

export type SectionOutcome =
  | { kind: 'created'; proposal: Proposal }
  | { kind: 'generation_failed'; error: string; message: string };

export type ReviewOutcome =
  | { kind: 'validated'; proposal: Proposal; validation: Validation }
  | { kind: 'requeued'; proposal: Proposal; succeeded: number; required: number }
  | { kind: 'conflict'; proposalId: string; reason: string };

/**
 * Identifies the audit actor for records written by a component
 */
export const ACTORS = {
  orchestrator: 'orchestrator',
  generator: 'proposal-generator',
  reviewers: 'reviewer-pool'
} as const;
