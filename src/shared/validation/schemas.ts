/**
 * Validation Schemas
 *
 * Zod schemas for every record that crosses a component boundary: ingested
 * sections, proposals, reviewer evaluations, validations, audit records, and
 * the raw replies of the content-generation capability.
 */

import { z } from 'zod';

const NonEmptyString = z.string().trim().min(1, 'Value cannot be empty or whitespace only');
const Sha256Hex = z.string().regex(/^[0-9a-f]{64}$/, 'Expected a hex-encoded SHA-256 digest');
const IsoTimestamp = z.string().datetime({ offset: true });

/**
 * Collapse whitespace so formatting-only rewrites compare equal
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

// ============================================================================
// Sections
// ============================================================================

export const IssueSeveritySchema = z.enum(['low', 'medium', 'high']);

export const SectionIssueSchema = z.object({
  type: NonEmptyString,
  description: NonEmptyString,
  severity: IssueSeveritySchema
});

export const SectionSchema = z.object({
  standard_id: NonEmptyString,
  section_id: NonEmptyString,
  title: z.string(),
  content: NonEmptyString,
  issues: z.array(SectionIssueSchema).default([])
});

// ============================================================================
// Proposals
// ============================================================================

export const PROPOSAL_STATUSES = [
  'drafted',
  'under_review',
  'approved',
  'approved_with_modifications',
  'rejected'
] as const;

export const TERMINAL_STATUSES = ['approved', 'approved_with_modifications', 'rejected'] as const;

export const PROPOSAL_CATEGORIES = [
  'definition',
  'accounting_treatment',
  'transaction_structure',
  'ambiguity_resolution',
  'new_guidance'
] as const;

export const ProposalStatusSchema = z.enum(PROPOSAL_STATUSES);
export const TerminalStatusSchema = z.enum(TERMINAL_STATUSES);
export const ProposalCategorySchema = z.enum(PROPOSAL_CATEGORIES);

export const ProposalSchema = z.object({
  id: NonEmptyString,
  standard_id: NonEmptyString,
  section_id: NonEmptyString,
  category: ProposalCategorySchema,
  current_text: NonEmptyString,
  proposed_text: NonEmptyString,
  rationale: NonEmptyString,
  status: ProposalStatusSchema,
  created_at: IsoTimestamp,
  updated_at: IsoTimestamp,
  supersedes: z.string().nullable()
}).refine(
  proposal => normalizeText(proposal.proposed_text) !== normalizeText(proposal.current_text),
  { message: 'proposed_text must differ from current_text', path: ['proposed_text'] }
);

/**
 * Reply of the capability when drafting a proposal
 */
export const GeneratedProposalSchema = z.object({
  proposed_text: z.string().trim().min(1, 'proposed_text cannot be empty'),
  rationale: z.string().trim().min(1, 'rationale cannot be empty'),
  category: z.string().optional(),
  metadata: z.record(z.unknown()).default({})
});

// ============================================================================
// Evaluations & validations
// ============================================================================

export const REVIEW_CRITERIA = [
  'shariah_compliance',
  'technical_accuracy',
  'clarity_and_precision',
  'practical_implementation',
  'consistency',
  'factual_accuracy'
] as const;

export const ReviewCriterionSchema = z.enum(REVIEW_CRITERIA);
export const ScoreSchema = z.number().finite().min(0).max(10);
export const RecommendationSchema = z.enum(['approve', 'revise', 'reject']);
export const CriterionScoresSchema = z.record(ReviewCriterionSchema, ScoreSchema);

/**
 * Reply of the capability when acting as a reviewer
 */
export const GeneratedEvaluationSchema = z.object({
  criterion_scores: CriterionScoresSchema.default({}),
  overall_score: ScoreSchema,
  recommendation: RecommendationSchema,
  feedback: z.string().default('')
});

export const EvaluationSchema = GeneratedEvaluationSchema.extend({
  reviewer_id: NonEmptyString,
  proposal_id: NonEmptyString
});

export const ExcludedReviewerSchema = z.object({
  reviewer_id: z.string(),
  reason: z.string(),
  attempts: z.number().int().nonnegative()
});

export const ConsensusDetailSchema = z.object({
  mean_score: z.number(),
  spread: z.number().nonnegative(),
  needs_escalation: z.boolean(),
  veto_applied: z.boolean(),
  criterion_scores: CriterionScoresSchema,
  recommendation_tally: z.object({
    approve: z.number().int().nonnegative(),
    revise: z.number().int().nonnegative(),
    reject: z.number().int().nonnegative()
  }),
  reviewers_requested: z.number().int().positive(),
  reviewers_succeeded: z.number().int().nonnegative(),
  excluded_reviewers: z.array(ExcludedReviewerSchema),
  thresholds: z.object({
    approve_threshold: z.number(),
    modify_threshold: z.number(),
    escalation_spread: z.number()
  })
});

export const ValidationSchema = z.object({
  id: NonEmptyString,
  proposal_id: NonEmptyString,
  overall_score: ScoreSchema,
  status: TerminalStatusSchema,
  evaluations: z.array(EvaluationSchema).min(1),
  consensus_detail: ConsensusDetailSchema,
  created_at: IsoTimestamp
});

// ============================================================================
// Audit
// ============================================================================

export const AuditRecordSchema = z.object({
  seq: z.number().int().positive(),
  timestamp: IsoTimestamp,
  actor: NonEmptyString,
  event_type: NonEmptyString,
  subject_id: NonEmptyString,
  payload: z.record(z.unknown()),
  payload_hash: Sha256Hex,
  prev_hash: Sha256Hex,
  hash: Sha256Hex
});
