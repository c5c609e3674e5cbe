/**
 * Consensus Engine
 *
 * Reduces a set of reviewer evaluations into one validation. Pure: the same
 * evaluations and thresholds always yield the same decision.
 *
 * 1. overall = mean of reviewer overall scores, clamped to [0, 10], 2 decimals
 * 2. per-criterion means over the reviewers that scored the criterion
 * 3. overall >= approve → approved; >= modify → approved_with_modifications;
 *    else rejected. Unanimous reject recommendations veto to rejected.
 * 4. spread = max - min; spread > escalation threshold flags escalation
 */

import { randomUUID } from 'crypto';
import { REVIEW_CRITERIA } from '../../shared/validation/schemas';
import type { ConsensusThresholds } from '../config';
import type {
  ConsensusDetail,
  CriterionScores,
  Evaluation,
  ExcludedReviewer,
  Proposal,
  TerminalStatus,
  Validation
} from '../types';

export interface ConsensusResult {
  status: TerminalStatus;
  overall_score: number;
  detail: ConsensusDetail;
}

export interface RoundSummary {
  requested: number;
  excluded: ExcludedReviewer[];
}

export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

export function clampScore(value: number): number {
  return Math.min(10, Math.max(0, value));
}

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Status implied by a score alone
 */
export function statusForScore(score: number, thresholds: ConsensusThresholds): TerminalStatus {
  if (score >= thresholds.approveThreshold) return 'approved';
  if (score >= thresholds.modifyThreshold) return 'approved_with_modifications';
  return 'rejected';
}

export function computeConsensus(
  evaluations: Evaluation[],
  thresholds: ConsensusThresholds,
  round: RoundSummary = { requested: evaluations.length, excluded: [] }
): ConsensusResult {
  if (evaluations.length === 0) {
    throw new Error('Consensus requires at least one evaluation');
  }

  // Cut-offs apply to the unrounded values; rounding is for the stored record only
  const scores = evaluations.map(evaluation => evaluation.overall_score);
  const rawMean = clampScore(mean(scores));
  const rawSpread = Math.max(...scores) - Math.min(...scores);
  const overall = roundScore(rawMean);

  const criterionScores: CriterionScores = {};
  for (const criterion of REVIEW_CRITERIA) {
    const scored = evaluations
      .map(evaluation => evaluation.criterion_scores[criterion])
      .filter((score): score is number => score !== undefined);
    if (scored.length > 0) {
      criterionScores[criterion] = roundScore(clampScore(mean(scored)));
    }
  }

  const tally = { approve: 0, revise: 0, reject: 0 };
  for (const evaluation of evaluations) {
    tally[evaluation.recommendation]++;
  }

  const scoreStatus = statusForScore(rawMean, thresholds);
  const unanimousReject = tally.reject === evaluations.length;
  const vetoApplied = unanimousReject && scoreStatus !== 'rejected';

  return {
    status: unanimousReject ? 'rejected' : scoreStatus,
    overall_score: overall,
    detail: {
      mean_score: overall,
      spread: roundScore(rawSpread),
      needs_escalation: rawSpread > thresholds.escalationSpread,
      veto_applied: vetoApplied,
      criterion_scores: criterionScores,
      recommendation_tally: tally,
      reviewers_requested: round.requested,
      reviewers_succeeded: evaluations.length,
      excluded_reviewers: round.excluded,
      thresholds: {
        approve_threshold: thresholds.approveThreshold,
        modify_threshold: thresholds.modifyThreshold,
        escalation_spread: thresholds.escalationSpread
      }
    }
  };
}

/**
 * Assemble the validation record for a proposal
 */
export function buildValidation(
  proposal: Proposal,
  evaluations: Evaluation[],
  consensus: ConsensusResult,
  options: { id?: string; now?: Date } = {}
): Validation {
  return {
    id: options.id ?? randomUUID(),
    proposal_id: proposal.id,
    overall_score: consensus.overall_score,
    status: consensus.status,
    evaluations,
    consensus_detail: consensus.detail,
    created_at: (options.now ?? new Date()).toISOString()
  };
}
