/**
 * Proposal State Machine
 * Single source of truth for proposal statuses and the edges between them.
 *
 *   drafted → under_review
 *   under_review → approved | approved_with_modifications | rejected
 *   under_review → drafted (quorum not met, requeued)
 *
 * Terminal statuses have no outgoing edges.
 */

import type { ProposalStatus } from '../types';

export const TRANSITIONS: Record<ProposalStatus, readonly ProposalStatus[]> = {
  drafted: ['under_review'],
  under_review: ['approved', 'approved_with_modifications', 'rejected', 'drafted'],
  approved: [],
  approved_with_modifications: [],
  rejected: []
};

export function isValidTransition(from: ProposalStatus, to: ProposalStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function getValidTransitions(from: ProposalStatus): readonly ProposalStatus[] {
  return TRANSITIONS[from];
}
