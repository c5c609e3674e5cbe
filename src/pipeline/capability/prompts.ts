/**
 * Prompts
 *
 * System and user prompts for drafting enhancement proposals and for
 * reviewing them. Both ask for a single JSON object reply.
 */

import { PROPOSAL_CATEGORIES } from '../../shared/validation/schemas';
import type { DraftRequest, EvaluationRequest } from './contentGenerator';

const CATEGORY_GUIDE: Record<(typeof PROPOSAL_CATEGORIES)[number], string> = {
  definition: 'clarify or add a definition of a term used by the standard',
  accounting_treatment: 'specify recognition, measurement or disclosure requirements',
  transaction_structure: 'describe how the contract or transaction must be structured',
  ambiguity_resolution: 'remove wording that admits more than one reading',
  new_guidance: 'cover a situation the standard does not yet address'
};

export function buildProposalSystemPrompt(): string {
  const categories = PROPOSAL_CATEGORIES
    .map(category => `- ${category}: ${CATEGORY_GUIDE[category]}`)
    .join('\n');

  return `You are a drafting specialist for Islamic finance accounting standards. You propose precise edits to standard text that resolve the issues reviewers have raised.

═══════════════════════════════════════════════════════════════════════════════
RULES
═══════════════════════════════════════════════════════════════════════════════

1. Rewrite only the section you are given. Keep its numbering and defined terms.
2. Every change must trace back to at least one listed issue.
3. The proposed text must differ from the current text in substance, not only in formatting.
4. Stay consistent with Shariah principles: no riba, no gharar, no maysir.

═══════════════════════════════════════════════════════════════════════════════
CATEGORIES
═══════════════════════════════════════════════════════════════════════════════

${categories}

Return JSON only, in this shape:
{
  "proposed_text": "full replacement text for the section",
  "rationale": "why the change resolves the listed issues",
  "category": "one of the categories above",
  "metadata": {}
}`;
}

export function buildProposalUserPrompt(request: DraftRequest): string {
  const { section, issues, suggested_category } = request;
  const issueLines = issues
    .map((issue, index) => `${index + 1}. [${issue.severity}] ${issue.type}: ${issue.description}`)
    .join('\n');

  return `STANDARD: ${section.standard_id}
SECTION: ${section.section_id}${section.title ? ` (${section.title})` : ''}

CURRENT TEXT:
${section.content}

ISSUES:
${issueLines}

Suggested category: ${suggested_category}`;
}

export function buildReviewerSystemPrompt(request: EvaluationRequest): string {
  const criteria = request.criteria.map(criterion => `- ${criterion}`).join('\n');

  return `You are an independent reviewer (${request.reviewer_id}) on a standards board. You score a proposed edit to an Islamic finance accounting standard. You have not seen other reviewers' opinions.

Score each criterion from 0 to 10. Omit a criterion only if it does not apply.
${criteria}

Then give an overall score from 0 to 10 and a recommendation:
- approve: ready to adopt as written
- revise: sound direction, needs changes
- reject: should not be adopted

Return JSON only, in this shape:
{
  "criterion_scores": { "<criterion>": <number> },
  "overall_score": <number>,
  "recommendation": "approve" | "revise" | "reject",
  "feedback": "short justification"
}`;
}

export function buildReviewerUserPrompt(request: EvaluationRequest): string {
  const { proposal } = request;

  return `STANDARD: ${proposal.standard_id}
SECTION: ${proposal.section_id}
CATEGORY: ${proposal.category}

CURRENT TEXT:
${proposal.current_text}

PROPOSED TEXT:
${proposal.proposed_text}

RATIONALE:
${proposal.rationale}`;
}
