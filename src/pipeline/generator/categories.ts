/**
 * Maps free-form issue types onto proposal categories.
 */

import type { ProposalCategory, SectionIssue } from '../types';

const CATEGORY_PATTERNS: { pattern: RegExp; category: ProposalCategory }[] = [
  { pattern: /defin|terminolog|meaning/i, category: 'definition' },
  { pattern: /account|measure|recogni|disclos|valuation/i, category: 'accounting_treatment' },
  { pattern: /struct|transaction|contract|ownership/i, category: 'transaction_structure' },
  { pattern: /ambigu|unclear|vague|inconsisten|conflict/i, category: 'ambiguity_resolution' }
];

const SEVERITY_WEIGHT: Record<SectionIssue['severity'], number> = {
  high: 3,
  medium: 2,
  low: 1
};

export function categoryForIssue(issue: SectionIssue): ProposalCategory {
  const match = CATEGORY_PATTERNS.find(({ pattern }) => pattern.test(issue.type));
  return match?.category ?? 'new_guidance';
}

/**
 * Category with the highest severity-weighted issue count.
 * Ties go to the category seen first.
 */
export function dominantCategory(issues: SectionIssue[]): ProposalCategory {
  const weights = new Map<ProposalCategory, number>();
  for (const issue of issues) {
    const category = categoryForIssue(issue);
    weights.set(category, (weights.get(category) ?? 0) + SEVERITY_WEIGHT[issue.severity]);
  }

  let best: ProposalCategory = 'new_guidance';
  let bestWeight = 0;
  for (const [category, weight] of weights) {
    if (weight > bestWeight) {
      best = category;
      bestWeight = weight;
    }
  }
  return best;
}
