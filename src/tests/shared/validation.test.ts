/**
 * Tests for boundary schemas and validator helpers
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  GeneratedEvaluationSchema,
  GeneratedProposalSchema,
  ProposalSchema,
  SectionSchema,
  normalizeText
} from '../../shared/validation/schemas';
import {
  formatValidationErrors,
  parseWithSchema,
  validateWithSchema
} from '../../shared/validation/validator';
import { makeProposal, makeSection } from '../helpers/fixtures';

describe('normalizeText', () => {
  it('collapses runs of whitespace and trims', () => {
    expect(normalizeText('  Profit\n\tshall   be  recognised ')).toBe('Profit shall be recognised');
  });

  it('is idempotent', () => {
    fc.assert(
      fc.property(fc.string(), text => {
        expect(normalizeText(normalizeText(text))).toBe(normalizeText(text));
      })
    );
  });
});

describe('SectionSchema', () => {
  it('defaults issues to an empty list', () => {
    const { issues: _issues, ...withoutIssues } = makeSection();
    const outcome = parseWithSchema(SectionSchema, withoutIssues);

    expect(outcome.success).toBe(true);
    if (outcome.success) {
      expect(outcome.data.issues).toEqual([]);
    }
  });

  it('reports whitespace-only content and unknown severities by field', () => {
    const result = validateWithSchema(SectionSchema, {
      ...makeSection({ content: '   ' }),
      issues: [{ type: 'gap', description: 'Missing guidance', severity: 'urgent' }]
    });

    expect(result.isValid).toBe(false);
    expect(result.errors.map(e => e.field)).toEqual(['content', 'issues.0.severity']);
  });

  it('reports a non-object at the root', () => {
    const result = validateWithSchema(SectionSchema, 'not a section');
    expect(result.errors).toEqual([{ field: '(root)', message: 'Expected object, received string' }]);
  });
});

describe('ProposalSchema', () => {
  it('accepts a well-formed proposal', () => {
    expect(ProposalSchema.safeParse(makeProposal()).success).toBe(true);
  });

  it('rejects a proposal whose text only differs in whitespace', () => {
    const outcome = parseWithSchema(
      ProposalSchema,
      makeProposal({ proposed_text: ' Profit shall be\nrecognised when earned. ' })
    );

    expect(outcome).toEqual({
      success: false,
      errors: [{ field: 'proposed_text', message: 'proposed_text must differ from current_text' }]
    });
  });

  it('rejects an unknown status', () => {
    const outcome = parseWithSchema(ProposalSchema, { ...makeProposal(), status: 'published' });
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.errors[0].field).toBe('status');
    }
  });

  it('rejects timestamps that are not ISO-8601', () => {
    const outcome = parseWithSchema(ProposalSchema, makeProposal({ created_at: 'yesterday' }));
    expect(outcome.success).toBe(false);
  });
});

describe('GeneratedProposalSchema', () => {
  it('trims text and defaults metadata', () => {
    const outcome = parseWithSchema(GeneratedProposalSchema, {
      proposed_text: '  New text.  ',
      rationale: 'Because.'
    });

    expect(outcome).toEqual({
      success: true,
      data: { proposed_text: 'New text.', rationale: 'Because.', metadata: {} }
    });
  });

  it('rejects blank proposed text', () => {
    const outcome = parseWithSchema(GeneratedProposalSchema, { proposed_text: ' ', rationale: 'r' });
    expect(outcome).toEqual({
      success: false,
      errors: [{ field: 'proposed_text', message: 'proposed_text cannot be empty' }]
    });
  });
});

describe('GeneratedEvaluationSchema', () => {
  it('rejects scores outside 0..10', () => {
    const outcome = parseWithSchema(GeneratedEvaluationSchema, {
      overall_score: 11,
      recommendation: 'approve'
    });
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.errors.map(e => e.field)).toEqual(['overall_score']);
    }
  });

  it('rejects unknown criteria keys', () => {
    const outcome = parseWithSchema(GeneratedEvaluationSchema, {
      criterion_scores: { elegance: 7 },
      overall_score: 7,
      recommendation: 'revise'
    });
    expect(outcome.success).toBe(false);
  });

  it('accepts any score in range', () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0, max: 10, noNaN: true }),
        fc.constantFrom('approve', 'revise', 'reject'),
        (score, recommendation) => {
          const outcome = parseWithSchema(GeneratedEvaluationSchema, {
            overall_score: score,
            recommendation
          });
          expect(outcome.success).toBe(true);
        }
      )
    );
  });
});

describe('formatValidationErrors', () => {
  it('joins field and message pairs', () => {
    expect(
      formatValidationErrors([
        { field: 'content', message: 'Required' },
        { field: 'issues.0.severity', message: 'Invalid enum value' }
      ])
    ).toBe('content: Required; issues.0.severity: Invalid enum value');
  });
});
