/**
 * Test fixtures and in-process fakes for the pipeline.
 */

import { resolvePipelineConfig, type PipelineConfig } from '../../pipeline/config';
import type { ContentGenerator, DraftRequest, EvaluationRequest, InvocationOptions } from '../../pipeline/capability/contentGenerator';
import type { Evaluation, Proposal, Section } from '../../pipeline/types';
import type {
  QueryOptions,
  RecordFilter,
  RecordMutator,
  RecordStore,
  StoredRecord
} from '../../shared/storage/interface';
import { MemoryRecordStore } from '../../shared/storage/memoryStorage';

export const FIXED_NOW = new Date('2025-01-15T10:00:00.000Z');

export function fixedClock(): () => Date {
  return () => FIXED_NOW;
}

/**
 * Pipeline config with short deadlines and near-zero backoff
 */
export function testPipelineConfig(): PipelineConfig {
  return resolvePipelineConfig({
    reviewers: { count: 3, quorum: 2, timeoutMs: 50, maxAttempts: 3 },
    generator: { timeoutMs: 50, maxAttempts: 3 },
    retry: { baseDelayMs: 1, backoffMultiplier: 2 }
  });
}

export function makeSection(overrides: Partial<Section> = {}): Section {
  return {
    standard_id: 'FAS-4',
    section_id: '3.2',
    title: 'Recognition of profit',
    content: 'Profit shall be recognised when earned.',
    issues: [
      { type: 'ambiguity', description: 'Timing of recognition is unclear.', severity: 'high' }
    ],
    ...overrides
  };
}

export function makeProposal(overrides: Partial<Proposal> = {}): Proposal {
  return {
    id: 'proposal-1',
    standard_id: 'FAS-4',
    section_id: '3.2',
    category: 'ambiguity_resolution',
    current_text: 'Profit shall be recognised when earned.',
    proposed_text: 'Profit shall be recognised over the financing period using the effective rate.',
    rationale: 'Removes the ambiguity about timing.',
    status: 'drafted',
    created_at: FIXED_NOW.toISOString(),
    updated_at: FIXED_NOW.toISOString(),
    supersedes: null,
    ...overrides
  };
}

export function makeEvaluation(
  overall: number,
  recommendation: Evaluation['recommendation'],
  overrides: Partial<Evaluation> = {}
): Evaluation {
  return {
    reviewer_id: 'reviewer-1',
    proposal_id: 'proposal-1',
    criterion_scores: {},
    overall_score: overall,
    recommendation,
    feedback: '',
    ...overrides
  };
}

export function draftReply(proposedText = 'Profit shall be recognised over the financing period.'): Record<string, unknown> {
  return {
    proposed_text: proposedText,
    rationale: 'Clarifies when profit is recognised.',
    category: 'ambiguity_resolution',
    metadata: {}
  };
}

export function evaluationReply(
  overall: number,
  recommendation: Evaluation['recommendation'] = 'approve'
): Record<string, unknown> {
  return {
    criterion_scores: { shariah_compliance: overall, clarity_and_precision: overall },
    overall_score: overall,
    recommendation,
    feedback: 'ok'
  };
}

type DraftBehaviour = (request: DraftRequest, options: InvocationOptions) => Promise<unknown>;
type EvaluateBehaviour = (request: EvaluationRequest, options: InvocationOptions) => Promise<unknown>;

/**
 * Scripted content generator that records every invocation
 */
export class FakeContentGenerator implements ContentGenerator {
  readonly draftCalls: Array<{ request: DraftRequest; options: InvocationOptions }> = [];
  readonly evaluateCalls: Array<{ request: EvaluationRequest; options: InvocationOptions }> = [];

  constructor(
    public draft: DraftBehaviour = async () => draftReply(),
    public evaluate: EvaluateBehaviour = async () => evaluationReply(9)
  ) {}

  draftProposal(request: DraftRequest, options: InvocationOptions): Promise<unknown> {
    this.draftCalls.push({ request, options });
    return this.draft(request, options);
  }

  evaluateProposal(request: EvaluationRequest, options: InvocationOptions): Promise<unknown> {
    this.evaluateCalls.push({ request, options });
    return this.evaluate(request, options);
  }
}

/**
 * Resolves only when the signal aborts, with a reply that is never used
 */
export function hangUntilAborted(signal: AbortSignal): Promise<unknown> {
  return new Promise(resolve => {
    signal.addEventListener('abort', () => resolve(null), { once: true });
  });
}

/**
 * Memory store whose writes to selected collections can be made to fail
 */
export class FlakyRecordStore implements RecordStore {
  readonly inner = new MemoryRecordStore();
  private failing = new Set<string>();

  failWrites(collection: string): void {
    this.failing.add(collection);
  }

  heal(collection: string): void {
    this.failing.delete(collection);
  }

  private check(collection: string): void {
    if (this.failing.has(collection)) {
      throw new Error(`disk full while writing ${collection}`);
    }
  }

  async put(collection: string, key: string, record: StoredRecord): Promise<void> {
    this.check(collection);
    return this.inner.put(collection, key, record);
  }

  async insert(collection: string, key: string, record: StoredRecord): Promise<void> {
    this.check(collection);
    return this.inner.insert(collection, key, record);
  }

  get(collection: string, key: string): Promise<StoredRecord | null> {
    return this.inner.get(collection, key);
  }

  query(collection: string, filter?: RecordFilter, options?: QueryOptions): Promise<StoredRecord[]> {
    return this.inner.query(collection, filter, options);
  }

  async update(collection: string, key: string, mutate: RecordMutator): Promise<StoredRecord | null> {
    this.check(collection);
    return this.inner.update(collection, key, mutate);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}
