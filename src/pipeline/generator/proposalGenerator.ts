/**
 * Proposal Generator
 *
 * Turns an ingested section and its issues into one validated proposal in
 * `drafted` status. The proposal is returned, not persisted.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { createComponentLogger } from '../../service/logger';
import { ErrorHandler } from '../../shared/errors/handler';
import {
  GeneratedProposalSchema,
  ProposalCategorySchema,
  ProposalSchema,
  SectionSchema,
  normalizeText
} from '../../shared/validation/schemas';
import { parseWithSchema } from '../../shared/validation/validator';
import type { GeneratorSettings, RetrySettings } from '../config';
import {
  CapabilityTimeoutError,
  GenerationFailedError,
  InvalidProposalError,
  InvalidRecordError
} from '../errors';
import type { Proposal, ProposalCategory, Section } from '../types';
import type { ContentGenerator, DraftRequest } from '../capability/contentGenerator';
import { dominantCategory } from './categories';

export interface ProposalGeneratorOptions {
  settings: GeneratorSettings;
  retry: RetrySettings;
  logger?: Logger;
  now?: () => Date;
  idFactory?: () => string;
}

export interface GenerateOptions {
  /** Id of the proposal this one revises */
  supersedes?: string | null;
}

export class ProposalGenerator {
  private logger: Logger;
  private now: () => Date;
  private idFactory: () => string;

  constructor(private readonly capability: ContentGenerator, private readonly options: ProposalGeneratorOptions) {
    this.logger = options.logger ?? createComponentLogger('proposal-generator');
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * @throws InvalidRecordError if the section is malformed
   * @throws InvalidProposalError if the section has no issues or the reply breaks the proposal invariants
   * @throws GenerationFailedError when retries are exhausted or the capability fails permanently
   */
  async generate(input: Section, options: GenerateOptions = {}): Promise<Proposal> {
    const parsedSection = parseWithSchema(SectionSchema, input);
    if (!parsedSection.success) {
      throw new InvalidRecordError('section', parsedSection.errors);
    }
    const section = parsedSection.data;
    const sectionKey = `${section.standard_id}/${section.section_id}`;

    if (section.issues.length === 0) {
      throw new InvalidProposalError(
        [{ field: 'issues', message: 'Section has no issues to address' }],
        { section: sectionKey }
      );
    }

    const request: DraftRequest = {
      section,
      issues: section.issues,
      suggested_category: dominantCategory(section.issues)
    };

    const { timeoutMs, maxAttempts } = this.options.settings;
    let attempts = 0;
    let reply: unknown;

    try {
      reply = await ErrorHandler.retry(
        attempt => {
          attempts = attempt;
          return ErrorHandler.withTimeout(
            signal => this.capability.draftProposal(request, {
              signal,
              timeoutMs,
              invocationId: randomUUID(),
              attempt
            }),
            timeoutMs,
            () => new CapabilityTimeoutError('Proposal generation', timeoutMs)
          );
        },
        {
          maxAttempts,
          delayMs: this.options.retry.baseDelayMs,
          backoffMultiplier: this.options.retry.backoffMultiplier,
          shouldRetry: error => ErrorHandler.isRetryable(error),
          onRetry: (attempt, error, delayMs) => {
            this.logger.warn(
              { section: sectionKey, attempt, delayMs, err: error.message },
              'Proposal generation failed, retrying'
            );
          }
        }
      );
    } catch (error) {
      throw new GenerationFailedError(sectionKey, attempts, error);
    }

    const proposal = this.buildProposal(section, reply, request.suggested_category, options.supersedes ?? null);
    this.logger.info(
      { proposalId: proposal.id, section: sectionKey, category: proposal.category, attempts },
      'Proposal drafted'
    );
    return proposal;
  }

  private buildProposal(
    section: Section,
    reply: unknown,
    suggestedCategory: ProposalCategory,
    supersedes: string | null
  ): Proposal {
    const sectionKey = `${section.standard_id}/${section.section_id}`;
    const generated = parseWithSchema(GeneratedProposalSchema, reply);
    if (!generated.success) {
      throw new InvalidProposalError(generated.errors, { section: sectionKey });
    }

    if (normalizeText(generated.data.proposed_text) === normalizeText(section.content)) {
      throw new InvalidProposalError(
        [{ field: 'proposed_text', message: 'proposed_text must differ from current_text' }],
        { section: sectionKey }
      );
    }

    const category = ProposalCategorySchema.safeParse(generated.data.category);
    const timestamp = this.now().toISOString();

    const candidate = {
      id: this.idFactory(),
      standard_id: section.standard_id,
      section_id: section.section_id,
      category: category.success ? category.data : suggestedCategory,
      current_text: section.content,
      proposed_text: generated.data.proposed_text,
      rationale: generated.data.rationale,
      status: 'drafted',
      created_at: timestamp,
      updated_at: timestamp,
      supersedes
    };

    const parsed = parseWithSchema(ProposalSchema, candidate);
    if (!parsed.success) {
      throw new InvalidProposalError(parsed.errors, { section: sectionKey });
    }
    return parsed.data;
  }
}
