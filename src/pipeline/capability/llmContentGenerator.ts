/**
 * LLM Content Generator
 *
 * ContentGenerator backed by the shared LLMClient. Maps SDK failures onto
 * the pipeline's transient/permanent split so retry decisions stay with
 * the caller.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import type { Logger } from 'pino';
import { createComponentLogger } from '../../service/logger';
import { ErrorHandler } from '../../shared/errors/handler';
import { LLMClient } from '../../shared/llm/client';
import { PermanentCapabilityError, PipelineError, TransientCapabilityError } from '../errors';
import type {
  ContentGenerator,
  DraftRequest,
  EvaluationRequest,
  InvocationOptions
} from './contentGenerator';
import {
  buildProposalSystemPrompt,
  buildProposalUserPrompt,
  buildReviewerSystemPrompt,
  buildReviewerUserPrompt
} from './prompts';

export interface LLMContentGeneratorOptions {
  draftTemperature?: number;
  reviewTemperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

/**
 * Classify an SDK failure as transient (retry) or permanent
 */
export function classifyCapabilityError(error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  if (
    error instanceof Anthropic.APIConnectionError ||
    error instanceof OpenAI.APIConnectionError ||
    error instanceof Anthropic.APIUserAbortError ||
    error instanceof OpenAI.APIUserAbortError
  ) {
    return new TransientCapabilityError(error.message, { cause: error });
  }

  if (error instanceof Anthropic.APIError || error instanceof OpenAI.APIError) {
    const status = error.status;
    if (status === undefined || TRANSIENT_STATUSES.has(status) || status >= 500) {
      return new TransientCapabilityError(error.message, { status, cause: error });
    }
    return new PermanentCapabilityError(error.message, { status, cause: error });
  }

  const normalized = ErrorHandler.toError(error);
  return ErrorHandler.isRetryable(normalized)
    ? new TransientCapabilityError(normalized.message, { cause: error })
    : new PermanentCapabilityError(normalized.message, { cause: error });
}

export class LLMContentGenerator implements ContentGenerator {
  private logger: Logger;
  private draftTemperature: number;
  private reviewTemperature: number;
  private maxTokens: number;

  constructor(private readonly client: LLMClient, options: LLMContentGeneratorOptions = {}) {
    this.logger = options.logger ?? createComponentLogger('content-generator');
    this.draftTemperature = options.draftTemperature ?? 0.2;
    this.reviewTemperature = options.reviewTemperature ?? 0.7;
    this.maxTokens = options.maxTokens ?? 4000;
  }

  async draftProposal(request: DraftRequest, options: InvocationOptions): Promise<unknown> {
    return this.invoke('draft', options, buildProposalSystemPrompt(), buildProposalUserPrompt(request), this.draftTemperature);
  }

  async evaluateProposal(request: EvaluationRequest, options: InvocationOptions): Promise<unknown> {
    return this.invoke(
      'evaluate',
      options,
      buildReviewerSystemPrompt(request),
      buildReviewerUserPrompt(request),
      this.reviewTemperature
    );
  }

  private async invoke(
    kind: 'draft' | 'evaluate',
    options: InvocationOptions,
    systemPrompt: string,
    userPrompt: string,
    temperature: number
  ): Promise<unknown> {
    this.logger.debug({ kind, invocationId: options.invocationId, attempt: options.attempt }, 'Invoking model');

    let content: string;
    try {
      const response = await this.client.complete({
        systemPrompt,
        messages: [{ role: 'user', content: userPrompt }],
        temperature,
        maxTokens: this.maxTokens,
        jsonMode: true,
        signal: options.signal,
        timeoutMs: options.timeoutMs
      });
      content = response.content;
    } catch (error) {
      throw classifyCapabilityError(error);
    }

    try {
      return this.client.parseJsonResponse(content);
    } catch (error) {
      throw new PermanentCapabilityError(ErrorHandler.toError(error).message, { cause: error });
    }
  }
}
