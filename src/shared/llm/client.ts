/**
 * LLM Client
 *
 * Unified client for Anthropic and OpenAI LLM providers.
 * Every call is a fresh, cancellable request: retries and timeouts are
 * owned by the caller, so the SDKs' own retry loops are disabled.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { jsonrepair } from 'jsonrepair';
import type { Logger } from 'pino';
import { createComponentLogger } from '../../service/logger';
import {
  LLMConfig,
  LLMRequest,
  LLMResponse,
  DEFAULT_LLM_CONFIG
} from './types';

/**
 * Unified LLM client supporting both Anthropic and OpenAI
 */
export class LLMClient {
  private config: LLMConfig;
  private anthropicClient?: Anthropic;
  private openaiClient?: OpenAI;
  private logger: Logger;

  constructor(
    config: Partial<LLMConfig> & Pick<LLMConfig, 'provider' | 'apiKey'>,
    logger: Logger = createComponentLogger('llm')
  ) {
    const defaults = DEFAULT_LLM_CONFIG[config.provider];
    this.config = {
      ...defaults,
      ...config,
      model: config.model || defaults.model
    };
    this.logger = logger;

    // Initialize the appropriate client
    if (this.config.provider === 'anthropic') {
      this.anthropicClient = new Anthropic({
        apiKey: this.config.apiKey,
        maxRetries: 0,
        timeout: this.config.timeout
      });
    } else {
      this.openaiClient = new OpenAI({
        apiKey: this.config.apiKey,
        maxRetries: 0,
        timeout: this.config.timeout
      });
    }
  }

  /**
   * Send a completion request to the LLM
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const temperature = request.temperature ?? this.config.temperature;
    const maxTokens = request.maxTokens ?? this.config.maxTokens;
    const model = request.model ?? this.config.model; // Allow per-request model override

    if (!request.messages.some(m => m.role === 'user')) {
      throw new Error('Request must include at least one user message');
    }

    const start = Date.now();
    this.logger.debug(
      { provider: this.config.provider, model, temperature, maxTokens, messages: request.messages.length },
      'LLM request start'
    );

    const response = this.config.provider === 'anthropic'
      ? await this.callAnthropic(request, temperature, maxTokens, model)
      : await this.callOpenAI(request, temperature, maxTokens, model);

    this.logger.debug(
      {
        model: response.model,
        finishReason: response.finishReason ?? 'unknown',
        elapsedMs: Date.now() - start,
        usage: response.usage
      },
      'LLM request end'
    );

    return response;
  }

  /**
   * Call Anthropic API
   */
  private async callAnthropic(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string
  ): Promise<LLMResponse> {
    if (!this.anthropicClient) {
      throw new Error('Anthropic client not initialized');
    }

    const response = await this.anthropicClient.messages.create(
      {
        model,
        max_tokens: maxTokens,
        temperature,
        system: request.systemPrompt || '',
        messages: request.messages.map(m => ({ role: m.role, content: m.content }))
      },
      { signal: request.signal, timeout: request.timeoutMs }
    );

    // Extract text content
    const content = response.content[0];
    if (!content || content.type !== 'text') {
      throw new Error('Unexpected response type from Anthropic');
    }

    return {
      content: content.text,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens
      },
      finishReason: response.stop_reason || undefined
    };
  }

  /**
   * Call OpenAI API
   */
  private async callOpenAI(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string
  ): Promise<LLMResponse> {
    if (!this.openaiClient) {
      throw new Error('OpenAI client not initialized');
    }

    // Build messages array with system prompt if provided
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

    if (request.systemPrompt) {
      messages.push({
        role: 'system',
        content: request.systemPrompt
      });
    }

    for (const message of request.messages) {
      messages.push({ role: message.role, content: message.content });
    }

    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages,
      temperature,
      max_tokens: maxTokens
    };

    if (request.jsonMode && /gpt-4o|gpt-4-turbo|gpt-4\.1/.test(model)) {
      params.response_format = { type: 'json_object' };
    }

    const response = await this.openaiClient.chat.completions.create(params, {
      signal: request.signal,
      timeout: request.timeoutMs
    });

    const choice = response.choices[0];
    if (!choice || !choice.message.content) {
      throw new Error('No content in OpenAI response');
    }

    return {
      content: choice.message.content,
      model: response.model,
      usage: response.usage ? {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens
      } : undefined,
      finishReason: choice.finish_reason || undefined
    };
  }

  /**
   * Parse JSON response from LLM, handling potential formatting issues
   */
  parseJsonResponse(text: string): unknown {
    // Remove markdown code fences if present
    const cleanText = text
      .trim()
      .replace(/^```(?:json)?\s*/i, '')
      .replace(/\s*```$/, '')
      .trim();

    try {
      return JSON.parse(cleanText);
    } catch (error) {
      // Fall back to the outermost object, repaired if needed
      const firstBrace = text.indexOf('{');
      const lastBrace = text.lastIndexOf('}');
      const candidate = firstBrace !== -1 && lastBrace > firstBrace
        ? text.substring(firstBrace, lastBrace + 1)
        : cleanText;

      try {
        return JSON.parse(jsonrepair(candidate));
      } catch {
        const errorMsg = error instanceof Error ? error.message : 'Unknown error';
        throw new Error(
          `Failed to parse LLM response as JSON: ${errorMsg}. Response preview: ${text.substring(0, 200)}`
        );
      }
    }
  }
}
