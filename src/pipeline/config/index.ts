/**
 * Pipeline Configuration
 *
 * Tunables for reviewer dispatch, proposal generation, retry backoff and the
 * consensus thresholds. Defaults follow the reference scoring rule; every
 * value can be overridden by the service configuration.
 */

import { ConfigurationError } from '../../shared/errors/types';

export interface ReviewerSettings {
  /** Reviewers dispatched per proposal */
  count: number;
  /** Minimum successful evaluations needed to finalize a validation */
  quorum: number;
  /** Deadline per reviewer attempt */
  timeoutMs: number;
  maxAttempts: number;
}

export interface GeneratorSettings {
  timeoutMs: number;
  maxAttempts: number;
}

export interface RetrySettings {
  baseDelayMs: number;
  backoffMultiplier: number;
}

export interface ConsensusThresholds {
  /** Mean score at or above which a proposal is approved */
  approveThreshold: number;
  /** Mean score at or above which a proposal is approved with modifications */
  modifyThreshold: number;
  /** Reviewer score spread above which the validation is flagged for escalation */
  escalationSpread: number;
}

export interface PipelineConfig {
  reviewers: ReviewerSettings;
  generator: GeneratorSettings;
  retry: RetrySettings;
  consensus: ConsensusThresholds;
}

export type PipelineConfigOverrides = {
  [K in keyof PipelineConfig]?: Partial<PipelineConfig[K]>;
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  reviewers: {
    count: 3,
    quorum: 2,
    timeoutMs: 30000,
    maxAttempts: 3
  },
  generator: {
    timeoutMs: 60000,
    maxAttempts: 3
  },
  retry: {
    baseDelayMs: 500,
    backoffMultiplier: 2
  },
  consensus: {
    approveThreshold: 8,
    modifyThreshold: 5,
    escalationSpread: 4
  }
};

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolvePipelineConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  const config: PipelineConfig = {
    reviewers: { ...DEFAULT_PIPELINE_CONFIG.reviewers, ...overrides.reviewers },
    generator: { ...DEFAULT_PIPELINE_CONFIG.generator, ...overrides.generator },
    retry: { ...DEFAULT_PIPELINE_CONFIG.retry, ...overrides.retry },
    consensus: { ...DEFAULT_PIPELINE_CONFIG.consensus, ...overrides.consensus }
  };
  validatePipelineConfig(config);
  return config;
}

/**
 * Throws ConfigurationError listing every invalid setting
 */
export function validatePipelineConfig(config: PipelineConfig): void {
  const errors: string[] = [];
  const { reviewers, generator, retry, consensus } = config;

  if (!Number.isInteger(reviewers.count) || reviewers.count < 1) {
    errors.push('reviewers.count must be a positive integer');
  }
  if (!Number.isInteger(reviewers.quorum) || reviewers.quorum < 1) {
    errors.push('reviewers.quorum must be a positive integer');
  } else if (reviewers.quorum > reviewers.count) {
    errors.push(`reviewers.quorum (${reviewers.quorum}) cannot exceed reviewers.count (${reviewers.count})`);
  }
  if (reviewers.timeoutMs <= 0) errors.push('reviewers.timeoutMs must be greater than 0');
  if (!Number.isInteger(reviewers.maxAttempts) || reviewers.maxAttempts < 1) {
    errors.push('reviewers.maxAttempts must be a positive integer');
  }
  if (generator.timeoutMs <= 0) errors.push('generator.timeoutMs must be greater than 0');
  if (!Number.isInteger(generator.maxAttempts) || generator.maxAttempts < 1) {
    errors.push('generator.maxAttempts must be a positive integer');
  }
  if (retry.baseDelayMs < 0) errors.push('retry.baseDelayMs cannot be negative');
  if (retry.backoffMultiplier < 1) errors.push('retry.backoffMultiplier must be at least 1');

  for (const key of ['approveThreshold', 'modifyThreshold'] as const) {
    if (consensus[key] < 0 || consensus[key] > 10) {
      errors.push(`consensus.${key} must be within [0, 10]`);
    }
  }
  if (consensus.modifyThreshold > consensus.approveThreshold) {
    errors.push('consensus.modifyThreshold cannot exceed consensus.approveThreshold');
  }
  if (consensus.escalationSpread < 0 || consensus.escalationSpread > 10) {
    errors.push('consensus.escalationSpread must be within [0, 10]');
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      'Pipeline configuration validation failed:\n' + errors.map(e => `  - ${e}`).join('\n'),
      { errors }
    );
  }
}
