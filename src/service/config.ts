/**
 * Environment Configuration
 *
 * Loads and validates environment variables, providing a typed configuration object.
 * Fails fast on malformed values so the pipeline never starts half-configured.
 *
 * Usage:
 *   import { loadConfig } from './config';
 *   const config = loadConfig();
 *   console.log(config.pipeline.reviewers.quorum);
 */

import 'dotenv/config';
import { ConfigurationError } from '../shared/errors/types';
import { DEFAULT_PIPELINE_CONFIG, resolvePipelineConfig, type PipelineConfig } from '../pipeline/config';

// =============================================================================
// Types
// =============================================================================

export type NodeEnv = 'development' | 'production' | 'test';
export type StoreBackend = 'memory' | 'sqlite';
export type LLMProviderType = 'anthropic' | 'openai';

type Env = Record<string, string | undefined>;

export interface RuntimeConfig {
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
  logLevel: string;
}

export interface StorageConfig {
  backend: StoreBackend;
  /** SQLite file path, used when backend is sqlite */
  databasePath: string;
}

export interface LLMSettings {
  provider: LLMProviderType;
  anthropicApiKey: string;
  openaiApiKey: string;
  /** Empty when the provider default should be used */
  model: string;
}

export interface AppConfig {
  runtime: RuntimeConfig;
  storage: StorageConfig;
  llm: LLMSettings;
  pipeline: PipelineConfig;
}

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Get an environment variable with a default value
 */
function getEnvWithDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/**
 * Get a numeric environment variable, or undefined when unset
 */
function getEnvNumber(env: Env, key: string): number | undefined {
  const value = env[key];
  if (!value) return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(
      `Invalid numeric value for ${key}: "${value}". Expected a number.`,
      { key }
    );
  }
  return parsed;
}

function parseNodeEnv(value: string): NodeEnv {
  const valid: NodeEnv[] = ['development', 'production', 'test'];
  return valid.find(candidate => candidate === value) ?? 'development';
}

function parseStoreBackend(value: string): StoreBackend {
  if (value === 'memory' || value === 'sqlite') return value;
  throw new ConfigurationError(
    `Invalid STORE_BACKEND: "${value}". Expected "memory" or "sqlite".`,
    { key: 'STORE_BACKEND' }
  );
}

function parseLLMProvider(value: string): LLMProviderType {
  if (value === 'openai') return 'openai';
  return 'anthropic';
}

// =============================================================================
// Configuration Loader
// =============================================================================

/**
 * Runtime settings only. Never throws, so the logger can be built before
 * the rest of the configuration is validated.
 */
export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const nodeEnv = parseNodeEnv(getEnvWithDefault(env, 'NODE_ENV', 'development'));
  const defaultLevel = nodeEnv === 'test' ? 'silent' : nodeEnv === 'development' ? 'debug' : 'info';
  return {
    nodeEnv,
    isDevelopment: nodeEnv === 'development',
    isProduction: nodeEnv === 'production',
    isTest: nodeEnv === 'test',
    logLevel: getEnvWithDefault(env, 'LOG_LEVEL', defaultLevel)
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const anthropicApiKey = env.ANTHROPIC_API_KEY || '';
  const openaiApiKey = env.OPENAI_API_KEY || '';

  // Fall back to OpenAI when only its key is present
  let provider = parseLLMProvider(getEnvWithDefault(env, 'LLM_PROVIDER', 'anthropic'));
  if (provider === 'anthropic' && !anthropicApiKey && openaiApiKey) {
    provider = 'openai';
  }

  const defaults = DEFAULT_PIPELINE_CONFIG;

  return {
    runtime: loadRuntimeConfig(env),
    storage: {
      backend: parseStoreBackend(getEnvWithDefault(env, 'STORE_BACKEND', 'memory')),
      databasePath: getEnvWithDefault(env, 'DATABASE_PATH', './data/pipeline.db')
    },
    llm: {
      provider,
      anthropicApiKey,
      openaiApiKey,
      model: env.LLM_MODEL || ''
    },
    pipeline: resolvePipelineConfig({
      reviewers: {
        count: getEnvNumber(env, 'REVIEWER_COUNT') ?? defaults.reviewers.count,
        quorum: getEnvNumber(env, 'REVIEW_QUORUM') ?? defaults.reviewers.quorum,
        timeoutMs: getEnvNumber(env, 'REVIEWER_TIMEOUT_MS') ?? defaults.reviewers.timeoutMs,
        maxAttempts: getEnvNumber(env, 'REVIEWER_MAX_ATTEMPTS') ?? defaults.reviewers.maxAttempts
      },
      generator: {
        timeoutMs: getEnvNumber(env, 'GENERATOR_TIMEOUT_MS') ?? defaults.generator.timeoutMs,
        maxAttempts: getEnvNumber(env, 'GENERATOR_MAX_ATTEMPTS') ?? defaults.generator.maxAttempts
      },
      retry: {
        baseDelayMs: getEnvNumber(env, 'RETRY_BASE_DELAY_MS') ?? defaults.retry.baseDelayMs,
        backoffMultiplier: defaults.retry.backoffMultiplier
      },
      consensus: {
        approveThreshold: getEnvNumber(env, 'APPROVE_THRESHOLD') ?? defaults.consensus.approveThreshold,
        modifyThreshold: getEnvNumber(env, 'MODIFY_THRESHOLD') ?? defaults.consensus.modifyThreshold,
        escalationSpread: getEnvNumber(env, 'ESCALATION_SPREAD') ?? defaults.consensus.escalationSpread
      }
    })
  };
}

/**
 * API key for the configured provider.
 * Throws when the provider has no key; only called when an LLM-backed
 * generator is actually built.
 */
export function requireLLMApiKey(llm: LLMSettings): string {
  const apiKey = llm.provider === 'anthropic' ? llm.anthropicApiKey : llm.openaiApiKey;
  if (!apiKey) {
    throw new ConfigurationError(
      `Missing required environment variable: ${llm.provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY'}. ` +
      'Please set it in your .env file or environment.',
      { provider: llm.provider }
    );
  }
  return apiKey;
}

export { ConfigurationError };
