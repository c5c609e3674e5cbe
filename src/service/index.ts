/**
 * Pipeline Composition Root
 *
 * Builds the bus, audit log, stores, generator, reviewer pool and
 * orchestrator from configuration and wires them together. Nothing here is
 * a singleton; every call returns an independent pipeline.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'pino';
import { AuditLog } from '../pipeline/audit/auditLog';
import type { ContentGenerator } from '../pipeline/capability/contentGenerator';
import { LLMContentGenerator } from '../pipeline/capability/llmContentGenerator';
import { InProcessEventBus } from '../pipeline/events/eventBus';
import { ProposalGenerator } from '../pipeline/generator/proposalGenerator';
import { ProposalOrchestrator } from '../pipeline/orchestrator';
import { ReviewerPool } from '../pipeline/reviewers/reviewerPool';
import { ProposalStore } from '../pipeline/store/proposalStore';
import type { PipelineEvents } from '../pipeline/types';
import { LLMClient } from '../shared/llm/client';
import { DatabaseRecordStore } from '../shared/storage/databaseStorage';
import type { RecordStore } from '../shared/storage/interface';
import { MemoryRecordStore } from '../shared/storage/memoryStorage';
import { AppConfig, LLMSettings, StorageConfig, loadConfig, requireLLMApiKey } from './config';
import { createComponentLogger } from './logger';

export interface Pipeline {
  config: AppConfig;
  store: RecordStore;
  bus: InProcessEventBus<PipelineEvents>;
  audit: AuditLog;
  proposals: ProposalStore;
  generator: ProposalGenerator;
  reviewers: ReviewerPool;
  orchestrator: ProposalOrchestrator;
  /** Stop the orchestrator, let in-flight handlers settle, close the store */
  shutdown(): Promise<void>;
}

export interface CreatePipelineOptions {
  config?: AppConfig;
  /** Defaults to an LLM-backed generator for the configured provider */
  contentGenerator?: ContentGenerator;
  /** Defaults to the configured backend */
  recordStore?: RecordStore;
  logger?: Logger;
  now?: () => Date;
}

export function createRecordStore(storage: StorageConfig): RecordStore {
  if (storage.backend === 'memory') {
    return new MemoryRecordStore();
  }
  if (storage.databasePath !== ':memory:') {
    fs.mkdirSync(path.dirname(storage.databasePath), { recursive: true });
  }
  return new DatabaseRecordStore({ databasePath: storage.databasePath });
}

export function createContentGenerator(llm: LLMSettings): ContentGenerator {
  const client = new LLMClient({
    provider: llm.provider,
    apiKey: requireLLMApiKey(llm),
    model: llm.model || undefined
  });
  return new LLMContentGenerator(client);
}

export function createPipeline(options: CreatePipelineOptions = {}): Pipeline {
  const config = options.config ?? loadConfig();
  const now = options.now;
  const componentLogger = (component: string): Logger =>
    options.logger ? options.logger.child({ component }) : createComponentLogger(component);
  const logger = componentLogger('pipeline');

  const store = options.recordStore ?? createRecordStore(config.storage);
  const capability = options.contentGenerator ?? createContentGenerator(config.llm);

  const bus = new InProcessEventBus<PipelineEvents>({ logger: componentLogger('event-bus') });
  const audit = new AuditLog(store, { logger: componentLogger('audit'), now });
  const proposals = new ProposalStore(store, { logger: componentLogger('proposal-store'), now });
  const generator = new ProposalGenerator(capability, {
    settings: config.pipeline.generator,
    retry: config.pipeline.retry,
    logger: componentLogger('proposal-generator'),
    now
  });
  const reviewers = new ReviewerPool(capability, {
    settings: config.pipeline.reviewers,
    retry: config.pipeline.retry,
    logger: componentLogger('reviewer-pool')
  });
  const orchestrator = new ProposalOrchestrator({
    bus,
    audit,
    proposals,
    generator,
    reviewers,
    thresholds: config.pipeline.consensus,
    logger: componentLogger('orchestrator'),
    now
  });

  logger.info(
    {
      store: config.storage.backend,
      reviewers: config.pipeline.reviewers.count,
      quorum: config.pipeline.reviewers.quorum
    },
    'Pipeline assembled'
  );

  return {
    config,
    store,
    bus,
    audit,
    proposals,
    generator,
    reviewers,
    orchestrator,
    async shutdown() {
      orchestrator.stop();
      await bus.idle();
      await store.close();
    }
  };
}
