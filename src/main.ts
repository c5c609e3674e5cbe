#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * Usage: node dist/main.js <sections.json>
 *
 * Reads an array of sections, runs each through the pipeline, waits for all
 * reviews to settle, prints a status summary and verifies the audit chain.
 */

import * as fs from 'fs';
import { createPipeline } from './service';
import { loadConfig } from './service/config';
import { createComponentLogger, logFatal } from './service/logger';
import { ErrorHandler } from './shared/errors/handler';
import type { ProposalStatus } from './pipeline/types';

const log = createComponentLogger('main');

export async function run(sectionsPath: string): Promise<number> {
  const raw: unknown = JSON.parse(fs.readFileSync(sectionsPath, 'utf8'));
  if (!Array.isArray(raw)) {
    throw new Error(`${sectionsPath} must contain a JSON array of sections`);
  }

  const pipeline = createPipeline({ config: loadConfig() });
  let failures = 0;
  pipeline.bus.subscribe('PipelineFailed', event => {
    failures++;
    log.error({ stage: event.payload.stage, subjectId: event.payload.subject_id }, event.payload.message);
  });

  pipeline.orchestrator.start();
  for (const section of raw) {
    try {
      pipeline.orchestrator.ingest(section);
    } catch (error) {
      failures++;
      log.error({ err: ErrorHandler.toError(error).message }, 'Skipping malformed section');
    }
  }

  await pipeline.bus.idle();

  const proposals = await pipeline.proposals.list();
  const summary: Partial<Record<ProposalStatus, number>> = {};
  for (const proposal of proposals) {
    summary[proposal.status] = (summary[proposal.status] ?? 0) + 1;
  }
  const generationFailures = pipeline.bus.recent('ProposalGenerationFailed', Number.MAX_SAFE_INTEGER).length;
  log.info({ sections: raw.length, proposals: proposals.length, generationFailures, summary }, 'Pipeline run complete');

  const verification = await pipeline.audit.verify();
  log.info(verification, 'Audit chain verified');

  await pipeline.shutdown();
  return failures > 0 ? 1 : 0;
}

if (require.main === module) {
  const sectionsPath = process.argv[2];
  if (!sectionsPath) {
    logFatal(new Error('Missing argument'), 'Usage: node dist/main.js <sections.json>');
  } else {
    run(sectionsPath).then(
      code => {
        process.exitCode = code;
      },
      error => logFatal(error, 'Pipeline run failed')
    );
  }
}
