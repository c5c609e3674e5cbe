/**
 * Orchestrator Integration Tests
 *
 * Runs the full lifecycle through the bus with an in-process store and a
 * scripted content generator.
 */

import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import {
  AuditWriteError,
  InvalidRecordError,
  NotFoundError,
  PermanentCapabilityError
} from '../../pipeline/errors';
import { createPipeline, type Pipeline } from '../../service';
import { loadConfig } from '../../service/config';
import type { RecordStore } from '../../shared/storage/interface';
import { MemoryRecordStore } from '../../shared/storage/memoryStorage';
import {
  FakeContentGenerator,
  FlakyRecordStore,
  draftReply,
  evaluationReply,
  fixedClock,
  makeSection,
  testPipelineConfig
} from '../helpers/fixtures';

function buildPipeline(
  capability: FakeContentGenerator = new FakeContentGenerator(),
  store: RecordStore = new MemoryRecordStore()
): Pipeline {
  return createPipeline({
    config: { ...loadConfig({ NODE_ENV: 'test' }), pipeline: testPipelineConfig() },
    contentGenerator: capability,
    recordStore: store,
    logger: pino({ level: 'silent' }),
    now: fixedClock()
  });
}

async function eventTypes(pipeline: Pipeline): Promise<string[]> {
  return (await pipeline.audit.list()).map(record => record.event_type);
}

describe('ProposalOrchestrator', () => {
  describe('through the event bus', () => {
    it('takes an ingested section to an approved validation', async () => {
      const pipeline = buildPipeline();
      pipeline.orchestrator.start();

      pipeline.orchestrator.ingest(makeSection());
      await pipeline.bus.idle();

      const [proposal] = await pipeline.proposals.list();
      expect(proposal.status).toBe('approved');
      expect(proposal.supersedes).toBeNull();

      const validation = await pipeline.proposals.getValidation(proposal.id);
      expect(validation?.overall_score).toBe(9);
      expect(validation?.evaluations).toHaveLength(3);

      expect(await eventTypes(pipeline)).toEqual([
        'SectionIngested',
        'ProposalCreated',
        'StatusTransition',
        'ProposalValidated'
      ]);
      await expect(pipeline.audit.verify()).resolves.toMatchObject({ verified: true, checked: 4 });

      const [validated] = pipeline.bus.recent('ProposalValidated');
      expect(validated.payload).toEqual({
        proposal_id: proposal.id,
        validation_id: validation?.id,
        status: 'approved',
        overall_score: 9,
        needs_escalation: false
      });

      await pipeline.shutdown();
    });

    it('records a conflict instead of a second validation when ProposalCreated is replayed', async () => {
      const pipeline = buildPipeline();
      pipeline.orchestrator.start();
      pipeline.orchestrator.ingest(makeSection());
      await pipeline.bus.idle();
      const [proposal] = await pipeline.proposals.list();

      pipeline.bus.publish('ProposalCreated', {
        proposal_id: proposal.id,
        standard_id: proposal.standard_id,
        section_id: proposal.section_id
      });
      await pipeline.bus.idle();

      expect(await pipeline.proposals.listValidations()).toHaveLength(1);
      const conflicts = await pipeline.audit.list({ event_type: 'TransitionConflict' });
      expect(conflicts).toHaveLength(1);
      expect(conflicts[0].payload).toEqual({
        from: 'drafted',
        to: 'under_review',
        error: 'ConflictError',
        message: 'Expected status "drafted" but found "approved"'
      });

      await pipeline.shutdown();
    });

    it('publishes PipelineFailed when the audit store is down', async () => {
      const store = new FlakyRecordStore();
      store.failWrites('audit');
      const pipeline = buildPipeline(new FakeContentGenerator(), store);
      pipeline.orchestrator.start();

      pipeline.orchestrator.ingest(makeSection());
      await pipeline.bus.idle();

      const [failed] = pipeline.bus.recent('PipelineFailed');
      expect(failed.payload).toEqual({
        stage: 'processSection',
        subject_id: 'FAS-4/3.2',
        error: 'AuditWriteError',
        message: 'Appending SectionIngested for FAS-4/3.2 failed: disk full while writing audit'
      });
      expect(await pipeline.proposals.list()).toEqual([]);

      await pipeline.shutdown();
    });

    it('stops reacting to events once stopped', async () => {
      const capability = new FakeContentGenerator();
      const pipeline = buildPipeline(capability);
      pipeline.orchestrator.start();
      pipeline.orchestrator.stop();

      pipeline.orchestrator.ingest(makeSection());
      await pipeline.bus.idle();

      expect(pipeline.orchestrator.running).toBe(false);
      expect(capability.draftCalls).toHaveLength(0);
    });
  });

  describe('ingest', () => {
    it('rejects a malformed section without publishing', () => {
      const pipeline = buildPipeline();

      expect(() => pipeline.orchestrator.ingest({ standard_id: 'FAS-4' })).toThrow(InvalidRecordError);
      expect(pipeline.bus.recent()).toEqual([]);
    });
  });

  describe('processSection', () => {
    it('creates a drafted proposal and announces it', async () => {
      const pipeline = buildPipeline();

      const outcome = await pipeline.orchestrator.processSection(makeSection());

      expect(outcome.kind).toBe('created');
      if (outcome.kind !== 'created') return;
      expect(await pipeline.proposals.get(outcome.proposal.id)).toEqual(outcome.proposal);
      expect(pipeline.bus.recent('ProposalCreated').map(e => e.payload)).toEqual([
        { proposal_id: outcome.proposal.id, standard_id: 'FAS-4', section_id: '3.2' }
      ]);

      const [ingested, created] = await pipeline.audit.list();
      expect(ingested).toMatchObject({ actor: 'orchestrator', subject_id: 'FAS-4/3.2' });
      expect(created).toMatchObject({ actor: 'proposal-generator', subject_id: outcome.proposal.id });
    });

    it('does not persist a proposal whose text matches the section', async () => {
      const capability = new FakeContentGenerator(async () => draftReply('Profit shall be recognised when earned.'));
      const pipeline = buildPipeline(capability);
      const create = vi.spyOn(pipeline.proposals, 'create');

      const outcome = await pipeline.orchestrator.processSection(makeSection());

      expect(outcome).toEqual({
        kind: 'generation_failed',
        error: 'InvalidProposalError',
        message: 'proposed_text: proposed_text must differ from current_text'
      });
      expect(create).not.toHaveBeenCalled();
      expect(await eventTypes(pipeline)).toEqual(['SectionIngested', 'ProposalGenerationFailed']);
      expect(pipeline.bus.recent('ProposalGenerationFailed').map(e => e.payload)).toEqual([
        {
          standard_id: 'FAS-4',
          section_id: '3.2',
          error: 'InvalidProposalError',
          message: 'proposed_text: proposed_text must differ from current_text'
        }
      ]);
    });

    it('records the attempts of a failed generation', async () => {
      const capability = new FakeContentGenerator(async () => {
        throw new PermanentCapabilityError('invalid api key', { status: 401 });
      });
      const pipeline = buildPipeline(capability);

      const outcome = await pipeline.orchestrator.processSection(makeSection());

      expect(outcome).toEqual({
        kind: 'generation_failed',
        error: 'GenerationFailedError',
        message: 'Gave up after 1 attempt(s): Content generator rejected the request'
      });
      const [failure] = await pipeline.audit.list({ event_type: 'ProposalGenerationFailed' });
      expect(failure.payload).toMatchObject({ attempts: 1, error: 'GenerationFailedError' });
    });

    it('links a re-drafted section to its previous proposal', async () => {
      const pipeline = buildPipeline();

      const first = await pipeline.orchestrator.processSection(makeSection());
      const second = await pipeline.orchestrator.processSection(makeSection());

      if (first.kind !== 'created' || second.kind !== 'created') throw new Error('expected proposals');
      expect(first.proposal.supersedes).toBeNull();
      expect(second.proposal.supersedes).toBe(first.proposal.id);
      expect((await pipeline.proposals.get(second.proposal.id))?.supersedes).toBe(first.proposal.id);
    });

    it('fails before generating when the audit log cannot be written', async () => {
      const store = new FlakyRecordStore();
      store.failWrites('audit');
      const capability = new FakeContentGenerator();
      const pipeline = buildPipeline(capability, store);

      await expect(pipeline.orchestrator.processSection(makeSection())).rejects.toBeInstanceOf(AuditWriteError);
      expect(capability.draftCalls).toHaveLength(0);
      expect(await pipeline.proposals.list()).toEqual([]);
    });
  });

  describe('reviewProposal', () => {
    async function drafted(pipeline: Pipeline): Promise<string> {
      const outcome = await pipeline.orchestrator.processSection(makeSection());
      if (outcome.kind !== 'created') {
        throw new Error(`expected a proposal, got ${outcome.kind}`);
      }
      return outcome.proposal.id;
    }

    it('rejects a proposal every reviewer rejects', async () => {
      const capability = new FakeContentGenerator(undefined, async () => evaluationReply(7, 'reject'));
      const pipeline = buildPipeline(capability);
      const id = await drafted(pipeline);

      const outcome = await pipeline.orchestrator.reviewProposal(id);

      expect(outcome.kind).toBe('validated');
      if (outcome.kind !== 'validated') return;
      expect(outcome.proposal.status).toBe('rejected');
      expect(outcome.validation.consensus_detail.veto_applied).toBe(true);
    });

    it('requeues the proposal when quorum is not met', async () => {
      const capability = new FakeContentGenerator(undefined, async request => {
        if (request.reviewer_id === 'reviewer-1') return evaluationReply(9);
        throw new Error('invalid api key');
      });
      const pipeline = buildPipeline(capability);
      const id = await drafted(pipeline);

      const outcome = await pipeline.orchestrator.reviewProposal(id);

      expect(outcome).toMatchObject({ kind: 'requeued', succeeded: 1, required: 2 });
      expect((await pipeline.proposals.get(id))?.status).toBe('drafted');
      expect(await pipeline.proposals.getValidation(id)).toBeNull();

      const [quorum] = await pipeline.audit.list({ event_type: 'QuorumNotMet' });
      expect(quorum.payload).toEqual({
        error: 'QuorumNotMetError',
        succeeded: 1,
        required: 2,
        excluded_reviewers: [
          { reviewer_id: 'reviewer-2', reason: 'invalid api key', attempts: 1 },
          { reviewer_id: 'reviewer-3', reason: 'invalid api key', attempts: 1 }
        ]
      });
      expect(pipeline.bus.recent('ProposalRequeued').map(e => e.payload)).toEqual([
        { proposal_id: id, succeeded: 1, required: 2 }
      ]);
      expect(await pipeline.orchestrator.replayDrafted()).toEqual([id]);
    });

    it('lets only one of two concurrent reviews finalize', async () => {
      const pipeline = buildPipeline();
      const id = await drafted(pipeline);

      const outcomes = await Promise.all([
        pipeline.orchestrator.reviewProposal(id),
        pipeline.orchestrator.reviewProposal(id)
      ]);

      expect(outcomes.map(o => o.kind).sort()).toEqual(['conflict', 'validated']);
      expect(await pipeline.proposals.listValidations()).toHaveLength(1);
      await expect(pipeline.audit.verify()).resolves.toMatchObject({ verified: true });
    });

    it('raises NotFoundError before writing anything', async () => {
      const pipeline = buildPipeline();

      await expect(pipeline.orchestrator.reviewProposal('missing')).rejects.toBeInstanceOf(NotFoundError);
      expect(await pipeline.audit.list()).toEqual([]);
    });

    it('returns the proposal to drafted when the validation cannot be audited, so it can be reviewed again', async () => {
      const store = new FlakyRecordStore();
      let outage = true;
      const capability = new FakeContentGenerator(undefined, async () => {
        if (outage) store.failWrites('audit');
        return evaluationReply(9);
      });
      const pipeline = buildPipeline(capability, store);
      const id = await drafted(pipeline);

      await expect(pipeline.orchestrator.reviewProposal(id)).rejects.toBeInstanceOf(AuditWriteError);
      expect((await pipeline.proposals.get(id))?.status).toBe('drafted');
      expect(await pipeline.proposals.getValidation(id)).toBeNull();

      outage = false;
      store.heal('audit');
      const retry = await pipeline.orchestrator.reviewProposal(id);

      expect(retry.kind).toBe('validated');
      expect((await pipeline.proposals.get(id))?.status).toBe('approved');
      expect(await eventTypes(pipeline)).toEqual([
        'SectionIngested',
        'ProposalCreated',
        'StatusTransition',
        'StatusTransition',
        'ProposalValidated'
      ]);
      await expect(pipeline.audit.verify()).resolves.toMatchObject({ verified: true, checked: 5 });
    });

    it('finishes a stored validation once the proposal store recovers', async () => {
      const store = new FlakyRecordStore();
      const pipeline = buildPipeline(new FakeContentGenerator(), store);
      const id = await drafted(pipeline);
      const saveValidation = pipeline.proposals.saveValidation.bind(pipeline.proposals);
      vi.spyOn(pipeline.proposals, 'saveValidation').mockImplementation(async validation => {
        await saveValidation(validation);
        store.failWrites('proposals');
      });

      await expect(pipeline.orchestrator.reviewProposal(id)).rejects.toThrow('disk full while writing proposals');
      expect((await pipeline.proposals.get(id))?.status).toBe('under_review');
      expect(pipeline.bus.recent('ProposalValidated')).toEqual([]);

      store.heal('proposals');
      expect(await pipeline.orchestrator.recoverStalled()).toEqual([id]);

      const validation = await pipeline.proposals.getValidation(id);
      expect((await pipeline.proposals.get(id))?.status).toBe('approved');
      expect(pipeline.bus.recent('ProposalValidated').map(e => e.payload)).toEqual([
        {
          proposal_id: id,
          validation_id: validation?.id,
          status: 'approved',
          overall_score: 9,
          needs_escalation: false
        }
      ]);
      const [aborted] = await pipeline.audit.list({ event_type: 'ReviewAborted' });
      expect(aborted.payload).toEqual({
        from: 'under_review',
        to: 'approved',
        error: 'Error',
        message: 'disk full while writing proposals'
      });
      const [recovered] = await pipeline.audit.list({ event_type: 'ReviewRecovered' });
      expect(recovered.payload).toEqual({ from: 'under_review', to: 'approved', validation_id: validation?.id });
      await expect(pipeline.audit.verify()).resolves.toMatchObject({ verified: true });
    });

    it('leaves the proposal drafted when the transition cannot be audited', async () => {
      const store = new FlakyRecordStore();
      const pipeline = buildPipeline(new FakeContentGenerator(), store);
      const id = await drafted(pipeline);

      store.failWrites('audit');
      await expect(pipeline.orchestrator.reviewProposal(id)).rejects.toBeInstanceOf(AuditWriteError);
      expect((await pipeline.proposals.get(id))?.status).toBe('drafted');
    });
  });

  describe('replayDrafted', () => {
    it('returns a stalled review to drafted before replaying it', async () => {
      const pipeline = buildPipeline();
      const outcome = await pipeline.orchestrator.processSection(makeSection());
      if (outcome.kind !== 'created') throw new Error('expected a proposal');
      const id = outcome.proposal.id;
      await pipeline.proposals.updateStatus(id, 'drafted', 'under_review');

      expect(await pipeline.orchestrator.replayDrafted()).toEqual([id]);

      expect((await pipeline.proposals.get(id))?.status).toBe('drafted');
      const [recovered] = await pipeline.audit.list({ event_type: 'ReviewRecovered' });
      expect(recovered.payload).toEqual({ from: 'under_review', to: 'drafted', validation_id: null });
    });

    it('republishes only drafted proposals', async () => {
      const pipeline = buildPipeline();
      const first = await pipeline.orchestrator.processSection(makeSection());
      await pipeline.orchestrator.processSection(makeSection({ section_id: '3.3' }));
      if (first.kind !== 'created') throw new Error('expected a proposal');
      await pipeline.orchestrator.reviewProposal(first.proposal.id);

      const replayed = await pipeline.orchestrator.replayDrafted();

      expect(replayed).toHaveLength(1);
      const replays = pipeline.bus.recent('ProposalCreated').filter(e => e.payload.replay === true);
      expect(replays.map(e => e.payload.proposal_id)).toEqual(replayed);
    });
  });
});
