/**
 * Proposal Lifecycle Orchestrator
 *
 * Drives a section from ingestion to a terminal validation:
 *
 *   SectionIngested → generate → ProposalCreated (drafted)
 *   ProposalCreated → under_review → reviewers → consensus → terminal status
 *                                            └→ quorum not met → drafted (requeued)
 *
 * Every step is written to the audit log before the store is mutated, and
 * announced on the bus after. The orchestrator is the only writer of
 * proposal status.
 *
 * A round that fails after `under_review` is unwound: back to `drafted` when no
 * validation was stored, forward to the validated status when one was.
 * Proposals left in `under_review` by a crash or an outage are settled the
 * same way by `recoverStalled`.
 */

import type { Logger } from 'pino';
import { createComponentLogger, serializeError } from '../service/logger';
import { AppError } from '../shared/errors/types';
import { ErrorHandler } from '../shared/errors/handler';
import { SectionSchema } from '../shared/validation/schemas';
import { parseWithSchema } from '../shared/validation/validator';
import { AuditLog, sha256 } from './audit/auditLog';
import type { ConsensusThresholds } from './config';
import {
  ConflictError,
  DuplicateKeyError,
  GenerationFailedError,
  InvalidProposalError,
  InvalidRecordError,
  NotFoundError,
  QuorumNotMetError
} from './errors';
import type { BusEvent, EventBus, Unsubscribe } from './events/eventBus';
import { ProposalGenerator } from './generator/proposalGenerator';
import { buildValidation, computeConsensus } from './reviewers/consensus';
import { ReviewRound, ReviewerPool } from './reviewers/reviewerPool';
import { ProposalFilter, ProposalStore } from './store/proposalStore';
import {
  ACTORS,
  PipelineEvents,
  PipelineFailedPayload,
  Proposal,
  ProposalStatus,
  ReviewOutcome,
  Validation,
  Section,
  SectionOutcome
} from './types';

export interface OrchestratorDependencies {
  bus: EventBus<PipelineEvents>;
  audit: AuditLog;
  proposals: ProposalStore;
  generator: ProposalGenerator;
  reviewers: ReviewerPool;
  thresholds: ConsensusThresholds;
  logger?: Logger;
  now?: () => Date;
}

export class ProposalOrchestrator {
  private readonly bus: EventBus<PipelineEvents>;
  private readonly audit: AuditLog;
  private readonly proposals: ProposalStore;
  private readonly generator: ProposalGenerator;
  private readonly reviewers: ReviewerPool;
  private readonly thresholds: ConsensusThresholds;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private subscriptions: Unsubscribe[] = [];
  private inFlight = new Set<string>();

  constructor(deps: OrchestratorDependencies) {
    this.bus = deps.bus;
    this.audit = deps.audit;
    this.proposals = deps.proposals;
    this.generator = deps.generator;
    this.reviewers = deps.reviewers;
    this.thresholds = deps.thresholds;
    this.logger = deps.logger ?? createComponentLogger('orchestrator');
    this.now = deps.now ?? (() => new Date());
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    if (this.subscriptions.length > 0) {
      return;
    }
    this.subscriptions = [
      this.bus.subscribe('SectionIngested', event => this.onSectionIngested(event)),
      this.bus.subscribe('ProposalCreated', event => this.onProposalCreated(event))
    ];
    this.logger.info('Orchestrator started');
  }

  stop(): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];
    this.logger.info('Orchestrator stopped');
  }

  get running(): boolean {
    return this.subscriptions.length > 0;
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /**
   * Entry point for the text extractor
   * @throws InvalidRecordError if the section is malformed
   * @returns the published event id
   */
  ingest(raw: unknown): string {
    const section = this.parseSection(raw);
    return this.bus.publish('SectionIngested', section);
  }

  /**
   * Generate and persist a drafted proposal for a section
   */
  async processSection(input: Section): Promise<SectionOutcome> {
    const section = this.parseSection(input);
    const sectionKey = `${section.standard_id}/${section.section_id}`;

    await this.audit.append({
      actor: ACTORS.orchestrator,
      event_type: 'SectionIngested',
      subject_id: sectionKey,
      payload: {
        standard_id: section.standard_id,
        section_id: section.section_id,
        title: section.title,
        content_hash: sha256(section.content),
        issues: section.issues
      }
    });

    const previous = await this.proposals.list({
      standard_id: section.standard_id,
      section_id: section.section_id
    });
    const supersedes = previous.length > 0 ? previous[previous.length - 1].id : null;

    let proposal: Proposal;
    try {
      proposal = await this.generator.generate(section, { supersedes });
    } catch (error) {
      if (
        error instanceof GenerationFailedError ||
        error instanceof InvalidProposalError ||
        error instanceof InvalidRecordError
      ) {
        return this.recordGenerationFailure(section, sectionKey, error);
      }
      throw error;
    }

    await this.audit.append({
      actor: ACTORS.generator,
      event_type: 'ProposalCreated',
      subject_id: proposal.id,
      payload: { proposal }
    });
    await this.proposals.create(proposal);

    this.bus.publish('ProposalCreated', {
      proposal_id: proposal.id,
      standard_id: proposal.standard_id,
      section_id: proposal.section_id
    });
    this.logger.info({ proposalId: proposal.id, section: sectionKey, supersedes }, 'Proposal created');

    return { kind: 'created', proposal };
  }

  /**
   * Run one review round for a drafted proposal
   * @throws NotFoundError if the proposal does not exist
   */
  async reviewProposal(proposalId: string): Promise<ReviewOutcome> {
    const existing = await this.proposals.get(proposalId);
    if (!existing) {
      throw new NotFoundError('Proposal', proposalId);
    }

    await this.recordTransition(proposalId, 'drafted', 'under_review');
    let underReview: Proposal;
    try {
      underReview = await this.proposals.updateStatus(proposalId, 'drafted', 'under_review');
    } catch (error) {
      return this.absorbConflict(error, proposalId, 'drafted', 'under_review');
    }

    this.inFlight.add(proposalId);
    try {
      return await this.completeReview(underReview);
    } catch (error) {
      await this.unwindReview(proposalId, error);
      throw error;
    } finally {
      this.inFlight.delete(proposalId);
    }
  }

  /**
   * Settle proposals stuck in `under_review` with no round running in this
   * orchestrator: forward to the stored validation's status, or back to
   * `drafted` when there is none
   * @throws AuditWriteError if the recovery cannot be audited
   * @returns ids of the proposals that were settled
   */
  async recoverStalled(filter: Omit<ProposalFilter, 'status'> = {}): Promise<string[]> {
    const stalled = await this.proposals.list({ ...filter, status: 'under_review' });
    const recovered: string[] = [];

    for (const proposal of stalled) {
      if (this.inFlight.has(proposal.id)) {
        continue;
      }
      const validation = await this.proposals.getValidation(proposal.id);
      const to: ProposalStatus = validation ? validation.status : 'drafted';

      await this.audit.append({
        actor: ACTORS.orchestrator,
        event_type: 'ReviewRecovered',
        subject_id: proposal.id,
        payload: { from: 'under_review', to, validation_id: validation?.id ?? null }
      });
      try {
        await this.settle(proposal.id, validation);
      } catch (error) {
        await this.absorbConflict(error, proposal.id, 'under_review', to);
        continue;
      }
      recovered.push(proposal.id);
    }

    if (recovered.length > 0) {
      this.logger.warn({ count: recovered.length, proposalIds: recovered }, 'Recovered stalled reviews');
    }
    return recovered;
  }

  /**
   * Re-announce drafted proposals (requeued after a failed round), settling
   * stalled reviews first
   * @returns ids of the proposals that were re-published
   */
  async replayDrafted(filter: Omit<ProposalFilter, 'status'> = {}): Promise<string[]> {
    await this.recoverStalled(filter);
    const drafted = await this.proposals.list({ ...filter, status: 'drafted' });
    for (const proposal of drafted) {
      this.bus.publish('ProposalCreated', {
        proposal_id: proposal.id,
        standard_id: proposal.standard_id,
        section_id: proposal.section_id,
        replay: true
      });
    }
    this.logger.info({ count: drafted.length }, 'Replayed drafted proposals');
    return drafted.map(proposal => proposal.id);
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  private async recordTransition(proposalId: string, from: ProposalStatus, to: ProposalStatus): Promise<void> {
    await this.audit.append({
      actor: ACTORS.orchestrator,
      event_type: 'StatusTransition',
      subject_id: proposalId,
      payload: { from, to }
    });
  }

  private async completeReview(underReview: Proposal): Promise<ReviewOutcome> {
    const proposalId = underReview.id;
    let round: ReviewRound;
    try {
      round = await this.reviewers.review(underReview);
    } catch (error) {
      if (error instanceof QuorumNotMetError) {
        return this.requeue(underReview, error);
      }
      throw error;
    }

    const consensus = computeConsensus(round.evaluations, this.thresholds, {
      requested: round.requested,
      excluded: round.excluded
    });
    const validation = buildValidation(underReview, round.evaluations, consensus, { now: this.now() });

    await this.audit.append({
      actor: ACTORS.reviewers,
      event_type: 'ProposalValidated',
      subject_id: proposalId,
      payload: { validation }
    });

    let validated: Proposal;
    try {
      await this.proposals.saveValidation(validation);
      validated = await this.proposals.updateStatus(proposalId, 'under_review', consensus.status);
    } catch (error) {
      return this.absorbConflict(error, proposalId, 'under_review', consensus.status);
    }

    this.announceValidated(validation);
    this.logger.info(
      {
        proposalId,
        status: consensus.status,
        score: consensus.overall_score,
        escalate: consensus.detail.needs_escalation
      },
      'Proposal validated'
    );

    return { kind: 'validated', proposal: validated, validation };
  }

  /**
   * Move a proposal out of `under_review` after its round failed. The audit
   * record is best effort here; a failure to settle leaves the proposal for
   * `recoverStalled`.
   */
  private async unwindReview(proposalId: string, cause: unknown): Promise<void> {
    const error = ErrorHandler.toError(cause);
    try {
      const validation = await this.proposals.getValidation(proposalId);
      const to: ProposalStatus = validation ? validation.status : 'drafted';

      try {
        await this.audit.append({
          actor: ACTORS.orchestrator,
          event_type: 'ReviewAborted',
          subject_id: proposalId,
          payload: { from: 'under_review', to, error: error.name, message: error.message }
        });
      } catch (auditError) {
        this.logger.warn({ proposalId, err: serializeError(auditError) }, 'Review abort could not be audited');
      }

      await this.settle(proposalId, validation);
      this.logger.warn({ proposalId, to, reason: error.message }, 'Review aborted');
    } catch (settleError) {
      this.logger.error(
        { proposalId, err: serializeError(settleError), reason: error.message },
        'Proposal left under review'
      );
    }
  }

  /**
   * Apply the status a stalled review resolves to
   */
  private async settle(proposalId: string, validation: Validation | null): Promise<Proposal> {
    if (!validation) {
      return this.proposals.updateStatus(proposalId, 'under_review', 'drafted');
    }
    const settled = await this.proposals.updateStatus(proposalId, 'under_review', validation.status);
    this.announceValidated(validation);
    return settled;
  }

  private announceValidated(validation: Validation): void {
    this.bus.publish('ProposalValidated', {
      proposal_id: validation.proposal_id,
      validation_id: validation.id,
      status: validation.status,
      overall_score: validation.overall_score,
      needs_escalation: validation.consensus_detail.needs_escalation
    });
  }

  private async requeue(proposal: Proposal, error: QuorumNotMetError): Promise<ReviewOutcome> {
    await this.audit.append({
      actor: ACTORS.reviewers,
      event_type: 'QuorumNotMet',
      subject_id: proposal.id,
      payload: {
        error: error.name,
        succeeded: error.succeeded,
        required: error.required,
        excluded_reviewers: error.context?.excluded_reviewers ?? []
      }
    });

    let requeued: Proposal;
    try {
      requeued = await this.proposals.updateStatus(proposal.id, 'under_review', 'drafted');
    } catch (updateError) {
      return this.absorbConflict(updateError, proposal.id, 'under_review', 'drafted');
    }

    this.bus.publish('ProposalRequeued', {
      proposal_id: proposal.id,
      succeeded: error.succeeded,
      required: error.required
    });
    this.logger.warn(
      { proposalId: proposal.id, succeeded: error.succeeded, required: error.required },
      'Quorum not met, proposal requeued'
    );

    return { kind: 'requeued', proposal: requeued, succeeded: error.succeeded, required: error.required };
  }

  /**
   * Duplicate triggers lose the conditional update; record that and move on.
   * Anything else is rethrown.
   */
  private async absorbConflict(
    error: unknown,
    proposalId: string,
    from: ProposalStatus,
    to: ProposalStatus
  ): Promise<ReviewOutcome> {
    if (!(error instanceof ConflictError) && !(error instanceof DuplicateKeyError)) {
      throw error;
    }

    this.logger.debug({ proposalId, from, to, reason: error.technicalDetails }, 'Transition conflict, event dropped');
    await this.audit.append({
      actor: ACTORS.orchestrator,
      event_type: 'TransitionConflict',
      subject_id: proposalId,
      payload: { from, to, error: error.name, message: error.technicalDetails }
    });

    return { kind: 'conflict', proposalId, reason: error.technicalDetails };
  }

  private async recordGenerationFailure(
    section: Section,
    sectionKey: string,
    error: GenerationFailedError | InvalidProposalError | InvalidRecordError
  ): Promise<SectionOutcome> {
    const failure = {
      standard_id: section.standard_id,
      section_id: section.section_id,
      error: error.name,
      message: error.technicalDetails
    };

    await this.audit.append({
      actor: ACTORS.generator,
      event_type: 'ProposalGenerationFailed',
      subject_id: sectionKey,
      payload: {
        ...failure,
        attempts: error instanceof GenerationFailedError ? error.attempts : 0
      }
    });
    this.bus.publish('ProposalGenerationFailed', failure);
    this.logger.warn({ section: sectionKey, error: error.name, reason: error.technicalDetails }, 'Proposal generation failed');

    return { kind: 'generation_failed', error: error.name, message: error.technicalDetails };
  }

  // ==========================================================================
  // Bus handlers
  // ==========================================================================

  private async onSectionIngested(event: BusEvent<PipelineEvents, 'SectionIngested'>): Promise<void> {
    const subjectId = `${event.payload.standard_id}/${event.payload.section_id}`;
    try {
      await this.processSection(event.payload);
    } catch (error) {
      this.reportFailure('processSection', subjectId, error);
    }
  }

  private async onProposalCreated(event: BusEvent<PipelineEvents, 'ProposalCreated'>): Promise<void> {
    try {
      await this.reviewProposal(event.payload.proposal_id);
    } catch (error) {
      this.reportFailure('reviewProposal', event.payload.proposal_id, error);
    }
  }

  /**
   * Fatal errors under bus delivery have no caller to reach; log them and
   * publish PipelineFailed so the triggering collaborator can observe them.
   */
  private reportFailure(stage: PipelineFailedPayload['stage'], subjectId: string, error: unknown): void {
    const appError = error instanceof AppError ? error : ErrorHandler.createUnexpectedError(error, { stage });
    ErrorHandler.logError(appError, { stage, subjectId });
    this.bus.publish('PipelineFailed', {
      stage,
      subject_id: subjectId,
      error: appError.name,
      message: appError.technicalDetails
    });
  }

  private parseSection(raw: unknown): Section {
    const parsed = parseWithSchema(SectionSchema, raw);
    if (!parsed.success) {
      throw new InvalidRecordError('section', parsed.errors);
    }
    return parsed.data;
  }
}
