/**
 * Proposal Store
 *
 * Proposal and Validation records over a RecordStore. Status changes are
 * conditional updates: the caller names the status it expects, and the
 * store checks it atomically with the write.
 */

import type { Logger } from 'pino';
import { createComponentLogger } from '../../service/logger';
import type { RecordStore, StoredRecord } from '../../shared/storage/interface';
import { ProposalSchema, ValidationSchema } from '../../shared/validation/schemas';
import { parseWithSchema } from '../../shared/validation/validator';
import {
  ConflictError,
  InvalidProposalError,
  InvalidRecordError,
  InvalidTransitionError,
  NotFoundError
} from '../errors';
import type { Proposal, ProposalStatus, Validation } from '../types';
import { getValidTransitions, isValidTransition } from './transitions';

export const PROPOSALS_COLLECTION = 'proposals';
export const VALIDATIONS_COLLECTION = 'validations';

export interface ProposalFilter {
  status?: ProposalStatus;
  standard_id?: string;
  section_id?: string;
}

export interface ProposalStoreOptions {
  logger?: Logger;
  /** Clock used for updated_at */
  now?: () => Date;
}

export class ProposalStore {
  private logger: Logger;
  private now: () => Date;

  constructor(private readonly records: RecordStore, options: ProposalStoreOptions = {}) {
    this.logger = options.logger ?? createComponentLogger('proposal-store');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Persist a new proposal
   * @throws InvalidProposalError if the proposal breaks its schema
   * @throws DuplicateKeyError if the id is taken
   */
  async create(proposal: Proposal): Promise<string> {
    const parsed = parseWithSchema(ProposalSchema, proposal);
    if (!parsed.success) {
      throw new InvalidProposalError(parsed.errors, { proposalId: proposal.id });
    }

    await this.records.insert(PROPOSALS_COLLECTION, parsed.data.id, parsed.data);
    this.logger.debug({ proposalId: parsed.data.id, status: parsed.data.status }, 'Proposal stored');
    return parsed.data.id;
  }

  /**
   * Move a proposal from `from` to `to`
   * @throws InvalidTransitionError if the edge is not allowed
   * @throws ConflictError if the stored status is not `from`
   * @throws NotFoundError if the proposal does not exist
   */
  async updateStatus(id: string, from: ProposalStatus, to: ProposalStatus): Promise<Proposal> {
    if (!isValidTransition(from, to)) {
      throw new InvalidTransitionError(id, from, to, getValidTransitions(from));
    }

    const updated = await this.records.update(PROPOSALS_COLLECTION, id, current => {
      const proposal = this.toProposal(current, id);
      if (proposal.status !== from) {
        throw new ConflictError(id, from, proposal.status);
      }
      return { ...proposal, status: to, updated_at: this.now().toISOString() };
    });

    if (!updated) {
      throw new NotFoundError('Proposal', id);
    }

    this.logger.debug({ proposalId: id, from, to }, 'Proposal status updated');
    return this.toProposal(updated, id);
  }

  async get(id: string): Promise<Proposal | null> {
    const record = await this.records.get(PROPOSALS_COLLECTION, id);
    return record ? this.toProposal(record, id) : null;
  }

  async list(filter: ProposalFilter = {}): Promise<Proposal[]> {
    const query: Record<string, string> = {};
    if (filter.status) query.status = filter.status;
    if (filter.standard_id) query.standard_id = filter.standard_id;
    if (filter.section_id) query.section_id = filter.section_id;

    const records = await this.records.query(PROPOSALS_COLLECTION, query);
    return records.map(record => this.toProposal(record));
  }

  /**
   * Persist the single validation of a proposal
   * @throws DuplicateKeyError if the proposal already has one
   */
  async saveValidation(validation: Validation): Promise<void> {
    const parsed = parseWithSchema(ValidationSchema, validation);
    if (!parsed.success) {
      throw new InvalidRecordError('validation', parsed.errors, { proposalId: validation.proposal_id });
    }
    await this.records.insert(VALIDATIONS_COLLECTION, parsed.data.proposal_id, parsed.data);
  }

  async getValidation(proposalId: string): Promise<Validation | null> {
    const record = await this.records.get(VALIDATIONS_COLLECTION, proposalId);
    return record ? this.toValidation(record) : null;
  }

  async listValidations(): Promise<Validation[]> {
    const records = await this.records.query(VALIDATIONS_COLLECTION);
    return records.map(record => this.toValidation(record));
  }

  private toProposal(record: StoredRecord, id?: string): Proposal {
    const parsed = parseWithSchema(ProposalSchema, record);
    if (!parsed.success) {
      throw new InvalidRecordError('proposal', parsed.errors, { id: id ?? record.id });
    }
    return parsed.data;
  }

  private toValidation(record: StoredRecord): Validation {
    const parsed = parseWithSchema(ValidationSchema, record);
    if (!parsed.success) {
      throw new InvalidRecordError('validation', parsed.errors, { proposalId: record.proposal_id });
    }
    return parsed.data;
  }
}
