/**
 * Audit Log
 *
 * Append-only, hash-chained record of every pipeline decision.
 *
 *   payload_hash = sha256(canonical(payload))
 *   hash         = sha256(canonical(record without hash))
 *   prev_hash    = hash of the previous record, or GENESIS_HASH for seq 1
 *
 * Appends are serialized internally so seq values are gapless even when
 * many proposals are processed concurrently.
 */

import { createHash } from 'crypto';
import type { Logger } from 'pino';
import { createComponentLogger } from '../../service/logger';
import { RecordStore, StoredRecord, isStoredRecord } from '../../shared/storage/interface';
import { AuditRecordSchema } from '../../shared/validation/schemas';
import { parseWithSchema } from '../../shared/validation/validator';
import { AuditWriteError, ChainIntegrityError, InvalidRecordError } from '../errors';
import type { AuditRecord } from '../types';

export const AUDIT_COLLECTION = 'audit';
export const GENESIS_HASH = '0'.repeat(64);

// ============================================================================
// Types
// ============================================================================

export interface AuditEntry {
  actor: string;
  event_type: string;
  subject_id: string;
  payload: Record<string, unknown>;
}

export interface AuditFilter {
  event_type?: string;
  subject_id?: string;
  actor?: string;
  /** Keep only the most recent matches */
  limit?: number;
}

export interface VerifyRange {
  from?: number;
  to?: number;
}

export interface VerifySummary {
  verified: true;
  checked: number;
  first_seq: number | null;
  last_seq: number | null;
}

export interface AuditLogOptions {
  logger?: Logger;
  now?: () => Date;
}

interface ChainHead {
  seq: number;
  hash: string;
}

// ============================================================================
// Hashing
// ============================================================================

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isStoredRecord(value)) {
    return Object.fromEntries(
      Object.keys(value).sort().map(key => [key, sortKeys(value[key])])
    );
  }
  return value;
}

/**
 * JSON with object keys sorted at every depth
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

function seqKey(seq: number): string {
  return String(seq).padStart(12, '0');
}

/**
 * Round-trip through JSON so the hashed payload is exactly what is stored
 */
function toJsonPayload(payload: Record<string, unknown>): StoredRecord {
  const copy: unknown = JSON.parse(JSON.stringify(payload));
  return isStoredRecord(copy) ? copy : {};
}

// ============================================================================
// Audit Log
// ============================================================================

export class AuditLog {
  private head: ChainHead | null = null;
  private pending: Promise<void> = Promise.resolve();
  private logger: Logger;
  private now: () => Date;

  constructor(private readonly records: RecordStore, options: AuditLogOptions = {}) {
    this.logger = options.logger ?? createComponentLogger('audit');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Append a record and return its seq
   * @throws AuditWriteError when the backing store fails
   */
  append(entry: AuditEntry): Promise<number> {
    const run = this.pending.then(() => this.write(entry));
    this.pending = run.then(() => undefined, () => undefined);
    return run;
  }

  /**
   * Recompute hashes and links for the records in range
   * @throws ChainIntegrityError at the first offending seq
   */
  async verify(range: VerifyRange = {}): Promise<VerifySummary> {
    const from = range.from ?? 1;
    const to = range.to ?? Number.POSITIVE_INFINITY;
    const stored = await this.records.query(AUDIT_COLLECTION);

    let expectedSeq = 1;
    let prevHash = GENESIS_HASH;
    let checked = 0;
    let firstSeq: number | null = null;
    let lastSeq: number | null = null;

    for (const raw of stored) {
      if (expectedSeq > to) break;

      const parsed = parseWithSchema(AuditRecordSchema, raw);
      if (!parsed.success) {
        throw new ChainIntegrityError(expectedSeq, `Malformed audit record: ${parsed.errors[0]?.message ?? 'unknown'}`);
      }
      const record = parsed.data;

      if (record.seq !== expectedSeq) {
        throw new ChainIntegrityError(expectedSeq, `Expected seq ${expectedSeq} but found ${record.seq}`);
      }

      if (record.seq >= from) {
        if (record.prev_hash !== prevHash) {
          throw new ChainIntegrityError(record.seq, 'prev_hash does not match the previous record');
        }
        if (sha256(canonicalize(record.payload)) !== record.payload_hash) {
          throw new ChainIntegrityError(record.seq, 'payload_hash does not match the payload');
        }
        const { hash, ...unhashed } = record;
        if (sha256(canonicalize(unhashed)) !== hash) {
          throw new ChainIntegrityError(record.seq, 'hash does not match the record');
        }
        checked++;
        firstSeq = firstSeq ?? record.seq;
        lastSeq = record.seq;
      }

      prevHash = record.hash;
      expectedSeq++;
    }

    this.logger.debug({ checked, firstSeq, lastSeq }, 'Audit chain verified');
    return { verified: true, checked, first_seq: firstSeq, last_seq: lastSeq };
  }

  /**
   * Records matching the filter, in seq order
   */
  async list(filter: AuditFilter = {}): Promise<AuditRecord[]> {
    const query: Record<string, string> = {};
    if (filter.event_type) query.event_type = filter.event_type;
    if (filter.subject_id) query.subject_id = filter.subject_id;
    if (filter.actor) query.actor = filter.actor;

    const stored = filter.limit === undefined
      ? await this.records.query(AUDIT_COLLECTION, query)
      : (await this.records.query(AUDIT_COLLECTION, query, { order: 'desc', limit: filter.limit })).reverse();

    return stored.map(raw => this.toRecord(raw));
  }

  private async write(entry: AuditEntry): Promise<number> {
    try {
      const head = await this.loadHead();
      const payload = toJsonPayload(entry.payload);
      const unhashed = {
        seq: head.seq + 1,
        timestamp: this.now().toISOString(),
        actor: entry.actor,
        event_type: entry.event_type,
        subject_id: entry.subject_id,
        payload,
        payload_hash: sha256(canonicalize(payload)),
        prev_hash: head.hash
      };
      const hash = sha256(canonicalize(unhashed));

      await this.records.insert(AUDIT_COLLECTION, seqKey(unhashed.seq), { ...unhashed, hash });
      this.head = { seq: unhashed.seq, hash };

      this.logger.debug(
        { seq: unhashed.seq, eventType: entry.event_type, subjectId: entry.subject_id },
        'Audit record appended'
      );
      return unhashed.seq;
    } catch (error) {
      // Re-read the head on the next append in case the store moved on
      this.head = null;
      throw new AuditWriteError(entry.event_type, entry.subject_id, error);
    }
  }

  private async loadHead(): Promise<ChainHead> {
    if (this.head) {
      return this.head;
    }
    const [latest] = await this.records.query(AUDIT_COLLECTION, {}, { order: 'desc', limit: 1 });
    if (latest) {
      const record = this.toRecord(latest);
      this.head = { seq: record.seq, hash: record.hash };
    } else {
      this.head = { seq: 0, hash: GENESIS_HASH };
    }
    return this.head;
  }

  private toRecord(raw: StoredRecord): AuditRecord {
    const parsed = parseWithSchema(AuditRecordSchema, raw);
    if (!parsed.success) {
      throw new InvalidRecordError('audit', parsed.errors, { seq: raw.seq });
    }
    return parsed.data;
  }
}
