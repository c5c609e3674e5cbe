/**
 * Record Store Interface
 *
 * Backend-agnostic persistence for keyed JSON records grouped into
 * collections. Backends:
 * - MemoryRecordStore: in-process Map (tests, single-run tools)
 * - DatabaseRecordStore: SQLite via better-sqlite3
 *
 * Records are opaque to the store; callers validate them on the way out.
 */

/**
 * A JSON object as stored
 */
export type StoredRecord = Record<string, unknown>;

/**
 * Equality filter on top-level record fields
 */
export type RecordFilter = Record<string, string | number | boolean | null>;

export interface QueryOptions {
  /** Maximum number of records to return */
  limit?: number;
  /** Insertion order; 'desc' returns the newest first. Default: 'asc' */
  order?: 'asc' | 'desc';
}

/**
 * Computes the replacement for a record inside an atomic update.
 * Throwing aborts the update and the error reaches the caller unchanged.
 */
export type RecordMutator = (current: StoredRecord) => StoredRecord;

export interface RecordStore {
  /**
   * Create or replace a record
   */
  put(collection: string, key: string, record: StoredRecord): Promise<void>;

  /**
   * Create a record
   * @throws DuplicateKeyError if the key is taken
   */
  insert(collection: string, key: string, record: StoredRecord): Promise<void>;

  /**
   * Read a record, or null when absent
   */
  get(collection: string, key: string): Promise<StoredRecord | null>;

  /**
   * Records whose fields equal every filter value, in insertion order
   */
  query(collection: string, filter?: RecordFilter, options?: QueryOptions): Promise<StoredRecord[]>;

  /**
   * Read-modify-write a single record atomically.
   * @returns The stored replacement, or null when the record is absent
   */
  update(collection: string, key: string, mutate: RecordMutator): Promise<StoredRecord | null>;

  /**
   * Release backend resources
   */
  close(): Promise<void>;
}

/**
 * Narrow an unknown value to a plain JSON object
 */
export function isStoredRecord(value: unknown): value is StoredRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when every filter entry equals the record's field
 */
export function matchesFilter(record: StoredRecord, filter: RecordFilter): boolean {
  return Object.entries(filter).every(([field, expected]) =>
    expected === null ? record[field] === null || record[field] === undefined : record[field] === expected
  );
}
