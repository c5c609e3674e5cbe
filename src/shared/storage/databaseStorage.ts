/**
 * Database Record Store
 *
 * SQLite-based implementation of RecordStore.
 * Uses better-sqlite3 for synchronous, performant database operations.
 *
 * Schema:
 *   records(id, collection, key, body, created_at, updated_at)
 *   UNIQUE(collection, key)
 *
 * Bodies are JSON text; filters are evaluated with json_extract.
 */

import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import { createComponentLogger } from '../../service/logger';
import {
  QueryOptions,
  RecordFilter,
  RecordMutator,
  RecordStore,
  StoredRecord,
  isStoredRecord
} from './interface';
import { DuplicateKeyError, StoreUnavailableError } from './errors';

// ============================================================================
// Types
// ============================================================================

/**
 * Configuration options for DatabaseRecordStore
 */
export interface DatabaseRecordStoreOptions {
  /**
   * Path to the SQLite database file
   * Use ':memory:' for an in-memory database (useful for testing)
   */
  databasePath: string;

  /**
   * Whether to enable WAL mode for better concurrent performance
   * Default: true
   */
  walMode?: boolean;

  logger?: Logger;
}

interface BodyRow {
  body: string;
}

type FilterValue = string | number | null;

// ============================================================================
// Schema Migration
// ============================================================================

const SCHEMA_VERSION = 1;

const MIGRATIONS: Record<number, string[]> = {
  1: [
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY
    )`,
    `CREATE TABLE IF NOT EXISTS records (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      collection TEXT NOT NULL,
      key TEXT NOT NULL,
      body TEXT NOT NULL,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      updated_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      UNIQUE(collection, key)
    )`,
    `CREATE INDEX IF NOT EXISTS idx_records_collection ON records(collection, id)`
  ]
};

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function toFilterValue(value: string | number | boolean | null): FilterValue {
  return typeof value === 'boolean' ? (value ? 1 : 0) : value;
}

/**
 * Carries a mutator's error out of the transaction so it rolls back
 */
class MutatorAbort extends Error {
  constructor(public readonly reason: unknown) {
    super('update aborted by mutator');
  }
}

// ============================================================================
// Database Record Store Implementation
// ============================================================================

export class DatabaseRecordStore implements RecordStore {
  private db: Database.Database;
  private logger: Logger;

  private stmtGet: Database.Statement<[string, string], BodyRow>;
  private stmtInsert: Database.Statement<[string, string, string]>;
  private stmtUpsert: Database.Statement<[string, string, string]>;
  private stmtUpdate: Database.Statement<[string, string, string]>;

  constructor(options: DatabaseRecordStoreOptions) {
    this.logger = options.logger ?? createComponentLogger('storage');

    this.db = DatabaseRecordStore.open(options.databasePath);

    if (options.walMode !== false) {
      this.db.pragma('journal_mode = WAL');
    }

    this.runMigrations();

    this.stmtGet = this.db.prepare<[string, string], BodyRow>(
      'SELECT body FROM records WHERE collection = ? AND key = ?'
    );

    this.stmtInsert = this.db.prepare<[string, string, string]>(
      'INSERT INTO records (collection, key, body) VALUES (?, ?, ?)'
    );

    this.stmtUpsert = this.db.prepare<[string, string, string]>(`
      INSERT INTO records (collection, key, body, created_at, updated_at)
      VALUES (?, ?, ?, CURRENT_TIMESTAMP, CURRENT_TIMESTAMP)
      ON CONFLICT(collection, key) DO UPDATE SET
        body = excluded.body,
        updated_at = CURRENT_TIMESTAMP
    `);

    this.stmtUpdate = this.db.prepare<[string, string, string]>(`
      UPDATE records SET body = ?, updated_at = CURRENT_TIMESTAMP
      WHERE collection = ? AND key = ?
    `);
  }

  private static open(databasePath: string): Database.Database {
    try {
      return new Database(databasePath);
    } catch (error) {
      throw new StoreUnavailableError('open', databasePath, error);
    }
  }

  /**
   * Run database migrations
   */
  private runMigrations(): void {
    this.db.exec(MIGRATIONS[1][0]);
    const row = this.db
      .prepare<[], { version: number }>('SELECT version FROM schema_version ORDER BY version DESC LIMIT 1')
      .get();
    const currentVersion = row?.version ?? 0;

    for (let v = currentVersion + 1; v <= SCHEMA_VERSION; v++) {
      const statements = MIGRATIONS[v];
      if (statements) {
        const transaction = this.db.transaction(() => {
          for (const sql of statements) {
            this.db.exec(sql);
          }
          this.db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(v);
        });
        transaction();
        this.logger.info({ version: v }, 'Migrated record store schema');
      }
    }
  }

  private parseBody(collection: string, key: string, body: string): StoredRecord {
    const value: unknown = JSON.parse(body);
    if (!isStoredRecord(value)) {
      throw new StoreUnavailableError('read', collection, new Error(`Record ${key} is not a JSON object`));
    }
    return value;
  }

  /**
   * Run a backend call, wrapping driver failures
   */
  private guard<T>(operation: string, collection: string, action: () => T): T {
    try {
      return action();
    } catch (error) {
      if (error instanceof DuplicateKeyError || error instanceof StoreUnavailableError) {
        throw error;
      }
      throw new StoreUnavailableError(operation, collection, error);
    }
  }

  // ============================================================================
  // RecordStore Implementation
  // ============================================================================

  async put(collection: string, key: string, record: StoredRecord): Promise<void> {
    this.guard('put', collection, () => {
      this.stmtUpsert.run(collection, key, JSON.stringify(record));
    });
  }

  async insert(collection: string, key: string, record: StoredRecord): Promise<void> {
    this.guard('insert', collection, () => {
      try {
        this.stmtInsert.run(collection, key, JSON.stringify(record));
      } catch (error) {
        if (error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
          throw new DuplicateKeyError(collection, key);
        }
        throw error;
      }
    });
  }

  async get(collection: string, key: string): Promise<StoredRecord | null> {
    return this.guard('get', collection, () => {
      const row = this.stmtGet.get(collection, key);
      return row ? this.parseBody(collection, key, row.body) : null;
    });
  }

  async query(
    collection: string,
    filter: RecordFilter = {},
    options: QueryOptions = {}
  ): Promise<StoredRecord[]> {
    const clauses = ['collection = ?'];
    const params: FilterValue[] = [collection];

    for (const [field, expected] of Object.entries(filter)) {
      if (!FIELD_NAME.test(field)) {
        throw new StoreUnavailableError('query', collection, new Error(`Invalid filter field: ${field}`));
      }
      if (expected === null) {
        clauses.push(`json_extract(body, '$.${field}') IS NULL`);
      } else {
        clauses.push(`json_extract(body, '$.${field}') = ?`);
        params.push(toFilterValue(expected));
      }
    }

    let sql = `SELECT key, body FROM records WHERE ${clauses.join(' AND ')} ORDER BY id ${options.order === 'desc' ? 'DESC' : 'ASC'}`;
    if (options.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(options.limit);
    }

    return this.guard('query', collection, () =>
      this.db
        .prepare<FilterValue[], { key: string; body: string }>(sql)
        .all(...params)
        .map(row => this.parseBody(collection, row.key, row.body))
    );
  }

  async update(collection: string, key: string, mutate: RecordMutator): Promise<StoredRecord | null> {
    const transaction = this.db.transaction((): StoredRecord | null => {
      const row = this.stmtGet.get(collection, key);
      if (!row) {
        return null;
      }
      let next: StoredRecord;
      try {
        next = mutate(this.parseBody(collection, key, row.body));
      } catch (error) {
        throw new MutatorAbort(error);
      }
      this.stmtUpdate.run(JSON.stringify(next), collection, key);
      return next;
    });

    try {
      return transaction.immediate();
    } catch (error) {
      if (error instanceof MutatorAbort) {
        throw error.reason;
      }
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      throw new StoreUnavailableError('update', collection, error);
    }
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  /**
   * Number of records in a collection
   */
  count(collection: string): number {
    const row = this.db
      .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM records WHERE collection = ?')
      .get(collection);
    return row?.total ?? 0;
  }
}
