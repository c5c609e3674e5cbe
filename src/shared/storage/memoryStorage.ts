/**
 * In-Memory Record Store
 *
 * Map-backed implementation for testing and development.
 * Data persists only for the lifetime of the instance. Records are cloned on
 * the way in and out so callers never share references with the store.
 */

import {
  QueryOptions,
  RecordFilter,
  RecordMutator,
  RecordStore,
  StoredRecord,
  matchesFilter
} from './interface';
import { DuplicateKeyError } from './errors';

export class MemoryRecordStore implements RecordStore {
  private collections = new Map<string, Map<string, StoredRecord>>();

  private collection(name: string): Map<string, StoredRecord> {
    let records = this.collections.get(name);
    if (!records) {
      records = new Map();
      this.collections.set(name, records);
    }
    return records;
  }

  async put(collection: string, key: string, record: StoredRecord): Promise<void> {
    this.collection(collection).set(key, structuredClone(record));
  }

  async insert(collection: string, key: string, record: StoredRecord): Promise<void> {
    const records = this.collection(collection);
    if (records.has(key)) {
      throw new DuplicateKeyError(collection, key);
    }
    records.set(key, structuredClone(record));
  }

  async get(collection: string, key: string): Promise<StoredRecord | null> {
    const record = this.collection(collection).get(key);
    return record ? structuredClone(record) : null;
  }

  async query(
    collection: string,
    filter: RecordFilter = {},
    options: QueryOptions = {}
  ): Promise<StoredRecord[]> {
    let matches = Array.from(this.collection(collection).values())
      .filter(record => matchesFilter(record, filter));

    if (options.order === 'desc') {
      matches = matches.reverse();
    }
    if (options.limit !== undefined) {
      matches = matches.slice(0, options.limit);
    }
    return matches.map(record => structuredClone(record));
  }

  async update(collection: string, key: string, mutate: RecordMutator): Promise<StoredRecord | null> {
    const records = this.collection(collection);
    const current = records.get(key);
    if (!current) {
      return null;
    }

    // No await between read and write, so the update is atomic
    const next = mutate(structuredClone(current));
    records.set(key, structuredClone(next));
    return structuredClone(next);
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
