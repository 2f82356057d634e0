/**
 * Object store wrapper
 *
 * Each data call is issued through the owning transaction's guard and returns
 * a {@link Request}; nothing here awaits.
 */

import { type KeyQuery, RecordSource } from './record-source.js';
import { asIs, ignoreResult, type Request } from './request.js';
import { Index } from './store-index.js';
import type { Transaction } from './transaction.js';

export class ObjectStore extends RecordSource<IDBObjectStore> {
  constructor(raw: IDBObjectStore, transaction: Transaction) {
    super(raw, transaction);
  }

  get raw(): IDBObjectStore {
    return this.host;
  }

  get autoIncrement(): boolean {
    return this.host.autoIncrement;
  }

  get indexNames(): string[] {
    return Array.from(this.host.indexNames);
  }

  /**
   * Adds a new record
   *
   * @param key - Explicit key, for stores without a key path
   * @returns Request resolving to the record key; fails with `ConstraintError` if the key exists
   */
  add(value: unknown, key?: IDBValidKey): Request<IDBValidKey> {
    return this.request((host) => (key === undefined ? host.add(value) : host.add(value, key)), asIs);
  }

  /**
   * Adds or replaces a record
   *
   * @param key - Explicit key, for stores without a key path
   */
  put(value: unknown, key?: IDBValidKey): Request<IDBValidKey> {
    return this.request((host) => (key === undefined ? host.put(value) : host.put(value, key)), asIs);
  }

  delete(query: KeyQuery): Request<void, undefined> {
    return this.request((host) => host.delete(query), ignoreResult);
  }

  clear(): Request<void, undefined> {
    return this.request((host) => host.clear(), ignoreResult);
  }

  index(name: string): Index {
    return new Index(
      this.transaction.run(() => this.host.index(name)),
      this.transaction,
    );
  }

  /** Creates an index. Only valid inside an upgrade. */
  createIndex(name: string, keyPath: string | string[], options?: IDBIndexParameters): Index {
    return new Index(
      this.transaction.run(() => this.host.createIndex(name, keyPath, options)),
      this.transaction,
    );
  }

  /** Deletes an index. Only valid inside an upgrade. */
  deleteIndex(name: string): void {
    this.transaction.run(() => this.host.deleteIndex(name));
  }
}
