/**
 * Durable Object Store Module
 *
 * Store operations that run under {@link DurableTransaction.withRetry} and
 * await their request, so each call either applies in some live transaction
 * or fails with a non-recoverable error.
 *
 * @module durable-object-store
 */

import type { Cursor, CursorWithValue, KeyQuery, ObjectStore, WaitOptions } from '@durable-idb/core';
import { DurableIndex } from './durable-index.js';
import type { DurableTransaction } from './durable-transaction.js';

export interface WriteOptions extends WaitOptions {
  /** Explicit key, for stores without a key path */
  key?: IDBValidKey;
}

export interface RangeOptions extends WaitOptions {
  query?: KeyQuery | null;
  /** Maximum number of results */
  count?: number;
}

export interface CursorOptions extends WaitOptions {
  query?: KeyQuery | null;
  direction?: IDBCursorDirection;
}

/**
 * Object store bound to whichever transaction is live in its owner
 *
 * @remarks
 * Holds no transaction of its own. Every call resolves the owner's live
 * transaction, so replacing it rebinds every store wrapper at once.
 */
export class DurableObjectStore {
  readonly #owner: DurableTransaction;
  readonly #name: string;

  constructor(owner: DurableTransaction, name: string) {
    this.#owner = owner;
    this.#name = name;
  }

  get name(): string {
    return this.#name;
  }

  get transaction(): DurableTransaction {
    return this.#owner;
  }

  /**
   * Runs `fn` against the store of the live transaction, retrying on a finished transaction
   *
   * @example
   * ```typescript
   * const total = await notes.withStore(async (store) => {
   *   await store.put({ id: 'n1' }).await();
   *   return store.count().await();
   * });
   * ```
   */
  withStore<T>(fn: (store: ObjectStore) => Promise<T>): Promise<T> {
    return this.#owner.withRetry((txn) => fn(txn.objectStore(this.#name)));
  }

  /** Adds a record; fails with `ConstraintError` if the key exists */
  add(value: unknown, options: WriteOptions = {}): Promise<IDBValidKey> {
    const { key, signal } = options;
    return this.withStore((store) => store.add(value, key).await({ signal }));
  }

  /** Adds or replaces a record */
  put(value: unknown, options: WriteOptions = {}): Promise<IDBValidKey> {
    const { key, signal } = options;
    return this.withStore((store) => store.put(value, key).await({ signal }));
  }

  delete(query: KeyQuery, options: WaitOptions = {}): Promise<void> {
    return this.withStore((store) => store.delete(query).await(options));
  }

  clear(options: WaitOptions = {}): Promise<void> {
    return this.withStore((store) => store.clear().await(options));
  }

  get(query: KeyQuery, options: WaitOptions = {}): Promise<unknown> {
    return this.withStore((store) => store.get(query).await(options));
  }

  getKey(query: KeyQuery, options: WaitOptions = {}): Promise<IDBValidKey | undefined> {
    return this.withStore((store) => store.getKey(query).await(options));
  }

  getAll(options: RangeOptions = {}): Promise<unknown[]> {
    const { query, count, signal } = options;
    return this.withStore((store) => store.getAll(query, count).await({ signal }));
  }

  getAllKeys(options: RangeOptions = {}): Promise<IDBValidKey[]> {
    const { query, count, signal } = options;
    return this.withStore((store) => store.getAllKeys(query, count).await({ signal }));
  }

  count(query?: KeyQuery, options: WaitOptions = {}): Promise<number> {
    return this.withStore((store) => store.count(query).await(options));
  }

  /**
   * Opens a cursor and returns its first position, or `null` for an empty range
   *
   * @remarks
   * The cursor belongs to the transaction live at the time of the call. If that
   * transaction finishes, moving the cursor fails and the traversal has to be
   * reopened.
   */
  openCursor(options: CursorOptions = {}): Promise<CursorWithValue | null> {
    const { query, direction, signal } = options;
    return this.withStore((store) => store.openCursor(query, direction).await({ signal }));
  }

  /** Key-only form of {@link DurableObjectStore.openCursor} */
  openKeyCursor(options: CursorOptions = {}): Promise<Cursor | null> {
    const { query, direction, signal } = options;
    return this.withStore((store) => store.openKeyCursor(query, direction).await({ signal }));
  }

  /** Durable view of the index `name` */
  index(name: string): DurableIndex {
    return new DurableIndex(this, name);
  }
}
