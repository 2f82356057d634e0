/**
 * Durable Transaction Module
 *
 * A transaction-like handle that survives the host auto-committing its
 * underlying transaction. Whenever work fails because the live transaction
 * already finished, a new one is opened over the same stores and the work
 * runs again.
 *
 * @module durable-transaction
 */

import {
  ConfigurationError,
  type Database,
  durableLog,
  isTxnFinishedError,
  type Transaction,
  type TransactionMode,
} from '@durable-idb/core';
import { DurableObjectStore } from './durable-object-store.js';

/** Work run against the live transaction. May run more than once. */
export type DurableWork<T> = (txn: Transaction) => Promise<T>;

/**
 * Transaction handle that recreates its host transaction on demand
 *
 * @remarks
 * Not safe for interleaved use: callers must serialize operations on one
 * instance. Work may be replayed, so it must be idempotent.
 *
 * @example
 * ```typescript
 * const durable = createDurableTransaction(db, 'readwrite', ['notes']);
 * const notes = durable.objectStore('notes');
 *
 * await notes.put({ id: 'n1', body: 'draft' });
 * await fetch('/sync'); // the host may auto-commit here
 * await notes.put({ id: 'n2', body: 'second' }); // runs in a fresh transaction if needed
 *
 * durable.commit();
 * ```
 */
export class DurableTransaction {
  readonly #db: Database;
  readonly #mode: TransactionMode;
  readonly #storeNames: readonly string[];
  readonly #stores: ReadonlyMap<string, DurableObjectStore>;
  #live: Transaction | null = null;

  /**
   * @throws {ConfigurationError} If `storeNames` is empty
   */
  constructor(db: Database, mode: TransactionMode, storeNames: readonly string[]) {
    if (storeNames.length === 0) {
      throw new ConfigurationError('A transaction must have at least one object store.');
    }

    this.#db = db;
    this.#mode = mode;
    this.#storeNames = Object.freeze([...storeNames]);
    this.#stores = new Map(this.#storeNames.map((name) => [name, new DurableObjectStore(this, name)]));
  }

  get mode(): TransactionMode {
    return this.#mode;
  }

  get storeNames(): readonly string[] {
    return this.#storeNames;
  }

  /** The current host transaction scope, or `null` before first use and after a finish */
  get live(): Transaction | null {
    return this.#live;
  }

  /**
   * Returns the durable store wrapper for `name`
   *
   * @remarks
   * The same instance is returned for the lifetime of this handle, however many
   * times the underlying transaction is replaced.
   *
   * @throws {ConfigurationError} If `name` was not requested at construction
   */
  objectStore(name: string): DurableObjectStore {
    const store = this.#stores.get(name);
    if (!store) {
      throw new ConfigurationError(`Object store "${name}" is not available in this transaction.`);
    }
    return store;
  }

  /**
   * Runs `work` against a live transaction, replacing it when it finished early
   *
   * @throws Any error outside the recoverable-finish class, unchanged
   */
  async withRetry<T>(work: DurableWork<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      const txn = this.#ensureLive();
      try {
        return await work(txn);
      } catch (error) {
        if (!isTxnFinishedError(error, this.#db.config.classify)) {
          throw error;
        }
        durableLog('Attempt %d found the transaction over [%s] finished, replacing it', attempt, this.#storeNames.join(', '));
        this.#release(txn);
      }
    }
  }

  /**
   * Aborts the live transaction, if any
   *
   * @returns `true` when the abort applied; `false` when there was nothing to
   * abort or the transaction had already finished
   */
  abort(): boolean {
    const txn = this.#live;
    if (!txn) {
      return false;
    }

    try {
      txn.abort();
      return true;
    } catch (error) {
      if (isTxnFinishedError(error, this.#db.config.classify)) {
        return false;
      }
      throw error;
    } finally {
      this.#release(txn);
    }
  }

  /**
   * Commits the live transaction, if any
   *
   * @returns `true` when the commit was issued; `false` when there was nothing
   * to commit or the host had already committed it
   */
  commit(): boolean {
    const txn = this.#live;
    if (!txn) {
      return false;
    }

    try {
      txn.commit();
      return true;
    } catch (error) {
      if (isTxnFinishedError(error, this.#db.config.classify)) {
        return false;
      }
      throw error;
    } finally {
      this.#release(txn);
    }
  }

  #ensureLive(): Transaction {
    if (this.#live) {
      return this.#live;
    }
    this.#live = this.#db.transaction(this.#mode, this.#storeNames);
    durableLog('Opened %s transaction over [%s]', this.#mode, this.#storeNames.join(', '));
    return this.#live;
  }

  /** Clears the live field, but only if it still refers to `txn` */
  #release(txn: Transaction): void {
    if (this.#live === txn) {
      this.#live = null;
    }
  }
}

/** Creates a {@link DurableTransaction} */
export const createDurableTransaction = (
  db: Database,
  mode: TransactionMode,
  storeNames: readonly string[],
): DurableTransaction => new DurableTransaction(db, mode, storeNames);
