/**
 * Database connection wrapper
 */

import type { ResolvedIdbConfig } from './config/index.js';
import type { TransactionMode } from './constants.js';
import { ConfigurationError, toIdbError } from './domain/errors.js';
import { ObjectStore } from './object-store.js';
import { Transaction } from './transaction.js';
import { txnLog } from './utils/debug.js';

export class Database {
  readonly #raw: IDBDatabase;
  readonly #upgrade: Transaction | null;
  readonly config: ResolvedIdbConfig;

  /**
   * @param upgradeTransaction - The version-change transaction, when wrapping a
   * connection from inside an upgrade callback
   */
  constructor(raw: IDBDatabase, config: ResolvedIdbConfig, upgradeTransaction: Transaction | null = null) {
    this.#raw = raw;
    this.config = config;
    this.#upgrade = upgradeTransaction;
  }

  get raw(): IDBDatabase {
    return this.#raw;
  }

  get name(): string {
    return this.#raw.name;
  }

  get version(): number {
    return this.#raw.version;
  }

  get objectStoreNames(): string[] {
    return Array.from(this.#raw.objectStoreNames);
  }

  /**
   * Opens a transaction scope over `storeNames`
   *
   * @throws {ConfigurationError} If `storeNames` is empty
   * @throws {IdbError} If the host refuses (unknown store, closing connection, ...)
   *
   * @example
   * ```typescript
   * const txn = db.transaction('readwrite', ['users', 'sessions']);
   * await txn.objectStore('users').put({ id: 'u1' }).await();
   * txn.commit();
   * ```
   */
  transaction(mode: TransactionMode, storeNames: readonly string[], options?: IDBTransactionOptions): Transaction {
    if (storeNames.length === 0) {
      throw new ConfigurationError('A transaction must have at least one object store.');
    }

    let raw: IDBTransaction;
    try {
      raw = this.#raw.transaction([...storeNames], mode, options);
    } catch (thrownValue) {
      throw toIdbError(thrownValue, this.config.classify);
    }

    txnLog('Opened %s transaction over [%s]', mode, storeNames.join(', '));
    return new Transaction(raw, this.config);
  }

  /** Creates an object store. Only valid inside an upgrade callback. */
  createObjectStore(name: string, options?: IDBObjectStoreParameters): ObjectStore {
    const upgrade = this.#requireUpgrade('createObjectStore');
    return new ObjectStore(
      upgrade.run(() => this.#raw.createObjectStore(name, options)),
      upgrade,
    );
  }

  /** Deletes an object store. Only valid inside an upgrade callback. */
  deleteObjectStore(name: string): void {
    const upgrade = this.#requireUpgrade('deleteObjectStore');
    upgrade.run(() => this.#raw.deleteObjectStore(name));
  }

  close(): void {
    this.#raw.close();
  }

  #requireUpgrade(operation: string): Transaction {
    if (!this.#upgrade) {
      throw new ConfigurationError(`${operation} is only available inside an upgrade callback.`);
    }
    return this.#upgrade;
  }
}
