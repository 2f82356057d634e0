/**
 * Database factory
 *
 * Entry point binding the library to a host `IDBFactory`.
 */

import { type IdbOptions, type ResolvedIdbConfig, resolveIdbConfig } from './config/index.js';
import { Database } from './database.js';
import { CancellationError, ConfigurationError, normalizeError, toIdbError } from './domain/errors.js';
import { ignoreResult, Request, type WaitOptions } from './request.js';
import { Transaction } from './transaction.js';
import { factoryLog } from './utils/debug.js';

/**
 * Runs inside `upgradeneeded`. Throwing aborts the upgrade and fails the open.
 */
export type UpgradeCallback = (db: Database, oldVersion: number, newVersion: number | null) => void;

export interface OpenOptions extends WaitOptions {
  upgrade?: UpgradeCallback;
}

export class Factory {
  static #global: Factory | undefined;

  readonly #raw: IDBFactory;
  readonly config: ResolvedIdbConfig;

  constructor(raw: IDBFactory, options: IdbOptions = {}) {
    this.#raw = raw;
    this.config = resolveIdbConfig(options);
  }

  /**
   * Factory bound to the global `indexedDB`
   *
   * @remarks
   * Initialized once. The first call resolves the global handle and its
   * options; every later call returns that same instance.
   *
   * @throws {ConfigurationError} If no global `indexedDB` exists, or options are
   * passed after initialization
   */
  static global(options?: IdbOptions): Factory {
    if (Factory.#global) {
      if (options) {
        throw new ConfigurationError('Factory.global() is already initialized; options are only accepted on the first call.');
      }
      return Factory.#global;
    }

    if (typeof indexedDB === 'undefined') {
      throw new ConfigurationError(
        'No global indexedDB found. Pass an IDBFactory to new Factory() or install one (for example fake-indexeddb in tests).',
      );
    }

    Factory.#global = new Factory(indexedDB, options);
    return Factory.#global;
  }

  get raw(): IDBFactory {
    return this.#raw;
  }

  /**
   * Opens (and upgrades when `version` is higher) a database
   *
   * @example
   * ```typescript
   * const db = await Factory.global().open('app', 1, {
   *   upgrade: (db) => {
   *     const users = db.createObjectStore('users', { keyPath: 'id' });
   *     users.createIndex('by-email', 'email', { unique: true });
   *   },
   * });
   * ```
   */
  async open(name: string, version?: number, options: OpenOptions = {}): Promise<Database> {
    const { upgrade, signal } = options;
    const raw = this.#hostCall(() => (version === undefined ? this.#raw.open(name) : this.#raw.open(name, version)));
    let upgradeFailure: Error | undefined;

    const onUpgrade = (event: IDBVersionChangeEvent): void => {
      const upgradeTransaction = raw.transaction;
      if (!upgradeTransaction) {
        return;
      }
      const scope = new Transaction(upgradeTransaction, this.config);
      factoryLog('Upgrading %s from version %d to %s', name, event.oldVersion, String(event.newVersion));

      try {
        upgrade?.(new Database(raw.result, this.config, scope), event.oldVersion, event.newVersion);
      } catch (thrownValue) {
        upgradeFailure = normalizeError(thrownValue);
        factoryLog('Upgrade of %s failed: %s', name, upgradeFailure.message);
        scope.tryAbort();
      }
    };
    const onBlocked = (): void => {
      factoryLog('Opening %s is blocked by another open connection', name);
    };

    raw.addEventListener('upgradeneeded', onUpgrade);
    raw.addEventListener('blocked', onBlocked);

    try {
      const request = new Request(raw, null, (db: IDBDatabase) => new Database(db, this.config), this.config);
      return await request.await({ signal });
    } catch (error) {
      if (error instanceof CancellationError && raw.readyState === 'pending') {
        // nobody will run the upgrade or receive the connection
        raw.addEventListener('upgradeneeded', () => this.#abandonUpgrade(raw, name), { once: true });
        raw.addEventListener('success', () => raw.result.close(), { once: true });
      }
      throw upgradeFailure ?? error;
    } finally {
      raw.removeEventListener('upgradeneeded', onUpgrade);
      raw.removeEventListener('blocked', onBlocked);
    }
  }

  /** Deletes a database. Waits while other connections block the deletion. */
  async deleteDatabase(name: string, options: WaitOptions = {}): Promise<void> {
    const raw = this.#hostCall(() => this.#raw.deleteDatabase(name));
    const onBlocked = (): void => {
      factoryLog('Deleting %s is blocked by another open connection', name);
    };

    raw.addEventListener('blocked', onBlocked);
    try {
      await new Request(raw, null, ignoreResult, this.config).await(options);
    } finally {
      raw.removeEventListener('blocked', onBlocked);
    }
  }

  /** Rolls back the version change of a cancelled open so the next open upgrades again. */
  #abandonUpgrade(raw: IDBOpenDBRequest, name: string): void {
    const upgradeTransaction = raw.transaction;
    if (!upgradeTransaction) {
      return;
    }
    factoryLog('Open of %s was cancelled; rolling back its upgrade', name);
    raw.addEventListener('error', (event) => event.preventDefault(), { once: true });
    new Transaction(upgradeTransaction, this.config).tryAbort();
  }

  #hostCall<T>(call: () => T): T {
    try {
      return call();
    } catch (thrownValue) {
      throw toIdbError(thrownValue, this.config.classify);
    }
  }
}
