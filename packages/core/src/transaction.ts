/**
 * Transaction Scope
 *
 * Wraps one host `IDBTransaction` and tracks its lifecycle from host events so
 * that work issued after the host finalized the transaction fails with a typed
 * {@link TransactionFinishedError} instead of host-specific text.
 */

import { bridge } from './bridge.js';
import type { ResolvedIdbConfig } from './config/index.js';
import type { TransactionMode } from './constants.js';
import { HOST_EVENTS } from './constants.js';
import {
  CancellationError,
  ListenerError,
  normalizeError,
  TransactionAbortedError,
  TransactionFinishedError,
  toIdbError,
} from './domain/errors.js';
import { ObjectStore } from './object-store.js';
import type { WaitOptions } from './request.js';
import { txnLog } from './utils/debug.js';

/**
 * Lifecycle of a transaction scope
 *
 * - `active`: accepts requests
 * - `committing`: `commit()` was called, completion pending
 * - `committed`: completed after an explicit commit
 * - `aborted`: aborted explicitly or by a failed request
 * - `finished-prematurely`: the host auto-committed it while idle
 */
export type TransactionState = 'active' | 'committing' | 'committed' | 'aborted' | 'finished-prematurely';

export class Transaction {
  readonly #raw: IDBTransaction;
  readonly #stores = new Map<string, ObjectStore>();
  #state: TransactionState = 'active';
  readonly config: ResolvedIdbConfig;

  constructor(raw: IDBTransaction, config: ResolvedIdbConfig) {
    this.#raw = raw;
    this.config = config;

    raw.addEventListener(
      'complete',
      () => {
        this.#state = this.#state === 'committing' ? 'committed' : 'finished-prematurely';
        txnLog('Transaction over [%s] completed: %s', this.objectStoreNames.join(', '), this.#state);
      },
      { once: true },
    );
    raw.addEventListener(
      'abort',
      () => {
        this.#state = 'aborted';
        txnLog('Transaction over [%s] aborted', this.objectStoreNames.join(', '));
      },
      { once: true },
    );
  }

  /** Underlying host transaction */
  get raw(): IDBTransaction {
    return this.#raw;
  }

  get state(): TransactionState {
    return this.#state;
  }

  /** True once the scope can no longer accept requests */
  get isFinished(): boolean {
    return this.#state !== 'active';
  }

  get mode(): IDBTransactionMode {
    return this.#raw.mode;
  }

  get objectStoreNames(): string[] {
    return Array.from(this.#raw.objectStoreNames);
  }

  /**
   * Runs a host call against this scope
   *
   * @throws {TransactionFinishedError} If the scope already left the `active` state,
   * or the host reports that it did
   * @throws {HostOperationError} Any other host failure
   */
  run<T>(hostCall: (raw: IDBTransaction) => T): T {
    if (this.isFinished) {
      throw new TransactionFinishedError('transaction-finished', `The transaction has finished. (${this.#state})`);
    }
    try {
      return hostCall(this.#raw);
    } catch (thrownValue) {
      throw toIdbError(thrownValue, this.config.classify);
    }
  }

  /**
   * Returns the store wrapper for `name`
   *
   * @remarks
   * The wrapper is cached, so repeated lookups return the same instance.
   */
  objectStore(name: string): ObjectStore {
    const cached = this.#stores.get(name);
    if (cached) {
      return cached;
    }
    const store = new ObjectStore(this.run((raw) => raw.objectStore(name)), this);
    this.#stores.set(name, store);
    return store;
  }

  /**
   * Commits the transaction explicitly
   *
   * @throws {TransactionFinishedError} If the transaction already finished
   */
  commit(): void {
    this.run((raw) => {
      // commit() is missing on older engines; those commit automatically once idle
      if (typeof raw.commit === 'function') {
        raw.commit();
      }
    });
    this.#state = 'committing';
  }

  /**
   * Aborts the transaction
   *
   * @throws {TransactionFinishedError} If the transaction already finished or is committing
   */
  abort(): void {
    if (this.isFinished) {
      throw new TransactionFinishedError('transaction-finished', `The transaction has finished. (${this.#state})`);
    }
    try {
      this.#raw.abort();
    } catch (thrownValue) {
      throw toIdbError(thrownValue, this.config.classify);
    }
    this.#state = 'aborted';
  }

  /**
   * Best-effort abort
   *
   * @returns Whether the abort applied
   */
  tryAbort(): boolean {
    try {
      this.abort();
      return true;
    } catch (thrownValue) {
      txnLog('Best-effort abort did not apply: %s', normalizeError(thrownValue).message);
      return false;
    }
  }

  /**
   * Waits until the transaction completes
   *
   * @throws {TransactionAbortedError} If it aborts
   * @throws {CancellationError} If `signal` aborts first
   */
  done(options: WaitOptions = {}): Promise<void> {
    if (this.#state === 'committed' || this.#state === 'finished-prematurely') {
      return Promise.resolve();
    }
    if (this.#state === 'aborted') {
      return Promise.reject(this.#abortError());
    }

    return new Promise<void>((resolve, reject) => {
      bridge(
        this.#raw,
        HOST_EVENTS.TRANSACTION,
        {
          success: () => resolve(),
          failure: () => reject(this.#abortError()),
          cancel: (reason) => reject(new CancellationError(reason)),
          panic: (error) => reject(new ListenerError(error)),
        },
        options,
      );
    });
  }

  #abortError(): TransactionAbortedError {
    const hostError = this.#raw.error;
    if (!hostError) {
      return new TransactionAbortedError();
    }
    const translated = toIdbError(hostError, this.config.classify);
    return new TransactionAbortedError(translated.message, { cause: hostError, domName: translated.domName });
  }
}
