/**
 * One-Shot Retry Wrapper
 *
 * Runs a unit of work inside a fresh transaction and starts over whenever the
 * host finishes that transaction underneath it.
 */

import type { TransactionMode } from './constants.js';
import type { Database } from './database.js';
import { isTxnFinishedError } from './domain/errors.js';
import type { Transaction } from './transaction.js';
import { retryLog } from './utils/debug.js';

/**
 * Work executed against one transaction attempt
 *
 * @remarks
 * May run more than once, so it must be safe to repeat.
 */
export type UnitOfWork<T> = (txn: Transaction) => Promise<T>;

/**
 * Runs `unitOfWork` until it completes in a transaction that did not finish early
 *
 * @returns The value of the successful attempt
 * @throws {ConfigurationError} If `storeNames` is empty
 * @throws The unit of work's error, unchanged, for anything outside the
 * recoverable-finish class
 *
 * @example
 * ```typescript
 * const total = await retryTransaction(db, TRANSACTION_MODE.READ_WRITE, ['counters'], async (txn) => {
 *   const store = txn.objectStore('counters');
 *   await store.put({ id: 'visits', value: 1 }).await();
 *   return store.count().await();
 * });
 * ```
 */
export const retryTransaction = async <T>(
  db: Database,
  mode: TransactionMode,
  storeNames: readonly string[],
  unitOfWork: UnitOfWork<T>,
): Promise<T> => {
  const { classify } = db.config;

  for (let attempt = 1; ; attempt++) {
    const txn = db.transaction(mode, storeNames);

    let value: T;
    try {
      value = await unitOfWork(txn);
    } catch (error) {
      if (isTxnFinishedError(error, classify)) {
        retryLog('Attempt %d over [%s] hit a finished transaction, retrying', attempt, storeNames.join(', '));
        // the host may still consider it active
        txn.tryAbort();
        continue;
      }
      txn.tryAbort();
      throw error;
    }

    try {
      txn.commit();
    } catch (error) {
      if (!isTxnFinishedError(error, classify)) {
        throw error;
      }
      retryLog('Transaction over [%s] finished before commit; its work is already applied', storeNames.join(', '));
    }

    return value;
  }
};
