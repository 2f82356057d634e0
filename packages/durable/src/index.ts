/**
 * @durable-idb/durable - Transactions that survive IndexedDB auto-commit
 *
 * @packageDocumentation
 */

export type { DurableWork } from './durable-transaction.js';
export { createDurableTransaction, DurableTransaction } from './durable-transaction.js';
export type { CursorOptions, RangeOptions, WriteOptions } from './durable-object-store.js';
export { DurableObjectStore } from './durable-object-store.js';
export { DurableIndex } from './durable-index.js';

// Re-exported from @durable-idb/core for single-import use
export type { Database, KeyQuery, Transaction, TransactionMode, WaitOptions } from '@durable-idb/core';
export { ConfigurationError, Factory, isTxnFinishedError, TransactionFinishedError } from '@durable-idb/core';
