/** @durable-idb/core - Promise-based IndexedDB access with typed transaction lifecycle */

// Bridge
export type { BridgeEvents, BridgeHandlers, BridgeOptions, Teardown } from './bridge.js';
export { bridge } from './bridge.js';
// Config
export type { IdbOptions, ResolvedIdbConfig } from './config/index.js';
export { resolveIdbConfig, validateIdbOptions } from './config/index.js';
// Constants
export type { TransactionMode } from './constants.js';
export { CURSOR_DIRECTION, DEFAULTS, HOST_EVENTS, TRANSACTION_MODE } from './constants.js';
// Cursor
export { Cursor, CursorWithValue } from './cursor.js';
export type { CursorCallback, IterationSignal } from './cursor-request.js';
export { CursorRequest, STOP_ITERATION } from './cursor-request.js';
// Database
export { Database } from './database.js';
// Domain - Errors
export {
  CancellationError,
  ConfigurationError,
  HostOperationError,
  IdbError,
  isTxnFinishedError,
  ListenerError,
  normalizeError,
  TransactionAbortedError,
  TransactionFinishedError,
  toIdbError,
} from './domain/errors.js';
// Domain - Finish Markers
export type { FinishClassifier, FinishMarker, FinishReason } from './domain/finish-markers.js';
export { classifyFinish, createFinishClassifier, DEFAULT_FINISH_MARKERS } from './domain/finish-markers.js';
// Factory
export type { OpenOptions, UpgradeCallback } from './factory.js';
export { Factory } from './factory.js';
// Object Store / Index
export { ObjectStore } from './object-store.js';
export type { KeyQuery } from './record-source.js';
export { RecordSource } from './record-source.js';
export { Index } from './store-index.js';
// Request
export type { ListenOptions, RequestListener, ResultMapper, WaitOptions } from './request.js';
export { asIs, ignoreResult, Request } from './request.js';
// Retry
export type { UnitOfWork } from './retry.js';
export { retryTransaction } from './retry.js';
// Transaction
export type { TransactionState } from './transaction.js';
export { Transaction } from './transaction.js';
// Utils - Debug
export { cursorLog, durableLog, factoryLog, requestLog, retryLog, txnLog } from './utils/debug.js';
// Utils - Error Handler
export type { ErrorHandler, ErrorStrategy } from './utils/error-handler.js';
export { createErrorHandler } from './utils/error-handler.js';
