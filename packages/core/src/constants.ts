/** Constants and Default Values for IndexedDB Access */

/** Access mode of a transaction scope */
export type TransactionMode = 'readonly' | 'readwrite';

/** Transaction mode constants */
export const TRANSACTION_MODE = {
  READ_ONLY: 'readonly',
  READ_WRITE: 'readwrite',
} as const satisfies Record<string, TransactionMode>;

/** Cursor traversal direction constants */
export const CURSOR_DIRECTION = {
  NEXT: 'next',
  NEXT_UNIQUE: 'nextunique',
  PREV: 'prev',
  PREV_UNIQUE: 'prevunique',
} as const satisfies Record<string, IDBCursorDirection>;

/** Host event names observed by the outcome bridge */
export const HOST_EVENTS = {
  REQUEST: { success: 'success', failure: 'error' },
  TRANSACTION: { success: 'complete', failure: 'abort' },
} as const;

/** Default configuration values */
export const DEFAULTS = {
  LISTENER_ERROR_STRATEGY: 'log',
  IDLE_WAIT_MS: 20,
  LOG_PREFIX: '[durable-idb]',
} as const;
