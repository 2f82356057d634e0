/**
 * Configuration Types
 *
 * @module config/types
 */

import type { FinishClassifier, FinishMarker } from '../domain/finish-markers.js';
import type { ErrorHandler, ErrorStrategy } from '../utils/error-handler.js';

/**
 * User-facing options
 *
 * @example
 * ```typescript
 * const factory = new Factory(indexedDB, {
 *   extraFinishMarkers: [
 *     { kind: 'error-name', reason: 'transaction-finished', name: 'TransactionInactiveError' },
 *   ],
 *   listenerErrors: 'ignore',
 *   onListenerError: (error, context) => telemetry.capture(error, { context }),
 * });
 * ```
 */
export interface IdbOptions {
  /** Additional recoverable-finish markers, checked after the built-in ones */
  extraFinishMarkers?: readonly FinishMarker[];
  /**
   * How failures inside host event listeners are reported
   * @default 'log'
   */
  listenerErrors?: ErrorStrategy;
  /** Custom reporter invoked before the strategy applies */
  onListenerError?: ErrorHandler;
}

/** Resolved configuration shared by all wrappers of one factory */
export interface ResolvedIdbConfig {
  readonly classify: FinishClassifier;
  readonly reportListenerError: ErrorHandler;
}

