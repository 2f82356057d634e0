/**
 * Error Types - Structured failures raised by the library
 *
 * Every error extends {@link IdbError}. Host failures are translated once,
 * at the boundary, by {@link toIdbError}; internal logic matches on the
 * classes below rather than on message text.
 */

import type { FinishClassifier, FinishReason } from './finish-markers.js';
import { classifyFinish } from './finish-markers.js';

interface IdbErrorOptions {
  cause?: unknown;
  /** Host classification, e.g. `ConstraintError` or `DataError` */
  domName?: string;
}

/** Base class of every error raised by the library */
export class IdbError extends Error {
  public readonly domName: string | undefined;

  constructor(message: string, options: IdbErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'IdbError';
    this.domName = options.domName;
  }
}

/**
 * The transaction ended before the requested operation or commit could apply
 *
 * @remarks
 * Recoverable: retry wrappers discard the scope and run the work again.
 */
export class TransactionFinishedError extends IdbError {
  constructor(
    public readonly reason: FinishReason,
    message = 'The transaction has finished.',
    options: IdbErrorOptions = {},
  ) {
    super(message, options);
    this.name = 'TransactionFinishedError';
  }
}

/** A request failed on the host (constraint violation, invalid state, ...) */
export class HostOperationError extends IdbError {
  constructor(message: string, options: IdbErrorOptions = {}) {
    super(message, options);
    this.name = 'HostOperationError';
  }
}

/** Awaited transaction completion ended in an abort */
export class TransactionAbortedError extends IdbError {
  constructor(message = 'The transaction was aborted.', options: IdbErrorOptions = {}) {
    super(message, options);
    this.name = 'TransactionAbortedError';
  }
}

/**
 * The wait was cancelled before the operation reported an outcome
 *
 * @remarks
 * Only the wait ends. The host operation may still complete later.
 */
export class CancellationError extends IdbError {
  constructor(public readonly reason: unknown) {
    super('The wait was cancelled before the request completed.', { cause: reason });
    this.name = 'CancellationError';
  }
}

/** Invalid arguments or options, reported synchronously and never retried */
export class ConfigurationError extends IdbError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A listener callback threw while handling a host notification */
export class ListenerError extends IdbError {
  constructor(cause: Error) {
    super(`Request listener failed: ${cause.message}`, { cause });
    this.name = 'ListenerError';
  }
}

/**
 * Normalizes any thrown value to an Error instance
 *
 * @remarks
 * Handles cases where non-Error values are thrown (strings, objects, etc.)
 */
export const normalizeError = (thrownValue: unknown): Error => {
  if (thrownValue instanceof Error) {
    return thrownValue;
  }
  return new Error(String(thrownValue));
};

/** @internal DOMException in hosts that have it, any error-like with a string `name` otherwise */
const readDomName = (thrownValue: unknown): string | undefined => {
  if (typeof DOMException !== 'undefined' && thrownValue instanceof DOMException) {
    return thrownValue.name;
  }
  if (thrownValue instanceof Error && thrownValue.name !== 'Error') {
    return thrownValue.name;
  }
  return undefined;
};

/**
 * Translates a host failure into a structured error
 *
 * @returns `thrownValue` itself when it already is an {@link IdbError};
 * a {@link TransactionFinishedError} when `classify` recognizes it;
 * a {@link HostOperationError} otherwise
 */
export const toIdbError = (thrownValue: unknown, classify: FinishClassifier): IdbError => {
  if (thrownValue instanceof IdbError) {
    return thrownValue;
  }

  const error = normalizeError(thrownValue);
  const options = { cause: thrownValue, domName: readDomName(thrownValue) };
  const reason = classify(thrownValue);

  if (reason) {
    return new TransactionFinishedError(reason, error.message, options);
  }
  return new HostOperationError(error.message, options);
};

/**
 * Checks whether a failure belongs to the recoverable-finish class
 *
 * @remarks
 * Values that never crossed {@link toIdbError} (for example an error thrown by
 * caller code) are classified with `classify` directly.
 */
export const isTxnFinishedError = (thrownValue: unknown, classify: FinishClassifier = classifyFinish): boolean => {
  if (thrownValue instanceof TransactionFinishedError) {
    return true;
  }
  if (thrownValue instanceof IdbError) {
    return false;
  }
  return classify(thrownValue) !== null;
};
