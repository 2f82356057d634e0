/**
 * Pending Operation
 *
 * A {@link Request} wraps one host `IDBRequest` and exposes its single
 * eventual outcome as a promise, with cancellation through an `AbortSignal`.
 */

import { bridge, type Teardown } from './bridge.js';
import type { ResolvedIdbConfig } from './config/index.js';
import { HOST_EVENTS } from './constants.js';
import type { IdbError } from './domain/errors.js';
import { CancellationError, HostOperationError, ListenerError, toIdbError } from './domain/errors.js';
import type { Transaction } from './transaction.js';
import { requestLog } from './utils/debug.js';

export interface WaitOptions {
  /** Cancels the wait. The host operation itself keeps running. */
  signal?: AbortSignal;
}

export interface ListenOptions extends WaitOptions {
  /** Deliver every success notification instead of only the first */
  multi?: boolean;
}

export interface RequestListener<T> {
  success: (value: T) => void;
  failure: (error: IdbError) => void;
}

/** Maps the raw host result to the value a caller sees */
export type ResultMapper<TRaw, TResult> = (raw: TRaw) => TResult;

/**
 * Result of a host request
 *
 * @template TResult - Value exposed to callers
 * @template TRaw - Value stored on the host request
 *
 * @example
 * ```typescript
 * const value = await store.get('user-1').await({ signal: AbortSignal.timeout(1000) });
 * ```
 */
export class Request<TResult, TRaw = TResult> {
  readonly #raw: IDBRequest<TRaw>;
  readonly #owner: WeakRef<Transaction> | undefined;
  readonly #map: ResultMapper<TRaw, TResult>;
  protected readonly config: ResolvedIdbConfig;

  constructor(
    raw: IDBRequest<TRaw>,
    owner: Transaction | null,
    map: ResultMapper<TRaw, TResult>,
    config: ResolvedIdbConfig,
  ) {
    this.#raw = raw;
    this.#owner = owner ? new WeakRef(owner) : undefined;
    this.#map = map;
    this.config = config;
  }

  /** Underlying host request */
  get raw(): IDBRequest<TRaw> {
    return this.#raw;
  }

  get readyState(): IDBRequestReadyState {
    return this.#raw.readyState;
  }

  /**
   * Transaction that issued the request, if it is still reachable
   *
   * @remarks
   * Lookup only. The request never keeps its transaction alive.
   */
  get transaction(): Transaction | undefined {
    return this.#owner?.deref();
  }

  /**
   * Reads the settled result
   *
   * @throws {IdbError} If the request is still pending or failed
   */
  result(): TResult {
    try {
      return this.#map(this.#raw.result);
    } catch (thrownValue) {
      throw toIdbError(thrownValue, this.config.classify);
    }
  }

  /** Reads the settled failure, or `null` when the request succeeded */
  error(): IdbError | null {
    try {
      const hostError = this.#raw.error;
      return hostError ? toIdbError(hostError, this.config.classify) : null;
    } catch (thrownValue) {
      return toIdbError(thrownValue, this.config.classify);
    }
  }

  /**
   * Subscribes to the request outcome
   *
   * @returns Teardown removing every registered listener
   */
  listen(listener: RequestListener<TResult>, options: ListenOptions = {}): Teardown {
    return bridge(
      this.#raw,
      HOST_EVENTS.REQUEST,
      {
        success: () => listener.success(this.result()),
        failure: () => listener.failure(this.error() ?? new HostOperationError('The request failed without an error.')),
        cancel: (reason) => listener.failure(new CancellationError(reason)),
        panic: (error) => this.recoverFromPanic(error, listener),
      },
      options,
    );
  }

  /**
   * Waits for the request to succeed or fail
   *
   * @throws {CancellationError} If `signal` aborts first
   * @throws {IdbError} The translated host failure
   */
  await(options: WaitOptions = {}): Promise<TResult> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new CancellationError(signal.reason));
    }

    if (this.#raw.readyState === 'done') {
      const error = this.error();
      return error ? Promise.reject(error) : new Promise((resolve) => resolve(this.result()));
    }

    return new Promise<TResult>((resolve, reject) => {
      this.listen({ success: resolve, failure: reject }, { signal });
    });
  }

  /**
   * Turns a throw from inside a listener into a failure result
   *
   * @remarks
   * The owning transaction is aborted best-effort so partially applied work
   * does not commit. Nothing thrown here reaches the host event loop.
   */
  protected recoverFromPanic(error: Error, listener: RequestListener<TResult>): void {
    requestLog('Listener failed while resolving request: %s', error.message);
    this.config.reportListenerError(error, 'request listener');
    this.transaction?.tryAbort();

    try {
      listener.failure(new ListenerError(error));
    } catch (secondary) {
      requestLog('Failure listener threw after a listener failure: %O', secondary);
    }
  }
}

/** Identity mapper for requests whose raw result is the caller's value */
export const asIs = <T>(raw: T): T => raw;

/** Mapper for requests that carry no value */
export const ignoreResult = (): void => undefined;
