/**
 * Outcome Bridge
 *
 * Converts the event-driven completion of a host object (a request or a
 * transaction) into handler calls with guaranteed listener teardown.
 *
 * @remarks
 * Exactly one success listener and one failure listener are registered per
 * subscription, plus an `abort` listener on the signal when one is given. All of
 * them are removed on whichever exit happens first: success (single mode),
 * failure, cancellation, or a throw inside a handler. In `multi` mode the
 * success listener stays registered across repeated notifications until the
 * returned teardown is called.
 */

import { normalizeError } from './domain/errors.js';

/** Event names of one host object */
export interface BridgeEvents {
  readonly success: string;
  readonly failure: string;
}

export interface BridgeHandlers {
  success: () => void;
  failure: () => void;
  cancel: (reason: unknown) => void;
  /** Receives anything thrown by the three handlers above. Must not throw. */
  panic: (error: Error) => void;
}

export interface BridgeOptions {
  signal?: AbortSignal;
  /** Keep the success listener registered after the first notification */
  multi?: boolean;
}

/** Removes every listener of a subscription. Idempotent. */
export type Teardown = () => void;

/**
 * Subscribes to the outcome of a host event target
 *
 * @example
 * ```typescript
 * const teardown = bridge(rawRequest, HOST_EVENTS.REQUEST, {
 *   success: () => resolve(rawRequest.result),
 *   failure: () => reject(rawRequest.error),
 *   cancel: (reason) => reject(new CancellationError(reason)),
 *   panic: (error) => reject(error),
 * }, { signal });
 * ```
 */
export const bridge = (
  target: EventTarget,
  events: BridgeEvents,
  handlers: BridgeHandlers,
  options: BridgeOptions = {},
): Teardown => {
  const { signal, multi = false } = options;
  let attached = false;

  const teardown: Teardown = () => {
    if (!attached) {
      return;
    }
    attached = false;
    target.removeEventListener(events.success, onSuccess);
    target.removeEventListener(events.failure, onFailure);
    signal?.removeEventListener('abort', onCancel);
  };

  const guarded =
    (fn: () => void) =>
    (): void => {
      try {
        fn();
      } catch (thrownValue) {
        teardown();
        handlers.panic(normalizeError(thrownValue));
      }
    };

  const onSuccess = guarded(() => {
    if (!multi) {
      teardown();
    }
    handlers.success();
  });

  const onFailure = guarded(() => {
    teardown();
    handlers.failure();
  });

  const onCancel = guarded(() => {
    teardown();
    handlers.cancel(signal?.reason);
  });

  if (signal?.aborted) {
    guarded(() => handlers.cancel(signal.reason))();
    return teardown;
  }

  target.addEventListener(events.success, onSuccess);
  target.addEventListener(events.failure, onFailure);
  signal?.addEventListener('abort', onCancel);
  attached = true;

  return teardown;
};
