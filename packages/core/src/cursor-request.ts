/**
 * Cursor Iteration Loop
 *
 * A cursor request reports one success per position. {@link CursorRequest.iterate}
 * keeps a single multi-value subscription open for the whole traversal and
 * closes it on every exit path.
 */

import type { Teardown } from './bridge.js';
import type { Cursor } from './cursor.js';
import type { IdbError } from './domain/errors.js';
import { Request, type WaitOptions } from './request.js';
import { cursorLog } from './utils/debug.js';

/** Returned from an iteration callback to stop without advancing */
export const STOP_ITERATION: unique symbol = Symbol('durable-idb.stop-iteration');

export type IterationSignal = typeof STOP_ITERATION;

export type CursorCallback<C> = (cursor: C) => IterationSignal | void | Promise<IterationSignal | void>;

type Outcome<T> = { ok: true; value: T } | { ok: false; error: IdbError };

interface PositionStream<C> {
  next: () => Promise<C | null>;
  close: Teardown;
}

/**
 * Request yielding a cursor per position, or `null` once the range is exhausted
 *
 * @example
 * ```typescript
 * await store.openCursor(null, 'prev').iterate((cursor) => {
 *   keys.push(cursor.key);
 *   if (keys.length === 10) {
 *     return STOP_ITERATION;
 *   }
 * });
 * ```
 */
export class CursorRequest<C extends Cursor, TRaw extends IDBCursor = IDBCursor> extends Request<C | null, TRaw | null> {
  /**
   * Visits every position until exhaustion, a stop signal, or an error
   *
   * @remarks
   * When the callback returns without moving the cursor, the loop issues
   * `continue()` itself. A callback that moved the cursor keeps its own move,
   * even when it then throws.
   *
   * @throws Whatever the callback throws, or the translated host failure
   */
  async iterate(callback: CursorCallback<C>, options: WaitOptions = {}): Promise<void> {
    const positions = this.#openPositions(options);
    let steps = 0;

    try {
      for (;;) {
        const cursor = await positions.next();
        if (cursor === null) {
          cursorLog('Cursor exhausted after %d step(s)', steps);
          return;
        }
        steps++;

        const signal = await callback(cursor);
        if (signal === STOP_ITERATION) {
          cursorLog('Iteration stopped by callback after %d step(s)', steps);
          return;
        }
        if (!cursor.moved) {
          cursor.continue();
        }
      }
    } finally {
      positions.close();
    }
  }

  #openPositions(options: WaitOptions): PositionStream<C> {
    const buffered: Outcome<C | null>[] = [];
    let waiting: { resolve: (value: C | null) => void; reject: (error: IdbError) => void } | null = null;

    const deliver = (outcome: Outcome<C | null>): void => {
      if (!waiting) {
        buffered.push(outcome);
        return;
      }
      const { resolve, reject } = waiting;
      waiting = null;
      if (outcome.ok) {
        resolve(outcome.value);
      } else {
        reject(outcome.error);
      }
    };

    if (this.readyState === 'done') {
      const error = this.error();
      deliver(error ? { ok: false, error } : { ok: true, value: this.result() });
    }

    const close = this.listen(
      {
        success: (value) => deliver({ ok: true, value }),
        failure: (error) => deliver({ ok: false, error }),
      },
      { ...options, multi: true },
    );

    const next = (): Promise<C | null> =>
      new Promise<C | null>((resolve, reject) => {
        const outcome = buffered.shift();
        if (!outcome) {
          waiting = { resolve, reject };
        } else if (outcome.ok) {
          resolve(outcome.value);
        } else {
          reject(outcome.error);
        }
      });

    return { next, close };
  }
}
