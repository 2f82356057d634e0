/**
 * Traversal Handle (Cursor)
 *
 * Wraps a host `IDBCursor`. A fresh wrapper is produced for every position,
 * so `moved` tracks whether the current step already requested movement.
 */

import { asIs, ignoreResult, Request } from './request.js';
import type { Transaction } from './transaction.js';

export class Cursor<TRaw extends IDBCursor = IDBCursor> {
  readonly #raw: TRaw;
  readonly #transaction: Transaction;
  #moved = false;

  constructor(raw: TRaw, transaction: Transaction) {
    this.#raw = raw;
    this.#transaction = transaction;
  }

  /** Underlying host cursor */
  get raw(): TRaw {
    return this.#raw;
  }

  get transaction(): Transaction {
    return this.#transaction;
  }

  /** Key at the current position */
  get key(): IDBValidKey {
    return this.#raw.key;
  }

  /** Effective primary key at the current position */
  get primaryKey(): IDBValidKey {
    return this.#raw.primaryKey;
  }

  get direction(): IDBCursorDirection {
    return this.#raw.direction;
  }

  /** Name of the object store or index being traversed */
  get source(): string {
    return this.#raw.source.name;
  }

  /** Whether advance/continue/continuePrimaryKey was called at this position */
  get moved(): boolean {
    return this.#moved;
  }

  /** Moves the cursor `count` positions forward along its direction */
  advance(count: number): void {
    this.#move((raw) => raw.advance(count));
  }

  /** Moves to the next position, or to the next position at or past `key` */
  continue(key?: IDBValidKey): void {
    this.#move((raw) => (key === undefined ? raw.continue() : raw.continue(key)));
  }

  /** Moves to the given index key and primary key. Index cursors only. */
  continuePrimaryKey(key: IDBValidKey, primaryKey: IDBValidKey): void {
    this.#move((raw) => raw.continuePrimaryKey(key, primaryKey));
  }

  /** Replaces the record at the current position without moving */
  update(value: unknown): Request<IDBValidKey> {
    const raw = this.#transaction.run(() => this.#raw.update(value));
    return new Request(raw, this.#transaction, asIs, this.#transaction.config);
  }

  /** Deletes the record at the current position without moving */
  delete(): Request<void, undefined> {
    const raw = this.#transaction.run(() => this.#raw.delete());
    return new Request(raw, this.#transaction, ignoreResult, this.#transaction.config);
  }

  #move(hostCall: (raw: TRaw) => void): void {
    this.#moved = true;
    this.#transaction.run(() => hostCall(this.#raw));
  }
}

/** Cursor that also exposes the record value */
export class CursorWithValue extends Cursor<IDBCursorWithValue> {
  /** Value at the current position */
  get value(): unknown {
    return this.raw.value;
  }
}
