/**
 * Shared query surface of object stores and indexes
 */

import { Cursor, CursorWithValue } from './cursor.js';
import { CursorRequest } from './cursor-request.js';
import { asIs, Request, type ResultMapper } from './request.js';
import type { Transaction } from './transaction.js';

/** A single key or a key range */
export type KeyQuery = IDBValidKey | IDBKeyRange;

export abstract class RecordSource<THost extends IDBObjectStore | IDBIndex> {
  protected constructor(
    protected readonly host: THost,
    public readonly transaction: Transaction,
  ) {}

  get name(): string {
    return this.host.name;
  }

  get keyPath(): string | string[] | null {
    return this.host.keyPath;
  }

  /** First record matching `query`, or `undefined` */
  get(query: KeyQuery): Request<unknown> {
    return this.request((host) => host.get(query), asIs);
  }

  /** Primary key of the first record matching `query`, or `undefined` */
  getKey(query: KeyQuery): Request<IDBValidKey | undefined> {
    return this.request((host) => host.getKey(query), asIs);
  }

  getAll(query?: KeyQuery | null, count?: number): Request<unknown[]> {
    return this.request((host) => host.getAll(query, count), asIs);
  }

  getAllKeys(query?: KeyQuery | null, count?: number): Request<IDBValidKey[]> {
    return this.request((host) => host.getAllKeys(query, count), asIs);
  }

  count(query?: KeyQuery): Request<number> {
    return this.request((host) => host.count(query), asIs);
  }

  openCursor(query?: KeyQuery | null, direction?: IDBCursorDirection): CursorRequest<CursorWithValue, IDBCursorWithValue> {
    const raw = this.transaction.run(() => this.host.openCursor(query, direction));
    return new CursorRequest(
      raw,
      this.transaction,
      (cursor: IDBCursorWithValue | null) => (cursor ? new CursorWithValue(cursor, this.transaction) : null),
      this.transaction.config,
    );
  }

  openKeyCursor(query?: KeyQuery | null, direction?: IDBCursorDirection): CursorRequest<Cursor, IDBCursor> {
    const raw = this.transaction.run(() => this.host.openKeyCursor(query, direction));
    return new CursorRequest(
      raw,
      this.transaction,
      (cursor: IDBCursor | null) => (cursor ? new Cursor(cursor, this.transaction) : null),
      this.transaction.config,
    );
  }

  /** Issues a host call through the transaction guard and wraps its request */
  protected request<TRaw, TResult>(
    hostCall: (host: THost) => IDBRequest<TRaw>,
    map: ResultMapper<TRaw, TResult>,
  ): Request<TResult, TRaw> {
    const raw = this.transaction.run(() => hostCall(this.host));
    return new Request(raw, this.transaction, map, this.transaction.config);
  }
}
