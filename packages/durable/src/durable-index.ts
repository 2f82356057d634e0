/**
 * Durable Index Module
 *
 * @module durable-index
 */

import type { Index, KeyQuery, WaitOptions } from '@durable-idb/core';
import type { DurableObjectStore, RangeOptions } from './durable-object-store.js';

/** Read access to an index, retried like its store */
export class DurableIndex {
  readonly #store: DurableObjectStore;
  readonly #name: string;

  constructor(store: DurableObjectStore, name: string) {
    this.#store = store;
    this.#name = name;
  }

  get name(): string {
    return this.#name;
  }

  get objectStore(): DurableObjectStore {
    return this.#store;
  }

  withIndex<T>(fn: (index: Index) => Promise<T>): Promise<T> {
    return this.#store.withStore((store) => fn(store.index(this.#name)));
  }

  get(query: KeyQuery, options: WaitOptions = {}): Promise<unknown> {
    return this.withIndex((index) => index.get(query).await(options));
  }

  /** Primary key of the first record whose index key matches `query` */
  getKey(query: KeyQuery, options: WaitOptions = {}): Promise<IDBValidKey | undefined> {
    return this.withIndex((index) => index.getKey(query).await(options));
  }

  getAll(options: RangeOptions = {}): Promise<unknown[]> {
    const { query, count, signal } = options;
    return this.withIndex((index) => index.getAll(query, count).await({ signal }));
  }

  getAllKeys(options: RangeOptions = {}): Promise<IDBValidKey[]> {
    const { query, count, signal } = options;
    return this.withIndex((index) => index.getAllKeys(query, count).await({ signal }));
  }

  count(query?: KeyQuery, options: WaitOptions = {}): Promise<number> {
    return this.withIndex((index) => index.count(query).await(options));
  }
}
