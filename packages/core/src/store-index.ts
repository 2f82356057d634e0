/**
 * Index wrapper
 */

import { RecordSource } from './record-source.js';
import type { Transaction } from './transaction.js';

export class Index extends RecordSource<IDBIndex> {
  constructor(raw: IDBIndex, transaction: Transaction) {
    super(raw, transaction);
  }

  get raw(): IDBIndex {
    return this.host;
  }

  get unique(): boolean {
    return this.host.unique;
  }

  get multiEntry(): boolean {
    return this.host.multiEntry;
  }

  /** Name of the object store this index belongs to */
  get objectStoreName(): string {
    return this.host.objectStore.name;
  }
}
