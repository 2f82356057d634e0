/**
 * Cursor Iteration Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CURSOR_DIRECTION, type CursorCallback, type CursorWithValue, type Database, type IdbError, STOP_ITERATION, TRANSACTION_MODE } from '../src/index.js';
import { deleteTestDatabase, openTestDatabase } from '../src/testing/index.js';

interface Item {
  id: number;
  label: string;
}

const ITEMS: Item[] = [
  { id: 1, label: 'b' },
  { id: 2, label: 'a' },
  { id: 3, label: 'c' },
  { id: 4, label: 'a' },
  { id: 5, label: 'b' },
];

describe('CursorRequest.iterate', () => {
  let db: Database;

  beforeEach(async () => {
    db = await openTestDatabase((upgradeDb) => {
      const items = upgradeDb.createObjectStore('items', { keyPath: 'id' });
      items.createIndex('by-label', 'label');
      upgradeDb.createObjectStore('empty', { keyPath: 'id' });
    });
    const txn = db.transaction(TRANSACTION_MODE.READ_WRITE, ['items']);
    for (const item of ITEMS) {
      txn.objectStore('items').put(item);
    }
    txn.commit();
    await txn.done();
  });

  afterEach(async () => {
    await deleteTestDatabase(db);
  });

  const readItems = () => db.transaction(TRANSACTION_MODE.READ_ONLY, ['items']).objectStore('items');

  it('should visit every position in key order', async () => {
    const keys: IDBValidKey[] = [];

    await readItems()
      .openCursor()
      .iterate((cursor) => {
        keys.push(cursor.key);
      });

    expect(keys).toEqual([1, 2, 3, 4, 5]);
  });

  it('should visit positions in reverse order', async () => {
    const keys: IDBValidKey[] = [];

    await readItems()
      .openCursor(null, CURSOR_DIRECTION.PREV)
      .iterate((cursor) => {
        keys.push(cursor.key);
      });

    expect(keys).toEqual([5, 4, 3, 2, 1]);
  });

  it('should stop after the first step when the callback returns STOP_ITERATION', async () => {
    // Arrange
    const callback = vi.fn((): typeof STOP_ITERATION => STOP_ITERATION);

    // Act
    await readItems().openCursor().iterate(callback);

    // Assert
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should expose record values and accept async callbacks', async () => {
    const labels: string[] = [];

    await readItems()
      .openCursor(IDBKeyRange.bound(2, 4))
      .iterate(async (cursor) => {
        await Promise.resolve();
        const value = cursor.value;
        if (typeof value === 'object' && value !== null && 'label' in value && typeof value.label === 'string') {
          labels.push(value.label);
        }
      });

    expect(labels).toEqual(['a', 'c', 'a']);
  });

  it('should resolve without calling back on an empty range', async () => {
    const callback = vi.fn();

    await db.transaction('readonly', ['empty']).objectStore('empty').openCursor().iterate(callback);

    expect(callback).not.toHaveBeenCalled();
  });

  it('should honour movement requested by the callback', async () => {
    // Arrange
    const keys: IDBValidKey[] = [];

    // Act
    await readItems()
      .openCursor()
      .iterate((cursor) => {
        keys.push(cursor.key);
        cursor.advance(2);
      });

    // Assert
    expect(keys).toEqual([1, 3, 5]);
  });

  it('should jump with continue(key)', async () => {
    const keys: IDBValidKey[] = [];

    await readItems()
      .openKeyCursor()
      .iterate((cursor) => {
        keys.push(cursor.key);
        if (cursor.key === 1) {
          cursor.continue(4);
        }
      });

    expect(keys).toEqual([1, 4, 5]);
  });

  it('should reject with the callback error after the callback moved the cursor', async () => {
    // Arrange
    const keys: IDBValidKey[] = [];
    const iteration = readItems()
      .openCursor()
      .iterate((cursor) => {
        keys.push(cursor.key);
        cursor.continue();
        throw new Error('stop here');
      });

    // Act & Assert
    await expect(iteration).rejects.toThrow('stop here');
    expect(keys).toEqual([1]);
  });

  it('should traverse an index with primary keys and source name', async () => {
    const seen: Array<[IDBValidKey, IDBValidKey, string]> = [];

    await readItems()
      .index('by-label')
      .openKeyCursor()
      .iterate((cursor) => {
        seen.push([cursor.key, cursor.primaryKey, cursor.source]);
      });

    expect(seen).toEqual([
      ['a', 2, 'by-label'],
      ['a', 4, 'by-label'],
      ['b', 1, 'by-label'],
      ['b', 5, 'by-label'],
      ['c', 3, 'by-label'],
    ]);
  });

  it('should delete and update records during traversal', async () => {
    // Arrange
    const txn = db.transaction('readwrite', ['items']);
    const store = txn.objectStore('items');

    // Act
    await store.openCursor().iterate(async (cursor) => {
      if (Number(cursor.key) % 2 === 0) {
        await cursor.delete().await();
      } else {
        await cursor.update({ id: cursor.key, label: 'odd' }).await();
      }
    });
    const remaining = await store.getAll().await();

    // Assert
    expect(remaining).toEqual([
      { id: 1, label: 'odd' },
      { id: 3, label: 'odd' },
      { id: 5, label: 'odd' },
    ]);
  });

  it('should visit a position delivered before iteration started', async () => {
    // Arrange
    const request = readItems().openCursor();
    const first = await request.await();
    const keys: IDBValidKey[] = [];

    // Act
    await request.iterate((cursor) => {
      keys.push(cursor.key);
    });

    // Assert
    expect(first?.key).toBe(1);
    expect(keys).toEqual([1, 2, 3, 4, 5]);
  });

  it('should stop waiting when the signal aborts', async () => {
    const controller = new AbortController();
    let failure: IdbError | undefined;

    await readItems()
      .openCursor()
      .iterate(
        () => {
          controller.abort('enough');
        },
        { signal: controller.signal },
      )
      .catch((error: IdbError) => {
        failure = error;
      });

    expect(failure?.name).toBe('CancellationError');
  });

  describe('subscription teardown', () => {
    const exits: Array<[string, (controller: AbortController) => CursorCallback<CursorWithValue>]> = [
      ['exhaustion', () => () => undefined],
      ['STOP_ITERATION', () => () => STOP_ITERATION],
      [
        'a callback throw',
        () => () => {
          throw new Error('stop here');
        },
      ],
      [
        'cancellation',
        (controller) => () => {
          controller.abort('enough');
        },
      ],
    ];

    it.each(exits)('should remove the success and error listeners after %s', async (_exit, createCallback) => {
      // Arrange
      const controller = new AbortController();
      const callback = createCallback(controller);
      const request = readItems().openCursor();
      const removeListener = vi.spyOn(request.raw, 'removeEventListener');

      // Act
      await request.iterate(callback, { signal: controller.signal }).catch(() => undefined);

      // Assert
      const removed = removeListener.mock.calls.map(([type]) => type);
      expect(removed).toContain('success');
      expect(removed).toContain('error');
    });
  });
});
