/**
 * Durable Transaction Tests
 */

import {
  CancellationError,
  ConfigurationError,
  type Database,
  HostOperationError,
  type Transaction,
} from '@durable-idb/core';
import { deleteTestDatabase, openTestDatabase, waitForIdle } from '@durable-idb/core/testing';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createDurableTransaction, DurableTransaction } from '../src/index.js';

describe('DurableTransaction', () => {
  let db: Database;

  beforeEach(async () => {
    db = await openTestDatabase((upgradeDb) => {
      upgradeDb.createObjectStore('notes', { keyPath: 'id' });
      upgradeDb.createObjectStore('settings');
    });
  });

  afterEach(async () => {
    await deleteTestDatabase(db);
  });

  const readNotes = () => db.transaction('readonly', ['notes']).objectStore('notes').getAll().await();

  describe('construction', () => {
    it('should reject an empty store list', () => {
      expect(() => createDurableTransaction(db, 'readonly', [])).toThrow(ConfigurationError);
    });

    it('should open the host transaction lazily', async () => {
      const durable = new DurableTransaction(db, 'readwrite', ['notes']);

      expect(durable.live).toBeNull();
      await durable.objectStore('notes').put({ id: 'n1' });
      expect(durable.live?.state).toBe('active');
    });
  });

  describe('objectStore', () => {
    it('should return the same wrapper across transaction replacements', async () => {
      // Arrange
      const durable = createDurableTransaction(db, 'readwrite', ['notes', 'settings']);
      const notes = durable.objectStore('notes');
      await notes.put({ id: 'n1' });

      // Act
      await waitForIdle();
      await notes.put({ id: 'n2' });

      // Assert
      expect(durable.objectStore('notes')).toBe(notes);
      expect(notes.transaction).toBe(durable);
    });

    it('should reject a store outside the transaction', () => {
      const durable = createDurableTransaction(db, 'readonly', ['notes']);

      expect(() => durable.objectStore('settings')).toThrow('Object store "settings" is not available in this transaction.');
    });
  });

  describe('withRetry', () => {
    it('should replace a transaction that finished while the caller was idle', async () => {
      // Arrange
      const durable = createDurableTransaction(db, 'readwrite', ['notes']);
      const notes = durable.objectStore('notes');
      await notes.put({ id: 'n1', body: 'before' });
      const first = durable.live;

      // Act
      await waitForIdle();
      const note = await notes.get('n1');

      // Assert
      expect(note).toEqual({ id: 'n1', body: 'before' });
      expect(first?.state).toBe('finished-prematurely');
      expect(durable.live).not.toBe(first);
    });

    it('should replay the work once the transaction finished mid-way', async () => {
      // Arrange
      const durable = createDurableTransaction(db, 'readwrite', ['notes']);
      let attempts = 0;
      const work = vi.fn(async (txn: Transaction) => {
        attempts++;
        if (attempts === 1) {
          await durable.objectStore('notes').put({ id: 'n1' });
          await waitForIdle();
        }
        return txn.objectStore('notes').count().await();
      });

      // Act
      const total = await durable.withRetry(work);

      // Assert
      expect(total).toBe(1);
      expect(work).toHaveBeenCalledTimes(2);
    });

    it('should recover after a host abort', async () => {
      // Arrange
      const durable = createDurableTransaction(db, 'readwrite', ['notes']);
      const notes = durable.objectStore('notes');
      await notes.put({ id: 'n1' });
      durable.live?.abort();

      // Act
      await notes.put({ id: 'n2' });
      durable.commit();

      // Assert
      await expect(db.transaction('readonly', ['notes']).objectStore('notes').getAllKeys().await()).resolves.toEqual(['n2']);
    });

    it('should recover after a constraint failure aborted the live transaction', async () => {
      // Arrange
      const durable = createDurableTransaction(db, 'readwrite', ['notes']);
      const notes = durable.objectStore('notes');
      await notes.add({ id: 'n1' });
      const failed = durable.live;

      // Act
      await expect(notes.add({ id: 'n1' })).rejects.toMatchObject({ name: 'HostOperationError', domName: 'ConstraintError' });
      await waitForIdle();
      await notes.put({ id: 'n2' });
      durable.commit();

      // Assert
      expect(failed?.state).toBe('aborted');
      await expect(readNotes()).resolves.toEqual([{ id: 'n2' }]);
    });

    it('should propagate errors outside the finish class without retrying', async () => {
      const durable = createDurableTransaction(db, 'readwrite', ['notes']);
      const failure = new Error('validation failed');
      const work = vi.fn(async () => {
        throw failure;
      });

      await expect(durable.withRetry(work)).rejects.toBe(failure);
      expect(work).toHaveBeenCalledTimes(1);
    });

    it('should not retry a cancelled wait', async () => {
      const durable = createDurableTransaction(db, 'readonly', ['notes']);
      const controller = new AbortController();
      controller.abort('user left');

      await expect(durable.objectStore('notes').get('n1', { signal: controller.signal })).rejects.toBeInstanceOf(
        CancellationError,
      );
    });
  });

  describe('commit', () => {
    it('should return false when no transaction is live', () => {
      const durable = createDurableTransaction(db, 'readwrite', ['notes']);

      expect(durable.commit()).toBe(false);
    });

    it('should commit the live transaction once', async () => {
      // Arrange
      const durable = createDurableTransaction(db, 'readwrite', ['notes']);
      await durable.objectStore('notes').put({ id: 'n1' });
      const live = durable.live;

      // Act
      const first = durable.commit();
      const second = durable.commit();
      await live?.done();

      // Assert
      expect(first).toBe(true);
      expect(second).toBe(false);
      expect(durable.live).toBeNull();
      expect(live?.state).toBe('committed');
    });

    it('should return false when the host already committed', async () => {
      const durable = createDurableTransaction(db, 'readwrite', ['notes']);
      await durable.objectStore('notes').put({ id: 'n1' });
      await waitForIdle();

      expect(durable.commit()).toBe(false);
      expect(durable.live).toBeNull();
      await expect(readNotes()).resolves.toEqual([{ id: 'n1' }]);
    });
  });

  describe('abort', () => {
    it('should return false when no transaction is live', () => {
      expect(createDurableTransaction(db, 'readwrite', ['notes']).abort()).toBe(false);
    });

    it('should undo the live work', async () => {
      // Arrange
      const durable = createDurableTransaction(db, 'readwrite', ['notes']);
      await durable.objectStore('notes').put({ id: 'n1' });

      // Act
      const applied = durable.abort();

      // Assert
      expect(applied).toBe(true);
      expect(durable.live).toBeNull();
      await expect(readNotes()).resolves.toEqual([]);
    });

    it('should return false when the transaction already finished', async () => {
      const durable = createDurableTransaction(db, 'readwrite', ['notes']);
      await durable.objectStore('notes').put({ id: 'n1' });
      await waitForIdle();

      expect(durable.abort()).toBe(false);
      expect(durable.live).toBeNull();
    });
  });

  it('should surface host failures as HostOperationError', async () => {
    const durable = createDurableTransaction(db, 'readonly', ['notes']);

    await expect(durable.objectStore('notes').put({ id: 'n1' })).rejects.toBeInstanceOf(HostOperationError);
  });
});
