import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { SqliteEntitlementStore } from '../../../../src/packages/adapters/storage/SqliteEntitlementStore.js';
import { PersistenceError } from '../../../../src/packages/core/errors.js';
import { T0, createTestDb, daysFrom } from '../../../helpers/index.js';

describe('SqliteEntitlementStore', () => {
  let db: Database.Database;
  let store: SqliteEntitlementStore;

  async function seed(accountId: string, tierName: string, expiresAt: Date): Promise<void> {
    await store.withAccount(accountId, (tx) =>
      tx.insert({ tierName, expiresAt, externalAssignmentId: null })
    );
  }

  beforeEach(() => {
    db = createTestDb();
    store = new SqliteEntitlementStore(db);
  });

  describe('unit of work', () => {
    it('should insert and read back a record at second precision', async () => {
      const expiresAt = new Date('2026-03-31T12:00:00.789Z');

      const inserted = await store.withAccount('acct-1', (tx) =>
        tx.insert({ tierName: 'Silver', expiresAt, externalAssignmentId: 'handle-1' })
      );

      expect(inserted).toEqual({
        accountId: 'acct-1',
        tierName: 'Silver',
        expiresAt: new Date('2026-03-31T12:00:00Z'),
        externalAssignmentId: 'handle-1',
      });
    });

    it('should reject a second record for the same tier', async () => {
      await seed('acct-1', 'Silver', daysFrom(T0, 1));
      await expect(seed('acct-1', 'Silver', daysFrom(T0, 2))).rejects.toThrow(/UNIQUE/);
    });

    it('should only see the locked account', async () => {
      await seed('acct-1', 'Silver', daysFrom(T0, 1));
      await seed('acct-2', 'Gold', daysFrom(T0, 1));

      const tiers = await store.withAccount('acct-1', async (tx) => (await tx.list()).map((e) => e.tierName));

      expect(tiers).toEqual(['Silver']);
      expect(await store.withAccount('acct-1', (tx) => tx.get('Gold'))).toBeNull();
    });

    it('should update the expiry and keep the handle unless one is given', async () => {
      await store.withAccount('acct-1', (tx) =>
        tx.insert({ tierName: 'Silver', expiresAt: daysFrom(T0, 1), externalAssignmentId: 'handle-1' })
      );

      const kept = await store.withAccount('acct-1', (tx) => tx.updateExpiry('Silver', daysFrom(T0, 31)));
      const replaced = await store.withAccount('acct-1', (tx) =>
        tx.updateExpiry('Silver', daysFrom(T0, 61), 'handle-2')
      );

      expect(kept.externalAssignmentId).toBe('handle-1');
      expect(kept.expiresAt).toEqual(daysFrom(T0, 31));
      expect(replaced.externalAssignmentId).toBe('handle-2');
    });

    it('should fail to update a missing record', async () => {
      await expect(
        store.withAccount('acct-1', (tx) => tx.updateExpiry('Silver', daysFrom(T0, 30)))
      ).rejects.toBeInstanceOf(PersistenceError);
    });

    it('should report how many rows were deleted', async () => {
      await seed('acct-1', 'Silver', daysFrom(T0, 1));

      expect(await store.withAccount('acct-1', (tx) => tx.delete('Silver'))).toBe(1);
      expect(await store.withAccount('acct-1', (tx) => tx.delete('Silver'))).toBe(0);
    });

    it('should swap one tier for another atomically', async () => {
      await seed('acct-1', 'Silver', daysFrom(T0, 29));

      const gold = await store.withAccount('acct-1', (tx) =>
        tx.replace('Silver', { tierName: 'Gold', expiresAt: daysFrom(T0, 30), externalAssignmentId: 'h' })
      );

      expect(gold.tierName).toBe('Gold');
      expect(await store.listAccountsWithTier('Silver')).toEqual([]);
      expect(await store.listAccountsWithTier('Gold')).toEqual(['acct-1']);
    });

    it('should overwrite a record already held for the new tier', async () => {
      await seed('acct-1', 'Silver', daysFrom(T0, 29));
      await seed('acct-1', 'Gold', daysFrom(T0, 5));

      const gold = await store.withAccount('acct-1', (tx) =>
        tx.replace('Silver', { tierName: 'Gold', expiresAt: daysFrom(T0, 30), externalAssignmentId: 'h' })
      );

      expect(gold).toEqual({
        accountId: 'acct-1',
        tierName: 'Gold',
        expiresAt: daysFrom(T0, 30),
        externalAssignmentId: 'h',
      });
      const records = await store.withAccount('acct-1', (tx) => tx.list());
      expect(records.map((r) => r.tierName)).toEqual(['Gold']);
    });

    it('should refuse to replace a tier that is not held', async () => {
      await expect(
        store.withAccount('acct-1', (tx) =>
          tx.replace('Silver', { tierName: 'Gold', expiresAt: daysFrom(T0, 30), externalAssignmentId: null })
        )
      ).rejects.toMatchObject({ name: 'PersistenceError', tierName: 'Silver' });
      expect(await store.listAccountsWithTier('Gold')).toEqual([]);
    });

    it('should run work for one account one at a time', async () => {
      const order: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const first = store.withAccount('acct-1', async () => {
        order.push('first:start');
        await gate;
        order.push('first:end');
      });
      const second = store.withAccount('acct-1', async () => {
        order.push('second');
      });
      const other = store.withAccount('acct-2', async () => {
        order.push('other');
      });

      await other;
      release();
      await Promise.all([first, second]);

      expect(order).toEqual(['first:start', 'other', 'first:end', 'second']);
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await seed('acct-1', 'Silver', daysFrom(T0, -2));
      await seed('acct-1', 'Gold', T0);
      await seed('acct-2', 'Silver', daysFrom(T0, 1));
      await seed('acct-3', 'Gold', daysFrom(T0, 3));
    });

    it('should find records at or past their expiry', async () => {
      const expired = await store.findExpired(T0);
      expect(expired.map((e) => `${e.accountId}:${e.tierName}`)).toEqual(['acct-1:Gold', 'acct-1:Silver']);
    });

    it('should filter expired records by tier', async () => {
      const expired = await store.findExpired(daysFrom(T0, 1), ['Silver']);
      expect(expired.map((e) => e.accountId)).toEqual(['acct-1', 'acct-2']);
    });

    it('should filter expired records by a set of tiers', async () => {
      const expired = await store.findExpired(daysFrom(T0, 3), ['Silver', 'Gold']);
      expect(expired.map((e) => `${e.accountId}:${e.tierName}`)).toEqual([
        'acct-1:Gold',
        'acct-1:Silver',
        'acct-2:Silver',
        'acct-3:Gold',
      ]);
      expect(await store.findExpired(daysFrom(T0, 3), [])).toEqual([]);
    });

    it('should find records expiring inside a window', async () => {
      const expiring = await store.findExpiringBetween(T0, daysFrom(T0, 3));
      expect(expiring.map((e) => `${e.accountId}:${e.tierName}`)).toEqual(['acct-2:Silver', 'acct-3:Gold']);
    });

    it('should list accounts with a ledger record for a tier', async () => {
      expect(await store.listAccountsWithTier('Gold')).toEqual(['acct-1', 'acct-3']);
    });
  });
});
