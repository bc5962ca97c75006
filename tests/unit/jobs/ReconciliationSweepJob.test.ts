import { describe, it, expect, beforeEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { ReconciliationSweepJob } from '../../../src/packages/jobs/reconciliation/ReconciliationSweepJob.js';
import { SqliteEntitlementStore } from '../../../src/packages/adapters/storage/SqliteEntitlementStore.js';
import { SqlitePrivilegeRevoker } from '../../../src/packages/adapters/storage/SqlitePrivilegeRevoker.js';
import { emptySweepStats } from '../../../src/packages/core/domain/entitlement.js';
import {
  InMemoryRoleAuthority,
  RecordingNotifier,
  T0,
  createMockLogger,
  createTestCatalog,
  createTestClock,
  createTestDb,
  daysFrom,
} from '../../helpers/index.js';

describe('ReconciliationSweepJob', () => {
  let db: Database.Database;
  let store: SqliteEntitlementStore;
  let privileges: SqlitePrivilegeRevoker;
  let authority: InMemoryRoleAuthority;
  let notifier: RecordingNotifier;
  let logger: ReturnType<typeof createMockLogger>;

  function createJob(options: { repairOrphanGrants?: boolean } = {}): ReconciliationSweepJob {
    return new ReconciliationSweepJob(
      {
        catalog: createTestCatalog(),
        store,
        authority,
        notifier,
        privileges,
        logger,
        clock: createTestClock().clock,
      },
      options
    );
  }

  async function seed(accountId: string, tierName: string, expiresAt: Date): Promise<void> {
    await store.withAccount(accountId, (tx) =>
      tx.insert({ tierName, expiresAt, externalAssignmentId: null })
    );
  }

  async function ledgerTiers(accountId: string): Promise<string[]> {
    const records = await store.withAccount(accountId, (tx) => tx.list());
    return records.map((record) => record.tierName);
  }

  beforeEach(() => {
    db = createTestDb();
    store = new SqliteEntitlementStore(db);
    logger = createMockLogger();
    privileges = new SqlitePrivilegeRevoker(db, logger);
    authority = new InMemoryRoleAuthority();
    notifier = new RecordingNotifier();
  });

  it('should revoke and remove expired entitlements with one call per account', async () => {
    authority.addMember('acct-1', 'Silver', 'Gold').addMember('acct-2', 'Silver');
    await seed('acct-1', 'Silver', daysFrom(T0, -1));
    await seed('acct-1', 'Gold', daysFrom(T0, -2));
    await seed('acct-2', 'Silver', daysFrom(T0, 5));

    const stats = await createJob().sweep();

    expect(stats).toEqual({ ...emptySweepStats(), expiredFound: 2, removed: 2 });
    expect(authority.revokeBatchCalls).toEqual([{ accountId: 'acct-1', tierNames: ['Gold', 'Silver'] }]);
    expect(authority.tiersOf('acct-1')).toEqual([]);
    expect(await ledgerTiers('acct-1')).toEqual([]);
    expect(await ledgerTiers('acct-2')).toEqual(['Silver']);
    expect(notifier.kinds()).toEqual(['expired:Gold', 'expired:Silver']);
  });

  it('should find nothing to do on a second run', async () => {
    authority.addMember('acct-1', 'Silver');
    await seed('acct-1', 'Silver', daysFrom(T0, -1));
    const job = createJob();

    await job.sweep();
    const second = await job.sweep();

    expect(second).toEqual(emptySweepStats());
    expect(authority.revokeBatchCalls).toHaveLength(1);
    expect(job.getPreviousStats()).toMatchObject({ removed: 1 });
    expect(job.getLastStats()).toEqual(emptySweepStats());
  });

  it('should drop records whose role was already removed', async () => {
    authority.addMember('acct-1');
    await seed('acct-1', 'Silver', daysFrom(T0, -1));

    const stats = await createJob().sweep();

    expect(stats).toEqual({ ...emptySweepStats(), expiredFound: 1, skippedMissingExternalGrant: 1 });
    expect(authority.revokeBatchCalls).toEqual([]);
    expect(await ledgerTiers('acct-1')).toEqual([]);
  });

  it('should drop records of accounts that left the community', async () => {
    await seed('gone-1', 'Silver', daysFrom(T0, -1));
    await seed('gone-1', 'Gold', daysFrom(T0, -1));

    const stats = await createJob().sweep();

    expect(stats).toEqual({ ...emptySweepStats(), expiredFound: 2, skippedMissingAccount: 2 });
    expect(await ledgerTiers('gone-1')).toEqual([]);
  });

  it('should keep a record whose revoke failed and retry it next run', async () => {
    authority.addMember('acct-1', 'Silver').addMember('acct-2', 'Silver');
    authority.revokeFailures.set('acct-1:Silver', 'RATE_LIMITED');
    await seed('acct-1', 'Silver', daysFrom(T0, -1));
    await seed('acct-2', 'Silver', daysFrom(T0, -1));
    const job = createJob();

    const first = await job.sweep();

    expect(first).toEqual({ ...emptySweepStats(), expiredFound: 2, removed: 1, failed: 1 });
    expect(await ledgerTiers('acct-1')).toEqual(['Silver']);
    expect(notifier.kinds()).toEqual(['expired:Silver']);

    authority.revokeFailures.clear();
    const second = await job.sweep();

    expect(second).toEqual({ ...emptySweepStats(), expiredFound: 1, removed: 1 });
    expect(await ledgerTiers('acct-1')).toEqual([]);
  });

  it('should isolate an account whose lookup throws', async () => {
    authority.addMember('acct-1', 'Silver').addMember('acct-2', 'Silver');
    authority.lookupFailures.set('acct-1', 'UNAVAILABLE');
    await seed('acct-1', 'Silver', daysFrom(T0, -1));
    await seed('acct-2', 'Silver', daysFrom(T0, -1));

    const stats = await createJob().sweep();

    expect(stats).toEqual({ ...emptySweepStats(), expiredFound: 2, removed: 1, failed: 1 });
    expect(logger.error).toHaveBeenCalledWith(
      { accountId: 'acct-1', tiers: ['Silver'], error: 'lookup failed' },
      'Account reconciliation failed; records left for next sweep'
    );
  });

  it('should skip records renewed after they were listed', async () => {
    authority.addMember('acct-1', 'Silver');
    await seed('acct-1', 'Silver', daysFrom(T0, -1));
    const findExpired = store.findExpired.bind(store);
    vi.spyOn(store, 'findExpired').mockImplementation(async (now, tierNames) => {
      const found = await findExpired(now, tierNames);
      await store.withAccount('acct-1', (tx) => tx.updateExpiry('Silver', daysFrom(T0, 29)));
      return found;
    });

    const stats = await createJob().sweep();

    expect(stats).toEqual({ ...emptySweepStats(), expiredFound: 1, skippedAlreadyRevoked: 1 });
    expect(authority.tiersOf('acct-1')).toEqual(['Silver']);
  });

  it('should only sweep the requested tier', async () => {
    authority.addMember('acct-1', 'Silver', 'Gold');
    await seed('acct-1', 'Silver', daysFrom(T0, -1));
    await seed('acct-1', 'Gold', daysFrom(T0, -1));

    const stats = await createJob().sweep(['Gold']);

    expect(stats.removed).toBe(1);
    expect(await ledgerTiers('acct-1')).toEqual(['Silver']);
  });

  it('should sweep a set of tiers with one revoke per account', async () => {
    authority.addMember('acct-1', 'Silver', 'Gold', 'Platinum');
    await seed('acct-1', 'Silver', daysFrom(T0, -1));
    await seed('acct-1', 'Gold', daysFrom(T0, -1));
    await seed('acct-1', 'Platinum', daysFrom(T0, -1));

    const stats = await createJob().sweep(['Silver', 'Gold']);

    expect(stats).toEqual({ ...emptySweepStats(), expiredFound: 2, removed: 2 });
    expect(authority.revokeBatchCalls).toEqual([{ accountId: 'acct-1', tierNames: ['Gold', 'Silver'] }]);
    expect(await ledgerTiers('acct-1')).toEqual(['Platinum']);
  });

  describe('delegated privileges', () => {
    beforeEach(async () => {
      await privileges.delegate('acct-1', 'user-9', 'channel:moderate');
      await seed('acct-1', 'Silver', daysFrom(T0, -1));
    });

    it('should strip them once the account holds no tier', async () => {
      authority.addMember('acct-1', 'Silver');

      await createJob().sweep();

      expect(await privileges.listDelegations('acct-1')).toEqual([]);
    });

    it('should keep them while another tier is still held', async () => {
      authority.addMember('acct-1', 'Silver', 'Gold');
      await seed('acct-1', 'Gold', daysFrom(T0, 10));

      await createJob().sweep();

      expect(await privileges.listDelegations('acct-1')).toEqual([
        { granteeAccountId: 'user-9', scope: 'channel:moderate' },
      ]);
    });
  });

  describe('orphan grants', () => {
    beforeEach(async () => {
      authority.addMember('acct-1', 'Silver').addMember('acct-2', 'Gold');
      await seed('acct-1', 'Silver', daysFrom(T0, 10));
    });

    it('should revoke roles held without a ledger record when enabled', async () => {
      const stats = await createJob({ repairOrphanGrants: true }).sweep();

      expect(stats).toEqual({ ...emptySweepStats(), orphanGrantsRevoked: 1 });
      expect(authority.tiersOf('acct-1')).toEqual(['Silver']);
      expect(authority.tiersOf('acct-2')).toEqual([]);
    });

    it('should leave them alone by default', async () => {
      await createJob().sweep();
      expect(authority.tiersOf('acct-2')).toEqual(['Gold']);
    });
  });

  it('should log unchanged sweeps at debug level', async () => {
    const job = createJob();

    await job.sweep();
    await job.sweep();

    const completed = logger.info.mock.calls.filter(([, message]) => message === 'Reconciliation sweep completed');
    const unchanged = logger.debug.mock.calls.filter(([, message]) => message === 'Reconciliation sweep unchanged');
    expect(completed).toHaveLength(1);
    expect(unchanged).toHaveLength(1);
  });
});
