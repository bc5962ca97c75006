import { describe, it, expect, beforeEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { PaymentIntakeService } from '../../../src/packages/core/services/PaymentIntakeService.js';
import { PurchaseDecisionEngine } from '../../../src/packages/core/services/PurchaseDecisionEngine.js';
import { SqliteEntitlementStore } from '../../../src/packages/adapters/storage/SqliteEntitlementStore.js';
import { SqliteWallet } from '../../../src/packages/adapters/storage/SqliteWallet.js';
import { SqlitePaymentLog } from '../../../src/packages/adapters/storage/SqlitePaymentLog.js';
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

describe('PaymentIntakeService', () => {
  let db: Database.Database;
  let store: SqliteEntitlementStore;
  let wallet: SqliteWallet;
  let payments: SqlitePaymentLog;
  let authority: InMemoryRoleAuthority;
  let notifier: RecordingNotifier;
  let intake: PaymentIntakeService;

  async function seed(accountId: string, tierName: string, expiresAt: Date): Promise<void> {
    await store.withAccount(accountId, (tx) =>
      tx.insert({ tierName, expiresAt, externalAssignmentId: null })
    );
  }

  beforeEach(() => {
    db = createTestDb();
    store = new SqliteEntitlementStore(db);
    wallet = new SqliteWallet(db);
    payments = new SqlitePaymentLog(db);
    authority = new InMemoryRoleAuthority();
    notifier = new RecordingNotifier();
    const catalog = createTestCatalog();
    const logger = createMockLogger();
    const { clock } = createTestClock();

    const engine = new PurchaseDecisionEngine({
      catalog,
      store,
      authority,
      wallet,
      notifier,
      restrictions: { clearRestrictions: vi.fn().mockResolvedValue(0) },
      logger,
      clock,
    });
    intake = new PaymentIntakeService({
      catalog,
      engine,
      authority,
      wallet,
      payments,
      notifier,
      logger,
      clock,
    });
  });

  describe('ingest', () => {
    it('should credit the payment and spend it on the matching tier', async () => {
      authority.addMember('acct-1');

      const result = await intake.ingest({ paymentId: 'pay-1', accountId: 'acct-1', amount: 100 });

      expect(result).toMatchObject({
        status: 'APPLIED',
        paymentId: 'pay-1',
        tierName: 'Silver',
        duration: 'monthly',
        purchase: { success: true, outcome: { pathTaken: 'NORMAL', expiresAt: daysFrom(T0, 30) } },
      });
      expect(await wallet.balanceOf('acct-1')).toBe(0);
      expect(await payments.outcomeOf('pay-1')).toBe('APPLIED:NORMAL');
    });

    it('should ignore a payment id it has already handled', async () => {
      authority.addMember('acct-1');
      await intake.ingest({ paymentId: 'pay-1', accountId: 'acct-1', amount: 100 });

      const again = await intake.ingest({ paymentId: 'pay-1', accountId: 'acct-1', amount: 100 });

      expect(again).toEqual({ status: 'DUPLICATE', paymentId: 'pay-1' });
      expect(authority.grantCalls).toHaveLength(1);
      expect(await wallet.balanceOf('acct-1')).toBe(0);
    });

    it('should record payments for unknown accounts without crediting anyone', async () => {
      const result = await intake.ingest({ paymentId: 'pay-1', accountId: 'ghost', amount: 100 });

      expect(result).toEqual({ status: 'ACCOUNT_NOT_FOUND', paymentId: 'pay-1' });
      expect(await wallet.balanceOf('ghost')).toBe(0);
      expect(await payments.outcomeOf('pay-1')).toBe('ACCOUNT_NOT_FOUND');
    });

    it('should keep amounts matching no tier as balance', async () => {
      authority.addMember('acct-1');

      const result = await intake.ingest({ paymentId: 'pay-1', accountId: 'acct-1', amount: 37 });

      expect(result).toEqual({ status: 'CREDITED', paymentId: 'pay-1' });
      expect(await wallet.balanceOf('acct-1')).toBe(37);
      expect(notifier.events).toEqual([{ accountId: 'acct-1', kind: 'credited', amount: 37 }]);
      expect(await payments.outcomeOf('pay-1')).toBe('CREDITED');
    });

    it('should upgrade a Silver holder paying the upgrade cost in the renewal window', async () => {
      authority.addMember('acct-1', 'Silver');
      await seed('acct-1', 'Silver', daysFrom(T0, 29));

      const result = await intake.ingest({ paymentId: 'pay-1', accountId: 'acct-1', amount: 400 });

      expect(result).toMatchObject({
        status: 'APPLIED',
        tierName: 'Gold',
        purchase: { success: true, outcome: { pathTaken: 'UPGRADE', refundIssued: 48 } },
      });
      expect(authority.tiersOf('acct-1')).toEqual(['Gold']);
      expect(await wallet.balanceOf('acct-1')).toBe(48);
      expect(await payments.outcomeOf('pay-1')).toBe('APPLIED:UPGRADE');
    });

    it('should keep the money when the resolved purchase is refused', async () => {
      authority.addMember('acct-1', 'Silver');
      await seed('acct-1', 'Silver', daysFrom(T0, 10));

      const result = await intake.ingest({ paymentId: 'pay-1', accountId: 'acct-1', amount: 400 });

      expect(result).toMatchObject({
        status: 'NOT_APPLIED',
        tierName: 'Gold',
        purchase: { success: false, reason: 'INSUFFICIENT_PAYMENT' },
      });
      expect(authority.tiersOf('acct-1')).toEqual(['Silver']);
      expect(await wallet.balanceOf('acct-1')).toBe(400);
      expect(await payments.outcomeOf('pay-1')).toBe('NOT_APPLIED:INSUFFICIENT_PAYMENT');
    });

    it('should turn a lower-tier price into a top-up of the held tier', async () => {
      authority.addMember('acct-1', 'Gold');
      await seed('acct-1', 'Gold', daysFrom(T0, 10));

      const result = await intake.ingest({ paymentId: 'pay-1', accountId: 'acct-1', amount: 100 });

      expect(result).toMatchObject({
        status: 'APPLIED',
        tierName: 'Gold',
        purchase: {
          success: true,
          outcome: { pathTaken: 'PARTIAL', daysAdded: 6, expiresAt: daysFrom(T0, 16) },
        },
      });
    });

    it('should reject malformed payments', async () => {
      const result = await intake.ingest({ paymentId: 'pay-1', accountId: 'acct-1', amount: -5 });
      expect(result.status).toBe('INVALID');
    });
  });

  describe('resolveTarget', () => {
    it.each([
      { amount: 100, held: null, expected: { tierName: 'Silver', duration: 'monthly' } },
      { amount: 1000, held: null, expected: { tierName: 'Platinum', duration: 'monthly' } },
      { amount: 1000, held: 'Silver', expected: { tierName: 'Silver', duration: 'yearly' } },
      { amount: 5000, held: null, expected: { tierName: 'Gold', duration: 'yearly' } },
      { amount: 400, held: 'Silver', expected: { tierName: 'Gold', duration: 'monthly' } },
      { amount: 99, held: 'Silver', expected: { tierName: 'Silver', duration: 'monthly' } },
      { amount: 499, held: 'Gold', expected: { tierName: 'Gold', duration: 'monthly' } },
      { amount: 500, held: 'Silver', expected: { tierName: 'Gold', duration: 'monthly' } },
      { amount: 99, held: null, expected: null },
      { amount: 37, held: 'Gold', expected: null },
    ])('should map $amount with $held held', ({ amount, held, expected }) => {
      expect(intake.resolveTarget(amount, held)).toEqual(expected);
    });
  });
});
