/**
 * SqliteWallet - per-account currency balances
 *
 * Credits upsert the row; debits are a single conditional UPDATE so a
 * balance can never go below zero.
 */

import type Database from 'better-sqlite3';
import type { IWallet } from '../../core/ports/IWallet.js';
import { sqliteTimestamp } from '../../../db/timestamps.js';

export class SqliteWallet implements IWallet {
  constructor(private readonly db: Database.Database) {}

  async credit(accountId: string, amount: number): Promise<number> {
    assertAmount(amount);
    this.db
      .prepare(
        `INSERT INTO wallets (account_id, balance, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(account_id) DO UPDATE SET
           balance = balance + excluded.balance,
           updated_at = excluded.updated_at`
      )
      .run(accountId, amount, sqliteTimestamp());
    return this.balanceOf(accountId);
  }

  async debit(accountId: string, amount: number): Promise<boolean> {
    assertAmount(amount);
    const result = this.db
      .prepare(
        `UPDATE wallets SET balance = balance - ?, updated_at = ?
         WHERE account_id = ? AND balance >= ?`
      )
      .run(amount, sqliteTimestamp(), accountId, amount);
    return result.changes === 1;
  }

  async balanceOf(accountId: string): Promise<number> {
    const row = this.db
      .prepare('SELECT balance FROM wallets WHERE account_id = ?')
      .get(accountId) as { balance: number } | undefined;
    return row?.balance ?? 0;
  }
}

function assertAmount(amount: number): void {
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new RangeError(`Wallet amount must be a positive integer, got ${amount}`);
  }
}
