/**
 * SqlitePaymentLog - idempotency record of ingested payments
 */

import type Database from 'better-sqlite3';
import type { HandledPayment, IPaymentLog } from '../../core/ports/ICollaborators.js';
import { sqliteTimestamp } from '../../../db/timestamps.js';

export class SqlitePaymentLog implements IPaymentLog {
  constructor(private readonly db: Database.Database) {}

  async claim(entry: HandledPayment): Promise<boolean> {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO handled_payments
           (payment_id, account_id, amount, source, received_at, outcome)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        entry.paymentId,
        entry.accountId,
        entry.amount,
        entry.source,
        sqliteTimestamp(entry.receivedAt),
        entry.outcome
      );
    return result.changes === 1;
  }

  async complete(paymentId: string, outcome: string): Promise<void> {
    this.db
      .prepare('UPDATE handled_payments SET outcome = ? WHERE payment_id = ?')
      .run(outcome, paymentId);
  }

  async outcomeOf(paymentId: string): Promise<string | null> {
    const row = this.db
      .prepare('SELECT outcome FROM handled_payments WHERE payment_id = ?')
      .get(paymentId) as { outcome: string } | undefined;
    return row?.outcome ?? null;
  }
}
