import type Database from 'better-sqlite3';
import type { INotificationLog } from '../../core/ports/INotifier.js';
import { parseSqliteTimestamp, sqliteTimestamp } from '../../../db/timestamps.js';

export class SqliteNotificationLog implements INotificationLog {
  constructor(private readonly db: Database.Database) {}

  async lastSentAt(accountId: string, tag: string): Promise<Date | null> {
    const row = this.db
      .prepare('SELECT sent_at FROM notification_log WHERE account_id = ? AND tag = ?')
      .get(accountId, tag) as { sent_at: string } | undefined;
    return row ? parseSqliteTimestamp(row.sent_at) : null;
  }

  async record(accountId: string, tag: string, sentAt: Date): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO notification_log (account_id, tag, sent_at) VALUES (?, ?, ?)
         ON CONFLICT(account_id, tag) DO UPDATE SET sent_at = excluded.sent_at`
      )
      .run(accountId, tag, sqliteTimestamp(sentAt));
  }
}
