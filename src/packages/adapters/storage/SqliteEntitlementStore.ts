/**
 * SqliteEntitlementStore - better-sqlite3 implementation of IEntitlementStore
 *
 * better-sqlite3 exposes one synchronous connection, so a transaction cannot
 * stay open across the awaits of an external call. Per-account isolation is
 * provided by a keyed lock around each unit of work instead; every
 * multi-statement mutation runs in its own SQLite transaction.
 *
 * @module packages/adapters/storage/SqliteEntitlementStore
 */

import type Database from 'better-sqlite3';
import type { Entitlement } from '../../core/domain/entitlement.js';
import type { IAccountEntitlements, IEntitlementStore } from '../../core/ports/IEntitlementStore.js';
import { PersistenceError } from '../../core/errors.js';
import { parseSqliteTimestamp, sqliteTimestamp } from '../../../db/timestamps.js';
import { KeyedLock } from './AccountLock.js';

interface EntitlementRow {
  account_id: string;
  tier_name: string;
  expires_at: string;
  external_assignment_id: string | null;
}

const COLUMNS = 'account_id, tier_name, expires_at, external_assignment_id';

function toEntitlement(row: EntitlementRow): Entitlement {
  return {
    accountId: row.account_id,
    tierName: row.tier_name,
    expiresAt: parseSqliteTimestamp(row.expires_at),
    externalAssignmentId: row.external_assignment_id,
  };
}

// =============================================================================
// Store
// =============================================================================

export class SqliteEntitlementStore implements IEntitlementStore {
  private readonly lock = new KeyedLock();

  constructor(private readonly db: Database.Database) {}

  async withAccount<T>(
    accountId: string,
    work: (tx: IAccountEntitlements) => Promise<T>
  ): Promise<T> {
    return this.lock.run(accountId, () => work(new SqliteAccountEntitlements(this.db, accountId)));
  }

  async findExpired(now: Date, tierNames?: readonly string[]): Promise<Entitlement[]> {
    const cutoff = sqliteTimestamp(now);
    if (tierNames && tierNames.length === 0) return [];
    const rows = tierNames
      ? (this.db
          .prepare(
            `SELECT ${COLUMNS} FROM entitlements
             WHERE expires_at <= ? AND tier_name IN (${tierNames.map(() => '?').join(', ')})
             ORDER BY account_id, tier_name`
          )
          .all(cutoff, ...tierNames) as EntitlementRow[])
      : (this.db
          .prepare(
            `SELECT ${COLUMNS} FROM entitlements
             WHERE expires_at <= ?
             ORDER BY account_id, tier_name`
          )
          .all(cutoff) as EntitlementRow[]);
    return rows.map(toEntitlement);
  }

  async findExpiringBetween(from: Date, to: Date): Promise<Entitlement[]> {
    const rows = this.db
      .prepare(
        `SELECT ${COLUMNS} FROM entitlements
         WHERE expires_at > ? AND expires_at <= ?
         ORDER BY expires_at, account_id`
      )
      .all(sqliteTimestamp(from), sqliteTimestamp(to)) as EntitlementRow[];
    return rows.map(toEntitlement);
  }

  async listAccountsWithTier(tierName: string): Promise<string[]> {
    const rows = this.db
      .prepare('SELECT account_id FROM entitlements WHERE tier_name = ? ORDER BY account_id')
      .all(tierName) as { account_id: string }[];
    return rows.map((row) => row.account_id);
  }
}

// =============================================================================
// Unit of work
// =============================================================================

class SqliteAccountEntitlements implements IAccountEntitlements {
  constructor(
    private readonly db: Database.Database,
    readonly accountId: string
  ) {}

  async get(tierName: string): Promise<Entitlement | null> {
    return this.select(tierName);
  }

  async list(): Promise<Entitlement[]> {
    const rows = this.db
      .prepare(`SELECT ${COLUMNS} FROM entitlements WHERE account_id = ? ORDER BY tier_name`)
      .all(this.accountId) as EntitlementRow[];
    return rows.map(toEntitlement);
  }

  async insert(entitlement: Omit<Entitlement, 'accountId'>): Promise<Entitlement> {
    this.insertRow(entitlement);
    return this.require(entitlement.tierName);
  }

  async updateExpiry(
    tierName: string,
    expiresAt: Date,
    externalAssignmentId?: string | null
  ): Promise<Entitlement> {
    const now = sqliteTimestamp();
    const result =
      externalAssignmentId === undefined
        ? this.db
            .prepare(
              `UPDATE entitlements SET expires_at = ?, updated_at = ?
               WHERE account_id = ? AND tier_name = ?`
            )
            .run(sqliteTimestamp(expiresAt), now, this.accountId, tierName)
        : this.db
            .prepare(
              `UPDATE entitlements SET expires_at = ?, external_assignment_id = ?, updated_at = ?
               WHERE account_id = ? AND tier_name = ?`
            )
            .run(sqliteTimestamp(expiresAt), externalAssignmentId, now, this.accountId, tierName);

    if (result.changes === 0) {
      throw new PersistenceError(
        `No entitlement ${tierName} to extend for ${this.accountId}`,
        this.accountId,
        tierName
      );
    }
    return this.require(tierName);
  }

  async delete(tierName: string): Promise<number> {
    return this.deleteRow(tierName);
  }

  async replace(
    removeTier: string,
    entitlement: Omit<Entitlement, 'accountId'>
  ): Promise<Entitlement> {
    this.db.transaction(() => {
      if (this.deleteRow(removeTier) === 0) {
        throw new PersistenceError(
          `No entitlement ${removeTier} to replace for ${this.accountId}`,
          this.accountId,
          removeTier
        );
      }
      this.upsertRow(entitlement);
    })();
    return this.require(entitlement.tierName);
  }

  private select(tierName: string): Entitlement | null {
    const row = this.db
      .prepare(`SELECT ${COLUMNS} FROM entitlements WHERE account_id = ? AND tier_name = ?`)
      .get(this.accountId, tierName) as EntitlementRow | undefined;
    return row ? toEntitlement(row) : null;
  }

  private require(tierName: string): Entitlement {
    const entitlement = this.select(tierName);
    if (!entitlement) {
      throw new PersistenceError(
        `Entitlement ${tierName} missing after write for ${this.accountId}`,
        this.accountId,
        tierName
      );
    }
    return entitlement;
  }

  private insertRow(entitlement: Omit<Entitlement, 'accountId'>): void {
    this.db
      .prepare(
        `INSERT INTO entitlements (account_id, tier_name, expires_at, external_assignment_id)
         VALUES (?, ?, ?, ?)`
      )
      .run(
        this.accountId,
        entitlement.tierName,
        sqliteTimestamp(entitlement.expiresAt),
        entitlement.externalAssignmentId
      );
  }

  private upsertRow(entitlement: Omit<Entitlement, 'accountId'>): void {
    this.db
      .prepare(
        `INSERT INTO entitlements (account_id, tier_name, expires_at, external_assignment_id)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(account_id, tier_name) DO UPDATE SET
           expires_at = excluded.expires_at,
           external_assignment_id = excluded.external_assignment_id,
           updated_at = datetime('now')`
      )
      .run(
        this.accountId,
        entitlement.tierName,
        sqliteTimestamp(entitlement.expiresAt),
        entitlement.externalAssignmentId
      );
  }

  private deleteRow(tierName: string): number {
    return this.db
      .prepare('DELETE FROM entitlements WHERE account_id = ? AND tier_name = ?')
      .run(this.accountId, tierName).changes;
  }
}
