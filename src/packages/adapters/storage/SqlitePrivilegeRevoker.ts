/**
 * SqlitePrivilegeRevoker - delegated privileges owned by tier holders
 *
 * Holders of a tier may delegate scoped privileges (moderation of their own
 * channel, for instance) to other accounts. The delegation only lives as
 * long as the owner's entitlement.
 */

import type Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { IPrivilegeRevoker } from '../../core/ports/ICollaborators.js';

export class SqlitePrivilegeRevoker implements IPrivilegeRevoker {
  private readonly log: Logger;

  constructor(
    private readonly db: Database.Database,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'SqlitePrivilegeRevoker' });
  }

  /** Records a delegation; duplicates are ignored */
  async delegate(ownerAccountId: string, granteeAccountId: string, scope: string): Promise<void> {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO delegated_privileges (owner_account_id, grantee_account_id, scope)
         VALUES (?, ?, ?)`
      )
      .run(ownerAccountId, granteeAccountId, scope);
  }

  async listDelegations(ownerAccountId: string): Promise<{ granteeAccountId: string; scope: string }[]> {
    const rows = this.db
      .prepare(
        `SELECT grantee_account_id, scope FROM delegated_privileges
         WHERE owner_account_id = ? ORDER BY id`
      )
      .all(ownerAccountId) as { grantee_account_id: string; scope: string }[];
    return rows.map((row) => ({ granteeAccountId: row.grantee_account_id, scope: row.scope }));
  }

  async stripDependentPrivileges(accountId: string): Promise<number> {
    const removed = this.db
      .prepare('DELETE FROM delegated_privileges WHERE owner_account_id = ?')
      .run(accountId).changes;

    if (removed > 0) {
      this.log.info({ accountId, removed }, 'Stripped delegated privileges');
    }
    return removed;
  }
}
