/**
 * BoundedRoleAuthority - timeout decorator for any IRoleAuthority
 *
 * Every call to the wrapped authority is bounded; an expired call surfaces
 * as ExternalAuthorityError('TIMEOUT') and is never treated as a success.
 * Enumerating holders pages through the whole guild and gets its own,
 * longer bound.
 *
 * @module packages/adapters/resilience/BoundedRoleAuthority
 */

import type { IRoleAuthority, RevokeBatchResult } from '../../core/ports/IRoleAuthority.js';
import { withTimeout } from './timeout.js';

export interface BoundedRoleAuthorityOptions {
  /** Bound for single-account calls (default: 10000) */
  timeoutMs?: number;
  /** Bound for listHolders (default: 60000) */
  listTimeoutMs?: number;
}

export class BoundedRoleAuthority implements IRoleAuthority {
  readonly listHolders?: (tierName: string) => Promise<string[]>;

  private readonly timeoutMs: number;

  constructor(
    private readonly inner: IRoleAuthority,
    options: BoundedRoleAuthorityOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
    const listTimeoutMs = options.listTimeoutMs ?? 60_000;

    if (inner.listHolders) {
      const listHolders = inner.listHolders.bind(inner);
      this.listHolders = (tierName) =>
        withTimeout(listHolders(tierName), listTimeoutMs, `listHolders(${tierName})`);
    }
  }

  grant(accountId: string, tierName: string): Promise<string> {
    return withTimeout(this.inner.grant(accountId, tierName), this.timeoutMs, 'grant', accountId);
  }

  revokeBatch(accountId: string, tierNames: readonly string[]): Promise<RevokeBatchResult> {
    return withTimeout(
      this.inner.revokeBatch(accountId, tierNames),
      this.timeoutMs,
      'revokeBatch',
      accountId
    );
  }

  hasGrant(accountId: string, tierName: string): Promise<boolean> {
    return withTimeout(this.inner.hasGrant(accountId, tierName), this.timeoutMs, 'hasGrant', accountId);
  }

  resolveAccount(accountId: string): Promise<boolean> {
    return withTimeout(this.inner.resolveAccount(accountId), this.timeoutMs, 'resolveAccount', accountId);
  }

  getGrantedTiers(accountId: string): Promise<string[]> {
    return withTimeout(
      this.inner.getGrantedTiers(accountId),
      this.timeoutMs,
      'getGrantedTiers',
      accountId
    );
  }
}
