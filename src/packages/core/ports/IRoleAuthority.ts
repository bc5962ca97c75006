/**
 * IRoleAuthority - Port Interface for the External Role Authority
 *
 * The chat platform mirrors every entitlement as a role assignment and can
 * change it independently (moderators, members leaving). It is the source
 * of truth for current possession, never for expiry.
 *
 * Implementations throw ExternalAuthorityError for every failure.
 *
 * @module packages/core/ports/IRoleAuthority
 */

import type { ExternalAuthorityError } from '../errors.js';

export interface RevokeFailure {
  tierName: string;
  error: ExternalAuthorityError;
}

export interface RevokeBatchResult {
  revoked: string[];
  failed: RevokeFailure[];
}

export interface IRoleAuthority {
  /** Assigns the tier's role; returns an opaque assignment handle */
  grant(accountId: string, tierName: string): Promise<string>;

  /** Removes several tiers from one account in a single call, reporting per tier */
  revokeBatch(accountId: string, tierNames: readonly string[]): Promise<RevokeBatchResult>;

  hasGrant(accountId: string, tierName: string): Promise<boolean>;

  /** False when the account no longer exists in the community */
  resolveAccount(accountId: string): Promise<boolean>;

  /** Catalog tiers currently granted to the account */
  getGrantedTiers(accountId: string): Promise<string[]>;

  /** Accounts currently granted the tier, where the authority can enumerate them */
  listHolders?(tierName: string): Promise<string[]>;
}
