/**
 * DiscordRoleAuthority - Guild roles as the external mirror of entitlements
 *
 * Every catalog tier maps to one guild role. Grants and single revokes go
 * through the guild member role endpoints; possession is read from the
 * member's role list. Revoking several tiers at once costs one member read
 * and one member PATCH instead of a DELETE per role.
 *
 * @module packages/adapters/discord/DiscordRoleAuthority
 */

import { Routes } from 'discord-api-types/v10';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { IRoleAuthority, RevokeBatchResult } from '../../core/ports/IRoleAuthority.js';
import { ExternalAuthorityError } from '../../core/errors.js';
import type { DiscordRestClient } from './rest.js';
import { toAuthorityError } from './discord-errors.js';

// =============================================================================
// Types
// =============================================================================

export interface DiscordRoleAuthorityConfig {
  guildId: string;
  /** Tier name -> Discord role id */
  roleIds: Record<string, string>;
}

export const GuildMemberSchema = z.object({
  user: z.object({ id: z.string() }).optional(),
  roles: z.array(z.string()),
});

export type GuildMember = z.infer<typeof GuildMemberSchema>;

const GuildMemberPageSchema = z.array(GuildMemberSchema);

/** Discord's maximum page size for List Guild Members */
const MEMBER_PAGE_SIZE = 1000;

// =============================================================================
// Adapter
// =============================================================================

export class DiscordRoleAuthority implements IRoleAuthority {
  private readonly log: Logger;
  private readonly tierByRole: Map<string, string>;

  constructor(
    private readonly rest: DiscordRestClient,
    private readonly config: DiscordRoleAuthorityConfig,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'DiscordRoleAuthority' });
    this.tierByRole = new Map(
      Object.entries(config.roleIds).map(([tierName, roleId]) => [roleId, tierName])
    );
  }

  async grant(accountId: string, tierName: string): Promise<string> {
    const roleId = this.roleIdFor(tierName);
    try {
      await this.rest.put(Routes.guildMemberRole(this.config.guildId, accountId, roleId), {
        reason: `Entitlement granted: ${tierName}`,
      });
    } catch (error) {
      throw toAuthorityError(error, accountId);
    }

    this.log.debug({ accountId, tierName, roleId }, 'Role granted');
    return `${this.config.guildId}:${accountId}:${roleId}`;
  }

  async revokeBatch(accountId: string, tierNames: readonly string[]): Promise<RevokeBatchResult> {
    if (tierNames.length > 1) {
      return this.revokeTogether(accountId, tierNames);
    }

    const result: RevokeBatchResult = { revoked: [], failed: [] };

    for (const tierName of tierNames) {
      const roleId = this.roleIdFor(tierName);
      try {
        await this.rest.delete(Routes.guildMemberRole(this.config.guildId, accountId, roleId), {
          reason: `Entitlement revoked: ${tierName}`,
        });
        result.revoked.push(tierName);
      } catch (error) {
        const failure = toAuthorityError(error, accountId);
        this.log.warn(
          { accountId, tierName, roleId, code: failure.code, error: failure.message },
          'Role revoke failed'
        );
        result.failed.push({ tierName, error: failure });
      }
    }

    return result;
  }

  async hasGrant(accountId: string, tierName: string): Promise<boolean> {
    const granted = await this.getGrantedTiers(accountId);
    return granted.includes(tierName);
  }

  async resolveAccount(accountId: string): Promise<boolean> {
    try {
      await this.fetchMember(accountId);
      return true;
    } catch (error) {
      if (error instanceof ExternalAuthorityError && error.code === 'ACCOUNT_NOT_FOUND') {
        return false;
      }
      throw error;
    }
  }

  async getGrantedTiers(accountId: string): Promise<string[]> {
    const member = await this.fetchMember(accountId);
    return this.tiersOf(member);
  }

  async listHolders(tierName: string): Promise<string[]> {
    const roleId = this.roleIdFor(tierName);
    const holders: string[] = [];
    let after = '0';

    for (;;) {
      let raw: unknown;
      try {
        raw = await this.rest.get(Routes.guildMembers(this.config.guildId), {
          query: new URLSearchParams({ limit: String(MEMBER_PAGE_SIZE), after }),
        });
      } catch (error) {
        throw toAuthorityError(error);
      }

      const page = GuildMemberPageSchema.parse(raw);
      for (const member of page) {
        if (member.user && member.roles.includes(roleId)) {
          holders.push(member.user.id);
        }
      }

      const last = page[page.length - 1];
      if (page.length < MEMBER_PAGE_SIZE || !last?.user) {
        break;
      }
      after = last.user.id;
    }

    return holders;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /**
   * Rewrites the member's role list without the given tiers. The whole batch
   * succeeds or fails together. Role changes made between the read and the
   * PATCH are overwritten.
   */
  private async revokeTogether(
    accountId: string,
    tierNames: readonly string[]
  ): Promise<RevokeBatchResult> {
    const removed = new Set(tierNames.map((tierName) => this.roleIdFor(tierName)));

    try {
      const member = await this.fetchMember(accountId);
      await this.rest.patch(Routes.guildMember(this.config.guildId, accountId), {
        body: { roles: member.roles.filter((roleId) => !removed.has(roleId)) },
        reason: `Entitlements revoked: ${tierNames.join(', ')}`,
      });
    } catch (error) {
      const failure = toAuthorityError(error, accountId);
      this.log.warn(
        { accountId, tierNames: [...tierNames], code: failure.code, error: failure.message },
        'Batch role revoke failed'
      );
      return { revoked: [], failed: tierNames.map((tierName) => ({ tierName, error: failure })) };
    }

    return { revoked: [...tierNames], failed: [] };
  }

  private async fetchMember(accountId: string): Promise<GuildMember> {
    let raw: unknown;
    try {
      raw = await this.rest.get(Routes.guildMember(this.config.guildId, accountId));
    } catch (error) {
      throw toAuthorityError(error, accountId);
    }

    const parsed = GuildMemberSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExternalAuthorityError(
        `Unexpected guild member payload: ${parsed.error.message}`,
        'UNAVAILABLE',
        accountId
      );
    }
    return parsed.data;
  }

  private tiersOf(member: GuildMember): string[] {
    const tiers: string[] = [];
    for (const roleId of member.roles) {
      const tierName = this.tierByRole.get(roleId);
      if (tierName) tiers.push(tierName);
    }
    return tiers;
  }

  private roleIdFor(tierName: string): string {
    const roleId = this.config.roleIds[tierName];
    if (!roleId) {
      throw new Error(`No Discord role configured for tier ${tierName}`);
    }
    return roleId;
  }
}
