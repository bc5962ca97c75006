/**
 * Removes restriction ("mute") roles from a member after a purchase.
 */

import { Routes } from 'discord-api-types/v10';
import type { Logger } from 'pino';
import type { IRestrictionService } from '../../core/ports/ICollaborators.js';
import type { DiscordRestClient } from './rest.js';
import { GuildMemberSchema } from './DiscordRoleAuthority.js';
import { toAuthorityError } from './discord-errors.js';

export class DiscordRestrictionService implements IRestrictionService {
  private readonly log: Logger;

  constructor(
    private readonly rest: DiscordRestClient,
    private readonly guildId: string,
    private readonly restrictionRoleIds: readonly string[],
    logger: Logger
  ) {
    this.log = logger.child({ component: 'DiscordRestrictionService' });
  }

  async clearRestrictions(accountId: string): Promise<number> {
    if (this.restrictionRoleIds.length === 0) {
      return 0;
    }

    try {
      const member = GuildMemberSchema.parse(
        await this.rest.get(Routes.guildMember(this.guildId, accountId))
      );
      const present = this.restrictionRoleIds.filter((roleId) => member.roles.includes(roleId));

      for (const roleId of present) {
        await this.rest.delete(Routes.guildMemberRole(this.guildId, accountId, roleId), {
          reason: 'Restriction lifted by purchase',
        });
      }

      if (present.length > 0) {
        this.log.info({ accountId, roleIds: present }, 'Restriction roles removed');
      }
      return present.length;
    } catch (error) {
      throw toAuthorityError(error, accountId);
    }
  }
}
