/**
 * Delivers entitlement notifications as direct messages.
 */

import { Routes } from 'discord-api-types/v10';
import { z } from 'zod';
import type { EntitlementNotification } from '../../core/domain/notification.js';
import type { INotificationSink } from '../../core/ports/INotifier.js';
import type { DiscordRestClient } from './rest.js';

const DmChannelSchema = z.object({ id: z.string() });

export class DiscordDmNotificationSink implements INotificationSink {
  constructor(private readonly rest: DiscordRestClient) {}

  async deliver(event: EntitlementNotification): Promise<void> {
    const channel = DmChannelSchema.parse(
      await this.rest.post(Routes.userChannels(), { body: { recipient_id: event.accountId } })
    );
    await this.rest.post(Routes.channelMessages(channel.id), {
      body: { content: formatNotification(event) },
    });
  }
}

function formatDate(date: Date | undefined): string {
  return date ? date.toISOString().slice(0, 10) : 'unknown';
}

export function formatNotification(event: EntitlementNotification): string {
  const { amount, expiresAt } = event;
  const tierName = event.tierName ?? 'your tier';
  switch (event.kind) {
    case 'purchased':
      return `You now hold ${tierName} until ${formatDate(expiresAt)}.`;
    case 'extended':
      return `${tierName} extended until ${formatDate(expiresAt)}.`;
    case 'upgraded':
      return `Upgraded to ${tierName} until ${formatDate(expiresAt)}. Refund applied: ${amount ?? 0}.`;
    case 'expired':
      return `Your ${tierName} entitlement has expired.`;
    case 'sold':
      return `You sold ${tierName}. ${amount ?? 0} was credited to your wallet.`;
    case 'expiring':
      return `Your ${tierName} entitlement expires on ${formatDate(expiresAt)}. Renew for ${amount ?? 0}.`;
    case 'credited':
      return `${amount ?? 0} was added to your wallet balance.`;
  }
}
