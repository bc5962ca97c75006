export { DiscordRoleAuthority, type DiscordRoleAuthorityConfig } from './DiscordRoleAuthority.js';
export { DiscordRestrictionService } from './DiscordRestrictionService.js';
export { DiscordDmNotificationSink, formatNotification } from './DiscordDmNotificationSink.js';
export { createDiscordRest, type DiscordRestClient } from './rest.js';
export { toAuthorityError } from './discord-errors.js';
