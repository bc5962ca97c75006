/**
 * Maps errors thrown by @discordjs/rest onto ExternalAuthorityError codes.
 *
 * The library throws DiscordAPIError (JSON error body with a numeric code),
 * HTTPError (status only), RateLimitError (when configured to reject on
 * rate limits) and AbortError on request timeout. They are recognised by
 * shape rather than by class.
 */

import { ExternalAuthorityError, errorMessage } from '../../core/errors.js';

/** Discord JSON error codes */
export const DISCORD_UNKNOWN_MEMBER = 10007;
export const DISCORD_UNKNOWN_USER = 10013;
export const DISCORD_MISSING_PERMISSIONS = 50013;

/**
 * Discord API error structure (subset)
 */
export interface DiscordHttpError {
  name?: string;
  status?: number;
  code?: number;
  retryAfter?: number;
}

export function readDiscordError(error: unknown): DiscordHttpError {
  if (typeof error !== 'object' || error === null) {
    return {};
  }
  return {
    name: 'name' in error && typeof error.name === 'string' ? error.name : undefined,
    status: 'status' in error && typeof error.status === 'number' ? error.status : undefined,
    code: 'code' in error && typeof error.code === 'number' ? error.code : undefined,
    retryAfter:
      'retryAfter' in error && typeof error.retryAfter === 'number' ? error.retryAfter : undefined,
  };
}

export function toAuthorityError(error: unknown, accountId?: string): ExternalAuthorityError {
  if (error instanceof ExternalAuthorityError) {
    return error;
  }

  const { name, status, code, retryAfter } = readDiscordError(error);
  const message = errorMessage(error);

  if (name === 'AbortError' || name === 'TimeoutError') {
    return new ExternalAuthorityError(`Discord request timed out: ${message}`, 'TIMEOUT', accountId);
  }
  if (name === 'RateLimitError' || status === 429) {
    return new ExternalAuthorityError(
      `Discord rate limit: ${message}`,
      'RATE_LIMITED',
      accountId,
      retryAfter
    );
  }
  if (code === DISCORD_UNKNOWN_MEMBER || code === DISCORD_UNKNOWN_USER) {
    return new ExternalAuthorityError(
      `Account not found in guild: ${message}`,
      'ACCOUNT_NOT_FOUND',
      accountId
    );
  }
  if (code === DISCORD_MISSING_PERMISSIONS || status === 403) {
    return new ExternalAuthorityError(`Discord refused: ${message}`, 'FORBIDDEN', accountId);
  }
  return new ExternalAuthorityError(`Discord request failed: ${message}`, 'UNAVAILABLE', accountId);
}
