/**
 * Entitlement Engine Errors
 *
 * Infrastructure failures are thrown as these classes. Business conditions
 * (unknown tier, insufficient funds, tier not held) are returned as typed
 * rejections by the services instead.
 *
 * @module packages/core/errors
 */

// =============================================================================
// External Authority
// =============================================================================

export type ExternalAuthorityErrorCode =
  | 'ACCOUNT_NOT_FOUND'
  | 'FORBIDDEN'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'UNAVAILABLE';

/**
 * Raised by role authority adapters when Discord (or any other authority)
 * refuses or fails a call.
 */
export class ExternalAuthorityError extends Error {
  constructor(
    message: string,
    public readonly code: ExternalAuthorityErrorCode,
    public readonly accountId?: string,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = 'ExternalAuthorityError';
  }

  /** Rate limits, timeouts and outages may succeed on a later attempt */
  get retryable(): boolean {
    return this.code === 'RATE_LIMITED' || this.code === 'TIMEOUT' || this.code === 'UNAVAILABLE';
  }
}

// =============================================================================
// Persistence
// =============================================================================

/**
 * An update or delete that was expected to touch a row affected none.
 */
export class PersistenceError extends Error {
  readonly code = 'PERSISTENCE_ERROR';

  constructor(
    message: string,
    public readonly accountId: string,
    public readonly tierName: string
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

// =============================================================================
// Catalog
// =============================================================================

export class CatalogError extends Error {
  readonly code = 'INVALID_CATALOG';

  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

/**
 * Normalizes an unknown thrown value for structured logging.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
