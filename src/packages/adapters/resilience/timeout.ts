import { ExternalAuthorityError } from '../../core/errors.js';

/**
 * Races `operation` against a timer. Expiry rejects with a TIMEOUT
 * ExternalAuthorityError; the timer is always cleared.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string,
  accountId?: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ExternalAuthorityError(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT', accountId));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, expiry]);
  } finally {
    clearTimeout(timer);
  }
}
