import { REST, type RequestData } from '@discordjs/rest';

/**
 * Subset of the @discordjs/rest client used by the adapters.
 */
export interface DiscordRestClient {
  get(route: `/${string}`, options?: RequestData): Promise<unknown>;
  put(route: `/${string}`, options?: RequestData): Promise<unknown>;
  post(route: `/${string}`, options?: RequestData): Promise<unknown>;
  patch(route: `/${string}`, options?: RequestData): Promise<unknown>;
  delete(route: `/${string}`, options?: RequestData): Promise<unknown>;
}

/**
 * Creates the bot-authenticated REST client. `timeoutMs` bounds every request.
 */
export function createDiscordRest(token: string, timeoutMs: number): DiscordRestClient {
  const rest = new REST({ version: '10', timeout: timeoutMs });
  rest.setToken(token);
  return rest;
}
