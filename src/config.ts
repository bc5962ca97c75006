/**
 * Service configuration
 *
 * Environment variables are validated with zod once at start-up. Invalid
 * configuration throws ConfigError with one detail per offending variable.
 */

import { z } from 'zod';

// ============================================================================
// Error Classes
// ============================================================================

export enum ConfigErrorCode {
  /** Config file not found */
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  /** Config file cannot be read */
  FILE_READ_ERROR = 'FILE_READ_ERROR',
  /** YAML syntax error */
  YAML_PARSE_ERROR = 'YAML_PARSE_ERROR',
  /** Schema validation failed */
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  /** Cross-reference validation failed */
  REFERENCE_ERROR = 'REFERENCE_ERROR',
}

export interface ConfigErrorDetail {
  message: string;
  path: (string | number)[];
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly details: ConfigErrorDetail[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  format(): string {
    const lines = [`Error: ${this.message}`];
    for (const detail of this.details) {
      const pathStr = detail.path.length > 0 ? ` at ${detail.path.join('.')}` : '';
      lines.push(`  - ${detail.message}${pathStr}`);
    }
    return lines.join('\n');
  }
}

export function toConfigDetails(error: z.ZodError): ConfigErrorDetail[] {
  return error.issues.map((issue) => ({ message: issue.message, path: issue.path }));
}

// ============================================================================
// Environment
// ============================================================================

const intervalMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  DISCORD_BOT_TOKEN: z.string().min(1, 'DISCORD_BOT_TOKEN is required'),
  DISCORD_GUILD_ID: z.string().regex(/^\d+$/, 'DISCORD_GUILD_ID must be a snowflake'),
  DATABASE_PATH: z.string().min(1).default('./data/tierkeep.db'),
  TIERS_CONFIG_PATH: z.string().min(1).default('./config/tiers.yaml'),
  SWEEP_INTERVAL_MS: intervalMs(60 * 60 * 1000),
  REMINDER_INTERVAL_MS: intervalMs(60 * 60 * 1000),
  EXTERNAL_TIMEOUT_MS: intervalMs(10_000),
  REPAIR_ORPHAN_GRANTS: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export interface Config {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  discord: {
    botToken: string;
    guildId: string;
  };
  databasePath: string;
  tiersConfigPath: string;
  sweepIntervalMs: number;
  reminderIntervalMs: number;
  externalTimeoutMs: number;
  repairOrphanGrants: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      'Environment validation failed',
      ConfigErrorCode.VALIDATION_ERROR,
      toConfigDetails(parsed.error)
    );
  }

  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    discord: {
      botToken: e.DISCORD_BOT_TOKEN,
      guildId: e.DISCORD_GUILD_ID,
    },
    databasePath: e.DATABASE_PATH,
    tiersConfigPath: e.TIERS_CONFIG_PATH,
    sweepIntervalMs: e.SWEEP_INTERVAL_MS,
    reminderIntervalMs: e.REMINDER_INTERVAL_MS,
    externalTimeoutMs: e.EXTERNAL_TIMEOUT_MS,
    repairOrphanGrants: e.REPAIR_ORPHAN_GRANTS,
  };
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  cachedConfig ??= loadConfig();
  return cachedConfig;
}
