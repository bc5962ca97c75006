import type Database from 'better-sqlite3';
import { ConfigError, getConfig } from './config.js';
import { loadTierConfig } from './tier-config.js';
import { openDatabase } from './db/database.js';
import { createDiscordRest } from './packages/adapters/discord/index.js';
import { createApp, type App } from './app.js';
import { createLogger } from './utils/logger.js';

// Initialize logger first
const logger = createLogger();

let app: App | null = null;
let db: Database.Database | null = null;

/**
 * Main entry point
 */
async function main(): Promise<void> {
  logger.info('Starting entitlement service');

  const config = getConfig();
  logger.info({ env: config.nodeEnv }, 'Configuration loaded');

  const tiers = loadTierConfig(config.tiersConfigPath);
  logger.info(
    { tiers: tiers.catalog.tiersByPriority().map((tier) => tier.name) },
    'Tier catalog loaded'
  );

  db = openDatabase(config.databasePath, logger);
  const rest = createDiscordRest(config.discord.botToken, config.externalTimeoutMs);

  app = createApp({ config, tiers, db, rest, logger });
  for (const scheduler of app.schedulers) {
    scheduler.start();
  }

  logger.info('Entitlement service ready');
}

/**
 * Graceful shutdown
 */
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutdown signal received, starting graceful shutdown');

  if (app) {
    await Promise.all(app.schedulers.map((scheduler) => scheduler.stop()));
    await app.notifications.flush();
    logger.info('Jobs stopped and notifications flushed');
  }

  db?.close();
  logger.info('Shutdown complete');
  process.exit(0);
}

function handleSignal(signal: string): void {
  shutdown(signal).catch((error) => {
    logger.fatal({ error }, 'Shutdown failed');
    process.exit(1);
  });
}

// Handle shutdown signals
process.on('SIGTERM', () => handleSignal('SIGTERM'));
process.on('SIGINT', () => handleSignal('SIGINT'));

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught exception, shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled rejection, shutting down');
  process.exit(1);
});

main().catch((error) => {
  if (error instanceof ConfigError) {
    logger.fatal({ code: error.code, details: error.details }, error.format());
  } else {
    logger.fatal({ error }, 'Failed to start entitlement service');
  }
  process.exit(1);
});
