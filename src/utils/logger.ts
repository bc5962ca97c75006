import { pino, type Logger } from 'pino';

export type { Logger };

/**
 * Root logger. Pretty-printed in development, JSON otherwise.
 */
export function createLogger(
  level: string = process.env['LOG_LEVEL'] || 'info',
  nodeEnv: string | undefined = process.env['NODE_ENV']
): Logger {
  return pino({
    level,
    base: { service: 'tierkeep' },
    transport:
      nodeEnv === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
  });
}
