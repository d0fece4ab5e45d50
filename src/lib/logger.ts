import pino from 'pino';

export type { Logger } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';
const debugMode = process.env.DEBUG_MODE === '1' || process.env.DEBUG_MODE?.toLowerCase() === 'true';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (debugMode) return 'debug';
  return isProduction ? 'info' : 'debug';
}

const logger = pino({
  level: resolveLevel(),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, ignore: 'pid,hostname' },
        },
      }),
});

/**
 * Creates a child logger bound to one pipeline component
 * (gateway, analyzer, generator, ...).
 */
export function createComponentLogger(
  component: string,
  extra?: Record<string, unknown>,
) {
  return logger.child({ component, ...extra });
}

export default logger;
