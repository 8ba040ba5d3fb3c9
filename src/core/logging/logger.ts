/**
 * Logging for splitstat
 *
 * One pino root logger per process, with cached child loggers per component.
 * Level comes from LOG_LEVEL (default 'info').
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

const loggerCache = new Map<string, Logger>();
let rootLogger: Logger | undefined;

function resolveLevel(value: string | undefined): LevelWithSilent {
  const level = LEVELS.find((candidate) => candidate === value?.toLowerCase());
  return level ?? 'info';
}

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: 'splitstat',
      level: resolveLevel(process.env.LOG_LEVEL),
      serializers: {
        err: pino.stdSerializers.err,
      },
    });
  }
  return rootLogger;
}

/**
 * Get the logger for a component. Same name returns the same instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger('aggregator');
 * logger.info({ records: 1000 }, 'aggregation finished');
 * ```
 */
export function createLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) {
    return cached;
  }

  const logger = getRootLogger().child({ component });
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Drop the root logger and all cached children. Used by tests.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
  rootLogger = undefined;
}
