/**
 * pino logger factory for taskpipe.
 *
 * No module-level logger: the level and destination are passed in by the
 * caller so repeated runs never share logging state.
 */

import { destination as pinoDestination, pino, type DestinationStream, type Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  level: LogLevel;
  /** Defaults to a synchronous stderr destination */
  destination?: DestinationStream;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(config: LoggerConfig): Logger {
  const destination =
    config.destination ?? pinoDestination({ dest: 2, sync: true });

  return pino(
    {
      name: 'taskpipe',
      level: config.level,
      base: undefined,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination
  );
}

/** Logger that drops everything; the default for library callers */
export function createSilentLogger(): Logger {
  return createLogger({
    level: 'silent',
    destination: { write: () => undefined },
  });
}
