import pino from 'pino';

export type Logger = pino.Logger;

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Root logger name; the client and CLI log under children of it.
 */
export const ROOT_LOGGER_NAME = 'paypal-rest';

export interface LoggerOptions {
  /** @default 'info' */
  level?: LogLevel;
  /** Where log lines go; defaults to stdout. */
  destination?: pino.DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings: pino.LoggerOptions = {
    name: ROOT_LOGGER_NAME,
    level: options.level ?? 'info',
  };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

let defaultLogger: Logger | undefined;

const LOG_LEVEL_ALIASES: Readonly<Record<string, LogLevel>> = {
  warning: 'warn',
  err: 'error',
  crit: 'fatal',
  critical: 'fatal',
};

/**
 * Resolve a level name, accepting `warning`, `err`, `crit` and `critical`
 * as aliases. Returns undefined for unknown names.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  const lower = name.toLowerCase();
  return LOG_LEVELS.find((level) => level === lower) ?? LOG_LEVEL_ALIASES[lower];
}

/**
 * Process-wide logger used when no logger is injected. Writes to stderr at
 * `$LOG_LEVEL` (default `info`).
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({
      level: parseLogLevel(process.env['LOG_LEVEL'] ?? '') ?? 'info',
      destination: pino.destination(2),
    });
  }
  return defaultLogger;
}
