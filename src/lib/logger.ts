/**
 * Logger built on pino.
 *
 * Output goes to stderr.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface LoggerConfig {
  name?: string;
  level?: string;
}

const REDACTED_PATHS = [
  'password',
  'token',
  'secret',
  'authorization',
  'credentials',
  '*.password',
  '*.token',
  '*.secret',
  '*.authorization',
  'headers.Authorization',
];

/**
 * Create a configured pino logger. Level resolves from the config, then
 * `LOG_LEVEL`, then `info`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    name: config.name ?? 'image-resolver',
    level: config.level ?? process.env.LOG_LEVEL ?? 'info',
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  return pino(options, pino.destination(2));
}

export interface Timer {
  end(additionalContext?: Record<string, unknown>): void;
}

/**
 * Measure an operation and log its duration on completion.
 */
export function createTimer(logger: Logger, operation: string): Timer {
  const start = Date.now();

  return {
    end(additionalContext = {}): void {
      logger.debug({ operation, durationMs: Date.now() - start, ...additionalContext }, 'Completed');
    },
  };
}
