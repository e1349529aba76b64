import winston from 'winston';

export type Logger = winston.Logger;

/** Options for {@link createLogger}. */
export interface LoggerOptions {
  /** Minimum level to emit. Defaults to LOG_LEVEL, then "info". */
  level?: string;
  /** Drop every entry (tests). */
  silent?: boolean;
  /** Value of the `service` field on every entry. */
  service?: string;
}

/**
 * Creates the structured logger shared by the core and the entry points.
 *
 * Notes:
 * - Entries are JSON lines written to stderr, so stdout stays free for the rendered critique.
 * - Errors keep their stack traces.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return winston.createLogger({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service: options.service ?? 'architect-critic' },
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      }),
    ],
  });
}
