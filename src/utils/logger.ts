import pino, { type DestinationStream, type Logger } from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

export interface LoggerOptions {
  level?: string;
  /** Alternate sink, stdout when omitted */
  destination?: DestinationStream;
}

/**
 * Structured logger using pino
 *
 * Configuration:
 * - LOG_LEVEL environment variable controls verbosity (trace, debug, info, warn, error, fatal)
 * - ISO timestamps for consistent time formatting
 * - JSON format for structured logging
 * - Raw chat and user ids must go through the SecureLogger, never straight here
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions = {
    level: options.level ?? LOG_LEVEL,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Redact sensitive fields if they accidentally get logged
    redact: {
      paths: ['*.password', '*.token', '*.botToken', '*.secret', '*.digestKey'],
      censor: '[REDACTED]',
    },
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

export const logger = createLogger();

/**
 * Apply the validated LOG_LEVEL to the shared logger. It is built on
 * import, before .env files are loaded.
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}
