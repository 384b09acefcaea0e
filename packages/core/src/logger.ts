import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Structured logger for the journal, projections and DLQ.
 *
 * Event payloads are opaque and may carry personal data, so call sites log
 * identifiers (streamId, version, eventId, type) and never payloads. Keys that
 * look like credentials are censored.
 */

const REDACTED_FIELDS = [
  'password',
  'secret',
  'token',
  'apiKey',
  'authorization',
  'connectionString',
  'payload',
];

function createRedactor(): { paths: string[]; censor: string } {
  return {
    paths: [...REDACTED_FIELDS, ...REDACTED_FIELDS.map((field) => `*.${field}`)],
    censor: '[REDACTED]',
  };
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
}

/**
 * Create a named logger
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info', correlationId } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: createRedactor(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: correlationId ? { correlationId } : {},
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  return pino(loggerOptions);
}

/**
 * Create a child logger with correlation ID
 */
export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

export const logger = createLogger({ name: 'streamvault' });

export type { Logger };
