import pino from 'pino';

export type Logger = pino.Logger;

/**
 * Redact sensitive data from logs
 * - Authorization headers (Bearer tokens)
 * - Access tokens (JWT-shaped strings) wherever they appear
 * - Passwords, password hashes and other secrets
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.Authorization',
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'password',
  'currentPassword',
  'newPassword',
  'passwordHash',
  '*.password',
  '*.passwordHash',
  'token',
  '*.token',
  'secret',
  'jwtSecret',
];

const JWT_PATTERN = /eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;

export function redactString(value: string): string {
  if (value.startsWith('Bearer ')) {
    return 'Bearer [REDACTED]';
  }
  return value.replace(JWT_PATTERN, '[REDACTED_JWT]');
}

/**
 * Recursively redact token-looking strings. Errors are left to the `err`
 * serializer since their fields are not enumerable.
 */
export function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactString(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (value instanceof Error || value instanceof Date) {
    return value;
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = redactValue(entry);
    }
    return result;
  }
  return value;
}

function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(record)) {
    result[key] = redactValue(entry);
  }
  return result;
}

/**
 * Create a structured logger instance with Pino
 *
 * `destination` is mainly for tests that capture output.
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const loggerOptions: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log: redactRecord,
    },
    hooks: {
      // Message strings bypass formatters.log
      logMethod(args, method) {
        for (let i = 0; i < args.length; i++) {
          const arg = args[i];
          if (typeof arg === 'string') {
            args[i] = redactString(arg);
          }
        }
        method.apply(this, args);
      },
    },
    ...options,
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
