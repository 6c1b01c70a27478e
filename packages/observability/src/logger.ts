import pino from 'pino';

/**
 * Paths pino censors before a record is written.
 * Session material must never reach a log line in plaintext.
 */
const REDACTION_PATHS = [
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'rawSecret',
  'secretHash',
  'sessionToken',
  'accessToken',
  'token',
  '*.sessionToken',
  '*.accessToken',
  '*.secretHash',
];

const SESSION_TOKEN_PATTERN = /sst_[A-Za-z0-9_.-]+/g;
const JWT_PATTERN = /eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;

/**
 * Mask bearer credentials embedded in free-form strings
 */
export function redactTokens(value: string): string {
  if (value.startsWith('Bearer ')) {
    return 'Bearer [REDACTED]';
  }
  return value
    .replace(SESSION_TOKEN_PATTERN, 'sst_[REDACTED]')
    .replace(JWT_PATTERN, '[REDACTED_JWT]');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively redact tokens in log arguments.
 * Class instances (errors, secrets with their own toJSON) are left to pino's serializers.
 */
function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactTokens(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const key of Object.keys(value)) {
      result[key] = redactValue(value[key]);
    }
    return result;
  }
  return value;
}

/**
 * Create a structured logger instance with Pino
 *
 * - Level from LOG_LEVEL (default info)
 * - Redaction of session tokens, access tokens and secret hashes
 * - ISO 8601 timestamps
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): pino.Logger {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    hooks: {
      logMethod(args, method) {
        for (let i = 0; i < args.length; i++) {
          args[i] = redactValue(args[i]);
        }
        method.apply(this, args);
      },
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();

export type Logger = pino.Logger;
