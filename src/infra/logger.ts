import pino from 'pino';

/**
 * Fields that must never reach the log output.
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'headers.authorization',
  'authorization',
  'password',
  'passwordHash',
  'token',
  'access_token',
  'secret',
];

/**
 * Create a structured JSON logger. Pass `level` from config; it defaults
 * to `info`.
 */
export function createLogger(options: pino.LoggerOptions = {}): pino.Logger {
  return pino({
    level: 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  });
}

export type Logger = pino.Logger;

export const logger = createLogger();
