import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { ApplicationError } from '../../../application/errors.js';
import type { Logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function isJsonParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

/** Client errors raised by express.json() before a route runs. */
interface BodyParserError {
  type: string;
  status: number;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

const BODY_PARSER_CODES: Record<string, string> = {
  'entity.too.large': 'PAYLOAD_TOO_LARGE',
  'charset.unsupported': 'UNSUPPORTED_CHARSET',
  'encoding.unsupported': 'UNSUPPORTED_ENCODING',
};

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (err instanceof ZodError) {
      const response: ErrorResponse = {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      };
      res.status(422).json(response);
      return;
    }

    if (isJsonParseError(err)) {
      const response: ErrorResponse = {
        code: 'INVALID_JSON',
        message: 'Request body is not valid JSON',
      };
      res.status(400).json(response);
      return;
    }

    if (isBodyParserError(err)) {
      logger.debug({ type: err.type, method: req.method, path: req.path }, 'Rejected request body');
      const response: ErrorResponse = {
        code: BODY_PARSER_CODES[err.type] ?? 'BAD_REQUEST',
        message: err.status === 413 ? 'Request body too large' : 'Request body could not be read',
      };
      res.status(err.status).json(response);
      return;
    }

    if (err instanceof ApplicationError) {
      const level = err.status >= 500 ? 'error' : 'debug';
      logger[level]({ code: err.code, method: req.method, path: req.path }, err.message);

      const response: ErrorResponse = {
        code: err.code,
        message: err.message,
      };
      res.status(err.status).json(response);
      return;
    }

    // Store or hashing failures: log everything, tell the client nothing.
    logger.error({ err, method: req.method, path: req.path }, 'Unhandled error');
    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
