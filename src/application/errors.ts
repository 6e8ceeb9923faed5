/**
 * Application-level errors for HTTP layer mapping.
 * Each carries a stable `code` that is sent to clients as-is.
 */
export abstract class ApplicationError extends Error {
  abstract readonly status: number;

  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class BadRequestError extends ApplicationError {
  readonly status = 400;
}

export class UnauthorizedError extends ApplicationError {
  readonly status = 401;
}

export class NotFoundError extends ApplicationError {
  readonly status = 404;

  constructor(message = 'Resource not found') {
    super('NOT_FOUND', message);
  }
}

export class ValidationError extends ApplicationError {
  readonly status = 422;

  constructor(message = 'Validation failed') {
    super('VALIDATION_ERROR', message);
  }
}

/**
 * An upstream collaborator failed. The message is safe to show to clients.
 */
export class UpstreamError extends ApplicationError {
  readonly status = 502;
}
