import { BadRequestError, UnauthorizedError } from '../errors.js';

export class DuplicateEmailError extends BadRequestError {
  constructor(message = 'Email already registered.') {
    super('DUPLICATE_EMAIL', message);
  }
}

/**
 * Raised for both an unknown email and a wrong password, so the login
 * endpoint does not reveal which emails are registered.
 */
export class InvalidCredentialsError extends UnauthorizedError {
  constructor(message = 'Invalid email or password') {
    super('INVALID_CREDENTIALS', message);
  }
}

export class MissingAuthorizationError extends UnauthorizedError {
  constructor(message = 'Missing authorization header') {
    super('MISSING_AUTHORIZATION', message);
  }
}

export class MalformedAuthorizationError extends UnauthorizedError {
  constructor(message = 'Authorization header must be "Bearer <token>"') {
    super('MALFORMED_AUTHORIZATION', message);
  }
}

export class InvalidOrExpiredTokenError extends UnauthorizedError {
  constructor(message = 'Invalid or expired token') {
    super('INVALID_OR_EXPIRED_TOKEN', message);
  }
}

export class UserNotFoundError extends UnauthorizedError {
  constructor(message = 'User not found') {
    super('USER_NOT_FOUND', message);
  }
}
