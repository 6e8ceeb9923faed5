import type { NextFunction, Request, Response } from 'express';
import type { AuthenticateUseCase } from '../../../application/auth/authenticate.js';
import { MissingAuthorizationError } from '../../../application/auth/errors.js';
import type { TokenClaims } from '../../../domain/auth/token.js';

/**
 * Verify the bearer token and attach its claims as `req.auth`.
 * Failures go to the error handler as 401s.
 */
export function authMiddleware(authenticate: AuthenticateUseCase) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      req.auth = authenticate.execute(req.headers.authorization);
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function requireAuth(req: Request): TokenClaims {
  if (!req.auth) {
    throw new MissingAuthorizationError();
  }
  return req.auth;
}
