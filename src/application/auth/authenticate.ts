import type { TokenClaims, TokenCodec } from '../../domain/auth/token.js';
import {
  InvalidOrExpiredTokenError,
  MalformedAuthorizationError,
  MissingAuthorizationError,
} from './errors.js';

/**
 * Pull the token out of an `Authorization: Bearer <token>` header value.
 * The scheme is matched case-insensitively.
 */
export function extractBearerToken(header: string | undefined): string {
  if (header === undefined || header.trim() === '') {
    throw new MissingAuthorizationError();
  }

  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    throw new MalformedAuthorizationError();
  }

  return parts[1];
}

/**
 * Turns an Authorization header into verified token claims.
 * Does not touch the credential store; resolving the user is up to the
 * caller.
 */
export class AuthenticateUseCase {
  constructor(private tokens: TokenCodec) {}

  execute(authorizationHeader: string | undefined): TokenClaims {
    const token = extractBearerToken(authorizationHeader);

    const claims = this.tokens.validate(token);
    if (!claims) {
      throw new InvalidOrExpiredTokenError();
    }

    return claims;
  }
}
