import { describe, it, expect } from 'vitest';
import { AuthenticateUseCase, extractBearerToken } from '../authenticate.js';
import {
  InvalidOrExpiredTokenError,
  MalformedAuthorizationError,
  MissingAuthorizationError,
} from '../errors.js';
import { TokenCodec } from '../../../domain/auth/token.js';

describe('extractBearerToken', () => {
  it('should return the token segment', () => {
    expect(extractBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
  });

  it('should match the scheme case-insensitively', () => {
    expect(extractBearerToken('bearer abc')).toBe('abc');
    expect(extractBearerToken('BEARER abc')).toBe('abc');
  });

  it('should treat an absent or blank header as missing', () => {
    expect(() => extractBearerToken(undefined)).toThrow(MissingAuthorizationError);
    expect(() => extractBearerToken('')).toThrow(MissingAuthorizationError);
    expect(() => extractBearerToken('   ')).toThrow(MissingAuthorizationError);
  });

  it('should reject other schemes and empty tokens as malformed', () => {
    expect(() => extractBearerToken('Token xyz')).toThrow(MalformedAuthorizationError);
    expect(() => extractBearerToken('Basic dXNlcjpwYXNz')).toThrow(MalformedAuthorizationError);
    expect(() => extractBearerToken('Bearer')).toThrow(MalformedAuthorizationError);
    expect(() => extractBearerToken('Bearer ')).toThrow(MalformedAuthorizationError);
    expect(() => extractBearerToken('Bearer a b')).toThrow(MalformedAuthorizationError);
  });
});

describe('AuthenticateUseCase', () => {
  const codec = new TokenCodec({
    secret: 'test-secret-0123456789',
    ttlSeconds: 60,
    algorithm: 'HS256',
  });
  const useCase = new AuthenticateUseCase(codec);

  it('should return the claims of a valid token', () => {
    const token = codec.issue({ subject: 'a@x.com', userId: 'user-1' });

    const claims = useCase.execute(`Bearer ${token}`);

    expect(claims.subject).toBe('a@x.com');
    expect(claims.userId).toBe('user-1');
  });

  it('should reject an invalid token', () => {
    expect(() => useCase.execute('Bearer not-a-token')).toThrow(InvalidOrExpiredTokenError);
  });
});
