import { hash, verify } from 'argon2';
import { HashingError } from './errors.js';

export interface PasswordHasher {
  hash(plainPassword: string): Promise<string>;
  verify(plainPassword: string, passwordHash: string): Promise<boolean>;
}

// PHC string as produced by argon2: $argon2id$v=19$m=...,t=...,p=...$salt$hash
const ARGON2_PHC = /^\$argon2(?:id|i|d)\$v=\d+\$m=\d+,t=\d+,p=\d+\$[A-Za-z0-9+/]+\$[A-Za-z0-9+/]+$/;

/**
 * Password hashing using Argon2id. The random salt is embedded in the
 * returned hash, so hashing the same password twice gives different output.
 */
export class Password implements PasswordHasher {
  /**
   * Hash a plain text password.
   */
  async hash(plainPassword: string): Promise<string> {
    try {
      return await hash(plainPassword);
    } catch (error) {
      throw new HashingError('Password hashing failed', { cause: error });
    }
  }

  /**
   * Verify a plain password against a stored hash.
   * A mismatch is `false`; a hash that is not an Argon2 PHC string is a
   * `HashingError`.
   */
  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    if (!ARGON2_PHC.test(passwordHash)) {
      throw new HashingError('Stored password hash is not a valid Argon2 hash');
    }

    try {
      return await verify(passwordHash, plainPassword);
    } catch (error) {
      throw new HashingError('Password verification failed', { cause: error });
    }
  }
}
