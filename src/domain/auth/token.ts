import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { TokenConfig } from '../../config.js';

export interface TokenSubject {
  subject: string;
  userId: string;
}

export interface TokenClaims extends TokenSubject {
  /** Seconds since epoch. */
  issuedAt: number;
  /** Seconds since epoch; the token is valid strictly before this instant. */
  expiresAt: number;
}

export type Clock = () => number;

const payloadSchema = z.object({
  sub: z.string().min(1),
  user_id: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

/**
 * Issues and validates signed bearer tokens (JWT, HMAC).
 *
 * Tokens are self-contained: validity depends only on the signature and
 * the `exp` claim, so there is nothing to store or revoke.
 */
export class TokenCodec {
  constructor(
    private readonly config: TokenConfig,
    private readonly clock: Clock = Date.now
  ) {}

  issue(claims: TokenSubject): string {
    const issuedAt = this.nowSeconds();
    return jwt.sign(
      {
        sub: claims.subject,
        user_id: claims.userId,
        iat: issuedAt,
        exp: issuedAt + this.config.ttlSeconds,
      },
      this.config.secret,
      { algorithm: this.config.algorithm }
    );
  }

  /**
   * Returns the claims of a well-formed, correctly signed, unexpired token,
   * or null otherwise.
   */
  validate(token: string): TokenClaims | null {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.secret, {
        algorithms: [this.config.algorithm],
        clockTimestamp: this.nowSeconds(),
      });
    } catch {
      return null;
    }

    const payload = payloadSchema.safeParse(decoded);
    if (!payload.success) {
      return null;
    }

    return {
      subject: payload.data.sub,
      userId: payload.data.user_id,
      issuedAt: payload.data.iat,
      expiresAt: payload.data.exp,
    };
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }
}
