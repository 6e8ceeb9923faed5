import type { TokenClaims } from '../../../domain/auth/token.js';

declare global {
  namespace Express {
    interface Request {
      auth?: TokenClaims;
    }
  }
}

export {};
