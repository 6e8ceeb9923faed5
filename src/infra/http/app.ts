import express from 'express';
import type { PasswordHasher } from '../../domain/auth/password.js';
import type { TokenCodec } from '../../domain/auth/token.js';
import type { UserSessions } from '../../domain/auth/user.js';
import type { Summarizer } from '../../domain/summaries/summarizer.js';
import type { Logger } from '../logger.js';
import { createAuthRoutes } from './routes/auth.js';
import { createSummaryRoutes } from './routes/summaries.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { notFoundHandler } from './middleware/notFound.js';

export interface AppDependencies {
  sessions: UserSessions;
  hasher: PasswordHasher;
  tokens: TokenCodec;
  summarizer: Summarizer;
  logger: Logger;
  /** Resolves when the backing store is reachable. */
  healthCheck: () => Promise<unknown>;
  /** Largest accepted JSON body, in express.json() notation. */
  bodyLimit?: string;
}

export const DEFAULT_BODY_LIMIT = '1mb';

const HEALTH_CHECK_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.use(express.json({ limit: deps.bodyLimit ?? DEFAULT_BODY_LIMIT }));

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(deps.healthCheck(), HEALTH_CHECK_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((err: unknown) => {
        deps.logger.warn({ err }, 'Health check failed');
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(createSwaggerRoutes());

  app.use(
    '/auth',
    createAuthRoutes({ sessions: deps.sessions, hasher: deps.hasher, tokens: deps.tokens })
  );
  app.use('/summaries', createSummaryRoutes(deps.summarizer, deps.logger));

  app.use(notFoundHandler);
  // Error handler (must be last)
  app.use(errorHandler(deps.logger));

  return app;
}
