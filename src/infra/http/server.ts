import { loadServerConfig } from '../../config.js';
import { Password } from '../../domain/auth/password.js';
import { TokenCodec } from '../../domain/auth/token.js';
import { createPool } from '../db/pool.js';
import { PgUserSessions } from '../db/userRepo.js';
import { AiSummarizer } from '../llm/aiSummarizer.js';
import { createLogger } from '../logger.js';
import { createApp } from './app.js';

const config = loadServerConfig();
const logger = createLogger({ level: config.logLevel });
const pool = createPool(config.databaseUrl, logger);

const app = createApp({
  sessions: new PgUserSessions(pool),
  hasher: new Password(),
  tokens: new TokenCodec(config.token),
  summarizer: new AiSummarizer(config.summaries, logger),
  logger,
  healthCheck: () => pool.query('SELECT 1'),
});

const server = app.listen(config.port, () => {
  logger.info(`Server running on http://localhost:${config.port}`);
  logger.info(`API docs: http://localhost:${config.port}/docs`);
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  server.close(() => {
    pool
      .end()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Failed to close database pool');
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
