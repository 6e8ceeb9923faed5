import pg, { type Pool as PgPool } from 'pg';
import { logger as defaultLogger, type Logger } from '../logger.js';

const { Pool } = pg;

export function createPool(
  connectionString: string | undefined,
  logger: Logger = defaultLogger
): PgPool {
  // Connecting is deferred until first use. The server checks DATABASE_URL
  // up front (loadServerConfig); tests pass whatever the environment has.
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database error');
  });

  return pool;
}
