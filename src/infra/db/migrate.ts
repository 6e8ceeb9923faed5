import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import type { Pool } from 'pg';
import { loadDatabaseUrl } from '../../config.js';
import { logger } from '../logger.js';
import { createPool } from './pool.js';

const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

interface Migration {
  filename: string;
  version: number;
}

function parseMigrationFilenames(files: string[]): Migration[] {
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: Pool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(pool: Pool, migration: Migration): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
    await client.query('COMMIT');
    logger.info({ version: migration.version, filename: migration.filename }, 'Applied migration');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

async function migrate(pool: Pool): Promise<number> {
  await ensureMigrationsTable(pool);
  const migrations = parseMigrationFilenames(await readdir(MIGRATIONS_DIR));
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));
  for (const migration of pending) {
    await applyMigration(pool, migration);
  }
  return pending.length;
}

async function main(): Promise<void> {
  const pool = createPool(loadDatabaseUrl());
  try {
    const count = await migrate(pool);
    logger.info({ count }, count === 0 ? 'No pending migrations' : 'Migrations applied');
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Migration failed');
  process.exitCode = 1;
});
