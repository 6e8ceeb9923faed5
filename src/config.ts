import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export interface TokenConfig {
  readonly secret: string;
  readonly ttlSeconds: number;
  readonly algorithm: 'HS256';
}

export interface AppConfig {
  readonly port: number;
  readonly databaseUrl: string | undefined;
  readonly logLevel: string;
  readonly token: TokenConfig;
  readonly summaries: {
    readonly apiKey: string | undefined;
    readonly model: string;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_TTL_SECONDS: z.coerce.number().int().positive().default(30 * 60),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  OPENAI_API_KEY: z.string().min(1).optional(),
  SUMMARY_MODEL: z.string().min(1).default('gpt-4o-mini'),
});

/**
 * Connection string for scripts that only need the database.
 */
export function loadDatabaseUrl(env: NodeJS.ProcessEnv = process.env): string {
  const url = env.DATABASE_URL;
  if (!url) {
    throw new ConfigError(['DATABASE_URL: Required']);
  }
  return url;
}

/**
 * Build the process-wide configuration from environment variables.
 * The result is frozen; callers pass pieces of it down explicitly.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  const vars = parsed.data;
  return Object.freeze({
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    logLevel: vars.LOG_LEVEL,
    token: Object.freeze({
      secret: vars.JWT_SECRET,
      ttlSeconds: vars.JWT_TTL_SECONDS,
      algorithm: 'HS256' as const,
    }),
    summaries: Object.freeze({
      apiKey: vars.OPENAI_API_KEY,
      model: vars.SUMMARY_MODEL,
    }),
  });
}

export interface ServerConfig extends AppConfig {
  readonly databaseUrl: string;
}

/**
 * Configuration for the HTTP server, which cannot run without a database.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const config = loadConfig(env);
  const databaseUrl = loadDatabaseUrl(env);
  return Object.freeze({ ...config, databaseUrl });
}
