import * as os from 'node:os';
import * as path from 'node:path';
import type { LogLevel } from '@nestjs/common';
import { z } from 'zod';

/** Treat `KEY=` lines in .env files as unset so defaults apply. */
const emptyAsUndefined = (value: unknown): unknown =>
  value === '' ? undefined : value;

const flag = (fallback: boolean) =>
  z.preprocess(
    emptyAsUndefined,
    z
      .enum(['true', 'false', '1', '0'])
      .default(fallback ? 'true' : 'false')
      .transform((value) => value === 'true' || value === '1'),
  );

const positiveInt = (fallback: number) =>
  z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().positive().default(fallback),
  );

const text = (fallback: string) =>
  z.preprocess(emptyAsUndefined, z.string().default(fallback));

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

export const UPDATE_PLATFORMS = ['windows', 'linux', 'macos'] as const;

export function defaultDatabasePath(): string {
  return path.join(os.homedir(), '.quality-system', 'quality-system.db');
}

/**
 * Environment schema
 *
 * Every key has a default so the desktop build starts without a .env file.
 * Values arrive as strings from process.env and are coerced here once;
 * services read them back through ConfigService with `{ infer: true }`.
 */
export const environmentSchema = z.object({
  NODE_ENV: z.preprocess(
    emptyAsUndefined,
    z.enum(['development', 'production', 'test']).default('development'),
  ),
  PORT: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().min(1).max(65535).default(3000),
  ),
  LOG_LEVEL: z.preprocess(emptyAsUndefined, z.enum(LOG_LEVELS).default('log')),
  CORS_ORIGIN: text('http://localhost:5173'),

  DB_PATH: text(defaultDatabasePath()),
  DB_SYNCHRONIZE: flag(true),
  DB_LOGGING: flag(false),

  APP_VERSION: text('1.0.0'),
  UPDATE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  UPDATE_CHECK_TIMEOUT_MS: positiveInt(5000),
  UPDATE_INSTALL_TARGET: text(process.execPath),
  UPDATE_DOWNLOAD_DIR: text(os.tmpdir()),
  UPDATE_PLATFORM: z.preprocess(
    emptyAsUndefined,
    z.enum(UPDATE_PLATFORMS).optional(),
  ),

  STATISTICS_MAX_RECORDS: positiveInt(100),
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * ConfigModule `validate` hook.
 * Throws on the first start-up with every offending key listed.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Environment {
  const result = environmentSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Expand a minimum level into the list Nest's logger expects.
 * `fatal` is always kept.
 */
export function resolveLogLevels(level: Environment['LOG_LEVEL']): LogLevel[] {
  const index = LOG_LEVELS.indexOf(level);
  return ['fatal', ...LOG_LEVELS.slice(0, index + 1)];
}
