import { z } from 'zod';
import { ValidationError } from '../errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  FRONTEND_URL: z.string().url().default('http://localhost:5173'),
  MAX_SCENARIO_LENGTH: z.coerce.number().int().positive().max(10_000).default(500),
  PREVENT_DUPLICATE_VOTES: booleanFlag.default('true'),
  STORAGE_DRIVER: z.enum(['memory', 'redis']).default('memory'),
  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  REDIS_KEY_PREFIX: z.string().min(1).default('classvote:'),
  ADMIN_PASSWORD: z.string().optional(),
});

export type StorageDriver = z.infer<typeof envSchema>['STORAGE_DRIVER'];

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
  db: number;
  keyPrefix: string;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  frontendUrl: string;
  maxScenarioLength: number;
  preventDuplicateVotes: boolean;
  storageDriver: StorageDriver;
  redis: RedisConfig;
  /** null disables the admin reset endpoint */
  adminPassword: string | null;
}

let cachedConfig: AppConfig | undefined;

/**
 * Parse application settings from the given environment.
 * Empty strings count as unset so `.env` templates with blank values fall back to defaults.
 * Throws ValidationError naming every invalid variable.
 */
export function parseAppConfig(env: Record<string, string | undefined>): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const invalid = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    throw new ValidationError(
      `Invalid configuration. Check environment variables: ${invalid.join(', ')}`,
      { invalid }
    );
  }

  const vars = result.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    frontendUrl: vars.FRONTEND_URL,
    maxScenarioLength: vars.MAX_SCENARIO_LENGTH,
    preventDuplicateVotes: vars.PREVENT_DUPLICATE_VOTES,
    storageDriver: vars.STORAGE_DRIVER,
    redis: {
      host: vars.REDIS_HOST,
      port: vars.REDIS_PORT,
      password: vars.REDIS_PASSWORD,
      db: vars.REDIS_DB,
      keyPrefix: vars.REDIS_KEY_PREFIX,
    },
    adminPassword: vars.ADMIN_PASSWORD ?? null,
  };
}

/**
 * Validated config from process.env, parsed once.
 */
export function getAppConfig(): AppConfig {
  if (cachedConfig === undefined) {
    cachedConfig = parseAppConfig(process.env);
  }
  return cachedConfig;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetAppConfigCache(): void {
  cachedConfig = undefined;
}
