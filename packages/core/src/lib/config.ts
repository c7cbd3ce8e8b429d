import { z } from 'zod';
import { REASSIGN_ADMIN_CHECKS, type ReassignAdminCheck } from '@ticketdesk/types';
import { ConfigurationError } from './errors';
import { isLogLevel, type LogLevel } from './logger';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.string().refine(isLogLevel, 'Unknown log level').default('info'),
  DATABASE_URL: z.string().url().optional(),
  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  DB_NAME: z.string().min(1).default('ticketdesk'),
  DB_USER: z.string().min(1).default('ticketdesk'),
  DB_PASSWORD: z.string().optional(),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  REASSIGN_ADMIN_CHECK: z.enum(REASSIGN_ADMIN_CHECKS).default('assignee'),
});

export interface DatabaseSettings {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  poolMax: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  host: string;
  logLevel: LogLevel;
  database: DatabaseSettings;
  tickets: {
    reassignAdminCheck: ReassignAdminCheck;
  };
}

/**
 * Reads and validates configuration from an environment map. Empty strings
 * count as unset so `.env` placeholders fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const parsed = result.data;

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    database: {
      connectionString: parsed.DATABASE_URL,
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      database: parsed.DB_NAME,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD,
      poolMax: parsed.DB_POOL_MAX,
    },
    tickets: {
      reassignAdminCheck: parsed.REASSIGN_ADMIN_CHECK,
    },
  };
}
