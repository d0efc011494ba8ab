import { z } from 'zod';
import { ConfigurationError } from './domain/index.js';

const optionalString = z.string().trim().min(1).optional();

const envSchema = z.object({
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.string().url().optional(),
  REDIS_URL: z.string().url().optional(),
  HEARTBEAT_CHECK_INTERVAL: z.coerce.number().int().positive().default(30),
  HEARTBEAT_STALE_THRESHOLD: z.coerce.number().int().positive().default(60),
  COLLABORATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  NOTIFICATIONS_CONFIG: optionalString,
});

export interface AppConfig {
  host: string;
  port: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  databaseUrl: string | undefined;
  redisUrl: string | undefined;
  checkIntervalMs: number;
  staleThresholdMs: number;
  collaboratorTimeoutMs: number;
  notificationsConfigPath: string | undefined;
}

/**
 * Reads the process configuration from environment variables.
 *
 * Empty strings count as unset. Interval and threshold are given in
 * seconds and returned in milliseconds. Throws ConfigurationError listing
 * every invalid variable.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = Object.fromEntries(
    Object.keys(envSchema.shape).map((key) => [key, env[key] === '' ? undefined : env[key]]),
  );

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Bad config: ${issues}`);
  }

  const data = result.data;
  return {
    host: data.HOST,
    port: data.PORT,
    logLevel: data.LOG_LEVEL,
    databaseUrl: data.DATABASE_URL,
    redisUrl: data.REDIS_URL,
    checkIntervalMs: data.HEARTBEAT_CHECK_INTERVAL * 1000,
    staleThresholdMs: data.HEARTBEAT_STALE_THRESHOLD * 1000,
    collaboratorTimeoutMs: data.COLLABORATOR_TIMEOUT_MS,
    notificationsConfigPath: data.NOTIFICATIONS_CONFIG,
  };
}
