import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from './errors';

const DEFAULT_PORT = 5000;
const DEFAULT_DB_PORT = 5432;

const intFromEnv = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(
    (v) => (typeof v === 'string' ? (v.trim() === '' ? undefined : Number(v)) : v),
    z.number().int().min(min).max(max).default(fallback),
  );

const required = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} must not be empty`);

const envSchema = z.object({
  PORT: intFromEnv(DEFAULT_PORT, 1, 65535),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DB_HOST: required('DB_HOST'),
  DB_PORT: intFromEnv(DEFAULT_DB_PORT, 1, 65535),
  DB_USER: required('DB_USER'),
  DB_PASSWORD: required('DB_PASSWORD'),
  DB_NAME: required('DB_NAME'),
  // cold-start window: 30 attempts, 1s apart
  DB_CONNECT_ATTEMPTS: intFromEnv(30, 1),
  DB_CONNECT_INTERVAL_MS: intFromEnv(1000, 0),
  DB_CONNECT_TIMEOUT_MS: intFromEnv(5000, 1),
  // kept short so a probe answers inside the orchestrator's 10s timeout
  HEALTH_CONNECT_ATTEMPTS: intFromEnv(3, 1),
  HEALTH_CONNECT_TIMEOUT_MS: intFromEnv(2000, 1),
});

/** The orchestrator gives up on a `/health` call after this long. */
export const HEALTH_PROBE_TIMEOUT_MS = 10_000;

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface RetryPolicy {
  maxAttempts: number;
  intervalMs: number;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  connectTimeoutMs: number;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  db: DatabaseConfig;
  connectRetry: RetryPolicy;
  healthRetry: RetryPolicy;
  healthConnectTimeoutMs: number;
}

/** Longest a health probe can take against a database that accepts TCP but never answers. */
export function healthProbeBoundMs(config: Pick<AppConfig, 'healthRetry' | 'healthConnectTimeoutMs'>): number {
  const { maxAttempts, intervalMs } = config.healthRetry;
  return maxAttempts * config.healthConnectTimeoutMs + (maxAttempts - 1) * intervalMs;
}

/**
 * Parses process configuration once at boot. Every DB_* connection setting
 * must be present and non-empty; anything else falls back to a default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  const config: AppConfig = {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    db: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      database: e.DB_NAME,
      connectTimeoutMs: e.DB_CONNECT_TIMEOUT_MS,
    },
    connectRetry: {
      maxAttempts: e.DB_CONNECT_ATTEMPTS,
      intervalMs: e.DB_CONNECT_INTERVAL_MS,
    },
    healthRetry: {
      maxAttempts: e.HEALTH_CONNECT_ATTEMPTS,
      intervalMs: e.DB_CONNECT_INTERVAL_MS,
    },
    healthConnectTimeoutMs: e.HEALTH_CONNECT_TIMEOUT_MS,
  };

  const bound = healthProbeBoundMs(config);
  if (bound >= HEALTH_PROBE_TIMEOUT_MS) {
    throw new ConfigError([
      `HEALTH_CONNECT_ATTEMPTS x HEALTH_CONNECT_TIMEOUT_MS plus intervals is ${bound}ms; it must stay under ${HEALTH_PROBE_TIMEOUT_MS}ms`,
    ]);
  }
  return config;
}
