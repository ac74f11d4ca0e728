import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';
import { DEFAULT_SESSION_KEY_PREFIX, DEFAULT_SESSION_TIMEOUT_SECONDS } from './session-store.js';
import { DEFAULT_SHIPPING_FAULT_USER_ID } from './steps/index.js';

/**
 * Environment variables read by {@link loadConfig}.
 */
const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

    // Session storage
    SESSION_BACKEND: z.enum(['memory', 'redis', 'postgres']).default('memory'),
    SESSION_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(DEFAULT_SESSION_TIMEOUT_SECONDS),
    SESSION_KEY_PREFIX: z.string().default(DEFAULT_SESSION_KEY_PREFIX),
    REDIS_URL: z.string().url().default('redis://localhost:6379'),
    DATABASE_URL: z.string().url().optional(),

    // Pipeline behaviour
    STEP_LATENCY_MS: z.coerce.number().int().nonnegative().default(0),
    SHIPPING_FAULT_USER_ID: z.string().min(1).default(DEFAULT_SHIPPING_FAULT_USER_ID),
  })
  .refine((env) => env.SESSION_BACKEND !== 'postgres' || env.DATABASE_URL !== undefined, {
    message: 'DATABASE_URL is required when SESSION_BACKEND is "postgres"',
    path: ['DATABASE_URL'],
  });

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Thrown when the environment does not satisfy the config schema.
 */
export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse and validate configuration from `env`.
 * @throws {@link ConfigError}
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  return parsed.data;
}
