import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { ConfigurationError } from './utils/errors.js';

/**
 * Telegram bot token: "<numeric bot id>:<auth token>"
 */
const botTokenSchema = z
  .string({ required_error: 'TELEGRAM_BOT_TOKEN is required' })
  .regex(
    /^\d{8,}:[A-Za-z0-9_-]{20,}$/,
    'Invalid Telegram bot token format (expected BOTID:AUTH_TOKEN)'
  );

/**
 * "true"/"false" flag; z.coerce.boolean() would read "false" as true
 */
const flagSchema = z
  .enum(['true', 'false'])
  .transform((val) => val === 'true');

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  // Telegram Configuration
  telegram: z.object({
    botToken: botTokenSchema,
    dropPendingUpdates: flagSchema.default('true'),
  }),

  // Registry Configuration
  registry: z.object({
    // Lifetime of every stored request, in seconds (5 minutes default)
    ttlSeconds: z.coerce.number().int().min(1).max(3600).default(300),
    // Background sweep interval, in seconds
    sweepIntervalSeconds: z.coerce.number().int().min(1).max(3600).default(30),
  }),

  // Admin check against getChatMember
  adminCheck: z.object({
    timeoutMs: z.coerce.number().int().min(100).max(60000).default(5000),
    // Circuit breaker reset timeout
    resetMs: z.coerce.number().int().min(1000).max(600000).default(30000),
  }),

  // Logging Configuration
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    // HMAC key for log digests; a random per-process key is used when unset
    digestKey: z.string().min(16, 'LOG_DIGEST_KEY must be at least 16 characters').optional(),
  }),
});

/**
 * Typed configuration object
 */
export interface Config {
  telegram: {
    botToken: string;
    dropPendingUpdates: boolean;
  };
  registry: {
    ttlSeconds: number;
    sweepIntervalSeconds: number;
  };
  adminCheck: {
    timeoutMs: number;
    resetMs: number;
  };
  logging: {
    level: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
    digestKey?: string;
  };
}

/**
 * Parse and validate configuration from environment variables
 *
 * @throws ConfigurationError listing every invalid or missing setting
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const rawConfig = {
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      dropPendingUpdates: env.TELEGRAM_DROP_PENDING_UPDATES,
    },
    registry: {
      ttlSeconds: env.REGISTRATION_TTL_SECONDS,
      sweepIntervalSeconds: env.SWEEP_INTERVAL_SECONDS,
    },
    adminCheck: {
      timeoutMs: env.ADMIN_CHECK_TIMEOUT_MS,
      resetMs: env.ADMIN_CHECK_RESET_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      digestKey: env.LOG_DIGEST_KEY,
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(errors);
  }

  return result.data;
}

/**
 * Load .env files into process.env, then parse it
 */
export function loadConfig(): Config {
  // Load environment variables from .env.local for development
  dotenvConfig({ path: '.env.local' });
  dotenvConfig(); // Fallback to .env

  return parseConfig(process.env);
}

/**
 * Registry TTL in milliseconds
 */
export function getRegistryTtlMs(config: Config): number {
  return config.registry.ttlSeconds * 1000;
}

/**
 * Sweep interval in milliseconds
 */
export function getSweepIntervalMs(config: Config): number {
  return config.registry.sweepIntervalSeconds * 1000;
}
