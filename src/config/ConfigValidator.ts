// src/config/ConfigValidator.ts

import { z } from 'zod';

// Token Store Configuration Schema
const TokenStoreConfigSchema = z
  .object({
    backend: z.enum(['memory', 'redis', 'postgres'], {
      errorMap: () => ({ message: "Token store backend must be 'memory', 'redis', or 'postgres'" }),
    }),
    url: z.string().url().optional(),
    namespace: z.string().min(1).optional(),
    encryption: z
      .object({
        key: z
          .string()
          .length(64, 'Encryption key must be exactly 64 characters')
          .regex(
            /^[0-9a-f]{64}$/i,
            'Encryption key must be a valid 32-byte hexadecimal string (0-9, a-f)'
          ),
        previousKeys: z.array(z.string()).optional(),
        algorithm: z.literal('aes-256-gcm'),
      })
      .optional(),
  })
  .refine((data) => data.backend === 'memory' || Boolean(data.url), {
    message: "Redis and Postgres backends require 'url' configuration",
  });

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .optional();

// Complete client configuration schema
export const RedditConfigSchema = z
  .object({
    clientId: z.string().min(1, 'clientId is required'),
    // null marks an installed app, which has no secret
    clientSecret: z.string().min(1).nullable(),
    userAgent: z.string().min(1, 'userAgent is required'),
    redirectUri: z.string().url().optional(),
    username: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    refreshToken: z.string().min(1).optional(),
    validateOnSubmit: z.boolean().default(false),
    oauthUrl: z.string().url().default('https://oauth.reddit.com'),
    redditUrl: z.string().url().default('https://www.reddit.com'),
    timeout: z.number().positive().default(16000),
    tokenStore: TokenStoreConfigSchema.default({ backend: 'memory' }),
    logging: LoggerConfigSchema,
    metrics: MetricsConfigSchema,
  })
  .refine((data) => Boolean(data.username) === Boolean(data.password), {
    message: 'username and password must be provided together',
    path: ['password'],
  })
  .refine((data) => !data.username || data.clientSecret !== null, {
    message: 'Script applications require a clientSecret',
    path: ['clientSecret'],
  });

export type RedditConfig = z.input<typeof RedditConfigSchema>;
export type RedditSettings = z.output<typeof RedditConfigSchema>;
export type TokenStoreConfig = z.output<typeof TokenStoreConfigSchema>;

/**
 * Validate client configuration
 *
 * @returns Validated configuration with defaults applied
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): RedditSettings {
  return RedditConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: RedditSettings } | { success: false; errors: string[] } {
  const result = RedditConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}

/**
 * Build a configuration from REDDIT_* environment variables.
 * Explicit overrides win over the environment.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<RedditConfig> = {}
): RedditConfig {
  const fromEnv: Partial<RedditConfig> = {};
  if (env.REDDIT_CLIENT_ID) fromEnv.clientId = env.REDDIT_CLIENT_ID;
  if (env.REDDIT_USER_AGENT) fromEnv.userAgent = env.REDDIT_USER_AGENT;
  if (env.REDDIT_REDIRECT_URI) fromEnv.redirectUri = env.REDDIT_REDIRECT_URI;
  if (env.REDDIT_USERNAME) fromEnv.username = env.REDDIT_USERNAME;
  if (env.REDDIT_PASSWORD) fromEnv.password = env.REDDIT_PASSWORD;
  if (env.REDDIT_REFRESH_TOKEN) fromEnv.refreshToken = env.REDDIT_REFRESH_TOKEN;

  return {
    clientId: '',
    userAgent: '',
    ...fromEnv,
    clientSecret: env.REDDIT_CLIENT_SECRET ? env.REDDIT_CLIENT_SECRET : null,
    ...overrides,
  };
}
