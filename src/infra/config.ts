import { z } from 'zod';
import { ConfigurationError } from '../application/errors.js';

export const SIGNING_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

export interface AuthConfig {
  readonly secret: string;
  readonly algorithm: SigningAlgorithm;
  readonly accessTokenTtlMinutes: number;
  readonly refreshTokenTtlDays: number;
}

export interface AdminWhitelistConfig {
  readonly emails: readonly string[];
  readonly domains: readonly string[];
}

export interface RateLimitConfig {
  readonly perMinute: number;
  readonly loginPerMinute: number;
}

export interface AppConfig {
  readonly port: number;
  readonly databaseUrl?: string;
  readonly auth: AuthConfig;
  readonly adminWhitelist: AdminWhitelistConfig;
  readonly rateLimit: RateLimitConfig;
}

const csv = z
  .string()
  .optional()
  .transform((val) =>
    (val ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

const envSchema = z.object({
  JWT_SECRET: z
    .string({ required_error: 'JWT_SECRET environment variable is required' })
    .min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_ALGORITHM: z.enum(SIGNING_ALGORITHMS).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60),
  REFRESH_TOKEN_EXPIRE_DAYS: z.coerce.number().int().positive().default(14),
  ADMIN_EMAILS: csv,
  ADMIN_EMAIL_DOMAINS: csv,
  DATABASE_URL: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
  LOGIN_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(10),
});

/**
 * Build the process configuration from environment variables.
 *
 * Called once at startup; the result is frozen and handed to every component
 * that needs it. Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  const config: AppConfig = {
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    auth: Object.freeze({
      secret: vars.JWT_SECRET,
      algorithm: vars.JWT_ALGORITHM,
      accessTokenTtlMinutes: vars.ACCESS_TOKEN_EXPIRE_MINUTES,
      refreshTokenTtlDays: vars.REFRESH_TOKEN_EXPIRE_DAYS,
    }),
    adminWhitelist: Object.freeze({
      emails: Object.freeze(vars.ADMIN_EMAILS),
      domains: Object.freeze(vars.ADMIN_EMAIL_DOMAINS),
    }),
    rateLimit: Object.freeze({
      perMinute: vars.RATE_LIMIT_PER_MINUTE,
      loginPerMinute: vars.LOGIN_RATE_LIMIT_PER_MINUTE,
    }),
  };

  return Object.freeze(config);
}
