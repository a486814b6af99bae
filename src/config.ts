// Central configuration for the todo API.
// Built once at startup from the environment and passed to whatever needs it.

import { z } from 'zod';
import { ConfigError } from './utils/errors.js';
import type { LogThreshold } from './utils/logger.js';

export const SIGNING_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

export const MIN_PRODUCTION_SECRET_LENGTH = 32;

export interface AppConfig {
  readonly appName: string;
  readonly nodeEnv: 'development' | 'production' | 'test';
  readonly port: number;
  readonly secretKey: string;
  readonly algorithm: SigningAlgorithm;
  readonly accessTokenTtlMinutes: number;
  readonly databaseUrl: string;
  readonly bcryptRounds: number;
  readonly corsOrigins: readonly string[];
  readonly loginRateLimit: number;
  readonly logLevel: LogThreshold;
}

const EnvSchema = z
  .object({
    SECRET_KEY: z.string().min(1, 'must not be empty'),
    JWT_ALGORITHM: z.enum(SIGNING_ALGORITHMS).default('HS256'),
    ACCESS_TOKEN_TTL_MINUTES: z.coerce.number().int().positive().default(30),
    DATABASE_URL: z.string().min(1).default('sqlite:///./data/todo.db'),
    BCRYPT_ROUNDS: z.coerce.number().int().max(31).default(10),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    CORS_ORIGINS: z.string().default('http://localhost:3000,http://localhost:8080'),
    LOGIN_RATE_LIMIT: z.coerce.number().int().positive().default(5),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    APP_NAME: z.string().min(1).default('Todo API'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && env.SECRET_KEY.length < MIN_PRODUCTION_SECRET_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SECRET_KEY'],
        message: `must be at least ${MIN_PRODUCTION_SECRET_LENGTH} characters in production`,
      });
    }
  });

/**
 * Split a comma-separated origin list, dropping blanks
 */
const parseOrigins = (value: string): string[] => {
  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
};

/**
 * Load and validate configuration from environment variables.
 * @throws ConfigError listing every invalid or missing variable
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;

  return Object.freeze({
    appName: parsed.APP_NAME,
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    secretKey: parsed.SECRET_KEY,
    algorithm: parsed.JWT_ALGORITHM,
    accessTokenTtlMinutes: parsed.ACCESS_TOKEN_TTL_MINUTES,
    databaseUrl: parsed.DATABASE_URL,
    bcryptRounds: parsed.BCRYPT_ROUNDS,
    corsOrigins: Object.freeze(parseOrigins(parsed.CORS_ORIGINS)),
    loginRateLimit: parsed.LOGIN_RATE_LIMIT,
    logLevel: parsed.LOG_LEVEL,
  });
};
