import {
  ACCESS_TOKEN_TTL_SECONDS,
  DEFAULT_TOKEN_AUDIENCE,
  DEFAULT_TOKEN_ISSUER,
  MIN_JWT_SECRET_LENGTH,
  type AccessTokenConfig,
} from '@payflow/auth';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    DATABASE_URL: z.string().trim().min(1).optional(),
    CORS_ORIGINS: z.string().default('http://localhost:5173'),
    TRUSTED_PROXY_IPS: z.string().default(''),
    JWT_SECRET: z
      .string({ required_error: 'JWT_SECRET is required' })
      .min(MIN_JWT_SECRET_LENGTH, `JWT_SECRET must be at least ${MIN_JWT_SECRET_LENGTH} characters`),
    JWT_ISSUER: z.string().trim().min(1).default(DEFAULT_TOKEN_ISSUER),
    JWT_AUDIENCE: z.string().trim().min(1).default(DEFAULT_TOKEN_AUDIENCE),
    ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(ACCESS_TOKEN_TTL_SECONDS),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV !== 'test' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required',
      });
    }
  });

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ApiConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  databaseUrl: string | null;
  corsOrigins: string[];
  trustedProxyIps: string[];
  accessToken: AccessTokenConfig;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function parseOrigins(value: string): string[] {
  return splitList(value).map((origin) => origin.replace(/\/+$/, ''));
}

/**
 * Parse process environment into typed API configuration
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    databaseUrl: values.DATABASE_URL ?? null,
    corsOrigins: parseOrigins(values.CORS_ORIGINS),
    trustedProxyIps: splitList(values.TRUSTED_PROXY_IPS),
    accessToken: {
      secret: values.JWT_SECRET,
      issuer: values.JWT_ISSUER,
      audience: values.JWT_AUDIENCE,
      ttlSeconds: values.ACCESS_TOKEN_TTL_SECONDS,
    },
    logLevel: values.LOG_LEVEL,
  };
}
