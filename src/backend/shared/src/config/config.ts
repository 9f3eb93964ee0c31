/**
 * Configuration
 *
 * Reads process configuration from environment variables. Every variable has
 * a default except CHECKFIX_API_KEY; without it the deterministic stub
 * verification client is wired in.
 *
 * @tested tests/property/config.property.test.ts
 */

import { z } from 'zod';
import { LogLevel, LogLevelSchema } from '../logging/logger.js';
import { ErrorCode, ValidationError } from '../models/errors.js';
import { formatZodIssues } from '../models/validation.js';

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true' || value === '1'));

export const EnvironmentSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: LogLevelSchema.default(LogLevel.INFO),
  SKIP_AUTH: booleanFlag(false),
  AUTH_AUDIENCE: z.string().min(1).default('api://supplier-compliance'),
  AUTH_ISSUER_TENANT: z.string().min(1).default('default-tenant'),
  CHECKFIX_API_URL: z.string().url().default('https://api.checkfix.io'),
  CHECKFIX_API_KEY: z.string().min(1).optional(),
  CHECKFIX_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  REMINDER_DAYS_BEFORE: z.coerce.number().int().min(0).default(7),
  ENABLE_SWAGGER: booleanFlag(true),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

export interface AppConfig {
  port: number;
  nodeEnv: Environment['NODE_ENV'];
  logLevel: LogLevel;
  auth: {
    audience: string;
    tenantId: string;
    skipAuth: boolean;
  };
  checkfix: {
    baseUrl: string;
    apiKey?: string;
    timeoutMs: number;
  };
  reminderDaysBefore: number;
  enableSwagger: boolean;
}

/**
 * Parses configuration from an environment map.
 * Empty strings are treated as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = EnvironmentSchema.safeParse(present);
  if (!result.success) {
    const details = formatZodIssues(result.error);
    throw new ValidationError(
      ErrorCode.INVALID_CONFIG,
      `Invalid configuration: ${details.map((d) => d.field).join(', ')}`,
      details
    );
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    auth: {
      audience: parsed.AUTH_AUDIENCE,
      tenantId: parsed.AUTH_ISSUER_TENANT,
      skipAuth: parsed.SKIP_AUTH,
    },
    checkfix: {
      baseUrl: parsed.CHECKFIX_API_URL.replace(/\/+$/, ''),
      apiKey: parsed.CHECKFIX_API_KEY,
      timeoutMs: parsed.CHECKFIX_TIMEOUT_MS,
    },
    reminderDaysBefore: parsed.REMINDER_DAYS_BEFORE,
    enableSwagger: parsed.ENABLE_SWAGGER,
  };
}
