// This module loads and validates runtime configuration from environment variables.

import { z } from 'zod';
import { DomainError } from '../errors/model.js';
import type { LogLevel } from '../utils/logger.js';

const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  AUTH_REQUIRED: booleanFlagSchema,
  CONCAT_MAX_LENGTH: z.coerce.number().int().positive().default(10),
  BODY_LIMIT: z.coerce.number().int().positive().default(1024 * 1024)
});

export interface AppConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  authRequired: boolean;
  concatMaxLength: number;
  bodyLimit: number;
}

// This function validates environment input and reports every offending variable at once.
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new DomainError(
      'invalid_config',
      'Invalid configuration.',
      parsed.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message
      }))
    );
  }

  return {
    host: parsed.data.HOST,
    port: parsed.data.PORT,
    logLevel: parsed.data.LOG_LEVEL,
    authRequired: parsed.data.AUTH_REQUIRED,
    concatMaxLength: parsed.data.CONCAT_MAX_LENGTH,
    bodyLimit: parsed.data.BODY_LIMIT
  };
}
