/**
 * Server configuration, read from environment variables.
 */

import { z } from 'zod';
import {
  getDefaultDbPath, LOG_LEVELS, ValidationError, zodErrorToIssues, formatIssues,
  type LogLevel,
} from '@taskboard/core';

export const API_PREFIX = '/api/v1';

export interface ServerConfig {
  appName: string;
  appVersion: string;
  nodeEnv: 'development' | 'production' | 'test';
  /** SQLite file path, or ':memory:' */
  databasePath: string;
  host: string;
  port: number;
  logLevel: LogLevel;
}

const envSchema = z.object({
  APP_NAME: z.string().min(1).default('Taskboard'),
  APP_VERSION: z.string().min(1).default('1.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_PATH: z.string().min(1).optional(),
  API_HOST: z.string().min(1).default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(LOG_LEVELS),
  ).default('info'),
});

/** Parse configuration from `env`; throws ValidationError naming each bad variable */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = zodErrorToIssues(result.error, 'env');
    throw new ValidationError(`Invalid configuration: ${formatIssues(issues)}`, issues);
  }

  const vars = result.data;
  return {
    appName: vars.APP_NAME,
    appVersion: vars.APP_VERSION,
    nodeEnv: vars.NODE_ENV,
    databasePath: vars.DATABASE_PATH ?? getDefaultDbPath(),
    host: vars.API_HOST,
    port: vars.API_PORT,
    logLevel: vars.LOG_LEVEL,
  };
}
