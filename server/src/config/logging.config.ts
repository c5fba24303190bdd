/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

import { z } from 'zod';
import { loadDotenv } from './dotenv.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

const LogLevelSchema = z.enum(LOG_LEVELS);

export function getLoggingConfig(env: NodeJS.ProcessEnv = loadDotenv()): LoggingConfig {
  const nodeEnv = env.NODE_ENV || 'development';
  const isDev = nodeEnv === 'development';

  // Tests stay quiet unless LOG_LEVEL asks otherwise
  const parsedLevel = LogLevelSchema.safeParse(env.LOG_LEVEL);
  const level: LogLevel = parsedLevel.success
    ? parsedLevel.data
    : nodeEnv === 'test' ? 'silent' : 'info';

  const rotateDays = Number(env.LOG_ROTATE_DAYS || 14);

  return {
    level,
    pretty: env.LOG_PRETTY === 'true' || (isDev && env.LOG_PRETTY !== 'false'),
    toFile: env.LOG_TO_FILE === 'true',
    dir: env.LOG_DIR || './logs',
    rotateDays: Number.isFinite(rotateDays) && rotateDays > 0 ? rotateDays : 14,
    console: env.LOG_CONSOLE !== 'false',
    redactFields: (env.LOG_REDACT_FIELDS ||
      'authorization,cookie,x-api-key,key,token,password,apiKey,api_key,secret')
      .split(',').map(f => f.trim()).filter(Boolean),
  };
}
