/**
 * Server configuration, read once from the environment.
 * Every value has a default so the hub boots with an empty .env.
 */

import { z } from 'zod';
import { loadDotenv } from './dotenv.js';

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('127.0.0.1'),
  CORS_ORIGINS: z.string().default('*'),

  WS_PATH: z.string().startsWith('/').default('/ws'),
  WS_HEARTBEAT_INTERVAL_MS: positiveInt(30_000),
  WS_IDLE_TIMEOUT_MS: positiveInt(15 * 60 * 1000),
  WS_MAX_PAYLOAD_BYTES: positiveInt(1024 * 1024),

  TOPIC_CAPACITY: positiveInt(256),
  OUTBOUND_QUEUE_CAPACITY: positiveInt(256),
});

export interface HubServerConfig {
  env: string;
  port: number;
  host: string;
  corsOrigins: string[];
  ws: {
    path: string;
    heartbeatIntervalMs: number;
    idleTimeoutMs: number;
    maxPayloadBytes: number;
    outboundQueueCapacity: number;
  };
  topicCapacity: number;
}

/**
 * Parse and validate configuration.
 * Throws ConfigError listing every invalid variable.
 */
export function getConfig(env: NodeJS.ProcessEnv = loadDotenv()): HubServerConfig {
  // Empty strings mean "unset" so the defaults apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      issue => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const vars = parsed.data;
  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    host: vars.HOST,
    corsOrigins: vars.CORS_ORIGINS.split(',').map(o => o.trim()).filter(Boolean),
    ws: {
      path: vars.WS_PATH,
      heartbeatIntervalMs: vars.WS_HEARTBEAT_INTERVAL_MS,
      idleTimeoutMs: vars.WS_IDLE_TIMEOUT_MS,
      maxPayloadBytes: vars.WS_MAX_PAYLOAD_BYTES,
      outboundQueueCapacity: vars.OUTBOUND_QUEUE_CAPACITY,
    },
    topicCapacity: vars.TOPIC_CAPACITY,
  };
}
