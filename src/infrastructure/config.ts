import { z } from 'zod';
import { DEFAULT_STREAM_KEY } from './redis/raw-event-producer.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Environment variables read by the collector. Every one has a default
 * suitable for local development.
 */
const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  RAW_EVENTS_STREAM: z.string().min(1).default(DEFAULT_STREAM_KEY),
  BODY_LIMIT: z.coerce.number().int().positive().default(1_048_576),
});

export interface CollectorConfig {
  host: string;
  port: number;
  logLevel: (typeof LOG_LEVELS)[number];
  redisUrl: string;
  streamKey: string;
  bodyLimit: number;
}

/**
 * Loads collector configuration from the environment.
 *
 * Throws on invalid values, naming every offending variable.
 */
export function loadCollectorConfig(
  env: Record<string, string | undefined> = process.env,
): CollectorConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid collector configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    redisUrl: e.REDIS_URL,
    streamKey: e.RAW_EVENTS_STREAM,
    bodyLimit: e.BODY_LIMIT,
  };
}
