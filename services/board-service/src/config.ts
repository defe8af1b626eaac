import { z } from 'zod';
import type { RecognizerKind } from './recognize';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  // 0 asks the OS for a free port.
  PORT: z.coerce.number().int().nonnegative().default(3000),
  DATABASE_URL: z.string().optional(),
  REDIS_URL: z.string().optional(),
  CORS_ORIGIN: z.string().optional(),
  WS_PATH: z.string().startsWith('/').default('/ws'),
  WS_REQUIRE_AUTH: flag.default('true'),
  WS_READ_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  WS_HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  WS_WRITE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  WS_MAX_PAYLOAD_BYTES: z.coerce.number().int().positive().default(1 << 20),
  RECOGNIZE_WIDTH: z.coerce.number().int().positive().default(300),
  RECOGNIZE_HEIGHT: z.coerce.number().int().positive().default(300),
  RECOGNIZER: z.enum(['raster', 'simple']).default('raster'),
  SESSION_TTL_SEC: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
});

export interface RealtimeConfig {
  path: string;
  requireAuth: boolean;
  readTimeoutMs: number;
  heartbeatIntervalMs: number;
  writeTimeoutMs: number;
  maxPayloadBytes: number;
}

export interface RecognitionConfig {
  /** Used when a request leaves the raster size out. */
  width: number;
  height: number;
  recognizer: RecognizerKind;
}

export interface Config {
  port: number;
  databaseUrl?: string;
  redisUrl?: string;
  corsOrigin?: string;
  sessionTtlSec: number;
  realtime: RealtimeConfig;
  recognition: RecognitionConfig;
}

/** Reads service configuration from the environment. Throws a ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,
    corsOrigin: parsed.CORS_ORIGIN,
    sessionTtlSec: parsed.SESSION_TTL_SEC,
    realtime: {
      path: parsed.WS_PATH,
      requireAuth: parsed.WS_REQUIRE_AUTH,
      readTimeoutMs: parsed.WS_READ_TIMEOUT_MS,
      heartbeatIntervalMs: parsed.WS_HEARTBEAT_INTERVAL_MS,
      writeTimeoutMs: parsed.WS_WRITE_TIMEOUT_MS,
      maxPayloadBytes: parsed.WS_MAX_PAYLOAD_BYTES,
    },
    recognition: {
      width: parsed.RECOGNIZE_WIDTH,
      height: parsed.RECOGNIZE_HEIGHT,
      recognizer: parsed.RECOGNIZER,
    },
  };
}
