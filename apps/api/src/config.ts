import { config as loadEnv } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  API_HOST: z.string().min(1).default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(1).default(3001),
  DATA_DIR: z.string().min(1).default('./data'),
  DATABASE_URL: z.string().min(1).optional(),
  STORAGE_BACKEND: z.enum(['sqlite', 'file']).default('sqlite'),
  TIME_ZONE: z.string().min(1).default('UTC'),
  RUN_EXPIRES_AFTER_SECONDS: z.coerce.number().int().min(1).default(600),
  RUN_SWEEP_INTERVAL_MS: z.coerce.number().int().min(100).default(30_000),
  RUN_STOP_TIMEOUT_MS: z.coerce.number().int().min(0).default(5_000),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().min(0).default(10_000),
  THREAD_CACHE_SIZE: z.coerce.number().int().min(1).default(1_000),
  MAX_UPLOAD_BYTES: z.coerce.number().int().min(1).default(20 * 1024 * 1024),
  EVENT_SINK: z.enum(['none', 'stdout']).default('none'),
  MIGRATE_ON_START: flag.default('true'),
});

export function parseConfig(env: Record<string, string | undefined> = process.env) {
  const parsed = envSchema.parse(env);
  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    host: parsed.API_HOST,
    port: parsed.API_PORT,
    dataDir: parsed.DATA_DIR,
    databaseUrl: parsed.DATABASE_URL ?? join(parsed.DATA_DIR, 'database.sqlite'),
    storageBackend: parsed.STORAGE_BACKEND,
    timeZone: parsed.TIME_ZONE,
    runExpiresAfterSeconds: parsed.RUN_EXPIRES_AFTER_SECONDS,
    runSweepIntervalMs: parsed.RUN_SWEEP_INTERVAL_MS,
    runStopTimeoutMs: parsed.RUN_STOP_TIMEOUT_MS,
    shutdownTimeoutMs: parsed.SHUTDOWN_TIMEOUT_MS,
    threadCacheSize: parsed.THREAD_CACHE_SIZE,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    eventSink: parsed.EVENT_SINK,
    migrateOnStart: parsed.MIGRATE_ON_START,
  };
}

export type AppConfig = ReturnType<typeof parseConfig>;

/** Reads the repository's `.env` first; only the process entry point calls this. */
export function loadConfig(): AppConfig {
  loadEnv({ path: resolve(__dirname, '../../../.env') });
  return parseConfig(process.env);
}
