import type { z } from 'zod';
import type { beatEntrySchema, beatScheduleFileSchema } from './schema.js';

/** Validated runtime configuration shared by all processes. */
export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  server: {
    host: string;
    port: number;
    /** Prefix for versioned routes, e.g. `/api_v1`. */
    apiPrefix: string;
    corsOrigins: string[];
  };
  database: {
    /** Canonical DSN, whichever shape it was configured in. */
    dsn: string;
    connectMaxAttempts: number;
    migrateOnStart: boolean;
    migrationsDir: string;
  };
  redis: {
    url: string;
    /** TTL of cached API responses. */
    cacheTtlSeconds: number;
  };
  spimex: {
    bulletinUrl: string;
    timeoutMs: number;
    /** IANA zone of the exchange's trading calendar. */
    timeZone: string;
  };
  worker: {
    concurrency: number;
  };
  beat: {
    scheduleFile: string;
    tickMs: number;
    lockTtlMs: number;
  };
}

export type BeatEntryConfig = z.infer<typeof beatEntrySchema>;
export type BeatScheduleFile = z.infer<typeof beatScheduleFileSchema>;
