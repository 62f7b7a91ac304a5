// ─── Types ──────────────────────────────────────────────────────
export type { AppConfig, BeatEntryConfig, BeatScheduleFile } from './types.js';
export type { DatabaseConnectionParts, ConnectionField } from './connection.js';

// ─── Schemas ────────────────────────────────────────────────────
export { beatEntrySchema, beatScheduleFileSchema, envSchema } from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export {
  loadConfig,
  loadJsonConfigFile,
  parseCorsOrigins,
  resolveDatabaseDsn,
  resolveEnvVars,
} from './loader.js';
export {
  buildDatabaseDsn,
  diffConnections,
  parseDatabaseDsn,
  readDiscreteConnection,
} from './connection.js';
