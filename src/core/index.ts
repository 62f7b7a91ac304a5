// Core primitives: branded types, errors, Result
export type { Clock, IsoDate, JobId } from './types.js';
export {
  addDays,
  compactDate,
  isTimeZone,
  listDaysDescending,
  parseIsoDate,
  systemClock,
  toIsoDate,
} from './types.js';

export {
  AppError,
  BrokerUnavailableError,
  BulletinDownloadError,
  ConfigError,
  MigrationError,
  NotFoundError,
  StoreUnavailableError,
  ValidationError,
  toError,
} from './errors.js';

export type { Result } from './result.js';
export { ok, err } from './result.js';
