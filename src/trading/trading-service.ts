/**
 * TradingService: imports SPIMEX bulletins into the store and serves the
 * read queries behind the trading-results endpoints.
 */
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import type { AppError } from '@/core/errors.js';
import { NotFoundError, ValidationError } from '@/core/errors.js';
import type { Clock, IsoDate } from '@/core/types.js';
import { addDays, listDaysDescending, systemClock, toIsoDate } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { TradingResultsRepository } from '@/infrastructure/repositories/trading-results-repository.js';
import type { SpimexClient } from './spimex-client.js';
import { parseBulletin } from './bulletin-parser.js';
import type { ImportReport, TradingResult, TradingResultFilters } from './types.js';

// ─── Interface ──────────────────────────────────────────────────

export interface TradingService {
  /**
   * Import every bulletin from `targetDate` through today.
   * Days already stored are skipped, so repeating an import is harmless.
   * A bulletin that cannot be parsed is listed in `unparsedDates` and the
   * walk continues; a failed download aborts the import.
   */
  importBulletins(targetDate: IsoDate): Promise<Result<ImportReport, AppError>>;
  /** Trading days present in the store within the last `days` days, today included. */
  getLastTradingDates(days: number): Promise<IsoDate[]>;
  /** Results of the most recent trading day. */
  getLastTradingResults(filters: TradingResultFilters): Promise<Result<TradingResult[], AppError>>;
  /** Results in the closed range `[start, end]`. */
  getTradingResultsInPeriod(
    start: IsoDate,
    end: IsoDate,
    filters: TradingResultFilters,
  ): Promise<Result<TradingResult[], AppError>>;
}

// ─── Options ────────────────────────────────────────────────────

export interface TradingServiceOptions {
  repository: TradingResultsRepository;
  client: SpimexClient;
  logger: Logger;
  clock?: Clock;
  /** Zone whose calendar day is "today"; UTC when omitted. */
  timeZone?: string;
}

// ─── Factory ────────────────────────────────────────────────────

/** Create a TradingService instance. */
export function createTradingService(options: TradingServiceOptions): TradingService {
  const { repository, client, logger } = options;
  const clock = options.clock ?? systemClock;
  const { timeZone } = options;

  return {
    async importBulletins(targetDate: IsoDate): Promise<Result<ImportReport, AppError>> {
      const today = toIsoDate(clock(), timeZone);
      if (targetDate > today) {
        return err(new ValidationError('Target date is in the future', { targetDate, today }));
      }

      const report: ImportReport = {
        requestedDates: listDaysDescending(targetDate, today),
        importedDates: [],
        skippedDates: [],
        missingDates: [],
        unparsedDates: [],
        insertedRows: 0,
      };

      for (const day of report.requestedDates) {
        if (await repository.hasResultsOn(day)) {
          report.skippedDates.push(day);
          continue;
        }

        const download = await client.downloadBulletin(day);
        if (!download.ok) return download;

        if (download.value === null) {
          report.missingDates.push(day);
          continue;
        }

        // A malformed bulletin is reported and skipped; retrying would fetch the same file.
        const parsed = parseBulletin(download.value, day);
        if (!parsed.ok) {
          logger.warn('Bulletin could not be parsed', {
            component: 'trading-service',
            date: day,
            error: parsed.error.message,
          });
          report.unparsedDates.push(day);
          continue;
        }

        report.insertedRows += await repository.insertMany(parsed.value);
        report.importedDates.push(day);
      }

      logger.info('Bulletin import finished', {
        component: 'trading-service',
        targetDate,
        imported: report.importedDates.length,
        skipped: report.skippedDates.length,
        missing: report.missingDates.length,
        unparsed: report.unparsedDates.length,
        insertedRows: report.insertedRows,
      });

      return ok(report);
    },

    async getLastTradingDates(days: number): Promise<IsoDate[]> {
      const today = toIsoDate(clock(), timeZone);
      return repository.listTradingDates(addDays(today, -(days - 1)), today);
    },

    async getLastTradingResults(
      filters: TradingResultFilters,
    ): Promise<Result<TradingResult[], AppError>> {
      const latest = await repository.findLatestDate();
      if (!latest) {
        return err(new NotFoundError('Database is empty'));
      }
      return ok(await repository.listByDate(latest, filters));
    },

    async getTradingResultsInPeriod(
      start: IsoDate,
      end: IsoDate,
      filters: TradingResultFilters,
    ): Promise<Result<TradingResult[], AppError>> {
      if (start > end) {
        return err(new ValidationError('start_date must not be after end_date', {
          startDate: start,
          endDate: end,
        }));
      }
      return ok(await repository.listInPeriod(start, end, filters));
    },
  };
}
