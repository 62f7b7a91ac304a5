/**
 * TradingResults repository: bulk insert and read queries over
 * `spimex_trading_results`.
 *
 * pg-backed. Inserts are idempotent per (date, exchange_product_id): a task
 * delivered twice, or a bulletin imported again, adds nothing.
 */
import type { Pool } from 'pg';
import { toError } from '@/core/errors.js';
import type { IsoDate } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type {
  NewTradingResult,
  TradingResult,
  TradingResultFilters,
} from '@/trading/types.js';

// ─── Repository Interface ───────────────────────────────────────

export interface TradingResultsRepository {
  /** Insert rows in one transaction, ignoring ones already stored. Returns the inserted count. */
  insertMany(rows: NewTradingResult[]): Promise<number>;
  /** Whether any row exists for the trading day. */
  hasResultsOn(date: IsoDate): Promise<boolean>;
  /** Distinct trading days in `[since, until]`, newest first. */
  listTradingDates(since: IsoDate, until: IsoDate): Promise<IsoDate[]>;
  /** Most recent trading day in the store, or null when it is empty. */
  findLatestDate(): Promise<IsoDate | null>;
  /** Results of one trading day. */
  listByDate(date: IsoDate, filters?: TradingResultFilters): Promise<TradingResult[]>;
  /** Results in the closed range `[start, end]`, newest day first. */
  listInPeriod(start: IsoDate, end: IsoDate, filters?: TradingResultFilters): Promise<TradingResult[]>;
}

// ─── SQL ────────────────────────────────────────────────────────

const TABLE = 'spimex_trading_results';

const INSERT_COLUMNS = [
  'exchange_product_id',
  'exchange_product_name',
  'oil_id',
  'delivery_basis_id',
  'delivery_basis_name',
  'delivery_type_id',
  'volume',
  'total',
  'count',
  'date',
] as const;

const SELECT_COLUMNS = `id, exchange_product_id, exchange_product_name, oil_id,
  delivery_basis_id, delivery_basis_name, delivery_type_id, volume, total, count,
  to_char(date, 'YYYY-MM-DD') AS date, created_on, updated_on`;

/** Rows per INSERT statement; keeps the bind parameter count well under pg's limit. */
export const INSERT_CHUNK_SIZE = 500;

// ─── Mappers ────────────────────────────────────────────────────

interface TradingResultRecord {
  id: string;
  exchange_product_id: string;
  exchange_product_name: string;
  oil_id: string;
  delivery_basis_id: string;
  delivery_basis_name: string;
  delivery_type_id: string;
  /** BIGINT columns arrive as strings. */
  volume: string;
  total: string;
  count: number;
  date: string;
  created_on: Date;
  updated_on: Date;
}

function toAppModel(record: TradingResultRecord): TradingResult {
  return {
    id: Number(record.id),
    exchangeProductId: record.exchange_product_id,
    exchangeProductName: record.exchange_product_name,
    oilId: record.oil_id,
    deliveryBasisId: record.delivery_basis_id,
    deliveryBasisName: record.delivery_basis_name,
    deliveryTypeId: record.delivery_type_id,
    volume: Number(record.volume),
    total: Number(record.total),
    count: record.count,
    date: record.date as IsoDate,
    createdOn: record.created_on,
    updatedOn: record.updated_on,
  };
}

function toInsertValues(row: NewTradingResult): unknown[] {
  return [
    row.exchangeProductId,
    row.exchangeProductName,
    row.oilId,
    row.deliveryBasisId,
    row.deliveryBasisName,
    row.deliveryTypeId,
    row.volume,
    row.total,
    row.count,
    row.date,
  ];
}

/** Append `AND column = $n` for every set filter. */
function filterClause(filters: TradingResultFilters | undefined, params: unknown[]): string {
  const conditions: string[] = [];
  const add = (column: string, value: string | undefined): void => {
    if (!value) return;
    params.push(value);
    conditions.push(`${column} = $${params.length}`);
  };

  add('oil_id', filters?.oilId);
  add('delivery_type_id', filters?.deliveryTypeId);
  add('delivery_basis_id', filters?.deliveryBasisId);

  return conditions.map((condition) => ` AND ${condition}`).join('');
}

// ─── Factory ────────────────────────────────────────────────────

/** Create a TradingResultsRepository backed by a pg Pool. */
export function createTradingResultsRepository(
  pool: Pool,
  logger: Logger,
): TradingResultsRepository {
  return {
    async insertMany(rows: NewTradingResult[]): Promise<number> {
      if (rows.length === 0) return 0;

      const client = await pool.connect();
      let inserted = 0;
      try {
        await client.query('BEGIN');

        for (let start = 0; start < rows.length; start += INSERT_CHUNK_SIZE) {
          const chunk = rows.slice(start, start + INSERT_CHUNK_SIZE);
          const params: unknown[] = [];
          const tuples = chunk.map((row) => {
            const values = toInsertValues(row);
            const placeholders = values.map((value) => {
              params.push(value);
              return `$${params.length}`;
            });
            return `(${placeholders.join(', ')})`;
          });

          const result = await client.query(
            `INSERT INTO ${TABLE} (${INSERT_COLUMNS.join(', ')}) VALUES ${tuples.join(', ')}
             ON CONFLICT (date, exchange_product_id) DO NOTHING`,
            params,
          );
          inserted += result.rowCount ?? 0;
        }

        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK').catch((rollbackError: unknown) => {
          logger.error('Rollback after failed insert also failed', {
            component: 'trading-results-repository',
            rows: rows.length,
            error: toError(rollbackError).message,
          });
        });
        // The connection may be mid-transaction; the pool discards it.
        client.release(toError(error));
        throw error;
      }

      client.release();
      return inserted;
    },

    async hasResultsOn(date: IsoDate): Promise<boolean> {
      const result = await pool.query(`SELECT 1 FROM ${TABLE} WHERE date = $1 LIMIT 1`, [date]);
      return result.rows.length > 0;
    },

    async listTradingDates(since: IsoDate, until: IsoDate): Promise<IsoDate[]> {
      const result = await pool.query<{ trading_date: string }>(
        `SELECT DISTINCT to_char(date, 'YYYY-MM-DD') AS trading_date FROM ${TABLE}
         WHERE date BETWEEN $1 AND $2
         ORDER BY trading_date DESC`,
        [since, until],
      );
      return result.rows.map((row) => row.trading_date as IsoDate);
    },

    async findLatestDate(): Promise<IsoDate | null> {
      const result = await pool.query<{ latest: string | null }>(
        `SELECT to_char(max(date), 'YYYY-MM-DD') AS latest FROM ${TABLE}`,
      );
      const latest = result.rows[0]?.latest;
      return latest ? (latest as IsoDate) : null;
    },

    async listByDate(date: IsoDate, filters?: TradingResultFilters): Promise<TradingResult[]> {
      const params: unknown[] = [date];
      const where = filterClause(filters, params);
      const result = await pool.query<TradingResultRecord>(
        `SELECT ${SELECT_COLUMNS} FROM ${TABLE}
         WHERE date = $1${where}
         ORDER BY exchange_product_id`,
        params,
      );
      return result.rows.map(toAppModel);
    },

    async listInPeriod(
      start: IsoDate,
      end: IsoDate,
      filters?: TradingResultFilters,
    ): Promise<TradingResult[]> {
      const params: unknown[] = [start, end];
      const where = filterClause(filters, params);
      const result = await pool.query<TradingResultRecord>(
        `SELECT ${SELECT_COLUMNS} FROM ${TABLE}
         WHERE date BETWEEN $1 AND $2${where}
         ORDER BY date DESC, exchange_product_id`,
        params,
      );
      return result.rows.map(toAppModel);
    },
  };
}
