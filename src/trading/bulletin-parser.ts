/**
 * Parser for the SPIMEX oil-section bulletin spreadsheet.
 *
 * Layout of the first sheet: a preamble, a row whose second cell reads
 * "Единица измерения: Метрическая тонна", one or more column-header rows,
 * the instrument rows, then an "Итого" total row. Instrument columns are
 * B code, C name, D delivery basis, E volume, F total (rub) and the last
 * column the number of contracts.
 */
import { read, utils } from 'xlsx';
import type { WorkBook } from 'xlsx';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { ValidationError, toError } from '@/core/errors.js';
import type { IsoDate } from '@/core/types.js';
import type { NewTradingResult } from './types.js';

type Cell = string | number | boolean | null;

const UNIT_MARKER = 'Единица измерения: Метрическая тонна';
const TOTAL_MARKER = 'Итого';
const PRODUCT_CODE = /^[A-Z0-9]{7,}$/;

const COLUMN = {
  code: 1,
  name: 2,
  basis: 3,
  volume: 4,
  total: 5,
} as const;

// ─── Cell helpers ───────────────────────────────────────────────

function cellText(cell: Cell | undefined): string {
  if (cell === null || cell === undefined) return '';
  return String(cell).trim();
}

/** Numeric cell to integer; "-", blanks and unparseable text count as 0. */
export function toInteger(cell: Cell | undefined): number {
  if (typeof cell === 'number') return Number.isFinite(cell) ? Math.round(cell) : 0;
  const text = cellText(cell).replace(/\s/g, '').replace(',', '.');
  if (text === '' || text === '-') return 0;
  const value = Number(text);
  return Number.isFinite(value) ? Math.round(value) : 0;
}

function isTotalRow(row: Cell[]): boolean {
  return row.some((cell) => cellText(cell).startsWith(TOTAL_MARKER));
}

// ─── Parser ─────────────────────────────────────────────────────

/** Extract the traded instruments (contract count > 0) of one bulletin. */
export function parseBulletin(
  data: Buffer,
  date: IsoDate,
): Result<NewTradingResult[], ValidationError> {
  let workbook: WorkBook;
  try {
    workbook = read(data, { type: 'buffer' });
  } catch (error) {
    return err(
      new ValidationError('Bulletin is not a readable spreadsheet', {
        date,
        reason: toError(error).message,
      }),
    );
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    return err(new ValidationError('Bulletin has no worksheet', { date }));
  }

  const rows = utils.sheet_to_json<Cell[]>(sheet, { header: 1, defval: null, blankrows: false });

  const markerIndex = rows.findIndex((row) => cellText(row[COLUMN.code]).includes(UNIT_MARKER));
  if (markerIndex === -1) {
    return err(new ValidationError('Bulletin has no metric-tonne section', { date }));
  }

  const results: NewTradingResult[] = [];
  for (const row of rows.slice(markerIndex + 1)) {
    if (isTotalRow(row)) break;

    const code = cellText(row[COLUMN.code]);
    if (!PRODUCT_CODE.test(code)) continue;

    const count = toInteger(row[row.length - 1]);
    if (count <= 0) continue;

    results.push({
      exchangeProductId: code,
      exchangeProductName: cellText(row[COLUMN.name]),
      oilId: code.slice(0, 4),
      deliveryBasisId: code.slice(4, 7),
      deliveryBasisName: cellText(row[COLUMN.basis]),
      deliveryTypeId: code.slice(-1),
      volume: toInteger(row[COLUMN.volume]),
      total: toInteger(row[COLUMN.total]),
      count,
      date,
    });
  }

  return ok(results);
}
