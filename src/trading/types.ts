import type { IsoDate } from '@/core/types.js';

// ─── Trading Results ────────────────────────────────────────────

/** One instrument row of a daily oil-section bulletin, ready to store. */
export interface NewTradingResult {
  /** Full instrument code, e.g. `A100ANK060F`. */
  exchangeProductId: string;
  exchangeProductName: string;
  /** First four characters of the instrument code. */
  oilId: string;
  /** Characters five to seven of the instrument code. */
  deliveryBasisId: string;
  deliveryBasisName: string;
  /** Last character of the instrument code. */
  deliveryTypeId: string;
  /** Contract volume in metric tonnes. */
  volume: number;
  /** Contract total in roubles. */
  total: number;
  /** Number of contracts. */
  count: number;
  date: IsoDate;
}

/** A stored trading result. */
export interface TradingResult extends NewTradingResult {
  id: number;
  createdOn: Date;
  updatedOn: Date;
}

/** Optional equality filters accepted by the read endpoints. */
export interface TradingResultFilters {
  oilId?: string;
  deliveryTypeId?: string;
  deliveryBasisId?: string;
}

// ─── Imports ────────────────────────────────────────────────────

/** Outcome of importing the bulletins from a target date through today. */
export interface ImportReport {
  /** Every day considered, newest first. */
  requestedDates: IsoDate[];
  /** Days whose bulletin was downloaded and stored. */
  importedDates: IsoDate[];
  /** Days already present in the store. */
  skippedDates: IsoDate[];
  /** Days without a published bulletin (weekends, holidays, not yet published). */
  missingDates: IsoDate[];
  /** Days whose bulletin was downloaded but could not be parsed; nothing was stored for them. */
  unparsedDates: IsoDate[];
  insertedRows: number;
}
