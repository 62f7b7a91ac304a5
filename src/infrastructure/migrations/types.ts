/** A single forward-only SQL migration. */
export interface Migration {
  /** File name without extension, e.g. `0001_create_spimex_trading_results`. */
  id: string;
  sql: string;
  /** sha256 of the SQL text, hex encoded. */
  checksum: string;
}

/** Outcome of one migration run. */
export interface MigrationReport {
  applied: string[];
  skipped: string[];
}
