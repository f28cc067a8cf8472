// src/server/store/types.ts

/** One row of cells, in column order. */
export type SheetRow = string[];

/**
 * Append-only tabular store. Implementations must raise StoreRateLimitedError
 * for quota exhaustion and StoreReadError / StoreWriteError for anything else.
 */
export interface RecordStore {
  /** Data rows of `table` in store order (no header row). */
  readAll(table: string): Promise<SheetRow[]>;
  appendRow(table: string, row: SheetRow): Promise<void>;
}
