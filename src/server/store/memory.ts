// src/server/store/memory.ts
import type { RecordStore, SheetRow } from './types';

/** In-process store for local dev and tests. Rows are copied in and out. */
export class MemoryRecordStore implements RecordStore {
  private readonly tables = new Map<string, SheetRow[]>();

  constructor(seed: Record<string, SheetRow[]> = {}) {
    for (const [table, rows] of Object.entries(seed)) {
      this.tables.set(table, rows.map((r) => [...r]));
    }
  }

  async readAll(table: string): Promise<SheetRow[]> {
    return (this.tables.get(table) ?? []).map((r) => [...r]);
  }

  async appendRow(table: string, row: SheetRow): Promise<void> {
    const rows = this.tables.get(table) ?? [];
    rows.push([...row]);
    this.tables.set(table, rows);
  }

  /** Synchronous view for assertions and diagnostics. */
  rows(table: string): SheetRow[] {
    return (this.tables.get(table) ?? []).map((r) => [...r]);
  }
}
