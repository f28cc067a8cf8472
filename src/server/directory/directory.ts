// src/server/directory/directory.ts
import type { DirectoryEntry } from '@/types/data';
import type { SheetRow } from '@/server/store/types';

/** Directory rows are `[department, group, password]`; rows missing a department or group are skipped. */
export function parseDirectoryRows(rows: SheetRow[]): DirectoryEntry[] {
  const out: DirectoryEntry[] = [];
  for (const row of rows) {
    const department = row[0] ?? '';
    const group = row[1] ?? '';
    if (!department || !group) continue;
    out.push({ department, group, secret: row[2] ?? '' });
  }
  return out;
}

/**
 * Read-only allow-list of (department, group, secret).
 * Secrets are compared verbatim; there is no hashing here.
 */
export class Directory {
  private readonly entries: readonly DirectoryEntry[];

  constructor(entries: readonly DirectoryEntry[]) {
    this.entries = entries;
  }

  get size(): number {
    return this.entries.length;
  }

  /** First exact match in store order wins. */
  authenticate(department: string, group: string, secret: string): boolean {
    return this.entries.some(
      (e) => e.department === department && e.group === group && e.secret === secret
    );
  }

  /** Unique departments in first-seen order. */
  departments(): string[] {
    return [...new Set(this.entries.map((e) => e.department))];
  }

  groupsIn(department: string): string[] {
    return this.entries.filter((e) => e.department === department).map((e) => e.group);
  }
}
