// src/server/records/rows.ts
import type { MeetingRecord } from '@/types/data';
import type { SheetRow } from '@/server/store/types';

// Column order of the records sheet:
// id | submittedAt | meetingDate | department | group | content | attachmentUrl
export function recordToRow(r: MeetingRecord): SheetRow {
  return [r.id, r.submittedAt, r.meetingDate, r.department, r.group, r.content, r.attachmentUrl];
}

// Sheets drops trailing empty cells, so short rows are padded with ''.
export function rowToRecord(row: SheetRow): MeetingRecord {
  const at = (i: number) => row[i] ?? '';
  return {
    id: at(0),
    submittedAt: at(1),
    meetingDate: at(2),
    department: at(3),
    group: at(4),
    content: at(5),
    attachmentUrl: at(6),
  };
}

export function parseRecordRows(rows: SheetRow[]): MeetingRecord[] {
  return rows.filter((row) => row.some((c) => c !== '')).map(rowToRecord);
}
