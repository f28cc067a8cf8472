// src/server/records/board.ts
import type { MeetingRecord } from '@/types/data';

export type BoardEntry = MeetingRecord & {
  preview: string;
  thumbnailUrl?: string;
};

export type BoardDepartment = {
  department: string;
  entries: BoardEntry[];
};

export type Board = {
  dates: string[];            // newest first
  selectedDate: string | null;
  departments: BoardDepartment[];
};

const PREVIEW_CHARS = 20;

/**
 * Drive links get an image preview URL. Handles both
 * `.../open?id=<id>` and `.../file/d/<id>/view` shapes.
 */
export function thumbnailUrl(url: string): string | undefined {
  if (!url || !url.includes('drive.google.com')) return undefined;
  let fileId = '';
  if (url.includes('id=')) {
    fileId = (url.split('id=').pop() ?? '').split('&')[0];
  } else {
    const parts = url.split('/');
    fileId = parts.length >= 2 ? parts[parts.length - 2] : '';
  }
  if (!fileId) return undefined;
  return `https://drive.google.com/thumbnail?id=${encodeURIComponent(fileId)}&sz=w800`;
}

export function toBoardEntry(r: MeetingRecord): BoardEntry {
  const thumb = thumbnailUrl(r.attachmentUrl);
  return {
    ...r,
    preview: r.content.slice(0, PREVIEW_CHARS),
    ...(thumb ? { thumbnailUrl: thumb } : {}),
  };
}

export function buildBoard(records: MeetingRecord[], date?: string): Board {
  const dates = [...new Set(records.map((r) => r.meetingDate).filter((d) => d))].sort().reverse();
  const selectedDate = date && dates.includes(date) ? date : (dates[0] ?? null);
  if (!selectedDate) return { dates, selectedDate: null, departments: [] };

  const byDept = new Map<string, BoardEntry[]>();
  for (const r of records) {
    if (r.meetingDate !== selectedDate) continue;
    const list = byDept.get(r.department) ?? [];
    list.push(toBoardEntry(r));
    byDept.set(r.department, list);
  }

  return {
    dates,
    selectedDate,
    departments: [...byDept.entries()].map(([department, entries]) => ({ department, entries })),
  };
}
