// src/app/api/records/route.ts
export const runtime = 'nodejs';

import { NextRequest, NextResponse } from 'next/server';
import { logInfo, newReqId } from '@/lib/log';
import { buildBoard } from '@/server/records/board';
import { NO_STORE, errorResponse } from '@/server/respond';
import { getServices } from '@/server/services';

/**
 * Query params:
 *  - date (optional, YYYY-MM-DD) – meeting date to show; defaults to the newest
 *  - refresh (optional: 1/true) – drop the cached snapshot first
 *
 * Response: { dates, selectedDate, departments: [{ department, entries }], fetchedAt }
 */
export async function GET(req: NextRequest) {
  const reqId = newReqId();
  const { searchParams } = new URL(req.url);
  const date = searchParams.get('date') || undefined;
  const refresh = searchParams.get('refresh');

  try {
    const { cache } = getServices();
    if (refresh === '1' || refresh?.toLowerCase() === 'true') {
      logInfo('Manual refresh requested', reqId);
      cache.invalidate();
    }
    const snap = await cache.get(reqId);
    const board = buildBoard(snap.records, date);
    return NextResponse.json({ ...board, fetchedAt: snap.fetchedAt }, { headers: NO_STORE });
  } catch (e) {
    return errorResponse(e, 'records.GET', reqId);
  }
}
