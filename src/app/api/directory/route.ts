// src/app/api/directory/route.ts
export const runtime = 'nodejs';

import { NextResponse } from 'next/server';
import { newReqId } from '@/lib/log';
import { errorResponse } from '@/server/respond';
import { getServices, loadDirectory } from '@/server/services';

/**
 * Response: { departments: [{ department, groups: string[] }] }
 * Secrets never leave the server.
 */
export async function GET() {
  const reqId = newReqId();
  try {
    const directory = await loadDirectory(getServices(), reqId);
    const departments = directory.departments().map((department) => ({
      department,
      groups: directory.groupsIn(department),
    }));
    return NextResponse.json({ departments });
  } catch (e) {
    return errorResponse(e, 'directory.GET', reqId);
  }
}
