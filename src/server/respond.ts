// src/server/respond.ts
import { NextResponse } from 'next/server';
import { ValidationError, toHttpError } from '@/lib/errors';
import { logError, logWarn } from '@/lib/log';

export const NO_STORE = {
  'Cache-Control': 'no-store, must-revalidate',
  'Pragma': 'no-cache',
};

/** Maps an error to its JSON response; only unexpected ones are logged as errors. */
export function errorResponse(e: unknown, where: string, reqId: string): NextResponse {
  const { status, body } = toHttpError(e);
  if (status >= 500) logError(`[${where}] failed`, reqId, e);
  else if (!(e instanceof ValidationError)) logWarn(`[${where}] rejected`, reqId, { status, error: body.error });
  return NextResponse.json({ ...body, reqId }, { status, headers: { ...NO_STORE, 'X-Request-Id': reqId } });
}
