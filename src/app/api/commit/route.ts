// src/app/api/commit/route.ts
export const runtime = 'nodejs';

import { NextRequest } from 'next/server';
import { CommitInProgressError, ValidationError } from '@/lib/errors';
import { isMeetingDate } from '@/lib/dates';
import { logError, newReqId } from '@/lib/log';
import { requireSession } from '@/server/auth/context';
import { commitBatch, type CommitEvent, type CommitOutcome } from '@/server/commit/pipeline';
import { NO_STORE, errorResponse } from '@/server/respond';
import { commitDeps, getServices, type Services } from '@/server/services';
import type { SessionContext } from '@/server/session/registry';

export type CommitStreamLine = CommitEvent | { type: 'result'; outcome: CommitSummary } | { type: 'error'; error: string; details: string };

type OmitEach<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

// Records are echoed as ids only to keep the stream small.
export type CommitSummary = OmitEach<CommitOutcome, 'appended'> & { appendedIds: string[] };

function summarize(outcome: CommitOutcome): CommitSummary {
  const { appended, ...rest } = outcome;
  return { ...rest, appendedIds: appended.map((r) => r.id) };
}

async function parseRequest(req: NextRequest, services: Services): Promise<{ ctx: SessionContext; meetingDate: string }> {
  const ctx = requireSession(req, services);
  const body: unknown = await req.json().catch(() => null);
  const date: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'meetingDate') : undefined;
  if (typeof date !== 'string' || !isMeetingDate(date)) throw new ValidationError('meetingDate must be YYYY-MM-DD');
  if (ctx.committing) throw new CommitInProgressError();
  return { ctx, meetingDate: date };
}

/**
 * Body: { meetingDate: "YYYY-MM-DD" }
 *
 * Streams NDJSON, one line per event:
 *   {"type":"progress","index":1,"total":3,"fraction":0.333,"appended":true}
 *   {"type":"attachmentFailed","failure":{...}}
 *   {"type":"result","outcome":{"status":"success"|"fatalStop",...}}
 * Closing the connection cancels at the next item boundary.
 */
export async function POST(req: NextRequest) {
  const reqId = newReqId();
  const services = getServices();

  let parsed: { ctx: SessionContext; meetingDate: string };
  try {
    parsed = await parseRequest(req, services);
  } catch (e) {
    return errorResponse(e, 'commit.POST', reqId);
  }
  const { ctx, meetingDate } = parsed;

  // client gone: stop writing, and cancel the commit at the next item boundary
  const abort = new AbortController();
  req.signal.addEventListener('abort', () => abort.abort(), { once: true });
  let closed = false;

  const stream = new ReadableStream<Uint8Array>({
    async start(controller) {
      const enc = new TextEncoder();
      const write = (line: CommitStreamLine) => {
        if (!closed) controller.enqueue(enc.encode(JSON.stringify(line) + '\n'));
      };

      try {
        const outcome = await commitBatch(
          ctx,
          { meetingDate, signal: abort.signal, onEvent: write, reqId },
          commitDeps(services)
        );
        write({ type: 'result', outcome: summarize(outcome) });
      } catch (e) {
        logError('Commit failed before completion', reqId, e);
        const details = e instanceof Error ? e.message : 'unknown';
        write({ type: 'error', error: e instanceof ValidationError ? 'invalid-input' : 'commit-failed', details });
      } finally {
        if (!closed) {
          closed = true;
          controller.close();
        }
      }
    },
    cancel() {
      closed = true;
      abort.abort();
    },
  });

  return new Response(stream, {
    headers: {
      'Content-Type': 'application/x-ndjson; charset=utf-8',
      'X-Request-Id': reqId,
      ...NO_STORE,
    },
  });
}
