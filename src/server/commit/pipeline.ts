// src/server/commit/pipeline.ts
import crypto from 'crypto';
import {
  CommitInProgressError,
  RelayError,
  StoreRateLimitedError,
  ValidationError,
} from '@/lib/errors';
import { fileStamp, formatTimestamp, isMeetingDate } from '@/lib/dates';
import { logError, logInfo, logWarn, serializeError } from '@/lib/log';
import { recordToRow } from '@/server/records/rows';
import type { ReadCache } from '@/server/cache/readCache';
import type { RelayClient } from '@/server/relay/client';
import type { RecordStore } from '@/server/store/types';
import type { SessionContext } from '@/server/session/registry';
import type { CartItem, MeetingRecord } from '@/types/data';

export type CommitDeps = {
  store: RecordStore;
  relay: Pick<RelayClient, 'upload'>;
  cache: Pick<ReadCache, 'invalidate'>;
  recordsTable: string;
  now?: () => Date;
  newId?: () => string;
};

export type AttachmentFailure = {
  index: number;            // 1-based cart position
  filename: string;
  kind: RelayError['kind'];
  retryable: boolean;
  message: string;
};

export type CommitEvent =
  | { type: 'progress'; index: number; total: number; fraction: number; appended: boolean }
  | { type: 'attachmentFailed'; failure: AttachmentFailure };

export type CommitOptions = {
  meetingDate: string;
  signal?: AbortSignal;
  onEvent?: (event: CommitEvent) => void;
  reqId?: string;
};

export type StopReason = 'rateLimited' | 'storeError' | 'cancelled';

export type CommitOutcome =
  | {
      status: 'success';
      appended: MeetingRecord[];
      attachmentFailures: AttachmentFailure[];
    }
  | {
      status: 'fatalStop';
      stoppedAt: number;    // 1-based cart position that was not committed
      reason: StopReason;
      message: string;
      appended: MeetingRecord[];
      attachmentFailures: AttachmentFailure[];
      /** the cart was kept; committing it again re-appends `appended` */
      duplicateRisk: boolean;
    };

/**
 * Commits the session's cart, one item at a time and in order.
 *
 * Attachment failures are per item: the record goes in with an empty URL.
 * An append failure stops the batch; the cart is left as it was, so a retry
 * re-appends what already made it (at-least-once, never silently lost).
 */
export async function commitBatch(
  session: SessionContext,
  opts: CommitOptions,
  deps: CommitDeps
): Promise<CommitOutcome> {
  const { meetingDate, signal, onEvent, reqId = 'commit' } = opts;
  if (!isMeetingDate(meetingDate)) throw new ValidationError(`invalid meeting date: ${meetingDate}`);
  if (session.committing) throw new CommitInProgressError();

  const now = deps.now ?? (() => new Date());
  const newId = deps.newId ?? (() => crypto.randomUUID());
  // a failing listener (e.g. a closed stream) must not change what gets committed
  const emit = (e: CommitEvent) => {
    try {
      onEvent?.(e);
    } catch (err) {
      logWarn('Commit listener failed', reqId, { event: e.type, err: serializeError(err) });
    }
  };

  const items = session.cart.items();
  const total = items.length;
  const appended: MeetingRecord[] = [];
  const attachmentFailures: AttachmentFailure[] = [];

  const stop = (stoppedAt: number, reason: StopReason, message: string): CommitOutcome => {
    // our own partial writes must be visible to the next read
    if (appended.length > 0) deps.cache.invalidate();
    logWarn('Commit stopped', reqId, { stoppedAt, total, reason, appended: appended.length });
    return {
      status: 'fatalStop',
      stoppedAt,
      reason,
      message,
      appended,
      attachmentFailures,
      duplicateRisk: appended.length > 0,
    };
  };

  session.committing = true;
  logInfo('Commit started', reqId, { total, meetingDate, ...session.identity });
  try {
    for (let i = 0; i < total; i++) {
      const index = i + 1;
      if (signal?.aborted) return stop(index, 'cancelled', 'commit cancelled');

      const item = items[i];
      const attachmentUrl = await uploadAttachment(item, index, now(), deps, reqId, (failure) => {
        attachmentFailures.push(failure);
        emit({ type: 'attachmentFailed', failure });
      });

      const record: MeetingRecord = {
        id: newId(),
        submittedAt: formatTimestamp(now()),
        meetingDate,
        department: session.identity.department,
        group: session.identity.group,
        content: item.content,
        attachmentUrl,
      };

      try {
        await deps.store.appendRow(deps.recordsTable, recordToRow(record));
      } catch (e) {
        logError('Append failed', reqId, e, { index, total });
        emit({ type: 'progress', index, total, fraction: index / total, appended: false });
        if (e instanceof StoreRateLimitedError) {
          return stop(index, 'rateLimited', 'The spreadsheet quota is exhausted. Wait a minute, then commit again.');
        }
        return stop(index, 'storeError', e instanceof Error ? e.message : String(e));
      }

      appended.push(record);
      emit({ type: 'progress', index, total, fraction: index / total, appended: true });
    }

    deps.cache.invalidate();
    session.cart.discardAll();
    logInfo('Commit finished', reqId, { appended: appended.length, attachmentFailures: attachmentFailures.length });
    return { status: 'success', appended, attachmentFailures };
  } catch (e) {
    if (appended.length > 0) deps.cache.invalidate();
    throw e;
  } finally {
    session.committing = false;
  }
}

async function uploadAttachment(
  item: CartItem,
  index: number,
  at: Date,
  deps: CommitDeps,
  reqId: string,
  onFailure: (f: AttachmentFailure) => void
): Promise<string> {
  const a = item.attachment;
  if (!a) return '';

  try {
    return await deps.relay.upload(a.bytes, `${fileStamp(at)}_${a.filename}`, a.mimeType);
  } catch (e) {
    if (!(e instanceof RelayError)) throw e;
    logWarn('Attachment upload failed; committing without it', reqId, { index, filename: a.filename, err: serializeError(e) });
    onFailure({ index, filename: a.filename, kind: e.kind, retryable: e.retryable, message: e.message });
    return '';
  }
}
