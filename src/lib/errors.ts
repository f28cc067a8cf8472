// src/lib/errors.ts

export class AppError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad user input (empty content, wrong file type, bad date). Stays with the caller. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super('validation', message);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'login required') {
    super('unauthorized', message);
  }
}

export class CommitInProgressError extends AppError {
  constructor() {
    super('commit-in-progress', 'a commit is already running for this session');
  }
}

// -----------------------------
// Relay
// -----------------------------
export type RelayErrorKind = 'transport' | 'malformedResponse' | 'applicationError';

export class RelayError extends AppError {
  readonly kind: RelayErrorKind;
  readonly status?: number;

  constructor(kind: RelayErrorKind, message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(`relay-${kind}`, message, { cause: opts.cause });
    this.kind = kind;
    this.status = opts.status;
  }

  /** transport and protocol hiccups are worth resubmitting; application errors need the user */
  get retryable(): boolean {
    return this.kind !== 'applicationError';
  }
}

// -----------------------------
// Record store
// -----------------------------
export type StoreOp = 'read' | 'write';

export class StoreError extends AppError {
  readonly op: StoreOp;
  readonly status?: number;

  constructor(code: string, op: StoreOp, message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(code, message, { cause: opts.cause });
    this.op = op;
    this.status = opts.status;
  }
}

export class StoreReadError extends StoreError {
  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super('store-read', 'read', message, opts);
  }
}

export class StoreWriteError extends StoreError {
  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super('store-write', 'write', message, opts);
  }
}

/** Quota exhausted on the store. Callers should wait, not retry in a loop. */
export class StoreRateLimitedError extends StoreError {
  constructor(op: StoreOp, message: string, opts: { status?: number; cause?: unknown } = {}) {
    super('store-rate-limited', op, message, opts);
  }
}

// -----------------------------
// HTTP mapping
// -----------------------------
export type HttpError = { status: number; body: { error: string; details: string } };

export function toHttpError(e: unknown): HttpError {
  const details = e instanceof Error ? e.message : 'unknown';
  if (e instanceof ValidationError) return { status: 400, body: { error: 'invalid-input', details } };
  if (e instanceof UnauthorizedError) return { status: 401, body: { error: 'unauthorized', details } };
  if (e instanceof CommitInProgressError) return { status: 409, body: { error: 'commit-in-progress', details } };
  if (e instanceof StoreRateLimitedError) {
    return {
      status: 429,
      body: { error: 'rate-limited', details: 'The spreadsheet quota is exhausted. Wait a minute and try again.' },
    };
  }
  if (e instanceof StoreError) return { status: 502, body: { error: `store-${e.op}-failed`, details } };
  if (e instanceof RelayError) return { status: 502, body: { error: `relay-${e.kind}`, details } };
  return { status: 500, body: { error: 'internal', details } };
}
