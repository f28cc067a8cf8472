// src/lib/log.ts
import crypto from 'crypto';

/** ── Small logging helpers ─────────────────────────────── */
const now = () => (typeof performance !== 'undefined' ? performance.now() : Date.now());
const ts = () => new Date().toISOString();
const j = (o: unknown) => JSON.stringify(o);

export type LogExtra = Record<string, unknown>;

export function newReqId(): string {
  return crypto.randomUUID();
}

export function logStart(step: string, reqId: string, extra: LogExtra = {}) { console.info(j({ ts: ts(), level: 'INFO', reqId, event: 'STEP_START', step, ...extra })); }
export function logEnd(step: string, reqId: string, ms: number, extra: LogExtra = {}) { console.info(j({ ts: ts(), level: 'INFO', reqId, event: 'STEP_END', step, duration_ms: Math.round(ms), ...extra })); }
export function logInfo(msg: string, reqId: string, extra: LogExtra = {}) { console.info(j({ ts: ts(), level: 'INFO', reqId, msg, ...extra })); }
export function logWarn(msg: string, reqId: string, extra: LogExtra = {}) { console.warn(j({ ts: ts(), level: 'WARN', reqId, msg, ...extra })); }
export function logError(msg: string, reqId: string, error?: unknown, extra: LogExtra = {}) { console.error(j({ ts: ts(), level: 'ERROR', reqId, msg, error: serializeError(error), ...extra })); }

export function serializeError(e: unknown) {
  if (!e) return null;
  if (e instanceof Error) {
    const field = (k: string): unknown => Reflect.get(e, k);
    return { name: e.name, message: e.message, stack: e.stack, code: field('code'), status: field('status'), kind: field('kind') };
  }
  return e;
}

export async function timed<T>(step: string, reqId: string, fn: () => Promise<T>): Promise<T> {
  const t0 = now(); logStart(step, reqId);
  try { const out = await fn(); logEnd(step, reqId, now() - t0); return out; }
  catch (err) { logError(`Step failed: ${step}`, reqId, err); throw err; }
}
