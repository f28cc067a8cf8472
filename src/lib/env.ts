// src/lib/env.ts
export const IS_CLOUD_RUN = !!process.env.K_SERVICE;     // set by Cloud Run
export const NODE_ENV = process.env.NODE_ENV || 'development';

export function envString(name: string, fallback = ''): string {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : fallback;
}

export function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw || !raw.trim()) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

/** comma separated list, lowercased, empties dropped */
export function envList(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (!raw || !raw.trim()) return fallback;
  return raw
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter((s) => s.length > 0);
}
