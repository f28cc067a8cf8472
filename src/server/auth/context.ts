// src/server/auth/context.ts
import type { NextRequest, NextResponse } from 'next/server';
import * as config from '@/config';
import { UnauthorizedError } from '@/lib/errors';
import type { Services } from '@/server/services';
import type { SessionContext } from '@/server/session/registry';

const commonCookieOpts = {
  httpOnly: true,
  sameSite: 'lax' as const,
  secure: process.env.NODE_ENV === 'production',
  path: '/',
};

// ────────────────────────────────────────────────
// Session id from the request (cookie first, header for non-browser clients)
// ────────────────────────────────────────────────
export function readSessionId(req: NextRequest): string | undefined {
  return req.cookies.get(config.SESSION_COOKIE)?.value || req.headers.get('x-session-id') || undefined;
}

export function currentSession(req: NextRequest, services: Services): SessionContext | null {
  return services.sessions.get(readSessionId(req));
}

// ────────────────────────────────────────────────
// Public entrypoint for routes that need a logged-in group
// ────────────────────────────────────────────────
export function requireSession(req: NextRequest, services: Services): SessionContext {
  const ctx = currentSession(req, services);
  if (!ctx) throw new UnauthorizedError();
  return ctx;
}

export function setSessionCookie(res: NextResponse, sessionId: string): void {
  res.cookies.set(config.SESSION_COOKIE, sessionId, commonCookieOpts);
}

export function clearSessionCookie(res: NextResponse): void {
  res.cookies.set(config.SESSION_COOKIE, '', { ...commonCookieOpts, maxAge: 0 });
}
