// src/app/api/session/route.ts
export const runtime = 'nodejs';

import { NextRequest, NextResponse } from 'next/server';
import { logInfo, logWarn, newReqId } from '@/lib/log';
import { clearSessionCookie, currentSession, readSessionId, setSessionCookie } from '@/server/auth/context';
import { errorResponse } from '@/server/respond';
import { getServices, loadDirectory } from '@/server/services';

type LoginBody = { department: string; group: string; password: string };

function parseLogin(v: unknown): LoginBody | null {
  if (typeof v !== 'object' || v === null) return null;
  const department: unknown = Reflect.get(v, 'department');
  const group: unknown = Reflect.get(v, 'group');
  const password: unknown = Reflect.get(v, 'password');
  if (typeof department !== 'string' || typeof group !== 'string') return null;
  // numeric passwords typed into a JSON client still compare as text
  const pw = typeof password === 'number' ? String(password) : password;
  if (typeof pw !== 'string') return null;
  return { department, group, password: pw };
}

export async function GET(req: NextRequest) {
  const ctx = currentSession(req, getServices());
  if (!ctx) return NextResponse.json({ loggedIn: false });
  return NextResponse.json({ loggedIn: true, ...ctx.identity, cartSize: ctx.cart.size });
}

/** Body: { department, group, password } */
export async function POST(req: NextRequest) {
  const reqId = newReqId();
  const body = parseLogin(await req.json().catch(() => null));
  if (!body) {
    return NextResponse.json({ error: 'department, group and password required' }, { status: 400 });
  }

  try {
    const services = getServices();
    const directory = await loadDirectory(services, reqId);
    const ctx = services.sessions.login(body.department, body.group, body.password, directory);
    if (!ctx) {
      logWarn('Login rejected', reqId, { department: body.department, group: body.group });
      return NextResponse.json({ error: 'invalid-credentials' }, { status: 401 });
    }

    // a fresh login replaces whatever session the browser had
    services.sessions.logout(readSessionId(req));

    logInfo('Login ok', reqId, { ...ctx.identity });
    const res = NextResponse.json({ loggedIn: true, ...ctx.identity });
    setSessionCookie(res, ctx.id);
    return res;
  } catch (e) {
    return errorResponse(e, 'session.POST', reqId);
  }
}

export async function DELETE(req: NextRequest) {
  const dropped = getServices().sessions.logout(readSessionId(req));
  const res = NextResponse.json({ ok: true, dropped });
  clearSessionCookie(res);
  return res;
}
