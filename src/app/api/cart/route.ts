// src/app/api/cart/route.ts
export const runtime = 'nodejs';

import { NextRequest, NextResponse } from 'next/server';
import { CommitInProgressError, ValidationError } from '@/lib/errors';
import { newReqId } from '@/lib/log';
import { requireSession } from '@/server/auth/context';
import { NO_STORE, errorResponse } from '@/server/respond';
import { getServices } from '@/server/services';
import type { Attachment } from '@/types/data';

export async function GET(req: NextRequest) {
  const reqId = newReqId();
  try {
    const ctx = requireSession(req, getServices());
    return NextResponse.json({ items: ctx.cart.summary() }, { headers: NO_STORE });
  } catch (e) {
    return errorResponse(e, 'cart.GET', reqId);
  }
}

/**
 * multipart/form-data:
 *  - content (required)
 *  - file (optional)
 */
export async function POST(req: NextRequest) {
  const reqId = newReqId();
  try {
    const ctx = requireSession(req, getServices());
    if (ctx.committing) throw new CommitInProgressError();

    let form: FormData;
    try {
      form = await req.formData();
    } catch {
      throw new ValidationError('expected multipart form data');
    }

    const content = form.get('content');
    if (typeof content !== 'string') throw new ValidationError('content is required');

    const file = form.get('file');
    let attachment: Attachment | undefined;
    // browsers send an empty, unnamed file part when nothing was picked
    if (file !== null && typeof file !== 'string' && (file.name || file.size > 0)) {
      attachment = {
        bytes: new Uint8Array(await file.arrayBuffer()),
        filename: file.name,
        mimeType: file.type || 'application/octet-stream',
      };
    }

    ctx.cart.stage(content, attachment);
    return NextResponse.json({ items: ctx.cart.summary() }, { status: 201, headers: NO_STORE });
  } catch (e) {
    return errorResponse(e, 'cart.POST', reqId);
  }
}

export async function DELETE(req: NextRequest) {
  const reqId = newReqId();
  try {
    const ctx = requireSession(req, getServices());
    if (ctx.committing) throw new CommitInProgressError();
    ctx.cart.discardAll();
    return NextResponse.json({ items: [] }, { headers: NO_STORE });
  } catch (e) {
    return errorResponse(e, 'cart.DELETE', reqId);
  }
}
