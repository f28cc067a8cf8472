// src/server/cart/cart.ts
import { ValidationError } from '@/lib/errors';
import type { Attachment, CartItem } from '@/types/data';

export type CartLimits = {
  allowedTypes: string[];   // lowercase extensions without the dot
  maxBytes: number;
};

export type CartLine = {
  content: string;
  filename: string | null;
  bytes: number;
};

function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot >= 0 ? filename.slice(dot + 1).toLowerCase() : '';
}

/**
 * Session-local list of entries waiting to be committed. FIFO: staging order is
 * commit order.
 */
export class Cart {
  private entries: CartItem[] = [];

  constructor(
    private readonly limits: CartLimits,
    private readonly now: () => number = Date.now
  ) {}

  get size(): number {
    return this.entries.length;
  }

  stage(content: string, attachment?: Attachment): void {
    if (!content) throw new ValidationError('content is required');
    if (attachment) this.checkAttachment(attachment);

    this.entries.push({
      content,
      ...(attachment ? { attachment } : {}),
      stagedAt: this.now(),
    });
  }

  discardAll(): void {
    this.entries = [];
  }

  /** A fresh copy per call; mutating it does not touch the cart. */
  items(): readonly CartItem[] {
    return [...this.entries];
  }

  /** Display view, no raw bytes. */
  summary(): CartLine[] {
    return this.entries.map((it) => ({
      content: it.content,
      filename: it.attachment?.filename ?? null,
      bytes: it.attachment?.bytes.byteLength ?? 0,
    }));
  }

  private checkAttachment(a: Attachment): void {
    const ext = extensionOf(a.filename);
    if (!this.limits.allowedTypes.includes(ext)) {
      throw new ValidationError(
        `file type "${ext ? `.${ext}` : 'none'}" is not allowed (allowed: ${this.limits.allowedTypes.join(', ')})`
      );
    }
    if (a.bytes.byteLength === 0) throw new ValidationError(`${a.filename} is empty`);
    if (a.bytes.byteLength > this.limits.maxBytes) {
      throw new ValidationError(`${a.filename} is larger than ${this.limits.maxBytes} bytes`);
    }
  }
}
