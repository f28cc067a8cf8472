// src/server/session/registry.ts
import crypto from 'crypto';
import { Cart, type CartLimits } from '@/server/cart/cart';
import type { Directory } from '@/server/directory/directory';
import type { Identity } from '@/types/data';

export type SessionContext = {
  id: string;
  identity: Identity;
  cart: Cart;
  createdAt: number;
  lastSeenAt: number;
  committing: boolean;
};

export type SessionRegistryOptions = {
  idleMs: number;
  cartLimits: CartLimits;
  now?: () => number;
};

// ────────────────────────────────────────────────
// Helpers
// ────────────────────────────────────────────────
function newKey() {
  return crypto.randomBytes(24).toString('hex');
}

/**
 * Process-local sessions. A context is created at login and dropped at logout
 * or after `idleMs` without a request; its cart goes with it.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionContext>();
  private readonly now: () => number;

  constructor(private readonly opts: SessionRegistryOptions) {
    this.now = opts.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  login(department: string, group: string, secret: string, directory: Directory): SessionContext | null {
    if (!directory.authenticate(department, group, secret)) return null;

    const t = this.now();
    this.sweep(t);
    const ctx: SessionContext = {
      id: newKey(),
      identity: { department, group },
      cart: new Cart(this.opts.cartLimits, this.now),
      createdAt: t,
      lastSeenAt: t,
      committing: false,
    };
    this.sessions.set(ctx.id, ctx);
    return ctx;
  }

  /** Touches the session; expired sessions are removed and reported as missing. */
  get(id: string | undefined): SessionContext | null {
    if (!id) return null;
    const ctx = this.sessions.get(id);
    if (!ctx) return null;

    const t = this.now();
    if (this.expired(ctx, t)) {
      this.drop(ctx);
      return null;
    }
    ctx.lastSeenAt = t;
    return ctx;
  }

  logout(id: string | undefined): boolean {
    const ctx = id ? this.sessions.get(id) : undefined;
    if (!ctx) return false;
    this.drop(ctx);
    return true;
  }

  private expired(ctx: SessionContext, t: number): boolean {
    return t - ctx.lastSeenAt > this.opts.idleMs && !ctx.committing;
  }

  /** Drops every idle session, including ones whose cookie never comes back. */
  private sweep(t: number): void {
    for (const ctx of [...this.sessions.values()]) {
      if (this.expired(ctx, t)) this.drop(ctx);
    }
  }

  private drop(ctx: SessionContext): void {
    ctx.cart.discardAll();
    this.sessions.delete(ctx.id);
  }
}
