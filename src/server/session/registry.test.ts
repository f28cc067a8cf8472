import { describe, expect, it } from 'vitest';

import { Directory } from '@/server/directory/directory';
import { SessionRegistry } from './registry';

const directory = new Directory([
  { department: 'Office A', group: 'G1', secret: 'pw1' },
  { department: 'Office B', group: 'G2', secret: 'pw2' },
]);

function makeRegistry(clock: { t: number }) {
  return new SessionRegistry({
    idleMs: 1_000,
    cartLimits: { allowedTypes: ['png'], maxBytes: 100 },
    now: () => clock.t,
  });
}

describe('SessionRegistry', () => {
  it('creates a context bound to the identity on a good login', () => {
    const sessions = makeRegistry({ t: 5 });
    const ctx = sessions.login('Office A', 'G1', 'pw1', directory);

    expect(ctx).not.toBeNull();
    expect(ctx?.identity).toEqual({ department: 'Office A', group: 'G1' });
    expect(ctx?.cart.size).toBe(0);
    expect(ctx?.id).toMatch(/^[0-9a-f]{48}$/);
    expect(sessions.get(ctx?.id)).toBe(ctx);
  });

  it('returns null on a bad login and keeps nothing', () => {
    const sessions = makeRegistry({ t: 0 });
    expect(sessions.login('Office A', 'G1', 'pw2', directory)).toBeNull();
    expect(sessions.size).toBe(0);
  });

  it('gives every session its own cart', () => {
    const sessions = makeRegistry({ t: 0 });
    const a = sessions.login('Office A', 'G1', 'pw1', directory);
    const b = sessions.login('Office B', 'G2', 'pw2', directory);
    a?.cart.stage('only in a');

    expect(a?.cart.size).toBe(1);
    expect(b?.cart.size).toBe(0);
    expect(a?.id).not.toBe(b?.id);
  });

  it('drops the session and its cart on logout', () => {
    const sessions = makeRegistry({ t: 0 });
    const ctx = sessions.login('Office A', 'G1', 'pw1', directory);
    ctx?.cart.stage('draft');

    expect(sessions.logout(ctx?.id)).toBe(true);
    expect(ctx?.cart.size).toBe(0);
    expect(sessions.get(ctx?.id)).toBeNull();
    expect(sessions.logout(ctx?.id)).toBe(false);
  });

  it('expires idle sessions and keeps active ones', () => {
    const clock = { t: 0 };
    const sessions = makeRegistry(clock);
    const active = sessions.login('Office A', 'G1', 'pw1', directory);
    const idle = sessions.login('Office B', 'G2', 'pw2', directory);

    clock.t = 800;
    expect(sessions.get(active?.id)).toBe(active);
    clock.t = 1_500;
    expect(sessions.get(active?.id)).toBe(active);
    expect(sessions.get(idle?.id)).toBeNull();
    expect(sessions.size).toBe(1);
  });

  it('sweeps abandoned sessions on the next login', () => {
    const clock = { t: 0 };
    const sessions = makeRegistry(clock);
    for (let i = 0; i < 50; i++) {
      sessions.login('Office A', 'G1', 'pw1', directory)?.cart.stage('draft');
    }
    const busy = sessions.login('Office B', 'G2', 'pw2', directory);
    if (!busy) throw new Error('login failed');
    busy.committing = true;
    expect(sessions.size).toBe(51);

    clock.t = 1_001;
    const fresh = sessions.login('Office A', 'G1', 'pw1', directory);

    expect(sessions.size).toBe(2);
    expect(sessions.get(busy.id)).toBe(busy);
    expect(sessions.get(fresh?.id)).toBe(fresh);
  });

  it('keeps sessions still inside the idle window', () => {
    const clock = { t: 0 };
    const sessions = makeRegistry(clock);
    sessions.login('Office A', 'G1', 'pw1', directory);

    clock.t = 1_000;
    sessions.login('Office B', 'G2', 'pw2', directory);

    expect(sessions.size).toBe(2);
  });

  it('ignores missing ids', () => {
    const sessions = makeRegistry({ t: 0 });
    expect(sessions.get(undefined)).toBeNull();
    expect(sessions.get('nope')).toBeNull();
  });
});
