import { describe, expect, it } from 'vitest';
import { buildTransition, rowToSignal, TransitionRequest } from '@libs/signals';
import { makeSignal, MINUTE, T0 } from './support/fixtures';
import { InMemorySignalStore } from './support/in-memory-signal-store';

const request = (at: number, trigger: 'EXPIRY' | 'ZOMBIE_RECLAIM'): TransitionRequest => {
  const toState = trigger === 'EXPIRY' ? 'EXPIRED' : 'CANCELLED';
  const transition = buildTransition('WAITING_FOR_ENTRY', toState, trigger, trigger.toLowerCase(), null, at);
  return {
    id: 'sig-1',
    expectedState: 'WAITING_FOR_ENTRY',
    patch: transition.patch,
    event: {
      signalId: 'sig-1',
      fromState: 'WAITING_FOR_ENTRY',
      toState,
      trigger,
      reason: transition.reason,
      candle: null,
      observedAt: at,
    },
  };
};

describe('conditional transitions', () => {
  it('lets exactly one of two racing writers win', async () => {
    const store = new InMemorySignalStore();
    store.seed(makeSignal());

    const [expired, cancelled] = await Promise.all([
      store.transition(request(T0 + 40 * MINUTE, 'EXPIRY')),
      store.transition(request(T0 + 40 * MINUTE, 'ZOMBIE_RECLAIM')),
    ]);

    expect([expired, cancelled]).toEqual([true, false]);
    expect((await store.findById('sig-1'))?.state).toBe('EXPIRED');
    expect((await store.listEvents('sig-1')).map((e) => e.trigger)).toEqual(['EXPIRY']);
  });

  it('claims the release once', async () => {
    const store = new InMemorySignalStore();
    store.seed(makeSignal({ released: false }));

    expect(await store.claimRelease('sig-1')).toBe(true);
    expect(await store.claimRelease('sig-1')).toBe(false);
  });

  it('hands a revoked release back to the next claimant', async () => {
    const store = new InMemorySignalStore();
    store.seed(makeSignal({ released: false }));

    expect(await store.revokeRelease('sig-1')).toBe(false);
    await store.claimRelease('sig-1');
    expect(await store.revokeRelease('sig-1')).toBe(true);
    expect(await store.claimRelease('sig-1')).toBe(true);
  });
});

describe('rowToSignal', () => {
  it('turns timestamps into epoch milliseconds', () => {
    const signal = makeSignal({ state: 'ENTRY_HIT', entryHitAt: T0 + 5 * MINUTE });
    const row = {
      ...signal,
      id: '5f0c6a2e-8f7b-4c1d-9e0a-2b3c4d5e6f70',
      generatedAt: new Date(signal.generatedAt),
      expiresAt: new Date(signal.expiresAt),
      entryHitAt: new Date(T0 + 5 * MINUTE),
      closedAt: null,
      acknowledgedAt: null,
    };

    expect(rowToSignal(row)).toEqual({ ...signal, id: '5f0c6a2e-8f7b-4c1d-9e0a-2b3c4d5e6f70' });
  });
});
