import { describe, expect, it } from 'vitest';
import { ConfigService } from '@nestjs/config';
import { InvariantViolationError } from '@libs/core';
import { ConfidenceRefiner, SignalDraft, SignalsService } from '@libs/signals';
import { MINUTE, T0 } from './support/fixtures';
import { RecordingNotifier } from './support/fakes';
import { InMemorySignalStore } from './support/in-memory-signal-store';

const setup = () => {
  const config = new ConfigService({ RELEASE_THRESHOLD: 0.75, ENTRY_VALIDITY_MINUTES: 35 });
  const store = new InMemorySignalStore();
  const notifier = new RecordingNotifier();
  const service = new SignalsService(store, notifier, new ConfidenceRefiner(config), config);
  return { store, notifier, service };
};

const draft = (overrides: Partial<SignalDraft> = {}): SignalDraft => ({
  asset: 'EUR/USD',
  timeframe: '5m',
  direction: 'BUY',
  entryPrice: 1.1,
  tp: 1.102,
  sl: 1.0985,
  rawConfidence: 0.8,
  ...overrides,
});

describe('SignalsService.createSignal', () => {
  it('publishes a signal that clears the release gate', async () => {
    const { store, notifier, service } = setup();

    const result = await service.createSignal(draft(), T0, []);

    expect(result.published).toBe(true);
    expect(result.release.releaseScore).toBe(0.96);
    expect(await store.findById('sig-1')).toMatchObject({
      state: 'WAITING_FOR_ENTRY',
      status: 'ACTIVE',
      generatedAt: T0,
      expiresAt: T0 + 35 * MINUTE,
      releaseConfidence: 0.96,
      released: true,
    });
    expect(notifier.sent).toEqual([
      {
        kind: 'PUBLISHED',
        signalId: 'sig-1',
        asset: 'EUR/USD',
        direction: 'BUY',
        entryPrice: 1.1,
        tp: 1.102,
        sl: 1.0985,
        releaseConfidence: 0.96,
        newState: 'WAITING_FOR_ENTRY',
        occurredAt: T0,
      },
    ]);
  });

  it('keeps the signal unreleased when the publish notification cannot be enqueued', async () => {
    const { store, notifier, service } = setup();
    notifier.failNext();

    const result = await service.createSignal(draft(), T0, []);

    expect(result).toMatchObject({ published: true, signal: { id: 'sig-1', released: false } });
    expect(await store.findById('sig-1')).toMatchObject({ state: 'WAITING_FOR_ENTRY', released: false });
    expect(notifier.sent).toEqual([]);
    expect(await store.claimRelease('sig-1')).toBe(true);
  });

  it('drops a signal below the gate without persisting it', async () => {
    const { store, notifier, service } = setup();

    const result = await service.createSignal(draft({ rawConfidence: 0.5 }), T0, []);

    expect(result).toMatchObject({ published: false, release: { releaseScore: 0.6 } });
    expect(await store.listAll()).toEqual([]);
    expect(notifier.sent).toEqual([]);
  });

  it.each([
    ['BUY with tp below entry', { tp: 1.09 }],
    ['BUY with sl above entry', { sl: 1.105 }],
    ['SELL with buy-side levels', { direction: 'SELL' as const }],
    ['non-positive entry', { entryPrice: 0 }],
  ])('rejects %s before anything is written', async (_label, overrides) => {
    const { store, service } = setup();

    await expect(service.createSignal(draft(overrides), T0, [])).rejects.toBeInstanceOf(InvariantViolationError);
    expect(await store.listAll()).toEqual([]);
  });
});

describe('SignalsService.acknowledge', () => {
  it('acknowledges once', async () => {
    const { service } = setup();
    const result = await service.createSignal(draft(), T0, []);
    if (!result.published) throw new Error('expected a published signal');

    expect(await service.acknowledge(result.signal.id, T0 + MINUTE)).toBe(true);
    expect(await service.acknowledge(result.signal.id, T0 + 2 * MINUTE)).toBe(false);
    expect((await service.getSignal(result.signal.id))?.acknowledgedAt).toBe(T0 + MINUTE);
  });
});
