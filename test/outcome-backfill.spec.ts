import { describe, expect, it } from 'vitest';
import { backfillOutcomes } from '@libs/signals';
import { candle, makeSignal, MINUTE, M5, T0 } from './support/fixtures';
import { StaticCandleFeed } from './support/fakes';
import { InMemorySignalStore } from './support/in-memory-signal-store';

const bar = (ts: number, high: number, low: number) => candle(ts, (high + low) / 2, high, low, (high + low) / 2);

describe('backfillOutcomes', () => {
  it('replays stored signals against history', async () => {
    const store = new InMemorySignalStore();
    store.seed(
      makeSignal({ id: 'won', asset: 'EUR/USD', state: 'TP_HIT', entryHitAt: T0 + M5, closedAt: T0 + 3 * M5 }),
      makeSignal({ id: 'never-entered', asset: 'GBP/USD', state: 'EXPIRED', generatedAt: T0 - M5 }),
      makeSignal({ id: 'odd-timeframe', asset: 'USD/JPY', timeframe: '7x', entryHitAt: T0, generatedAt: T0 - 2 * M5 }),
    );
    const feed = new StaticCandleFeed().set('EUR/USD', [
      bar(T0, 1.1015, 1.0975),
      bar(T0 + M5, 1.1025, 1.0995),
      bar(T0 + 2 * M5, 1.1015, 1.1005),
      bar(T0 + 3 * M5, 1.1025, 1.1005),
    ]);

    const report = await backfillOutcomes(store, feed, T0 + 60 * MINUTE, { limit: 100, maxLookback: 500 });

    expect(report.outcomes.map((o) => [o.signalId, o.outcome])).toEqual([
      ['won', 'HIT_TP'],
      ['never-entered', 'EXPIRED'],
    ]);
    expect(report.outcomes[0].rMultiple).toBeCloseTo(0.002 / 0.0015, 10);
    expect(report.skipped).toEqual([{ signalId: 'odd-timeframe', reason: 'Unsupported timeframe 7x' }]);
    expect(report.summary).toMatchObject({ count: 2, wins: 1, losses: 0, expired: 1, winRate: 1 });
    expect(feed.calls).toEqual([{ asset: 'EUR/USD', timeframe: '5m', lookback: 13 }]);
  });

  it('records a feed failure as skipped', async () => {
    const store = new InMemorySignalStore();
    store.seed(makeSignal({ state: 'ENTRY_HIT', entryHitAt: T0 }));

    const report = await backfillOutcomes(store, new StaticCandleFeed().fail('EUR/USD'), T0 + 10 * MINUTE, {
      limit: 10,
      maxLookback: 500,
    });

    expect(report.outcomes).toEqual([]);
    expect(report.skipped).toEqual([{ signalId: 'sig-1', reason: 'static: no data for EUR/USD' }]);
  });

  it('skips a closed signal whose entry is older than the fetched history', async () => {
    const store = new InMemorySignalStore();
    store.seed(makeSignal({ id: 'old-win', state: 'TP_HIT', entryHitAt: T0 + M5, closedAt: T0 + 3 * M5 }));
    const now = T0 + 1000 * M5;
    const feed = new StaticCandleFeed().set(
      'EUR/USD',
      Array.from({ length: 10 }, (_, i) => bar(now - (9 - i) * M5, 1.1005, 1.0995)),
    );

    const report = await backfillOutcomes(store, feed, now, { limit: 10, maxLookback: 10 });

    expect(report.outcomes).toEqual([]);
    expect(report.skipped).toEqual([{ signalId: 'old-win', reason: 'History beyond lookback 10' }]);
    expect(feed.calls).toEqual([{ asset: 'EUR/USD', timeframe: '5m', lookback: 10 }]);
  });
});
