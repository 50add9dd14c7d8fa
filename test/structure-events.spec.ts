import { describe, expect, it } from 'vitest';
import {
  detectStructureEvents,
  detectSwings,
  eventQuality,
  eventStrength,
  fakeBreakoutReasons,
  filterFakeBreakouts,
  scoreStructureEvent,
  StructureEvent,
} from '@libs/structure';
import { candle, M5, T0 } from './support/fixtures';

// swing high at index 2 (1.5), swing low at index 4 (0.9), index 6 closes above the high
const breakoutSeries = () => [
  candle(T0, 0.85, 1.0, 0.8, 0.95),
  candle(T0 + M5, 1.05, 1.2, 1.0, 1.15),
  candle(T0 + 2 * M5, 1.35, 1.5, 1.3, 1.45),
  candle(T0 + 3 * M5, 1.05, 1.2, 1.0, 1.15),
  candle(T0 + 4 * M5, 0.95, 1.1, 0.9, 1.05),
  candle(T0 + 5 * M5, 1.15, 1.3, 1.1, 1.25),
  candle(T0 + 6 * M5, 1.42, 1.6, 1.4, 1.58),
];

describe('structure events', () => {
  it('classifies a close above the only swing high as a bullish CHoCH', () => {
    const candles = breakoutSeries();
    const swings = detectSwings(candles, 2);
    expect(swings.map((s) => [s.index, s.kind])).toEqual([
      [2, 'high'],
      [4, 'low'],
    ]);

    const events = detectStructureEvents(candles, swings, 2, 0.0001);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      kind: 'CHOCH',
      direction: 'bullish',
      breakIndex: 6,
      breakClose: 1.58,
      acceptedByClose: true,
      trend: 'ranging',
    });
    expect(events[0].bodyStrength).toBeCloseTo(0.8, 6);
  });

  it('keeps a clean break with only a missing follow-through', () => {
    const candles = breakoutSeries();
    const events = detectStructureEvents(candles, detectSwings(candles, 2), 2, 0.0001);
    const [filtered] = filterFakeBreakouts(events, candles);

    expect(filtered.fakeReasons).toEqual(['no follow-through']);
    expect(filtered.isFake).toBe(false);
  });

  it('scores a valid CHoCH by base weight, strength and quality', () => {
    const candles = breakoutSeries();
    const [filtered] = filterFakeBreakouts(detectStructureEvents(candles, detectSwings(candles, 2), 2, 0.0001), candles);

    expect(eventStrength(filtered)).toBeCloseTo(0.94, 6);
    expect(eventQuality(filtered)).toBeCloseTo(1, 6);
    const scored = scoreStructureEvent(filtered);
    expect(scored.weight).toBe(0.47);
    expect(scored.item).toMatchObject({ type: 'CHOCH', direction: 'bullish', priceLevel: 1.5, candleIndex: 6, value: 0.47 });
  });
});

describe('fake breakout filter', () => {
  const wickOnlyBreak = (): { event: StructureEvent; candles: ReturnType<typeof candle>[] } => {
    const candles = [candle(T0, 1.0, 1.1, 0.95, 1.05), candle(T0 + M5, 1.0, 1.2, 0.99, 1.01)];
    return {
      candles,
      event: {
        kind: 'BOS',
        direction: 'bullish',
        swing: { index: 0, price: 1.1, kind: 'high', strength: 2 },
        breakIndex: 1,
        breakClose: 1.01,
        acceptedByClose: false,
        bodyStrength: 0.01 / 0.21,
        trend: 'uptrend',
      },
    };
  };

  it('flags a wick-only break with no body as fake', () => {
    const { event, candles } = wickOnlyBreak();

    expect(fakeBreakoutReasons(event, candles)).toEqual([
      'no close acceptance',
      'long rejection wick',
      'weak body',
      'no follow-through',
    ]);
  });

  it('turns a fake into zero-weight evidence', () => {
    const { event, candles } = wickOnlyBreak();
    const [filtered] = filterFakeBreakouts([event], candles);
    const scored = scoreStructureEvent(filtered);

    expect(scored.weight).toBe(0);
    expect(scored.item.type).toBe('FAKE_BREAKOUT');
    expect(scored.item.direction).toBe('bullish');
  });

  it('counts follow-through when the next closes hold beyond the level', () => {
    const { event, candles } = wickOnlyBreak();
    const withFollow = [...candles, candle(T0 + 2 * M5, 1.1, 1.16, 1.09, 1.15), candle(T0 + 3 * M5, 1.15, 1.2, 1.12, 1.18)];

    expect(fakeBreakoutReasons(event, withFollow)).not.toContain('no follow-through');
  });
});
