import { describe, expect, it } from 'vitest';
import { ConfigService } from '@nestjs/config';
import { DataInsufficientError, MalformedCandleError } from '@libs/core';
import { Candle } from '@libs/market-data';
import {
  analyzeStructure,
  detectFairValueGaps,
  detectLiquiditySweeps,
  dominanceRatio,
  ENGINE_NAME,
  ENGINE_VERSION,
  FilteredStructureEvent,
  resolveStructureState,
  StructureEngine,
} from '@libs/structure';
import { candle, flatCandles, M5, T0 } from './support/fixtures';

const zigzag = (count: number): Candle[] => {
  const out: Candle[] = [];
  let previous = 1.1;
  for (let i = 0; i < count; i += 1) {
    const close = 1.1 + 0.002 * Math.sin(i / 3) + 0.0001 * i;
    out.push(candle(T0 + i * M5, previous, Math.max(previous, close) + 0.0003, Math.min(previous, close) - 0.0003, close));
    previous = close;
  }
  return out;
};

/**
 * Closes step through `pattern` from `start`. Up candles wick 0.5 above the close and 0.25
 * below the open; down candles the mirror, so every turn is a strict pivot.
 */
const staircase = (start: number, pattern: readonly number[], count: number): Candle[] => {
  const out: Candle[] = [];
  let open = start;
  for (let i = 0; i < count; i += 1) {
    const close = open + pattern[i % pattern.length];
    out.push(
      close >= open
        ? candle(T0 + i * M5, open, close + 0.5, open - 0.25, close)
        : candle(T0 + i * M5, open, open + 0.25, close - 0.5, close),
    );
    open = close;
  }
  return out;
};

const breaks = (state: ReturnType<typeof analyzeStructure>) =>
  state.evidence
    .filter((item) => item.type === 'BOS' || item.type === 'CHOCH')
    .map((item) => [item.type, item.direction, item.priceLevel, item.candleIndex]);

const event = (direction: 'bullish' | 'bearish', breakIndex: number, isFake = false): FilteredStructureEvent => ({
  kind: 'BOS',
  direction,
  swing: { index: breakIndex - 3, price: 1.1, kind: direction === 'bullish' ? 'high' : 'low', strength: 2 },
  breakIndex,
  breakClose: 1.1,
  acceptedByClose: true,
  bodyStrength: 0.8,
  trend: 'ranging',
  isFake,
  fakeReasons: [],
});

describe('analyzeStructure', () => {
  it('rejects windows shorter than the minimum', () => {
    expect(() => analyzeStructure(flatCandles(10, T0, M5), 'EUR/USD', '5m', 'test')).toThrow(DataInsufficientError);
  });

  it('rejects a malformed candle', () => {
    const candles = flatCandles(30, T0, M5);
    candles[12] = candle(candles[12].timestamp, 1.1, 1.09, 1.1, 1.1);
    expect(() => analyzeStructure(candles, 'EUR/USD', '5m', 'test')).toThrow(MalformedCandleError);
  });

  it('returns a deep-equal result for the same input', () => {
    const candles = zigzag(60);
    const first = analyzeStructure(candles, 'EUR/USD', '5m', 'test');
    const second = analyzeStructure(candles, 'EUR/USD', '5m', 'test');

    expect(second).toEqual(first);
    expect(first.traceId).toMatch(/^struct-[0-9a-f]{12}$/);
    expect(first.generatedAt).toBe(candles[59].timestamp);
    expect(first.confidence).toBeGreaterThanOrEqual(0);
    expect(first.confidence).toBeLessThanOrEqual(1);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('changes the trace id when the symbol changes', () => {
    const candles = zigzag(40);
    expect(analyzeStructure(candles, 'EUR/USD', '5m', 'test').traceId).not.toBe(
      analyzeStructure(candles, 'GBP/USD', '5m', 'test').traceId,
    );
  });

  it('reports a flat market as ranging with no breaks', () => {
    const state = analyzeStructure(flatCandles(30, T0, M5), 'EUR/USD', '5m', 'test');

    expect(state.direction).toBe('ranging');
    expect(state.confidence).toBe(0.6);
    expect(state.dominanceRatio).toBe(0);
    expect(state.scores).toEqual({ bullish: 0, bearish: 0 });
    expect(state.evidence).toEqual([{ type: 'RANGE', description: 'No structure breaks detected' }]);
  });
});

describe('analyzeStructure on trending markets', () => {
  const uptrend = staircase(100, [2, 2, 2, 2, -1, -1, -1], 33);
  const downtrend = staircase(200, [-2, -2, -2, -2, 1, 1, 1], 33);

  it('reads higher highs and higher lows as bullish', () => {
    const state = analyzeStructure(uptrend, 'EUR/USD', '5m', 'test');

    expect(state.direction).toBe('bullish');
    expect(state.confidence).toBe(0.98);
    expect(state.dominanceRatio).toBe(1);
    expect(state.scores.bearish).toBe(0);
    expect(state.scores.bullish).toBeCloseTo(2.9166, 4);
    expect(breaks(state)).toEqual([
      ['CHOCH', 'bullish', 108.5, 8],
      ['CHOCH', 'bullish', 113.5, 15],
      ['BOS', 'bullish', 118.5, 22],
      ['BOS', 'bullish', 123.5, 29],
    ]);
    expect(state.evidence[2]).toEqual({
      type: 'BOS',
      description: 'BOS bullish: swing high 118.5 broken at index 22 with close acceptance',
      direction: 'bullish',
      priceLevel: 118.5,
      strength: 0.9182,
      candleIndex: 22,
      value: 0.5509,
    });
    expect(state.evidence.filter((item) => item.type === 'FVG')).toHaveLength(10);
    expect(state.evidence.some((item) => item.type === 'RANGE' || item.type === 'CONTRADICTION')).toBe(false);
    expect(state.generatedAt).toBe(T0 + 32 * M5);
  });

  it('reads lower highs and lower lows as bearish', () => {
    const state = analyzeStructure(downtrend, 'EUR/USD', '5m', 'test');

    expect(state.direction).toBe('bearish');
    expect(state.confidence).toBe(0.98);
    expect(state.dominanceRatio).toBe(1);
    expect(state.scores.bullish).toBe(0);
    expect(state.scores.bearish).toBeCloseTo(2.4185, 4);
    expect(breaks(state)).toEqual([
      ['CHOCH', 'bearish', 191.5, 8],
      ['CHOCH', 'bearish', 186.5, 15],
      ['BOS', 'bearish', 181.5, 22],
      ['BOS', 'bearish', 176.5, 29],
    ]);
    expect(state.evidence.filter((item) => item.type === 'FVG').every((item) => item.direction === 'bearish')).toBe(true);
  });

  it('keeps the trace id stable per input', () => {
    const first = analyzeStructure(uptrend, 'EUR/USD', '5m', 'test');

    expect(first.traceId).toMatch(/^struct-[0-9a-f]{12}$/);
    expect(analyzeStructure(uptrend, 'EUR/USD', '5m', 'test').traceId).toBe(first.traceId);
    expect(analyzeStructure(downtrend, 'EUR/USD', '5m', 'test').traceId).not.toBe(first.traceId);
  });
});

describe('resolveStructureState', () => {
  it('follows the leading side when the latest valid break agrees', () => {
    const resolved = resolveStructureState({ bullish: 0.8, bearish: 0.2 }, [event('bearish', 5), event('bullish', 9)]);
    expect(resolved.direction).toBe('bullish');
    expect(resolved.confidence).toBe(0.6);
  });

  it('downgrades to ranging when the latest valid break disagrees', () => {
    const resolved = resolveStructureState({ bullish: 0.8, bearish: 0.2 }, [event('bullish', 5), event('bearish', 9)]);
    expect(resolved.direction).toBe('ranging');
    expect(resolved.confidence).toBe(0.4);
    expect(resolved.items[0]).toMatchObject({ type: 'CONTRADICTION', direction: 'bearish', candleIndex: 9 });
  });

  it('ignores fake breaks when looking for a contradiction', () => {
    const resolved = resolveStructureState({ bullish: 0.8, bearish: 0.2 }, [event('bullish', 5), event('bearish', 9, true)]);
    expect(resolved.direction).toBe('bullish');
  });

  it('stays ranging under the minimum total', () => {
    const resolved = resolveStructureState({ bullish: 0.1, bearish: 0.05 }, [event('bullish', 5)]);
    expect(resolved.direction).toBe('ranging');
    expect(resolved.confidence).toBe(0.6667);
  });

  it('stays ranging without a clear lead', () => {
    const resolved = resolveStructureState({ bullish: 0.5, bearish: 0.45 }, [event('bullish', 5)]);
    expect(resolved.direction).toBe('ranging');
    expect(resolved.confidence).toBe(0.9474);
  });

  it('caps directional confidence', () => {
    expect(resolveStructureState({ bullish: 1.5, bearish: 0 }, [event('bullish', 5)]).confidence).toBe(0.98);
  });
});

describe('supporting evidence', () => {
  const gapSeries = () => [
    candle(T0, 0.95, 1.0, 0.9, 0.98),
    candle(T0 + M5, 1.0, 1.21, 0.99, 1.2),
    candle(T0 + 2 * M5, 1.2, 1.3, 1.1, 1.25),
    candle(T0 + 3 * M5, 1.25, 1.35, 1.2, 1.3),
  ];

  it('finds an unfilled bullish fair value gap', () => {
    expect(detectFairValueGaps(gapSeries())).toEqual([
      { index: 1, direction: 'bullish', top: 1.1, bottom: 1.0, midpoint: 1.05, size: 1.1 - 1.0, quality: 0.7843, filled: false },
    ]);
  });

  it('marks the gap filled once price trades back to its midpoint', () => {
    const candles = [...gapSeries(), candle(T0 + 4 * M5, 1.3, 1.32, 1.04, 1.1)];
    expect(detectFairValueGaps(candles).map((g) => g.filled)).toEqual([true]);
  });

  it('detects a sweep of a swing high that closes back below it', () => {
    const candles = [
      candle(T0, 1.1, 1.15, 1.05, 1.12),
      candle(T0 + M5, 1.12, 1.2, 1.1, 1.15),
      candle(T0 + 2 * M5, 1.15, 1.17, 1.12, 1.16),
      candle(T0 + 3 * M5, 1.15, 1.25, 1.1, 1.18),
    ];
    const sweeps = detectLiquiditySweeps(candles, [{ index: 1, price: 1.2, kind: 'high', strength: 2 }]);

    expect(sweeps).toEqual([{ index: 3, swingIndex: 1, sweptLevel: 1.2, direction: 'bearish', rejection: 0.4667 }]);
  });

  it('measures dominance after the most recent swing', () => {
    const candles = [
      candle(T0, 1.0, 1.0, 1.0, 1.0),
      candle(T0 + M5, 1.0, 1.0, 1.0, 1.0),
      candle(T0 + 2 * M5, 1.0, 1.0, 1.0, 1.0),
      candle(T0 + 3 * M5, 1.1, 1.1, 1.1, 1.1),
      candle(T0 + 4 * M5, 1.2, 1.2, 1.2, 1.2),
      candle(T0 + 5 * M5, 0.9, 0.9, 0.9, 0.9),
      candle(T0 + 6 * M5, 1.0, 1.0, 1.0, 1.0),
    ];
    const swings = [{ index: 2, price: 1.0, kind: 'low' as const, strength: 2 }];

    expect(dominanceRatio(candles, swings, 'bullish')).toBe(0.5);
    expect(dominanceRatio(candles, swings, 'bearish')).toBe(0.25);
    expect(dominanceRatio(candles, swings, 'ranging')).toBe(0.5);
  });
});

describe('StructureEngine', () => {
  it('describes itself from configuration', () => {
    const engine = new StructureEngine(new ConfigService({ STRUCTURE_SENSITIVITY: 3, STRUCTURE_MIN_CANDLES: 5 }));

    expect(engine.describeEngine()).toEqual({
      engine: ENGINE_NAME,
      version: ENGINE_VERSION,
      deterministic: true,
      learnedComponents: false,
      sensitivity: 3,
      minCandles: 9,
    });
  });

  it('analyzes with its configured options', () => {
    const engine = new StructureEngine(new ConfigService({ STRUCTURE_SENSITIVITY: 2, STRUCTURE_MIN_CANDLES: 12 }));
    expect(engine.analyze(flatCandles(12, T0, M5), 'EUR/USD', '5m', 'test').direction).toBe('ranging');
  });
});
