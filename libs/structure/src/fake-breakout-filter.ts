import { Candle } from '@libs/market-data';
import { FilteredStructureEvent, StructureEvent } from './types';

const WICK_RATIO_LIMIT = 0.6;
const WEAK_BODY_LIMIT = 0.3;
const FOLLOW_THROUGH_CANDLES = 2;
const MIN_FAKE_CRITERIA = 2;

const breakWickRatio = (event: StructureEvent, candle: Candle): number => {
  const range = candle.high - candle.low;
  if (range <= 0) return 0;
  const wick =
    event.direction === 'bullish'
      ? candle.high - Math.max(candle.open, candle.close)
      : Math.min(candle.open, candle.close) - candle.low;
  return wick / range;
};

export const fakeBreakoutReasons = (event: StructureEvent, candles: readonly Candle[]): string[] => {
  const candle = candles[event.breakIndex];
  const reasons: string[] = [];

  if (!event.acceptedByClose) reasons.push('no close acceptance');
  if (breakWickRatio(event, candle) > WICK_RATIO_LIMIT) reasons.push('long rejection wick');
  if (event.bodyStrength < WEAK_BODY_LIMIT) reasons.push('weak body');

  const following = candles.slice(event.breakIndex + 1, event.breakIndex + 1 + FOLLOW_THROUGH_CANDLES);
  const stayed = following.filter((c) =>
    event.direction === 'bullish' ? c.close > event.swing.price : c.close < event.swing.price,
  ).length;
  if (following.length === 0 || stayed * 2 < following.length) {
    reasons.push('no follow-through');
  }

  return reasons;
};

export const filterFakeBreakouts = (
  events: readonly StructureEvent[],
  candles: readonly Candle[],
): FilteredStructureEvent[] =>
  events.map((event) => {
    const fakeReasons = fakeBreakoutReasons(event, candles);
    return { ...event, isFake: fakeReasons.length >= MIN_FAKE_CRITERIA, fakeReasons };
  });
