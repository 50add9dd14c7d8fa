import { Candle } from '@libs/market-data';
import { BreakDirection, StructureEvent, SwingPoint, TrendContext } from './types';

const RECENT_SWINGS = 10;

export const bodyStrength = (candle: Candle): number => {
  const range = candle.high - candle.low;
  return range > 0 ? Math.abs(candle.close - candle.open) / range : 0;
};

/** Trend from swings already confirmed (n candles to their right) before `beforeIndex`. */
export const trendContext = (
  swings: readonly SwingPoint[],
  beforeIndex: number,
  sensitivity: number,
): TrendContext => {
  const confirmed = swings.filter((s) => s.index + sensitivity < beforeIndex);
  const highs = confirmed.filter((s) => s.kind === 'high').slice(-2);
  const lows = confirmed.filter((s) => s.kind === 'low').slice(-2);
  if (highs.length < 2 || lows.length < 2) return 'ranging';

  const higherHigh = highs[1].price > highs[0].price;
  const higherLow = lows[1].price > lows[0].price;
  const lowerHigh = highs[1].price < highs[0].price;
  const lowerLow = lows[1].price < lows[0].price;

  if (higherHigh && higherLow) return 'uptrend';
  if (lowerHigh && lowerLow) return 'downtrend';
  return 'ranging';
};

const findBreak = (
  candles: readonly Candle[],
  swing: SwingPoint,
  breakThreshold: number,
): { index: number; accepted: boolean } | null => {
  const level =
    swing.kind === 'high' ? swing.price * (1 + breakThreshold) : swing.price * (1 - breakThreshold);

  for (let k = swing.index + 1; k < candles.length; k += 1) {
    const candle = candles[k];
    if (swing.kind === 'high') {
      if (candle.close > level) return { index: k, accepted: true };
      if (candle.high > level) return { index: k, accepted: false };
    } else {
      if (candle.close < level) return { index: k, accepted: true };
      if (candle.low < level) return { index: k, accepted: false };
    }
  }
  return null;
};

/**
 * First break of each of the last swings. A break with the prevailing trend is a BOS,
 * anything else a CHoCH. Returned in break order.
 */
export const detectStructureEvents = (
  candles: readonly Candle[],
  swings: readonly SwingPoint[],
  sensitivity: number,
  breakThreshold: number,
): StructureEvent[] => {
  const events: StructureEvent[] = [];

  for (const swing of swings.slice(-RECENT_SWINGS)) {
    const found = findBreak(candles, swing, breakThreshold);
    if (!found) continue;

    const direction: BreakDirection = swing.kind === 'high' ? 'bullish' : 'bearish';
    const trend = trendContext(swings, found.index, sensitivity);
    const withTrend =
      (direction === 'bullish' && trend === 'uptrend') ||
      (direction === 'bearish' && trend === 'downtrend');
    const candle = candles[found.index];

    events.push({
      kind: withTrend ? 'BOS' : 'CHOCH',
      direction,
      swing,
      breakIndex: found.index,
      breakClose: candle.close,
      acceptedByClose: found.accepted,
      bodyStrength: bodyStrength(candle),
      trend,
    });
  }

  return events.sort((a, b) => a.breakIndex - b.breakIndex || a.swing.index - b.swing.index);
};
