import { Candle } from '@libs/market-data';
import { bodyStrength } from './structure-events';
import { BreakDirection, FairValueGap } from './types';
import { mean, round4 } from './math.util';

const MAX_AGE_CANDLES = 50;
const MIN_GAP_OF_AVG_RANGE = 0.1;

const isFilled = (candles: readonly Candle[], gap: Omit<FairValueGap, 'filled'>): boolean =>
  candles
    .slice(gap.index + 2)
    .some((c) => (gap.direction === 'bullish' ? c.low <= gap.midpoint : c.high >= gap.midpoint));

export const detectFairValueGaps = (candles: readonly Candle[]): FairValueGap[] => {
  if (candles.length < 3) return [];

  const avgRange = mean(candles.map((c) => c.high - c.low));
  if (avgRange <= 0) return [];
  const minGap = avgRange * MIN_GAP_OF_AVG_RANGE;

  const gaps: FairValueGap[] = [];
  const start = Math.max(0, candles.length - MAX_AGE_CANDLES - 2);

  for (let i = start; i < candles.length - 2; i += 1) {
    const first = candles[i];
    const impulse = candles[i + 1];
    const third = candles[i + 2];

    const candidates: Array<{ direction: BreakDirection; top: number; bottom: number }> = [];
    if (first.high < third.low) {
      candidates.push({ direction: 'bullish', top: third.low, bottom: first.high });
    }
    if (first.low > third.high) {
      candidates.push({ direction: 'bearish', top: first.low, bottom: third.high });
    }

    for (const { direction, top, bottom } of candidates) {
      const size = top - bottom;
      if (size < minGap) continue;

      const gap = {
        index: i + 1,
        direction,
        top,
        bottom,
        midpoint: (top + bottom) / 2,
        size,
        quality: round4(0.6 * bodyStrength(impulse) + 0.4 * Math.min(1, size / avgRange)),
      };
      gaps.push({ ...gap, filled: isFilled(candles, gap) });
    }
  }

  return gaps;
};
