import { Candle } from '@libs/market-data';
import { LiquiditySweep, SwingPoint } from './types';
import { round4 } from './math.util';

const RECENT_SWINGS = 10;

/** The last candle pierces a recent swing and closes back inside it. */
export const detectLiquiditySweeps = (
  candles: readonly Candle[],
  swings: readonly SwingPoint[],
): LiquiditySweep[] => {
  if (candles.length < 2 || swings.length === 0) return [];

  const index = candles.length - 1;
  const candle = candles[index];
  const range = candle.high - candle.low;
  if (range <= 0) return [];

  const sweeps: LiquiditySweep[] = [];
  for (const swing of swings.slice(-RECENT_SWINGS)) {
    if (swing.index >= index) continue;

    if (swing.kind === 'high' && candle.high > swing.price && candle.close <= swing.price) {
      const wick = candle.high - Math.max(candle.open, candle.close);
      if (wick > 0) {
        sweeps.push({
          index,
          swingIndex: swing.index,
          sweptLevel: swing.price,
          direction: 'bearish',
          rejection: round4(wick / range),
        });
      }
    }

    if (swing.kind === 'low' && candle.low < swing.price && candle.close >= swing.price) {
      const wick = Math.min(candle.open, candle.close) - candle.low;
      if (wick > 0) {
        sweeps.push({
          index,
          swingIndex: swing.index,
          sweptLevel: swing.price,
          direction: 'bullish',
          rejection: round4(wick / range),
        });
      }
    }
  }

  return sweeps;
};
