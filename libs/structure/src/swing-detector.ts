import { Candle } from '@libs/market-data';
import { SwingKind, SwingPoint } from './types';

const MAX_STRENGTH_OFFSET = 10;

const beats = (kind: SwingKind, a: number, b: number): boolean => (kind === 'high' ? a > b : a < b);

const swingStrength = (prices: readonly number[], index: number, n: number, kind: SwingKind): number => {
  let strength = n;
  const maxOffset = Math.min(MAX_STRENGTH_OFFSET, index, prices.length - index - 1);

  for (let offset = n + 1; offset <= maxOffset; offset += 1) {
    if (beats(kind, prices[index], prices[index - offset])) {
      strength += 0.5;
    }
    if (beats(kind, prices[index], prices[index + offset])) {
      strength += 0.5;
    } else {
      break;
    }
  }

  return Math.floor(strength);
};

const detectSide = (candles: readonly Candle[], n: number, kind: SwingKind): SwingPoint[] => {
  const prices = candles.map((c) => (kind === 'high' ? c.high : c.low));
  const swings: SwingPoint[] = [];

  for (let i = n; i < prices.length - n; i += 1) {
    let isPivot = true;
    for (let j = 1; j <= n && isPivot; j += 1) {
      isPivot = beats(kind, prices[i], prices[i - j]) && beats(kind, prices[i], prices[i + j]);
    }
    if (isPivot) {
      swings.push({ index: i, price: prices[i], kind, strength: swingStrength(prices, i, n, kind) });
    }
  }

  return swings;
};

/**
 * Strict pivots: a swing high beats the `n` highs on each side, a swing low the `n` lows.
 * Sorted by index; a candle that is both keeps its high first.
 */
export const detectSwings = (candles: readonly Candle[], sensitivity: number): SwingPoint[] => {
  const swings = [...detectSide(candles, sensitivity, 'high'), ...detectSide(candles, sensitivity, 'low')];
  // Array.prototype.sort is stable
  return swings.sort((a, b) => a.index - b.index);
};
