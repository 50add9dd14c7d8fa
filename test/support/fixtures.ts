import { Candle } from '@libs/market-data';
import { Signal } from '@libs/signals';

export const T0 = Date.UTC(2024, 0, 15, 14, 0, 0);
export const MINUTE = 60_000;
export const M5 = 5 * MINUTE;

export const candle = (timestamp: number, open: number, high: number, low: number, close: number, volume = 100): Candle => ({
  timestamp,
  open,
  high,
  low,
  close,
  volume,
});

export const makeSignal = (overrides: Partial<Signal> = {}): Signal => ({
  id: 'sig-1',
  asset: 'EUR/USD',
  timeframe: '5m',
  direction: 'BUY',
  entryPrice: 1.1,
  tp: 1.102,
  sl: 1.0985,
  rewardRiskRatio: 0.002 / 0.0015,
  rawConfidence: 0.8,
  releaseConfidence: 0.96,
  releaseExplanation: 'raw=0.8000;session=1.20;volatility=1.00;spread=1.00;release=0.9600',
  state: 'WAITING_FOR_ENTRY',
  status: 'ACTIVE',
  result: null,
  generatedAt: T0,
  expiresAt: T0 + 35 * MINUTE,
  entryHitAt: null,
  closedAt: null,
  released: true,
  acknowledgedAt: null,
  ...overrides,
});

/** Flat candles with a fixed range, one per step, starting at `start`. */
export const flatCandles = (count: number, start: number, step: number, price = 1.1, range = 0.001): Candle[] =>
  Array.from({ length: count }, (_, i) =>
    candle(start + i * step, price, price + range / 2, price - range / 2, price),
  );
