import { Candle } from '../types';

export const CANDLE_FEED = Symbol('CANDLE_FEED');

export interface LatestPrice {
  asset: string;
  price: number;
  ts: number;
}

export interface FeedSnapshot {
  provider: string;
  failures: number;
  lastError: string | null;
  lastSuccessAt: number | null;
}

export interface CandleFeed {
  readonly provider: string;
  /** Chronological, oldest first. Transport failures surface as FeedUnavailableError. */
  fetchCandles(asset: string, timeframe: string, lookback: number): Promise<Candle[]>;
  fetchLatestPrice(asset: string): Promise<LatestPrice>;
}
