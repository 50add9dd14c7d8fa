export interface Candle {
  /** Open time, epoch milliseconds. */
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** The OHLC part of a candle kept as transition evidence. */
export type CandleSnapshot = Pick<Candle, 'timestamp' | 'open' | 'high' | 'low' | 'close'>;

export const toCandleSnapshot = (candle: Candle): CandleSnapshot => ({
  timestamp: candle.timestamp,
  open: candle.open,
  high: candle.high,
  low: candle.low,
  close: candle.close,
});
