import { MalformedCandleError } from '@libs/core';
import { Candle } from './types';

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

export const assertValidCandle = (candle: Candle): void => {
  const { timestamp, open, high, low, close, volume } = candle;

  if (!isFiniteNumber(timestamp) || timestamp < 0) {
    throw new MalformedCandleError(`Invalid candle timestamp: ${String(timestamp)}`, null);
  }
  if (![open, high, low, close, volume].every(isFiniteNumber)) {
    throw new MalformedCandleError('Candle has non-finite price or volume', timestamp);
  }
  if (volume < 0) {
    throw new MalformedCandleError(`Negative volume ${volume}`, timestamp);
  }
  if (low > Math.min(open, close)) {
    throw new MalformedCandleError(`low ${low} above min(open, close)`, timestamp);
  }
  if (high < Math.max(open, close)) {
    throw new MalformedCandleError(`high ${high} below max(open, close)`, timestamp);
  }
};

export const isValidCandle = (candle: Candle): boolean => {
  try {
    assertValidCandle(candle);
    return true;
  } catch {
    return false;
  }
};

export interface RejectedCandle {
  candle: Candle;
  reason: string;
}

/**
 * Drops malformed candles and any candle that does not advance the timestamp.
 * Input order is kept; the caller decides what to do with the rejects.
 */
export const sanitizeCandles = (
  candles: readonly Candle[],
): { accepted: Candle[]; rejected: RejectedCandle[] } => {
  const accepted: Candle[] = [];
  const rejected: RejectedCandle[] = [];
  let lastTimestamp = Number.NEGATIVE_INFINITY;

  for (const candle of candles) {
    try {
      assertValidCandle(candle);
    } catch (error) {
      rejected.push({ candle, reason: error instanceof Error ? error.message : 'Unknown error' });
      continue;
    }
    if (candle.timestamp <= lastTimestamp) {
      rejected.push({ candle, reason: `Non-increasing timestamp ${candle.timestamp}` });
      continue;
    }
    lastTimestamp = candle.timestamp;
    accepted.push(candle);
  }

  return { accepted, rejected };
};
