import { Candle } from '@libs/market-data';
import { Signal, SignalLevels } from './types';

export type Outcome = 'HIT_TP' | 'HIT_SL' | 'EXPIRED';

export interface ExitHit {
  exit: 'TP' | 'SL';
  candle: Candle;
}

export interface FindExitOptions {
  /** Candles before this are ignored; the candle at it can only stop out. */
  entryCandleTimestamp?: number | null;
}

const touchesSl = (levels: SignalLevels, candle: Candle): boolean =>
  levels.direction === 'BUY' ? candle.low <= levels.sl : candle.high >= levels.sl;

const touchesTp = (levels: SignalLevels, candle: Candle): boolean =>
  levels.direction === 'BUY' ? candle.high >= levels.tp : candle.low <= levels.tp;

/**
 * Chronological exit scan shared by the live watcher and offline resolution.
 * Stop-loss is checked before take-profit inside every candle.
 *
 * The candle that touched entry resolves to SL only. A poller that re-reads the latest candle on
 * its next tick could still book TP on it; this scan never does, so a replay of the same candles
 * gives the same answer however often it was polled. TP counts from the following candle.
 */
export const findExit = (
  levels: SignalLevels,
  candles: readonly Candle[],
  options: FindExitOptions = {},
): ExitHit | null => {
  const entryTs = options.entryCandleTimestamp ?? null;

  for (const candle of candles) {
    if (entryTs !== null && candle.timestamp < entryTs) continue;

    if (touchesSl(levels, candle)) return { exit: 'SL', candle };
    // whether price reached tp before the entry inside this candle is unknowable
    if (entryTs !== null && candle.timestamp === entryTs) continue;
    if (touchesTp(levels, candle)) return { exit: 'TP', candle };
  }
  return null;
};

export type OutcomeSignal = SignalLevels &
  Pick<Signal, 'rewardRiskRatio'> &
  Partial<Pick<Signal, 'entryHitAt'>>;

export const resolveOutcome = (signal: OutcomeSignal, candlesSinceEntry: readonly Candle[]): Outcome => {
  const hit = findExit(signal, candlesSinceEntry, { entryCandleTimestamp: signal.entryHitAt });
  if (!hit) return 'EXPIRED';
  return hit.exit === 'TP' ? 'HIT_TP' : 'HIT_SL';
};

export const computeRMultiple = (outcome: Outcome, signal: Pick<Signal, 'rewardRiskRatio'>): number => {
  switch (outcome) {
    case 'HIT_TP':
      return signal.rewardRiskRatio;
    case 'HIT_SL':
      return -1.0;
    case 'EXPIRED':
      return 0.0;
  }
};

export interface OutcomeSummary {
  count: number;
  wins: number;
  losses: number;
  expired: number;
  winRate: number;
  totalR: number;
  averageR: number;
}

export const summarizeOutcomes = (
  results: ReadonlyArray<{ outcome: Outcome; rMultiple: number }>,
): OutcomeSummary => {
  const wins = results.filter((r) => r.outcome === 'HIT_TP').length;
  const losses = results.filter((r) => r.outcome === 'HIT_SL').length;
  const expired = results.length - wins - losses;
  const totalR = results.reduce((sum, r) => sum + r.rMultiple, 0);
  const decided = wins + losses;

  return {
    count: results.length,
    wins,
    losses,
    expired,
    winRate: decided ? Math.round((wins / decided) * 10_000) / 10_000 : 0,
    totalR: Math.round(totalR * 10_000) / 10_000,
    averageR: results.length ? Math.round((totalR / results.length) * 10_000) / 10_000 : 0,
  };
};
