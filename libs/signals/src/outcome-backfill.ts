import { CandleFeed, parseTimeframeToMs, sanitizeCandles } from '@libs/market-data';
import { computeRMultiple, Outcome, OutcomeSummary, resolveOutcome, summarizeOutcomes } from './outcome-resolver';
import { SignalStore } from './store/signal-store';
import { Signal } from './types';

export interface BackfilledOutcome {
  signalId: string;
  asset: string;
  direction: Signal['direction'];
  storedState: Signal['state'];
  outcome: Outcome;
  rMultiple: number;
}

export interface BackfillReport {
  outcomes: BackfilledOutcome[];
  skipped: Array<{ signalId: string; reason: string }>;
  summary: OutcomeSummary;
}

export interface BackfillOptions {
  limit: number;
  maxLookback: number;
  asset?: string;
}

/**
 * Replays stored signals against feed history with the same exit scan the watcher uses.
 * Signals that never touched entry count as EXPIRED; signals whose entry candle is older
 * than the fetched history are skipped rather than resolved.
 */
export const backfillOutcomes = async (
  store: Pick<SignalStore, 'listAll'>,
  feed: Pick<CandleFeed, 'fetchCandles'>,
  now: number,
  options: BackfillOptions,
): Promise<BackfillReport> => {
  const signals = await store.listAll({ limit: options.limit, asset: options.asset });
  const outcomes: BackfilledOutcome[] = [];
  const skipped: BackfillReport['skipped'] = [];

  for (const signal of signals) {
    const base = {
      signalId: signal.id,
      asset: signal.asset,
      direction: signal.direction,
      storedState: signal.state,
    };

    if (signal.entryHitAt === null) {
      outcomes.push({ ...base, outcome: 'EXPIRED', rMultiple: 0 });
      continue;
    }

    const timeframeMs = parseTimeframeToMs(signal.timeframe);
    if (!timeframeMs) {
      skipped.push({ signalId: signal.id, reason: `Unsupported timeframe ${signal.timeframe}` });
      continue;
    }

    const entryHitAt = signal.entryHitAt;
    const lookback = Math.min(options.maxLookback, Math.ceil((now - entryHitAt) / timeframeMs) + 2);
    try {
      const { accepted } = sanitizeCandles(await feed.fetchCandles(signal.asset, signal.timeframe, lookback));
      if (accepted.length === 0 || accepted[0].timestamp > entryHitAt) {
        skipped.push({ signalId: signal.id, reason: `History beyond lookback ${lookback}` });
        continue;
      }
      const end = signal.closedAt ?? now;
      const window = accepted.filter((c) => c.timestamp >= entryHitAt && c.timestamp <= end);
      const outcome = resolveOutcome(signal, window);
      outcomes.push({ ...base, outcome, rMultiple: computeRMultiple(outcome, signal) });
    } catch (error) {
      skipped.push({ signalId: signal.id, reason: error instanceof Error ? error.message : 'Unknown error' });
    }
  }

  return { outcomes, skipped, summary: summarizeOutcomes(outcomes) };
};
