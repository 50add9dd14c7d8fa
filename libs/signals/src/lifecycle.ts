import { Candle, toCandleSnapshot } from '@libs/market-data';
import { findExit } from './outcome-resolver';
import {
  Signal,
  SignalResult,
  SignalState,
  SignalStatus,
  SignalTransition,
  TransitionTrigger,
} from './types';

export const TERMINAL_STATES: ReadonlySet<SignalState> = new Set<SignalState>([
  'TP_HIT',
  'SL_HIT',
  'EXPIRED',
  'CANCELLED',
]);

export const isTerminal = (state: SignalState): boolean => TERMINAL_STATES.has(state);

export const statusForState = (state: SignalState): SignalStatus => {
  switch (state) {
    case 'EXPIRED':
      return 'EXPIRED';
    case 'TP_HIT':
    case 'SL_HIT':
    case 'CANCELLED':
      return 'CLOSED';
    default:
      return 'ACTIVE';
  }
};

export const resultForState = (state: SignalState): SignalResult | null => {
  switch (state) {
    case 'TP_HIT':
      return 'PROFIT';
    case 'SL_HIT':
      return 'LOSS';
    case 'EXPIRED':
      return 'EXPIRED';
    case 'CANCELLED':
      return 'CANCELLED';
    default:
      return null;
  }
};

const ALLOWED_TRANSITIONS: Record<SignalState, readonly SignalState[]> = {
  CANDIDATE: ['WAITING_FOR_ENTRY', 'CANCELLED'],
  WAITING_FOR_ENTRY: ['ENTRY_HIT', 'EXPIRED', 'CANCELLED'],
  ENTRY_HIT: ['TP_HIT', 'SL_HIT', 'CANCELLED'],
  TP_HIT: [],
  SL_HIT: [],
  EXPIRED: [],
  CANCELLED: [],
};

export const canTransition = (from: SignalState, to: SignalState): boolean =>
  ALLOWED_TRANSITIONS[from].includes(to);

export const buildTransition = (
  fromState: SignalState,
  toState: SignalState,
  trigger: TransitionTrigger,
  reason: string,
  candle: Candle | null,
  at: number,
): SignalTransition => {
  if (!canTransition(fromState, toState)) {
    throw new Error(`Illegal transition ${fromState} -> ${toState}`);
  }

  const terminal = isTerminal(toState);
  return {
    fromState,
    toState,
    trigger,
    reason,
    candle: candle ? toCandleSnapshot(candle) : null,
    patch: {
      state: toState,
      status: statusForState(toState),
      result: resultForState(toState),
      ...(toState === 'ENTRY_HIT' ? { entryHitAt: at } : {}),
      ...(terminal ? { closedAt: at } : {}),
    },
  };
};

const exitTransition = (signal: Signal, candles: readonly Candle[], entryHitAt: number): SignalTransition | null => {
  const hit = findExit(signal, candles, { entryCandleTimestamp: entryHitAt });
  if (!hit) return null;

  return hit.exit === 'SL'
    ? buildTransition('ENTRY_HIT', 'SL_HIT', 'MARKET', `Stop-loss ${signal.sl} touched`, hit.candle, hit.candle.timestamp)
    : buildTransition('ENTRY_HIT', 'TP_HIT', 'MARKET', `Take-profit ${signal.tp} touched`, hit.candle, hit.candle.timestamp);
};

/**
 * Ordered transitions the candles justify for one signal. Pure; the caller applies them
 * one by one with a conditional update and stops at the first that no longer matches.
 * Candles are assumed validated and strictly increasing.
 */
export const evaluateTransitions = (
  signal: Signal,
  candles: readonly Candle[],
  now: number,
): SignalTransition[] => {
  switch (signal.state) {
    case 'WAITING_FOR_ENTRY': {
      const window = candles.filter((c) => c.timestamp >= signal.generatedAt && c.timestamp < signal.expiresAt);
      const touch = window.find((c) =>
        signal.direction === 'BUY' ? c.low <= signal.entryPrice : c.high >= signal.entryPrice,
      );

      if (touch) {
        const entry = buildTransition(
          'WAITING_FOR_ENTRY',
          'ENTRY_HIT',
          'MARKET',
          `Entry ${signal.entryPrice} touched`,
          touch,
          touch.timestamp,
        );
        const exit = exitTransition(signal, candles, touch.timestamp);
        return exit ? [entry, exit] : [entry];
      }

      if (now >= signal.expiresAt) {
        const last = window.length ? window[window.length - 1] : null;
        return [
          buildTransition(
            'WAITING_FOR_ENTRY',
            'EXPIRED',
            'EXPIRY',
            `Entry window closed at ${new Date(signal.expiresAt).toISOString()} without touching ${signal.entryPrice}`,
            last,
            now,
          ),
        ];
      }
      return [];
    }

    case 'ENTRY_HIT': {
      if (signal.entryHitAt === null) return [];
      const exit = exitTransition(signal, candles, signal.entryHitAt);
      return exit ? [exit] : [];
    }

    default:
      return [];
  }
};
