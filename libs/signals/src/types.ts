import {
  SIGNAL_DIRECTIONS,
  SIGNAL_RESULTS,
  SIGNAL_STATES,
  SIGNAL_STATUSES,
  TRANSITION_TRIGGERS,
} from '@libs/core';
import { CandleSnapshot } from '@libs/market-data';

export type SignalDirection = (typeof SIGNAL_DIRECTIONS)[number];
export type SignalState = (typeof SIGNAL_STATES)[number];
export type SignalStatus = (typeof SIGNAL_STATUSES)[number];
export type SignalResult = (typeof SIGNAL_RESULTS)[number];
export type TransitionTrigger = (typeof TRANSITION_TRIGGERS)[number];

export interface SignalLevels {
  direction: SignalDirection;
  entryPrice: number;
  tp: number;
  sl: number;
}

/** Times are epoch milliseconds. */
export interface Signal extends SignalLevels {
  id: string;
  asset: string;
  timeframe: string;
  rewardRiskRatio: number;
  rawConfidence: number;
  releaseConfidence: number;
  releaseExplanation: string;
  state: SignalState;
  status: SignalStatus;
  result: SignalResult | null;
  generatedAt: number;
  expiresAt: number;
  entryHitAt: number | null;
  closedAt: number | null;
  released: boolean;
  acknowledgedAt: number | null;
}

export type NewSignal = Omit<Signal, 'id'>;

/** What the generation path hands over before scoring. */
export interface SignalDraft extends SignalLevels {
  asset: string;
  timeframe: string;
  rawConfidence: number;
}

export interface SignalPatch {
  state: SignalState;
  status: SignalStatus;
  result?: SignalResult | null;
  entryHitAt?: number;
  closedAt?: number;
}

export interface ValidationEvent {
  signalId: string;
  fromState: SignalState;
  toState: SignalState;
  trigger: TransitionTrigger;
  reason: string;
  candle: CandleSnapshot | null;
  observedAt: number;
}

export interface SignalTransition {
  fromState: SignalState;
  toState: SignalState;
  trigger: TransitionTrigger;
  reason: string;
  candle: CandleSnapshot | null;
  patch: SignalPatch;
}
