import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Candle } from '@libs/market-data';

export interface SessionWindows {
  primaryStartHour: number;
  overlapStartHour: number;
  overlapEndHour: number;
  rolloverStartHour: number;
  rolloverEndHour: number;
}

export const DEFAULT_SESSION_WINDOWS: SessionWindows = {
  primaryStartHour: 6,
  overlapStartHour: 13,
  overlapEndHour: 17,
  rolloverStartHour: 21,
  rolloverEndHour: 24,
};

export interface ReleaseComponents {
  raw: number;
  session: number;
  volatility: number;
  spread: number;
}

export interface ReleaseScore {
  releaseScore: number;
  explanation: string;
  components: ReleaseComponents;
}

const ATR_PERIOD = 14;
const QUIET_RATIO = 0.5;
const SPIKE_RATIO = 2.5;
const QUIET_FACTOR = 0.7;
const SPIKE_FACTOR = 0.6;
const ROLLOVER_FACTOR = 0.5;

const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;

const inWindow = (hour: number, start: number, end: number): boolean => hour >= start && hour < end;

export const sessionWeight = (now: Date, windows: SessionWindows = DEFAULT_SESSION_WINDOWS): number => {
  const hour = now.getUTCHours();
  if (inWindow(hour, windows.overlapStartHour, windows.overlapEndHour)) return 1.2;
  if (inWindow(hour, windows.primaryStartHour, windows.overlapStartHour)) return 1.0;
  return 0.8;
};

export const spreadFactor = (now: Date, windows: SessionWindows = DEFAULT_SESSION_WINDOWS): number =>
  inWindow(now.getUTCHours(), windows.rolloverStartHour, windows.rolloverEndHour) ? ROLLOVER_FACTOR : 1.0;

const trueRange = (candle: Candle, previous: Candle | undefined): number => {
  const range = candle.high - candle.low;
  if (!previous) return range;
  return Math.max(
    range,
    Math.abs(candle.high - previous.close),
    Math.abs(candle.low - previous.close),
  );
};

/** Last candle's range against the mean true range of the 14 candles before it. */
export const volatilityFactor = (candles: readonly Candle[]): number => {
  if (candles.length < ATR_PERIOD + 1) return 1.0;

  const last = candles[candles.length - 1];
  const start = candles.length - 1 - ATR_PERIOD;
  let total = 0;
  for (let i = start; i < candles.length - 1; i += 1) {
    total += trueRange(candles[i], i > 0 ? candles[i - 1] : undefined);
  }
  const baseline = total / ATR_PERIOD;
  if (baseline <= 0) return 1.0;

  const ratio = (last.high - last.low) / baseline;
  if (ratio < QUIET_RATIO) return QUIET_FACTOR;
  if (ratio > SPIKE_RATIO) return SPIKE_FACTOR;
  return 1.0;
};

export const formatReleaseExplanation = (components: ReleaseComponents, releaseScore: number): string =>
  [
    `raw=${components.raw.toFixed(4)}`,
    `session=${components.session.toFixed(2)}`,
    `volatility=${components.volatility.toFixed(2)}`,
    `spread=${components.spread.toFixed(2)}`,
    `release=${releaseScore.toFixed(4)}`,
  ].join(';');

export const parseReleaseExplanation = (
  explanation: string,
): (ReleaseComponents & { release: number }) | null => {
  const values = new Map<string, number>();
  for (const part of explanation.split(';')) {
    const [key, raw] = part.split('=');
    const value = Number(raw);
    if (!key || raw === undefined || !Number.isFinite(value)) return null;
    values.set(key.trim(), value);
  }

  const raw = values.get('raw');
  const session = values.get('session');
  const volatility = values.get('volatility');
  const spread = values.get('spread');
  const release = values.get('release');
  if (
    raw === undefined ||
    session === undefined ||
    volatility === undefined ||
    spread === undefined ||
    release === undefined
  ) {
    return null;
  }
  return { raw, session, volatility, spread, release };
};

export const calculateReleaseScore = (
  rawConfidence: number,
  now: Date,
  recentCandles: readonly Candle[],
  windows: SessionWindows = DEFAULT_SESSION_WINDOWS,
): ReleaseScore => {
  if (!Number.isFinite(rawConfidence)) {
    throw new RangeError(`rawConfidence must be finite, got ${rawConfidence}`);
  }

  const components: ReleaseComponents = {
    raw: Math.min(1, Math.max(0, rawConfidence)),
    session: sessionWeight(now, windows),
    volatility: volatilityFactor(recentCandles),
    spread: spreadFactor(now, windows),
  };
  const product = components.raw * components.session * components.volatility * components.spread;
  const releaseScore = round4(Math.min(1, Math.max(0, product)));

  return { releaseScore, explanation: formatReleaseExplanation(components, releaseScore), components };
};

@Injectable()
export class ConfidenceRefiner {
  private readonly windows: SessionWindows;
  readonly releaseThreshold: number;

  constructor(configService: ConfigService) {
    this.windows = {
      primaryStartHour: configService.get<number>('SESSION_PRIMARY_START_HOUR', DEFAULT_SESSION_WINDOWS.primaryStartHour),
      overlapStartHour: configService.get<number>('SESSION_OVERLAP_START_HOUR', DEFAULT_SESSION_WINDOWS.overlapStartHour),
      overlapEndHour: configService.get<number>('SESSION_OVERLAP_END_HOUR', DEFAULT_SESSION_WINDOWS.overlapEndHour),
      rolloverStartHour: configService.get<number>('ROLLOVER_START_HOUR', DEFAULT_SESSION_WINDOWS.rolloverStartHour),
      rolloverEndHour: configService.get<number>('ROLLOVER_END_HOUR', DEFAULT_SESSION_WINDOWS.rolloverEndHour),
    };
    this.releaseThreshold = configService.get<number>('RELEASE_THRESHOLD', 0.75);
  }

  calculateReleaseScore(rawConfidence: number, now: Date, recentCandles: readonly Candle[]): ReleaseScore {
    return calculateReleaseScore(rawConfidence, now, recentCandles, this.windows);
  }

  clearsGate(releaseScore: number): boolean {
    return releaseScore >= this.releaseThreshold;
  }
}
