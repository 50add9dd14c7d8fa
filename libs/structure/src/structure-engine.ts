import { createHash } from 'crypto';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataInsufficientError } from '@libs/core';
import { assertValidCandle, Candle } from '@libs/market-data';
import {
  aggregateScores,
  scoreFairValueGap,
  scoreLiquiditySweep,
  scoreStructureEvent,
} from './evidence-scorer';
import { filterFakeBreakouts } from './fake-breakout-filter';
import { detectFairValueGaps } from './fvg-detector';
import { detectLiquiditySweeps } from './liquidity-sweeps';
import { dominanceRatio, resolveStructureState } from './state-resolver';
import { detectStructureEvents } from './structure-events';
import { detectSwings } from './swing-detector';
import {
  EvidenceItem,
  StructureEngineDescription,
  StructureEngineOptions,
  StructureState,
} from './types';

export const ENGINE_NAME = 'structure-state-engine';
export const ENGINE_VERSION = '1.5.0';

export const DEFAULT_STRUCTURE_OPTIONS: StructureEngineOptions = {
  sensitivity: 2,
  minCandles: 30,
  breakThreshold: 0.0001,
};

export const requiredCandles = (options: StructureEngineOptions): number =>
  Math.max(options.minCandles, 2 * options.sensitivity + 3);

const buildTraceId = (
  candles: readonly Candle[],
  symbol: string,
  timeframe: string,
  source: string,
  options: StructureEngineOptions,
): string => {
  const digest = createHash('sha256')
    .update(JSON.stringify({ symbol, timeframe, source, options, candles }))
    .digest('hex');
  return `struct-${digest.slice(0, 12)}`;
};

/**
 * Pure structure classification over a chronological candle window.
 * Same inputs give a deep-equal, frozen result.
 */
export const analyzeStructure = (
  candles: readonly Candle[],
  symbol: string,
  timeframe: string,
  source: string,
  options: StructureEngineOptions = DEFAULT_STRUCTURE_OPTIONS,
): StructureState => {
  const required = requiredCandles(options);
  if (candles.length < required) {
    throw new DataInsufficientError(required, candles.length);
  }
  candles.forEach(assertValidCandle);

  const swings = detectSwings(candles, options.sensitivity);
  const events = filterFakeBreakouts(
    detectStructureEvents(candles, swings, options.sensitivity, options.breakThreshold),
    candles,
  );
  const gaps = detectFairValueGaps(candles).filter((g) => !g.filled);
  const sweeps = detectLiquiditySweeps(candles, swings);

  const weighted = [
    ...events.map(scoreStructureEvent),
    ...gaps.map(scoreFairValueGap),
    ...sweeps.map(scoreLiquiditySweep),
  ];
  const scores = aggregateScores(weighted);
  const resolved = resolveStructureState(scores, events);

  const evidence: EvidenceItem[] = [...weighted.map((w) => w.item), ...resolved.items];

  return Object.freeze({
    direction: resolved.direction,
    confidence: resolved.confidence,
    dominanceRatio: dominanceRatio(candles, swings, resolved.direction),
    evidence: Object.freeze(evidence.map((item) => Object.freeze(item))),
    traceId: buildTraceId(candles, symbol, timeframe, source, options),
    generatedAt: candles[candles.length - 1].timestamp,
    symbol,
    timeframe,
    source,
    scores: Object.freeze(scores),
  });
};

@Injectable()
export class StructureEngine {
  private readonly logger = new Logger(StructureEngine.name);
  private readonly options: StructureEngineOptions;

  constructor(configService: ConfigService) {
    this.options = {
      sensitivity: configService.get<number>('STRUCTURE_SENSITIVITY', DEFAULT_STRUCTURE_OPTIONS.sensitivity),
      minCandles: configService.get<number>('STRUCTURE_MIN_CANDLES', DEFAULT_STRUCTURE_OPTIONS.minCandles),
      breakThreshold: DEFAULT_STRUCTURE_OPTIONS.breakThreshold,
    };
  }

  analyze(candles: readonly Candle[], symbol: string, timeframe: string, source: string): StructureState {
    const state = analyzeStructure(candles, symbol, timeframe, source, this.options);
    this.logger.debug(
      JSON.stringify({
        event: 'structure_analyzed',
        traceId: state.traceId,
        symbol,
        timeframe,
        direction: state.direction,
        confidence: state.confidence,
        evidence: state.evidence.length,
      }),
    );
    return state;
  }

  describeEngine(): StructureEngineDescription {
    return {
      engine: ENGINE_NAME,
      version: ENGINE_VERSION,
      deterministic: true,
      learnedComponents: false,
      sensitivity: this.options.sensitivity,
      minCandles: requiredCandles(this.options),
    };
  }
}
