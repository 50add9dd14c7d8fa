import {
  FairValueGap,
  FilteredStructureEvent,
  LiquiditySweep,
  StructureScores,
  WeightedEvidence,
} from './types';
import { clamp, round4 } from './math.util';

const BASE_WEIGHTS = { BOS: 0.6, CHOCH: 0.5 } as const;
const FVG_WEIGHT = 0.15;
const SWEEP_WEIGHT = 0.2;

export const eventStrength = (event: FilteredStructureEvent): number =>
  Math.min(1, 0.5 + 0.3 * event.bodyStrength + 0.2 * (event.acceptedByClose ? 1 : 0));

export const eventQuality = (event: FilteredStructureEvent): number => {
  const bodyAdjustment = event.bodyStrength > 0.7 ? 0.2 : event.bodyStrength < 0.3 ? -0.2 : 0;
  return clamp(0.7 + bodyAdjustment + (event.acceptedByClose ? 0.1 : 0));
};

export const scoreStructureEvent = (event: FilteredStructureEvent): WeightedEvidence => {
  const level = event.swing.price;
  const side = event.swing.kind === 'high' ? 'high' : 'low';

  if (event.isFake) {
    return {
      weight: 0,
      item: {
        type: 'FAKE_BREAKOUT',
        description: `Rejected ${event.direction} break of swing ${side} ${level} (${event.fakeReasons.join(', ')})`,
        direction: event.direction,
        priceLevel: level,
        strength: 0,
        candleIndex: event.breakIndex,
        value: 0,
      },
    };
  }

  const strength = eventStrength(event);
  const weight = round4(BASE_WEIGHTS[event.kind] * strength * eventQuality(event));
  return {
    weight,
    item: {
      type: event.kind,
      description: `${event.kind} ${event.direction}: swing ${side} ${level} broken at index ${event.breakIndex}${
        event.acceptedByClose ? ' with close acceptance' : ' by wick'
      }`,
      direction: event.direction,
      priceLevel: level,
      strength: round4(strength),
      candleIndex: event.breakIndex,
      value: weight,
    },
  };
};

export const scoreFairValueGap = (gap: FairValueGap): WeightedEvidence => {
  const weight = round4(FVG_WEIGHT * gap.quality);
  return {
    weight,
    item: {
      type: 'FVG',
      description: `Unfilled ${gap.direction} fair value gap ${gap.bottom}-${gap.top} (quality ${gap.quality})`,
      direction: gap.direction,
      priceLevel: gap.midpoint,
      strength: gap.quality,
      candleIndex: gap.index,
      value: weight,
    },
  };
};

export const scoreLiquiditySweep = (sweep: LiquiditySweep): WeightedEvidence => {
  const weight = round4(SWEEP_WEIGHT * sweep.rejection);
  return {
    weight,
    item: {
      type: 'LIQUIDITY_SWEEP',
      description: `Liquidity sweep of ${sweep.direction === 'bullish' ? 'low' : 'high'} ${sweep.sweptLevel} (rejection ${sweep.rejection})`,
      direction: sweep.direction,
      priceLevel: sweep.sweptLevel,
      strength: sweep.rejection,
      candleIndex: sweep.index,
      value: weight,
    },
  };
};

export const aggregateScores = (evidence: readonly WeightedEvidence[]): StructureScores => {
  const scores: StructureScores = { bullish: 0, bearish: 0 };
  for (const { item, weight } of evidence) {
    if (item.direction) scores[item.direction] += weight;
  }
  return { bullish: round4(scores.bullish), bearish: round4(scores.bearish) };
};
