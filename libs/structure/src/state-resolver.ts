import { Candle } from '@libs/market-data';
import {
  EvidenceItem,
  FilteredStructureEvent,
  StructureDirection,
  StructureScores,
  SwingPoint,
} from './types';
import { round4 } from './math.util';

const MIN_TOTAL_SCORE = 0.3;
const LEAD_RATIO = 1.2;
const MAX_CONFIDENCE = 0.98;
const NO_BREAK_CONFIDENCE = 0.6;
const DOMINANCE_WINDOW = 20;

export interface ResolvedStructure {
  direction: StructureDirection;
  confidence: number;
  items: EvidenceItem[];
}

const rangingConfidence = ({ bullish, bearish }: StructureScores): number => {
  const total = bullish + bearish;
  if (total <= 0) return NO_BREAK_CONFIDENCE;
  return round4(Math.min(MAX_CONFIDENCE, 1 - Math.abs(bullish - bearish) / total));
};

export const resolveStructureState = (
  scores: StructureScores,
  events: readonly FilteredStructureEvent[],
): ResolvedStructure => {
  if (events.length === 0) {
    return {
      direction: 'ranging',
      confidence: NO_BREAK_CONFIDENCE,
      items: [{ type: 'RANGE', description: 'No structure breaks detected' }],
    };
  }

  const { bullish, bearish } = scores;
  const total = bullish + bearish;

  if (total < MIN_TOTAL_SCORE) {
    return {
      direction: 'ranging',
      confidence: rangingConfidence(scores),
      items: [{ type: 'RANGE', description: `Total evidence ${round4(total)} below ${MIN_TOTAL_SCORE}`, value: round4(total) }],
    };
  }

  const lead: StructureDirection =
    bullish >= LEAD_RATIO * bearish ? 'bullish' : bearish >= LEAD_RATIO * bullish ? 'bearish' : 'ranging';

  if (lead === 'ranging') {
    return {
      direction: 'ranging',
      confidence: rangingConfidence(scores),
      items: [{ type: 'RANGE', description: 'Neither side leads by the required margin' }],
    };
  }

  const valid = events.filter((e) => !e.isFake);
  const latest = valid.length ? valid[valid.length - 1] : undefined;
  if (latest && latest.direction !== lead) {
    return {
      direction: 'ranging',
      confidence: rangingConfidence(scores),
      items: [
        {
          type: 'CONTRADICTION',
          description: `${lead} evidence contradicted by latest ${latest.kind} ${latest.direction} at index ${latest.breakIndex}`,
          direction: latest.direction,
          candleIndex: latest.breakIndex,
        },
      ],
    };
  }

  const [leadScore, otherScore] = lead === 'bullish' ? [bullish, bearish] : [bearish, bullish];
  return {
    direction: lead,
    confidence: round4(Math.min(MAX_CONFIDENCE, leadScore - otherScore)),
    items: [],
  };
};

/** Share of recent closes on the resolved side of the most recent swing. */
export const dominanceRatio = (
  candles: readonly Candle[],
  swings: readonly SwingPoint[],
  direction: StructureDirection,
): number => {
  if (swings.length === 0) return 0;
  const pivot = swings[swings.length - 1];
  const window = candles.slice(pivot.index + 1).slice(-DOMINANCE_WINDOW);
  if (window.length === 0) return 0;

  const above = window.filter((c) => c.close > pivot.price).length / window.length;
  const below = window.filter((c) => c.close < pivot.price).length / window.length;

  switch (direction) {
    case 'bullish':
      return round4(above);
    case 'bearish':
      return round4(below);
    case 'ranging':
      return round4(Math.max(above, below));
  }
};
