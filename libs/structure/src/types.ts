export type BreakDirection = 'bullish' | 'bearish';

export type StructureDirection = BreakDirection | 'ranging';

export type EvidenceType =
  | 'BOS'
  | 'CHOCH'
  | 'FAKE_BREAKOUT'
  | 'FVG'
  | 'LIQUIDITY_SWEEP'
  | 'RANGE'
  | 'CONTRADICTION';

export interface EvidenceItem {
  type: EvidenceType;
  description: string;
  direction?: BreakDirection;
  priceLevel?: number;
  strength?: number;
  candleIndex?: number;
  /** Weight contributed to the directional score. */
  value?: number;
}

export interface StructureScores {
  bullish: number;
  bearish: number;
}

export interface StructureState {
  direction: StructureDirection;
  confidence: number;
  dominanceRatio: number;
  evidence: readonly EvidenceItem[];
  traceId: string;
  generatedAt: number;
  symbol: string;
  timeframe: string;
  source: string;
  scores: StructureScores;
}

export type SwingKind = 'high' | 'low';

export interface SwingPoint {
  index: number;
  price: number;
  kind: SwingKind;
  strength: number;
}

export type TrendContext = 'uptrend' | 'downtrend' | 'ranging';

export type StructureEventKind = 'BOS' | 'CHOCH';

export interface StructureEvent {
  kind: StructureEventKind;
  direction: BreakDirection;
  swing: SwingPoint;
  breakIndex: number;
  breakClose: number;
  acceptedByClose: boolean;
  bodyStrength: number;
  trend: TrendContext;
}

export interface FilteredStructureEvent extends StructureEvent {
  isFake: boolean;
  fakeReasons: string[];
}

export interface FairValueGap {
  /** Index of the impulse (middle) candle. */
  index: number;
  direction: BreakDirection;
  top: number;
  bottom: number;
  midpoint: number;
  size: number;
  quality: number;
  filled: boolean;
}

export interface LiquiditySweep {
  index: number;
  swingIndex: number;
  sweptLevel: number;
  direction: BreakDirection;
  rejection: number;
}

export interface WeightedEvidence {
  item: EvidenceItem;
  weight: number;
}

export interface StructureEngineOptions {
  sensitivity: number;
  minCandles: number;
  breakThreshold: number;
}

export interface StructureEngineDescription {
  engine: string;
  version: string;
  deterministic: true;
  learnedComponents: false;
  sensitivity: number;
  minCandles: number;
}
