import {
  bigserial,
  boolean,
  doublePrecision,
  index,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';

export const SIGNAL_DIRECTIONS = ['BUY', 'SELL'] as const;

export const SIGNAL_STATES = [
  'CANDIDATE',
  'WAITING_FOR_ENTRY',
  'ENTRY_HIT',
  'TP_HIT',
  'SL_HIT',
  'EXPIRED',
  'CANCELLED',
] as const;

export const SIGNAL_STATUSES = ['ACTIVE', 'CLOSED', 'EXPIRED'] as const;

export const SIGNAL_RESULTS = ['PROFIT', 'LOSS', 'EXPIRED', 'CANCELLED'] as const;

export const TRANSITION_TRIGGERS = ['MARKET', 'EXPIRY', 'ZOMBIE_RECLAIM'] as const;

const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

export const signals = pgTable(
  'signals',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    asset: text('asset').notNull(),
    timeframe: text('timeframe').notNull(),
    direction: text('direction', { enum: SIGNAL_DIRECTIONS }).notNull(),
    entryPrice: doublePrecision('entry_price').notNull(),
    tp: doublePrecision('tp').notNull(),
    sl: doublePrecision('sl').notNull(),
    rewardRiskRatio: doublePrecision('reward_risk_ratio').notNull(),
    rawConfidence: doublePrecision('raw_confidence').notNull(),
    releaseConfidence: doublePrecision('release_confidence').notNull(),
    releaseExplanation: text('release_explanation').notNull(),
    state: text('state', { enum: SIGNAL_STATES }).notNull(),
    status: text('status', { enum: SIGNAL_STATUSES }).notNull(),
    result: text('result', { enum: SIGNAL_RESULTS }),
    generatedAt: timestampColumn('generated_at').notNull(),
    expiresAt: timestampColumn('expires_at').notNull(),
    entryHitAt: timestampColumn('entry_hit_at'),
    closedAt: timestampColumn('closed_at'),
    acknowledgedAt: timestampColumn('acknowledged_at'),
    released: boolean('released').notNull().default(false),
  },
  (table) => ({
    stateIdx: index('signals_state_idx').on(table.state),
    assetStateIdx: index('signals_asset_state_idx').on(table.asset, table.state),
  }),
);

export const signalValidationEvents = pgTable(
  'signal_validation_events',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    signalId: uuid('signal_id')
      .notNull()
      .references(() => signals.id),
    fromState: text('from_state', { enum: SIGNAL_STATES }).notNull(),
    toState: text('to_state', { enum: SIGNAL_STATES }).notNull(),
    trigger: text('trigger', { enum: TRANSITION_TRIGGERS }).notNull(),
    reason: text('reason').notNull(),
    candleTime: timestampColumn('candle_time'),
    candleOpen: doublePrecision('candle_open'),
    candleHigh: doublePrecision('candle_high'),
    candleLow: doublePrecision('candle_low'),
    candleClose: doublePrecision('candle_close'),
    observedAt: timestampColumn('observed_at').notNull(),
  },
  (table) => ({
    signalIdx: index('signal_validation_events_signal_idx').on(table.signalId),
  }),
);

export const schema = { signals, signalValidationEvents };

export type SignalRow = typeof signals.$inferSelect;
export type NewSignalRow = typeof signals.$inferInsert;
export type SignalValidationEventRow = typeof signalValidationEvents.$inferSelect;
