import { Injectable } from '@nestjs/common';
import {
  Database,
  DatabaseService,
  NewSignalRow,
  SignalRow,
  SignalValidationEventRow,
  signalValidationEvents,
  signals,
} from '@libs/core';
import { and, asc, desc, eq, isNull, notInArray } from 'drizzle-orm';
import { TERMINAL_STATES } from '../lifecycle';
import { NewSignal, Signal, SignalPatch, ValidationEvent } from '../types';
import { ListSignalsOptions, SignalStore, TransitionRequest } from './signal-store';

const DEFAULT_LIST_LIMIT = 500;

const toDate = (ms: number): Date => new Date(ms);
const toMs = (date: Date | null): number | null => (date ? date.getTime() : null);

export const rowToSignal = (row: SignalRow): Signal => ({
  id: row.id,
  asset: row.asset,
  timeframe: row.timeframe,
  direction: row.direction,
  entryPrice: row.entryPrice,
  tp: row.tp,
  sl: row.sl,
  rewardRiskRatio: row.rewardRiskRatio,
  rawConfidence: row.rawConfidence,
  releaseConfidence: row.releaseConfidence,
  releaseExplanation: row.releaseExplanation,
  state: row.state,
  status: row.status,
  result: row.result,
  generatedAt: row.generatedAt.getTime(),
  expiresAt: row.expiresAt.getTime(),
  entryHitAt: toMs(row.entryHitAt),
  closedAt: toMs(row.closedAt),
  released: row.released,
  acknowledgedAt: toMs(row.acknowledgedAt),
});

const signalToRow = (signal: NewSignal): NewSignalRow => ({
  ...signal,
  generatedAt: toDate(signal.generatedAt),
  expiresAt: toDate(signal.expiresAt),
  entryHitAt: signal.entryHitAt === null ? null : toDate(signal.entryHitAt),
  closedAt: signal.closedAt === null ? null : toDate(signal.closedAt),
  acknowledgedAt: signal.acknowledgedAt === null ? null : toDate(signal.acknowledgedAt),
});

const patchToRow = (patch: SignalPatch): Partial<NewSignalRow> => ({
  state: patch.state,
  status: patch.status,
  ...(patch.result !== undefined ? { result: patch.result } : {}),
  ...(patch.entryHitAt !== undefined ? { entryHitAt: toDate(patch.entryHitAt) } : {}),
  ...(patch.closedAt !== undefined ? { closedAt: toDate(patch.closedAt) } : {}),
});

const rowToEvent = (row: SignalValidationEventRow): ValidationEvent => ({
  signalId: row.signalId,
  fromState: row.fromState,
  toState: row.toState,
  trigger: row.trigger,
  reason: row.reason,
  candle:
    row.candleTime !== null &&
    row.candleOpen !== null &&
    row.candleHigh !== null &&
    row.candleLow !== null &&
    row.candleClose !== null
      ? {
          timestamp: row.candleTime.getTime(),
          open: row.candleOpen,
          high: row.candleHigh,
          low: row.candleLow,
          close: row.candleClose,
        }
      : null,
  observedAt: row.observedAt.getTime(),
});

@Injectable()
export class DrizzleSignalStore implements SignalStore {
  private readonly db: Database;

  constructor(databaseService: DatabaseService) {
    this.db = databaseService.db;
  }

  async insert(signal: NewSignal): Promise<Signal> {
    const [row] = await this.db.insert(signals).values(signalToRow(signal)).returning();
    return rowToSignal(row);
  }

  async findById(id: string): Promise<Signal | null> {
    const rows = await this.db.select().from(signals).where(eq(signals.id, id)).limit(1);
    return rows.length ? rowToSignal(rows[0]) : null;
  }

  async listActive(): Promise<Signal[]> {
    const rows = await this.db
      .select()
      .from(signals)
      .where(notInArray(signals.state, [...TERMINAL_STATES]))
      .orderBy(asc(signals.generatedAt));
    return rows.map(rowToSignal);
  }

  async listAll(options: ListSignalsOptions = {}): Promise<Signal[]> {
    const rows = await this.db
      .select()
      .from(signals)
      .where(options.asset ? eq(signals.asset, options.asset) : undefined)
      .orderBy(desc(signals.generatedAt))
      .limit(options.limit ?? DEFAULT_LIST_LIMIT);
    return rows.map(rowToSignal);
  }

  async transition({ id, expectedState, patch, event }: TransitionRequest): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      const updated = await tx
        .update(signals)
        .set(patchToRow(patch))
        .where(and(eq(signals.id, id), eq(signals.state, expectedState)))
        .returning({ id: signals.id });

      if (updated.length === 0) {
        return false;
      }

      await tx.insert(signalValidationEvents).values({
        signalId: event.signalId,
        fromState: event.fromState,
        toState: event.toState,
        trigger: event.trigger,
        reason: event.reason,
        candleTime: event.candle ? toDate(event.candle.timestamp) : null,
        candleOpen: event.candle?.open ?? null,
        candleHigh: event.candle?.high ?? null,
        candleLow: event.candle?.low ?? null,
        candleClose: event.candle?.close ?? null,
        observedAt: toDate(event.observedAt),
      });
      return true;
    });
  }

  async claimRelease(id: string): Promise<boolean> {
    const updated = await this.db
      .update(signals)
      .set({ released: true })
      .where(and(eq(signals.id, id), eq(signals.released, false)))
      .returning({ id: signals.id });
    return updated.length > 0;
  }

  async revokeRelease(id: string): Promise<boolean> {
    const updated = await this.db
      .update(signals)
      .set({ released: false })
      .where(and(eq(signals.id, id), eq(signals.released, true)))
      .returning({ id: signals.id });
    return updated.length > 0;
  }

  async acknowledge(id: string, at: number): Promise<boolean> {
    const updated = await this.db
      .update(signals)
      .set({ acknowledgedAt: toDate(at) })
      .where(and(eq(signals.id, id), isNull(signals.acknowledgedAt)))
      .returning({ id: signals.id });
    return updated.length > 0;
  }

  async listEvents(signalId: string): Promise<ValidationEvent[]> {
    const rows = await this.db
      .select()
      .from(signalValidationEvents)
      .where(eq(signalValidationEvents.signalId, signalId))
      .orderBy(asc(signalValidationEvents.id));
    return rows.map(rowToEvent);
  }
}
