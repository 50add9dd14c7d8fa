import { SIGNAL_DIRECTIONS, SIGNAL_STATES } from '@libs/core';
import { z } from 'zod';
import { Signal } from '../types';

export const SIGNAL_NOTIFIER = Symbol('SIGNAL_NOTIFIER');

export const signalNotificationSchema = z.object({
  kind: z.enum(['PUBLISHED', 'TERMINAL']),
  signalId: z.string().min(1),
  asset: z.string().min(1),
  direction: z.enum(SIGNAL_DIRECTIONS),
  entryPrice: z.number().positive(),
  tp: z.number().positive(),
  sl: z.number().positive(),
  releaseConfidence: z.number().min(0).max(1),
  newState: z.enum(SIGNAL_STATES),
  occurredAt: z.number().int().nonnegative(),
});

export type SignalNotification = z.infer<typeof signalNotificationSchema>;
export type SignalNotificationKind = SignalNotification['kind'];

export interface SignalNotifier {
  notify(notification: SignalNotification): Promise<void>;
}

export const buildSignalNotification = (
  kind: SignalNotificationKind,
  signal: Signal,
  occurredAt: number,
): SignalNotification => ({
  kind,
  signalId: signal.id,
  asset: signal.asset,
  direction: signal.direction,
  entryPrice: signal.entryPrice,
  tp: signal.tp,
  sl: signal.sl,
  releaseConfidence: signal.releaseConfidence,
  newState: signal.state,
  occurredAt,
});
