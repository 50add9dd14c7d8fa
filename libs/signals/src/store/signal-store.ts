import { NewSignal, Signal, SignalPatch, SignalState, ValidationEvent } from '../types';

export const SIGNAL_STORE = Symbol('SIGNAL_STORE');

export interface TransitionRequest {
  id: string;
  /** The update applies only while the stored state still equals this. */
  expectedState: SignalState;
  patch: SignalPatch;
  event: ValidationEvent;
}

export interface ListSignalsOptions {
  limit?: number;
  asset?: string;
}

export interface SignalStore {
  insert(signal: NewSignal): Promise<Signal>;
  findById(id: string): Promise<Signal | null>;
  /** Non-terminal signals, oldest first. */
  listActive(): Promise<Signal[]>;
  listAll(options?: ListSignalsOptions): Promise<Signal[]>;
  /** Conditional update plus event append in one unit. False when the guard no longer matches. */
  transition(request: TransitionRequest): Promise<boolean>;
  /** Flips `released` false -> true. False if it was already released. */
  claimRelease(id: string): Promise<boolean>;
  /** Flips `released` back to false after the publish notification could not be enqueued. */
  revokeRelease(id: string): Promise<boolean>;
  acknowledge(id: string, at: number): Promise<boolean>;
  listEvents(signalId: string): Promise<ValidationEvent[]>;
}
