export type DomainErrorCode =
  | 'DATA_INSUFFICIENT'
  | 'FEED_UNAVAILABLE'
  | 'MALFORMED_CANDLE'
  | 'INVARIANT_VIOLATION'
  | 'STALE_SIGNAL';

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The window is too short to analyse; the caller has to wait for more candles. */
export class DataInsufficientError extends DomainError {
  readonly code = 'DATA_INSUFFICIENT' as const;

  constructor(
    readonly required: number,
    readonly received: number,
  ) {
    super(`At least ${required} candles are required, received ${received}`);
  }
}

/** Transient upstream failure. Retried on the next tick, never persisted. */
export class FeedUnavailableError extends DomainError {
  readonly code = 'FEED_UNAVAILABLE' as const;

  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${provider}: ${message}`, options);
  }
}

export class MalformedCandleError extends DomainError {
  readonly code = 'MALFORMED_CANDLE' as const;

  constructor(
    message: string,
    readonly timestamp: number | null = null,
  ) {
    super(message);
  }
}

/** Entry / take-profit / stop-loss relationship is broken. Rejected before persistence. */
export class InvariantViolationError extends DomainError {
  readonly code = 'INVARIANT_VIOLATION' as const;
}

export class StaleSignalError extends DomainError {
  readonly code = 'STALE_SIGNAL' as const;

  constructor(
    readonly signalId: string,
    readonly state: string,
    readonly ageMinutes: number,
    readonly thresholdMinutes: number,
  ) {
    super(
      `Signal ${signalId} stuck in ${state} for ${ageMinutes}m (threshold ${thresholdMinutes}m)`,
    );
  }
}

export const isDomainError = (error: unknown): error is DomainError =>
  error instanceof DomainError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
