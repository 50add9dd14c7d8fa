import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { describeError } from '@libs/core';
import { Candle } from '@libs/market-data';
import { ConfidenceRefiner, ReleaseScore } from './confidence-refiner';
import { publishRelease } from './notifications/release-publisher';
import { SIGNAL_NOTIFIER, SignalNotifier } from './notifications/signal-notification';
import { assertValidLevels, computeRewardRiskRatio } from './signal-levels';
import { SIGNAL_STORE, SignalStore } from './store/signal-store';
import { Signal, SignalDraft, ValidationEvent } from './types';

export type CreateSignalResult =
  | { published: false; release: ReleaseScore }
  | { published: true; release: ReleaseScore; signal: Signal };

@Injectable()
export class SignalsService {
  private readonly logger = new Logger(SignalsService.name);
  private readonly entryValidityMs: number;

  constructor(
    @Inject(SIGNAL_STORE) private readonly store: SignalStore,
    @Inject(SIGNAL_NOTIFIER) private readonly notifier: SignalNotifier,
    private readonly confidenceRefiner: ConfidenceRefiner,
    configService: ConfigService,
  ) {
    this.entryValidityMs = configService.get<number>('ENTRY_VALIDITY_MINUTES', 35) * 60_000;
  }

  /**
   * Scores a draft and persists it only when it clears the release gate.
   * Level violations throw before anything is written. A failed PUBLISHED enqueue leaves the
   * signal stored with `released: false`; the watcher retries it.
   */
  async createSignal(draft: SignalDraft, now: number, recentCandles: readonly Candle[]): Promise<CreateSignalResult> {
    assertValidLevels(draft);

    const release = this.confidenceRefiner.calculateReleaseScore(draft.rawConfidence, new Date(now), recentCandles);
    if (!this.confidenceRefiner.clearsGate(release.releaseScore)) {
      this.logger.log(
        JSON.stringify({
          event: 'signal_below_release_gate',
          asset: draft.asset,
          direction: draft.direction,
          explanation: release.explanation,
        }),
      );
      return { published: false, release };
    }

    const inserted = await this.store.insert({
      asset: draft.asset,
      timeframe: draft.timeframe,
      direction: draft.direction,
      entryPrice: draft.entryPrice,
      tp: draft.tp,
      sl: draft.sl,
      rewardRiskRatio: computeRewardRiskRatio(draft),
      rawConfidence: draft.rawConfidence,
      releaseConfidence: release.releaseScore,
      releaseExplanation: release.explanation,
      state: 'WAITING_FOR_ENTRY',
      status: 'ACTIVE',
      result: null,
      generatedAt: now,
      expiresAt: now + this.entryValidityMs,
      entryHitAt: null,
      closedAt: null,
      released: false,
      acknowledgedAt: null,
    });

    let released = true;
    try {
      await publishRelease(this.store, this.notifier, inserted, now);
    } catch (error) {
      released = false;
      this.logger.warn(
        JSON.stringify({ event: 'release_notification_failed', signalId: inserted.id, message: describeError(error) }),
      );
    }
    const signal: Signal = { ...inserted, released };

    this.logger.log(
      JSON.stringify({
        event: 'signal_published',
        signalId: signal.id,
        asset: signal.asset,
        direction: signal.direction,
        releaseConfidence: signal.releaseConfidence,
        released,
        expiresAt: new Date(signal.expiresAt).toISOString(),
      }),
    );
    return { published: true, release, signal };
  }

  async acknowledge(id: string, now: number): Promise<boolean> {
    const acknowledged = await this.store.acknowledge(id, now);
    if (!acknowledged) {
      this.logger.debug(`Signal ${id} missing or already acknowledged`);
    }
    return acknowledged;
  }

  getSignal(id: string): Promise<Signal | null> {
    return this.store.findById(id);
  }

  listEvents(signalId: string): Promise<ValidationEvent[]> {
    return this.store.listEvents(signalId);
  }
}
