import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { describeError, FeedUnavailableError } from '@libs/core';
import {
  Candle,
  CANDLE_FEED,
  CandleFeed,
  parseTimeframeToMs,
  sanitizeCandles,
} from '@libs/market-data';
import {
  buildSignalNotification,
  evaluateTransitions,
  isTerminal,
  publishRelease,
  Signal,
  SIGNAL_NOTIFIER,
  SIGNAL_STORE,
  SignalNotifier,
  SignalNotification,
  SignalStore,
} from '@libs/signals';
import { TickSummary, WatcherHeartbeatService } from './watcher-heartbeat.service';

type CandleRequest = { asset: string; timeframe: string; lookback: number };

const requestKey = (asset: string, timeframe: string): string => `${asset}|${timeframe}`;

/** Bars needed to cover a signal's whole life plus a small margin. */
export const lookbackFor = (signal: Signal, timeframeMs: number, now: number, cap: number): number =>
  Math.min(cap, Math.max(1, Math.ceil((now - signal.generatedAt) / timeframeMs)) + 2);

@Injectable()
export class SignalWatcherService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SignalWatcherService.name);
  private intervalHandle?: NodeJS.Timeout;
  private isRunning = false;

  constructor(
    @Inject(SIGNAL_STORE) private readonly store: SignalStore,
    @Inject(CANDLE_FEED) private readonly feed: CandleFeed,
    @Inject(SIGNAL_NOTIFIER) private readonly notifier: SignalNotifier,
    private readonly heartbeat: WatcherHeartbeatService,
    private readonly configService: ConfigService,
  ) {}

  onModuleInit(): void {
    const enabled = this.configService.get<boolean>('WATCHER_ENABLED', true);
    if (!enabled) {
      this.logger.log('Signal watcher disabled (WATCHER_ENABLED=false).');
      return;
    }

    const intervalSeconds = this.configService.get<number>('WATCHER_INTERVAL_SECONDS', 30);
    this.heartbeat.markStarted(Date.now());
    this.intervalHandle = setInterval(() => {
      void this.runTick();
    }, intervalSeconds * 1000);

    void this.runTick();
  }

  onModuleDestroy(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = undefined;
    }
    this.heartbeat.markStopped();
  }

  /** One pass over every non-terminal signal. Resolves null when the tick was skipped or failed. */
  async runTick(now: number = Date.now()): Promise<TickSummary | null> {
    if (this.isRunning) {
      this.logger.warn('Watcher tick skipped because a previous tick is still active.');
      return null;
    }

    this.isRunning = true;
    const startedAt = Date.now();
    try {
      let active: Signal[];
      try {
        active = await this.store.listActive();
      } catch (error) {
        const message = describeError(error);
        this.logger.error(`Watcher tick failed to load active signals: ${message}`);
        await this.heartbeat.recordFailure(now, message);
        return null;
      }

      const summary: TickSummary = {
        tickAt: now,
        durationMs: 0,
        processed: 0,
        transitions: 0,
        staleGuards: 0,
        feedFailures: 0,
        malformedCandles: 0,
        errors: 0,
        notified: 0,
        notifyFailures: 0,
      };

      const fetchCandles = this.memoisedFetcher(this.planRequests(active, now));

      for (const signal of active) {
        summary.processed += 1;
        try {
          await this.processSignal(signal, now, fetchCandles, summary);
        } catch (error) {
          if (error instanceof FeedUnavailableError) {
            summary.feedFailures += 1;
            this.logger.warn(
              JSON.stringify({ event: 'feed_unavailable', signalId: signal.id, asset: signal.asset, message: error.message }),
            );
          } else {
            summary.errors += 1;
            this.logger.error(`Watcher failed for signal ${signal.id}: ${describeError(error)}`);
          }
        }
      }

      summary.durationMs = Date.now() - startedAt;
      this.logger.log(JSON.stringify({ event: 'watcher_tick_complete', ...summary }));
      await this.heartbeat.recordSuccess(summary);
      return summary;
    } finally {
      this.isRunning = false;
    }
  }

  private planRequests(active: readonly Signal[], now: number): Map<string, CandleRequest> {
    const cap = this.configService.get<number>('WATCHER_MAX_LOOKBACK', 500);
    const requests = new Map<string, CandleRequest>();

    for (const signal of active) {
      const timeframeMs = parseTimeframeToMs(signal.timeframe);
      if (!timeframeMs) continue;
      const key = requestKey(signal.asset, signal.timeframe);
      const lookback = lookbackFor(signal, timeframeMs, now, cap);
      const existing = requests.get(key);
      if (!existing || existing.lookback < lookback) {
        requests.set(key, { asset: signal.asset, timeframe: signal.timeframe, lookback });
      }
    }
    return requests;
  }

  private memoisedFetcher(requests: Map<string, CandleRequest>): (signal: Signal) => Promise<Candle[]> {
    const cache = new Map<string, Promise<Candle[]>>();

    return (signal) => {
      const key = requestKey(signal.asset, signal.timeframe);
      const request = requests.get(key);
      if (!request) {
        return Promise.reject(new Error(`Unsupported timeframe ${signal.timeframe}`));
      }
      let pending = cache.get(key);
      if (!pending) {
        pending = this.feed.fetchCandles(request.asset, request.timeframe, request.lookback);
        cache.set(key, pending);
      }
      return pending;
    };
  }

  private async processSignal(
    signal: Signal,
    now: number,
    fetchCandles: (signal: Signal) => Promise<Candle[]>,
    summary: TickSummary,
  ): Promise<void> {
    if (isTerminal(signal.state)) return;

    let current = signal;
    if (!signal.released) {
      current = { ...signal, released: await this.retryRelease(signal, now, summary) };
    }

    const fetched = await fetchCandles(signal);
    const { accepted, rejected } = sanitizeCandles(fetched);
    for (const { candle, reason } of rejected) {
      summary.malformedCandles += 1;
      this.logger.warn(
        JSON.stringify({ event: 'malformed_candle_skipped', signalId: signal.id, timestamp: candle.timestamp, reason }),
      );
    }

    for (const transition of evaluateTransitions(signal, accepted, now)) {
      const applied = await this.store.transition({
        id: signal.id,
        expectedState: transition.fromState,
        patch: transition.patch,
        event: {
          signalId: signal.id,
          fromState: transition.fromState,
          toState: transition.toState,
          trigger: transition.trigger,
          reason: transition.reason,
          candle: transition.candle,
          observedAt: now,
        },
      });

      if (!applied) {
        summary.staleGuards += 1;
        this.logger.debug(
          `Signal ${signal.id} no longer in ${transition.fromState}; skipping ${transition.toState}`,
        );
        return;
      }

      current = { ...current, ...transition.patch };
      summary.transitions += 1;
      this.logger.log(
        JSON.stringify({
          event: 'signal_transition',
          signalId: signal.id,
          asset: signal.asset,
          from: transition.fromState,
          to: transition.toState,
          trigger: transition.trigger,
          reason: transition.reason,
          candleTime: transition.candle ? new Date(transition.candle.timestamp).toISOString() : null,
        }),
      );

      if (isTerminal(transition.toState)) {
        await this.sendNotification(buildSignalNotification('TERMINAL', current, now), summary);
      }
    }
  }

  /** Publishes a signal whose PUBLISHED notification never made it onto the queue. */
  private async retryRelease(signal: Signal, now: number, summary: TickSummary): Promise<boolean> {
    try {
      if (await publishRelease(this.store, this.notifier, signal, now)) {
        summary.notified += 1;
        this.logger.log(JSON.stringify({ event: 'release_retried', signalId: signal.id }));
      }
      return true;
    } catch (error) {
      summary.notifyFailures += 1;
      this.logger.warn(
        JSON.stringify({ event: 'release_notification_failed', signalId: signal.id, message: describeError(error) }),
      );
      return false;
    }
  }

  /** The transition is already committed; a failed enqueue is logged and counted, never rethrown. */
  private async sendNotification(notification: SignalNotification, summary: TickSummary): Promise<void> {
    try {
      await this.notifier.notify(notification);
      summary.notified += 1;
    } catch (error) {
      summary.notifyFailures += 1;
      this.logger.error(
        JSON.stringify({
          event: 'notification_failed',
          kind: notification.kind,
          signalId: notification.signalId,
          newState: notification.newState,
          message: describeError(error),
        }),
      );
    }
  }
}
