import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { describeError } from '@libs/core';
import {
  buildSignalNotification,
  buildTransition,
  SIGNAL_NOTIFIER,
  SIGNAL_STORE,
  SignalNotifier,
  SignalStore,
} from '@libs/signals';
import { detectZombie, ZombieThresholds } from './zombie-detector';

@Injectable()
export class JanitorCron {
  private readonly logger = new Logger(JanitorCron.name);
  private isRunning = false;

  constructor(
    @Inject(SIGNAL_STORE) private readonly store: SignalStore,
    @Inject(SIGNAL_NOTIFIER) private readonly notifier: SignalNotifier,
    private readonly configService: ConfigService,
  ) {}

  @Cron(CronExpression.EVERY_5_MINUTES)
  async handleCron(): Promise<void> {
    const enabled = this.configService.get<boolean>('JANITOR_ENABLED', true);
    if (!enabled) {
      this.logger.debug('Janitor disabled (JANITOR_ENABLED=false).');
      return;
    }
    if (this.isRunning) {
      this.logger.warn('Janitor run skipped because a previous run is still active.');
      return;
    }

    this.isRunning = true;
    try {
      await this.reclaimZombies(Date.now());
    } catch (error) {
      this.logger.error(`Janitor run failed: ${describeError(error)}`);
    } finally {
      this.isRunning = false;
    }
  }

  /** Cancels stale, unacknowledged signals. Returns how many were reclaimed. */
  async reclaimZombies(now: number): Promise<number> {
    const thresholds: ZombieThresholds = {
      pendingMinutes: this.configService.get<number>('ZOMBIE_PENDING_MINUTES', 120),
      activeMinutes: this.configService.get<number>('ZOMBIE_ACTIVE_MINUTES', 1440),
    };

    const active = await this.store.listActive();
    let reclaimed = 0;

    for (const signal of active) {
      const stale = detectZombie(signal, now, thresholds);
      if (!stale) continue;

      try {
        const transition = buildTransition(signal.state, 'CANCELLED', 'ZOMBIE_RECLAIM', stale.message, null, now);
        const applied = await this.store.transition({
          id: signal.id,
          expectedState: signal.state,
          patch: transition.patch,
          event: {
            signalId: signal.id,
            fromState: signal.state,
            toState: 'CANCELLED',
            trigger: 'ZOMBIE_RECLAIM',
            reason: stale.message,
            candle: null,
            observedAt: now,
          },
        });
        if (!applied) {
          this.logger.debug(`Signal ${signal.id} moved on before reclamation`);
          continue;
        }

        reclaimed += 1;
        this.logger.warn(
          JSON.stringify({
            event: 'zombie_reclaimed',
            signalId: signal.id,
            asset: signal.asset,
            fromState: signal.state,
            ageMinutes: stale.ageMinutes,
            thresholdMinutes: stale.thresholdMinutes,
          }),
        );
        await this.notifier.notify(
          buildSignalNotification('TERMINAL', { ...signal, ...transition.patch }, now),
        );
      } catch (error) {
        this.logger.error(`Zombie reclamation failed for ${signal.id}: ${describeError(error)}`);
      }
    }

    if (reclaimed > 0) {
      this.logger.log(`Janitor run complete: scanned=${active.length} reclaimed=${reclaimed}`);
    }
    return reclaimed;
  }
}
