import { BullModule } from '@nestjs/bullmq';
import { Module } from '@nestjs/common';
import { CoreModule, NOTIFICATIONS_QUEUE_NAME } from '@libs/core';
import { ConfidenceRefiner } from './confidence-refiner';
import { QueueSignalNotifier } from './notifications/queue-signal-notifier';
import { SIGNAL_NOTIFIER } from './notifications/signal-notification';
import { SignalsService } from './signals.service';
import { DrizzleSignalStore } from './store/drizzle-signal-store';
import { SIGNAL_STORE } from './store/signal-store';

@Module({
  imports: [CoreModule, BullModule.registerQueue({ name: NOTIFICATIONS_QUEUE_NAME })],
  providers: [
    ConfidenceRefiner,
    SignalsService,
    { provide: SIGNAL_STORE, useClass: DrizzleSignalStore },
    { provide: SIGNAL_NOTIFIER, useClass: QueueSignalNotifier },
  ],
  exports: [ConfidenceRefiner, SignalsService, SIGNAL_STORE, SIGNAL_NOTIFIER],
})
export class SignalsModule {}
