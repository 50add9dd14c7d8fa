import { InjectQueue } from '@nestjs/bullmq';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NOTIFICATIONS_QUEUE_NAME, withTimeout } from '@libs/core';
import { Queue } from 'bullmq';
import { SignalNotification, SignalNotifier, signalNotificationSchema } from './signal-notification';

export const notificationJobName = (kind: SignalNotification['kind']): string =>
  kind === 'PUBLISHED' ? 'signalPublished' : 'signalTerminal';

/** One job per (signal, kind); a repeated notify is dropped by the queue. */
export const notificationJobId = (notification: Pick<SignalNotification, 'signalId' | 'kind'>): string =>
  `${notification.signalId}-${notification.kind.toLowerCase()}`;

export const enqueueSignalNotification = async (
  queue: Pick<Queue, 'add'>,
  notification: SignalNotification,
  options: { attempts: number; backoffDelayMs: number },
): Promise<void> => {
  const payload = signalNotificationSchema.parse(notification);
  await queue.add(notificationJobName(payload.kind), payload, {
    jobId: notificationJobId(payload),
    attempts: options.attempts,
    backoff: { type: 'exponential', delay: options.backoffDelayMs },
    removeOnComplete: true,
    removeOnFail: { count: 50 },
  });
};

@Injectable()
export class QueueSignalNotifier implements SignalNotifier {
  private readonly logger = new Logger(QueueSignalNotifier.name);
  private readonly attempts: number;
  private readonly backoffDelayMs: number;
  private readonly enqueueTimeoutMs: number;

  constructor(
    @InjectQueue(NOTIFICATIONS_QUEUE_NAME) private readonly queue: Pick<Queue, 'add'>,
    configService: ConfigService,
  ) {
    this.attempts = configService.get<number>('NOTIFY_JOB_ATTEMPTS', 5);
    this.backoffDelayMs = configService.get<number>('NOTIFY_JOB_BACKOFF_DELAY_MS', 3000);
    this.enqueueTimeoutMs = configService.get<number>('REDIS_COMMAND_TIMEOUT_MS', 2000);
  }

  async notify(notification: SignalNotification): Promise<void> {
    await withTimeout(
      enqueueSignalNotification(this.queue, notification, {
        attempts: this.attempts,
        backoffDelayMs: this.backoffDelayMs,
      }),
      this.enqueueTimeoutMs,
      'notification enqueue',
    );
    this.logger.log(
      JSON.stringify({
        event: 'notification_enqueued',
        kind: notification.kind,
        signalId: notification.signalId,
        newState: notification.newState,
      }),
    );
  }
}
