export const DEFAULT_NOTIFICATIONS_QUEUE_NAME = 'signal-notifications';

/**
 * Queue names feed decorators, so they are read at import time. Entry points load `.env`
 * (`dotenv/config`) before importing anything that reaches this module.
 */
export const notificationsQueueName = (env: NodeJS.ProcessEnv = process.env): string =>
  env.QUEUE_NOTIFICATIONS_NAME?.trim() || DEFAULT_NOTIFICATIONS_QUEUE_NAME;

export const NOTIFICATIONS_QUEUE_NAME = notificationsQueueName();
