export * from './types';
export * from './signal-levels';
export * from './confidence-refiner';
export * from './outcome-resolver';
export * from './outcome-backfill';
export * from './lifecycle';
export * from './store/signal-store';
export * from './store/drizzle-signal-store';
export * from './notifications/signal-notification';
export * from './notifications/queue-signal-notifier';
export * from './notifications/release-publisher';
export * from './signals.service';
export * from './signals.module';
