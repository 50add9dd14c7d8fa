import { SignalStore } from '../store/signal-store';
import { Signal } from '../types';
import { buildSignalNotification, SignalNotifier } from './signal-notification';

/**
 * Claims the release flag and enqueues the PUBLISHED notification. Resolves false when another
 * writer already holds the claim. If the enqueue fails the claim is revoked before rethrowing, so
 * the next watcher tick can publish the signal again.
 */
export const publishRelease = async (
  store: Pick<SignalStore, 'claimRelease' | 'revokeRelease'>,
  notifier: SignalNotifier,
  signal: Signal,
  now: number,
): Promise<boolean> => {
  if (!(await store.claimRelease(signal.id))) {
    return false;
  }

  try {
    await notifier.notify(buildSignalNotification('PUBLISHED', { ...signal, released: true }, now));
    return true;
  } catch (error) {
    await store.revokeRelease(signal.id);
    throw error;
  }
};
