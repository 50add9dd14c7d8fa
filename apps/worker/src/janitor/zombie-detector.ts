import { StaleSignalError } from '@libs/core';
import { Signal } from '@libs/signals';

export interface ZombieThresholds {
  pendingMinutes: number;
  activeMinutes: number;
}

/**
 * Pending signals age from generation, ENTRY_HIT ones from the entry touch.
 * Acknowledged or terminal signals are never zombies.
 */
export const detectZombie = (signal: Signal, now: number, thresholds: ZombieThresholds): StaleSignalError | null => {
  if (signal.acknowledgedAt !== null) return null;

  let since: number;
  let thresholdMinutes: number;
  switch (signal.state) {
    case 'CANDIDATE':
    case 'WAITING_FOR_ENTRY':
      since = signal.generatedAt;
      thresholdMinutes = thresholds.pendingMinutes;
      break;
    case 'ENTRY_HIT':
      since = signal.entryHitAt ?? signal.generatedAt;
      thresholdMinutes = thresholds.activeMinutes;
      break;
    default:
      return null;
  }

  const ageMinutes = Math.floor((now - since) / 60_000);
  return ageMinutes > thresholdMinutes
    ? new StaleSignalError(signal.id, signal.state, ageMinutes, thresholdMinutes)
    : null;
};
