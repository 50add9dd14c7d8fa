import { InvariantViolationError } from '@libs/core';
import { SignalLevels } from './types';

export const computeRewardRiskRatio = ({ entryPrice, tp, sl }: SignalLevels): number =>
  Math.abs(tp - entryPrice) / Math.abs(entryPrice - sl);

/** BUY: sl < entry < tp. SELL: tp < entry < sl. Never repaired, only rejected. */
export const assertValidLevels = (levels: SignalLevels): void => {
  const { direction, entryPrice, tp, sl } = levels;

  for (const [name, value] of [
    ['entryPrice', entryPrice],
    ['tp', tp],
    ['sl', sl],
  ] as const) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvariantViolationError(`${name} must be a positive finite number, got ${value}`);
    }
  }

  if (direction === 'BUY' && !(sl < entryPrice && entryPrice < tp)) {
    throw new InvariantViolationError(
      `BUY requires sl < entry < tp (sl=${sl}, entry=${entryPrice}, tp=${tp})`,
    );
  }
  if (direction === 'SELL' && !(tp < entryPrice && entryPrice < sl)) {
    throw new InvariantViolationError(
      `SELL requires tp < entry < sl (tp=${tp}, entry=${entryPrice}, sl=${sl})`,
    );
  }
};
