import { RISK } from '@/utils/config.ts';
import { deepFreeze } from '@/utils/freeze.ts';
import { InputError, ValidationError } from '@/plan/errors.ts';
import type { Clock, ConvictionLevel, RiskAllocation, RiskContext } from '@/plan/types.ts';

const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max);

export const riskPctForConviction = (conviction: ConvictionLevel): number =>
  clamp(RISK.convictionRiskPct[conviction], RISK.minRiskPct, RISK.maxRiskPct);

export type PositionSizing = {
  riskAmount: number;
  positionSize: number;
  actualRiskAmount: number;
  positionValue: number;
};

/**
 * Largest whole position whose loss at the stop stays within `equity * riskPct`.
 * Floors, then steps down once when float rounding overshoots the budget.
 */
export const sizePosition = (
  equity: number,
  riskPct: number,
  riskPerShare: number,
  entry: number,
): PositionSizing => {
  if (!Number.isFinite(equity) || equity <= 0) {
    throw new InputError(`equity must be a positive number, got ${equity}`);
  }
  if (!Number.isFinite(riskPerShare) || riskPerShare <= 0) {
    throw new ValidationError(`riskPerShare must be positive, got ${riskPerShare}`);
  }

  const riskAmount = equity * riskPct;
  let positionSize = Math.max(0, Math.floor(riskAmount / riskPerShare));
  if (!Number.isSafeInteger(positionSize)) {
    throw new ValidationError('position size exceeds safe integer range', { equity, riskPct, riskPerShare });
  }
  if (positionSize > 0 && positionSize * riskPerShare > riskAmount) {
    positionSize -= 1;
  }

  return {
    riskAmount,
    positionSize,
    actualRiskAmount: positionSize * riskPerShare,
    positionValue: positionSize * entry,
  };
};

const pct = (value: number): string => `${(value * 100).toFixed(2)}%`;

export const runRiskStage = (context: RiskContext, clock: Clock): RiskAllocation => {
  const { request, analyst, setup } = context;
  const riskPct = riskPctForConviction(analyst.conviction);
  const sizing = sizePosition(request.equity, riskPct, setup.riskPerShare, setup.entry);
  const sizeable = sizing.positionSize > 0;

  const rationale = sizeable
    ? `${analyst.conviction} conviction risks ${pct(riskPct)} of ${request.equity.toFixed(2)} equity ` +
      `(${sizing.riskAmount.toFixed(2)}). At ${setup.riskPerShare.toFixed(2)} risk per share that buys ` +
      `${sizing.positionSize} units, risking ${sizing.actualRiskAmount.toFixed(2)}.`
    : `Setup is unsizeable at current risk tolerance: ${setup.riskPerShare.toFixed(2)} risk per share ` +
      `exceeds the ${sizing.riskAmount.toFixed(2)} budget (${pct(riskPct)} of ${request.equity.toFixed(2)} equity).`;

  return deepFreeze({
    equity: request.equity,
    conviction: analyst.conviction,
    riskPct,
    riskAmount: sizing.riskAmount,
    riskPerShare: setup.riskPerShare,
    positionSize: sizing.positionSize,
    actualRiskAmount: sizing.actualRiskAmount,
    positionValue: sizing.positionValue,
    sizeable,
    rationale,
    createdAt: clock().toISOString(),
  });
};
