import { deepFreeze } from '@/utils/freeze.ts';
import { ValidationError } from '@/plan/errors.ts';
import type {
  AnalystRecommendation,
  Clock,
  CompleteTradePlan,
  RiskAllocation,
  TradingSetup,
} from '@/plan/types.ts';

export type PlanParts = {
  analyst: AnalystRecommendation;
  setup: TradingSetup | null;
  allocation: RiskAllocation | null;
};

const money = (value: number): string => value.toFixed(2);

export const buildExecutiveSummary = (parts: PlanParts): string => {
  const { analyst, setup, allocation } = parts;
  if (!setup || !allocation) {
    return `NO TRADE for ${analyst.symbol} (${analyst.conviction} conviction). ${analyst.rationale}`;
  }

  const position = allocation.sizeable
    ? `Position: ${allocation.positionSize} units (${money(allocation.positionValue)} notional), ` +
      `risking ${money(allocation.actualRiskAmount)} of ${money(allocation.riskAmount)} budget`
    : `Position: none, setup unsizeable at current risk tolerance (${money(setup.riskPerShare)} risk per unit ` +
      `vs ${money(allocation.riskAmount)} budget)`;

  return [
    `${setup.direction} ${setup.symbol} at ${money(setup.entry)}`,
    `Stop: ${money(setup.stopLoss)} (${money(setup.riskPerShare)} risk per unit)`,
    `Targets: ${setup.takeProfits.map(money).join(', ')} (R:R ${setup.rewardToRisk.toFixed(2)})`,
    position,
    `Conviction: ${analyst.conviction} (${(allocation.riskPct * 100).toFixed(2)}% risk)`,
  ].join('\n');
};

const crossCheck = (parts: PlanParts): string[] => {
  const { analyst, setup, allocation } = parts;
  const issues: string[] = [];

  if ((setup === null) !== (allocation === null)) {
    issues.push('setup and allocation must be both present or both absent');
  }
  if (analyst.direction === 'NO_TRADE') {
    if (setup || allocation) issues.push('a NO_TRADE recommendation cannot carry a setup or allocation');
    return issues;
  }
  if (!setup || !allocation) {
    issues.push(`a ${analyst.direction} recommendation requires a setup and allocation`);
    return issues;
  }
  if (setup.direction !== analyst.direction) {
    issues.push(`setup direction ${setup.direction} does not match analyst direction ${analyst.direction}`);
  }
  if (setup.symbol !== analyst.symbol) {
    issues.push(`setup symbol ${setup.symbol} does not match analyst symbol ${analyst.symbol}`);
  }
  if (allocation.conviction !== analyst.conviction) {
    issues.push(`allocation conviction ${allocation.conviction} does not match analyst conviction ${analyst.conviction}`);
  }
  if (allocation.riskPerShare !== setup.riskPerShare) {
    issues.push('allocation riskPerShare does not match the setup');
  }
  if (allocation.actualRiskAmount > allocation.riskAmount) {
    issues.push('allocation actual risk exceeds its budget');
  }
  return issues;
};

export const assemblePlan = (parts: PlanParts, clock: Clock): CompleteTradePlan => {
  const issues = crossCheck(parts);
  if (issues.length > 0) {
    throw new ValidationError(issues, parts);
  }

  const { analyst, setup, allocation } = parts;
  const base = {
    symbol: analyst.symbol,
    analyst,
    executiveSummary: buildExecutiveSummary(parts),
    createdAt: clock().toISOString(),
  };

  const plan: CompleteTradePlan =
    !setup || !allocation
      ? { ...base, status: 'NO_TRADE', setup: null, allocation: null, isExecutable: false }
      : { ...base, status: 'COMPLETE', setup, allocation, isExecutable: allocation.sizeable };
  return deepFreeze(plan);
};
