import { deepFreeze } from '@/utils/freeze.ts';
import { callCapability } from '@/plan/boundary.ts';
import { ValidationError } from '@/plan/errors.ts';
import { formatIssues, traderReplySchema } from '@/plan/schemas.ts';
import { isActionable } from '@/plan/types.ts';
import type { RetryPolicy } from '@/utils/retry.ts';
import type { TradeReasoner } from '@/plan/capabilities.ts';
import type { ActionableDirection, Clock, RunContext, TradingSetup } from '@/plan/types.ts';

export type TraderStageDeps = {
  reasoner: TradeReasoner;
  retry: RetryPolicy;
  clock: Clock;
};

/** Ordering problems for a setup; empty when the levels are strictly ordered for the direction. */
export const checkLevelOrdering = (
  direction: ActionableDirection,
  entry: number,
  stopLoss: number,
  takeProfits: readonly number[],
): string[] => {
  const issues: string[] = [];
  const ahead = (a: number, b: number) => (direction === 'LONG' ? a > b : a < b);
  const word = direction === 'LONG' ? 'above' : 'below';

  if (!ahead(entry, stopLoss)) {
    issues.push(`${direction} entry ${entry} must be ${word} stopLoss ${stopLoss}`);
  }
  if (takeProfits.length > 0 && !ahead(takeProfits[0], entry)) {
    issues.push(`${direction} takeProfits[0] ${takeProfits[0]} must be ${word} entry ${entry}`);
  }
  for (let i = 1; i < takeProfits.length; i++) {
    if (!ahead(takeProfits[i], takeProfits[i - 1])) {
      issues.push(`${direction} takeProfits[${i}] ${takeProfits[i]} must be ${word} takeProfits[${i - 1}] ${takeProfits[i - 1]}`);
    }
  }
  return issues;
};

export const runTraderStage = async (
  context: RunContext,
  deps: TraderStageDeps,
  signal?: AbortSignal,
): Promise<TradingSetup> => {
  const { request, analyst } = context;
  const direction = analyst.direction;
  if (!isActionable(direction)) {
    throw new Error('Trader stage requires an actionable analyst recommendation');
  }

  const reply = await callCapability(
    'reasoner',
    (s) =>
      deps.reasoner.planSetup(
        {
          symbol: request.symbol,
          prompt: request.prompt,
          chartAnalysis: context.chartAnalysis,
          research: context.research,
          analyst,
        },
        s,
      ),
    { stage: 'trader', retry: deps.retry, signal },
  );

  const parsed = traderReplySchema.safeParse(reply);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error), reply);
  }

  const setup = parsed.data;
  if (setup.direction !== direction) {
    throw new ValidationError(`setup direction ${setup.direction} does not match analyst direction ${direction}`, reply);
  }
  const orderingIssues = checkLevelOrdering(direction, setup.entry, setup.stopLoss, setup.takeProfits);
  if (orderingIssues.length > 0) {
    throw new ValidationError(orderingIssues, reply);
  }

  const riskPerShare = Math.abs(setup.entry - setup.stopLoss);
  if (!(riskPerShare > 0)) {
    throw new ValidationError('riskPerShare must be positive', reply);
  }

  return deepFreeze({
    symbol: request.symbol,
    direction,
    entry: setup.entry,
    stopLoss: setup.stopLoss,
    takeProfits: [...setup.takeProfits],
    riskPerShare,
    rewardToRisk: Math.abs(setup.takeProfits[0] - setup.entry) / riskPerShare,
    chartStructure: setup.chartStructure,
    rationale: setup.rationale,
    createdAt: deps.clock().toISOString(),
  });
};
