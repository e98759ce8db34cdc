import { createLogger } from '@/utils/logger.ts';
import { runAnalystStage } from '@/plan/analyst.ts';
import { runTraderStage } from '@/plan/trader.ts';
import { runRiskStage } from '@/plan/risk.ts';
import { assemblePlan } from '@/plan/assembler.ts';
import {
  CancellationError,
  InputError,
  PipelineError,
  isTradePlanError,
} from '@/plan/errors.ts';
import type { RetryPolicy } from '@/utils/retry.ts';
import type { ResearchClient, TradeReasoner, VisionAnalyzer } from '@/plan/capabilities.ts';
import type {
  Clock,
  CompleteTradePlan,
  PartialArtifacts,
  PlanRequest,
  RunContext,
  StageName,
} from '@/plan/types.ts';

const logger = createLogger('pipeline');

export type PipelineDeps = {
  vision: VisionAnalyzer;
  research: ResearchClient | null;
  reasoner: TradeReasoner;
  retry: RetryPolicy;
  scrapeLimit: number;
  clock?: Clock;
};

export type RunOptions = {
  signal?: AbortSignal;
};

const runId = (): string => `plan_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;

export const validateRequest = (request: PlanRequest): string[] => {
  const issues: string[] = [];
  if (request.symbol.trim().length === 0) issues.push('symbol is required');
  if (!Number.isFinite(request.equity) || request.equity <= 0) {
    issues.push(`equity must be a positive number, got ${request.equity}`);
  }
  if (request.chart.data.length === 0) issues.push('chart image is empty');
  return issues;
};

/**
 * Runs Analyst, Trader and Risk in order and assembles the plan. A NO_TRADE
 * recommendation skips Trader and Risk. Every failure surfaces as a
 * PipelineError naming the stage, carrying the artifacts finished so far.
 */
export const runTradePlan = async (
  request: PlanRequest,
  deps: PipelineDeps,
  options: RunOptions = {},
): Promise<CompleteTradePlan> => {
  const { signal } = options;
  const clock = deps.clock ?? (() => new Date());
  const id = runId();
  const partial: PartialArtifacts = {};
  let stage: StageName = 'input';

  const enter = (next: StageName) => {
    stage = next;
    if (signal?.aborted) {
      throw new CancellationError(`Run cancelled before the ${next} stage`, { cause: signal.reason });
    }
  };

  logger.info(`[${id}] planning ${request.symbol}`, { equity: request.equity, prompt: request.prompt !== null });

  try {
    const issues = validateRequest(request);
    if (issues.length > 0) throw new InputError(issues);

    enter('analyst');
    const analysis = await runAnalystStage(request, { ...deps, clock }, signal);
    partial.analyst = analysis.recommendation;
    logger.info(`[${id}] analyst: ${analysis.recommendation.direction} (${analysis.recommendation.conviction})`);

    const context: RunContext = {
      request,
      chartAnalysis: analysis.chartAnalysis,
      research: analysis.research,
      analyst: analysis.recommendation,
    };

    if (analysis.recommendation.direction === 'NO_TRADE') {
      enter('assembler');
      const plan = assemblePlan({ analyst: analysis.recommendation, setup: null, allocation: null }, clock);
      logger.info(`[${id}] no trade for ${request.symbol}`);
      return plan;
    }

    enter('trader');
    const setup = await runTraderStage(context, { reasoner: deps.reasoner, retry: deps.retry, clock }, signal);
    partial.setup = setup;
    logger.info(`[${id}] trader: entry ${setup.entry} stop ${setup.stopLoss}`, { takeProfits: setup.takeProfits });

    enter('risk');
    const allocation = runRiskStage({ ...context, setup }, clock);
    partial.allocation = allocation;
    logger.info(`[${id}] risk: ${allocation.positionSize} units at ${(allocation.riskPct * 100).toFixed(2)}%`);

    enter('assembler');
    const plan = assemblePlan({ analyst: analysis.recommendation, setup, allocation }, clock);
    logger.info(`[${id}] plan complete`, { executable: plan.isExecutable });
    return plan;
  } catch (err) {
    if (!isTradePlanError(err)) {
      logger.error(`[${id}] ${stage} stage threw`, { error: err instanceof Error ? err.message : String(err) });
      throw err;
    }
    const failure = new PipelineError(stage, err, partial);
    logger.warn(`[${id}] ${failure.message}`);
    throw failure;
  }
};
