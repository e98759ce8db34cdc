import { runTradePlan } from '@/plan/pipeline.ts';
import { InputError, PipelineError, isTradePlanError } from '@/plan/errors.ts';
import type { ChartImage } from '@/data-sources/types.ts';
import type { AccountInfoProvider } from '@/plan/capabilities.ts';
import type { PipelineDeps, RunOptions } from '@/plan/pipeline.ts';
import type { CompleteTradePlan } from '@/plan/types.ts';

export type AdvisorDeps = PipelineDeps & {
  account: AccountInfoProvider;
};

export type TradeRequestInput = {
  symbol?: string | null;
  chart?: ChartImage | null;
  equity?: number | null;
  prompt?: string | null;
};

export type TradeAdvisor = {
  submit: (input: TradeRequestInput, options?: RunOptions) => Promise<CompleteTradePlan>;
  hasResearch: boolean;
};

export const normalizeSymbol = (symbol: string): string => symbol.trim().toUpperCase();

export const normalizePrompt = (prompt: string | null | undefined): string | null => {
  const trimmed = prompt?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
};

const resolveEquity = async (
  account: AccountInfoProvider,
  explicit: number | null | undefined,
  issues: string[],
): Promise<number | null> => {
  try {
    return await account.getEquity(explicit);
  } catch (err) {
    if (err instanceof InputError) {
      issues.push(...err.issues);
      return null;
    }
    throw err;
  }
};

export const createTradeAdvisor = (deps: AdvisorDeps): TradeAdvisor => {
  const submit = async (input: TradeRequestInput, options: RunOptions = {}): Promise<CompleteTradePlan> => {
    const issues: string[] = [];
    const symbol = normalizeSymbol(input.symbol ?? '');
    if (symbol.length === 0) issues.push('symbol is required');

    const chart = input.chart ?? null;
    if (!chart) issues.push('chart image is required');

    let equity: number | null;
    try {
      equity = await resolveEquity(deps.account, input.equity, issues);
    } catch (err) {
      if (isTradePlanError(err)) throw new PipelineError('input', err);
      throw err;
    }

    if (!chart || equity === null || issues.length > 0) {
      throw new PipelineError('input', new InputError(issues));
    }

    return runTradePlan({ chart, symbol, equity, prompt: normalizePrompt(input.prompt) }, deps, options);
  };

  return { submit, hasResearch: deps.research !== null };
};
