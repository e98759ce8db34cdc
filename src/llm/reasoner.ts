import { ANALYST_SYSTEM, TRADER_SYSTEM, buildAnalystPrompt, buildTraderPrompt } from '@/llm/prompts.ts';
import type { LlmClient } from '@/llm/client.ts';
import type { TradeReasoner } from '@/plan/capabilities.ts';

/** Analyst calls use the deep tier; setups are mechanical enough for balanced. */
export const createTradeReasoner = (llm: LlmClient): TradeReasoner => ({
  recommend: (request, signal) =>
    llm.completeJson(
      { capability: 'reasoner', tier: 'deep', system: ANALYST_SYSTEM, content: buildAnalystPrompt(request) },
      signal,
    ),
  planSetup: (request, signal) =>
    llm.completeJson(
      { capability: 'reasoner', tier: 'balanced', system: TRADER_SYSTEM, content: buildTraderPrompt(request) },
      signal,
    ),
});
