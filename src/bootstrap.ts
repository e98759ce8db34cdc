import { RETRY } from '@/utils/config.ts';
import { createAnthropicMessages, createLlmClient } from '@/llm/client.ts';
import { createVisionAnalyzer } from '@/llm/vision.ts';
import { createTradeReasoner } from '@/llm/reasoner.ts';
import { createSerperClient } from '@/data-sources/serper.ts';
import { createExplicitAccount } from '@/data-sources/account.ts';
import { createTradeAdvisor } from '@/plan/advisor.ts';
import type { AppConfig } from '@/utils/config.ts';
import type { MessagesApi } from '@/llm/types.ts';
import type { TradeAdvisor } from '@/plan/advisor.ts';

export type BootstrapOverrides = {
  messages?: MessagesApi;
  fetch?: typeof fetch;
};

export const buildAdvisor = (config: AppConfig, overrides: BootstrapOverrides = {}): TradeAdvisor => {
  if (!config.anthropic.apiKey && !overrides.messages) {
    throw new Error('ANTHROPIC_API_KEY is required');
  }

  const llm = createLlmClient(overrides.messages ?? createAnthropicMessages(config.anthropic), {
    models: config.anthropic.models,
    maxTokens: config.anthropic.maxTokens,
    timeoutMs: config.anthropic.timeoutMs,
  });

  const research = config.serper.apiKey
    ? createSerperClient({ ...config.serper, fetch: overrides.fetch })
    : null;

  return createTradeAdvisor({
    vision: createVisionAnalyzer(llm),
    research,
    reasoner: createTradeReasoner(llm),
    account: createExplicitAccount(),
    retry: RETRY,
    scrapeLimit: config.serper.scrapeLimit,
  });
};
