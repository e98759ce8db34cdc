import type Anthropic from '@anthropic-ai/sdk';

export type ModelTier = 'fast' | 'balanced' | 'deep';

export type LlmCapability = 'vision' | 'reasoner';

export type CompletionRequest = {
  capability: LlmCapability;
  tier: ModelTier;
  system: string;
  content: string | Anthropic.ContentBlockParam[];
  maxTokens?: number;
};

/** The slice of the Anthropic Messages API the client uses. */
export type MessagesApi = {
  create(
    body: Anthropic.MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal; timeout?: number },
  ): Promise<{ content: Array<{ type: string; text?: string }> }>;
};
