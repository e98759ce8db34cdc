import Anthropic from '@anthropic-ai/sdk';
import { logger } from '@/utils/logger.ts';
import {
  CancellationError,
  ExternalServiceError,
  ValidationError,
  isRetryableStatus,
} from '@/plan/errors.ts';
import type { AppConfig } from '@/utils/config.ts';
import type { CompletionRequest, MessagesApi, ModelTier } from '@/llm/types.ts';

export type LlmClientOptions = {
  models: Record<ModelTier, string>;
  maxTokens: number;
  timeoutMs: number;
};

export type LlmClient = {
  complete: (request: CompletionRequest, signal?: AbortSignal) => Promise<string>;
  completeJson: (request: CompletionRequest, signal?: AbortSignal) => Promise<unknown>;
};

/** Retries happen at the stage boundary, so the SDK's own retries are off. */
export const createAnthropicMessages = (config: AppConfig['anthropic']): MessagesApi =>
  new Anthropic({ apiKey: config.apiKey, maxRetries: 0, timeout: config.timeoutMs }).messages;

export const stripCodeFences = (raw: string): string =>
  raw
    .replace(/```json\n?/g, '')
    .replace(/```\n?/g, '')
    .trim();

const toServiceError = (request: CompletionRequest, model: string, err: unknown): Error => {
  const { capability } = request;
  if (err instanceof Anthropic.APIUserAbortError) {
    return new CancellationError(`${capability} request aborted`, { cause: err });
  }
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new ExternalServiceError(capability, `${model} timed out`, { cause: err });
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return new ExternalServiceError(capability, `${model} unreachable: ${err.message}`, { cause: err });
  }
  if (err instanceof Anthropic.APIError) {
    const status = typeof err.status === 'number' ? err.status : null;
    return new ExternalServiceError(capability, `${model} ${status ?? 'error'}: ${err.message}`, {
      status,
      retryable: status === null || isRetryableStatus(status),
      cause: err,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ExternalServiceError(capability, `${model} call failed: ${message}`, { cause: err });
};

export const createLlmClient = (messages: MessagesApi, options: LlmClientOptions): LlmClient => {
  const complete = async (request: CompletionRequest, signal?: AbortSignal): Promise<string> => {
    const model = options.models[request.tier];
    let response: Awaited<ReturnType<MessagesApi['create']>>;
    try {
      response = await messages.create(
        {
          model,
          max_tokens: request.maxTokens ?? options.maxTokens,
          system: request.system,
          messages: [{ role: 'user', content: request.content }],
        },
        { signal, timeout: options.timeoutMs },
      );
    } catch (err) {
      logger.warn(`LLM call failed (${request.tier}/${model})`, {
        error: err instanceof Error ? err.message : String(err),
      });
      throw toServiceError(request, model, err);
    }

    const text = response.content
      .flatMap((block) => (block.type === 'text' && typeof block.text === 'string' ? [block.text] : []))
      .join('\n')
      .trim();
    if (!text) {
      throw new ExternalServiceError(request.capability, `${model} returned no text`, { retryable: true });
    }
    return text;
  };

  const completeJson = async (request: CompletionRequest, signal?: AbortSignal): Promise<unknown> => {
    const raw = await complete(request, signal);
    try {
      return JSON.parse(stripCodeFences(raw));
    } catch (err) {
      logger.warn('Failed to parse LLM JSON response', {
        error: err instanceof Error ? err.message : String(err),
        raw: raw.substring(0, 200),
      });
      throw new ValidationError(`${request.capability} reply is not valid JSON`, raw);
    }
  };

  return { complete, completeJson };
};
