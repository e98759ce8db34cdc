import Anthropic from '@anthropic-ai/sdk';
import { describe, expect, it, vi } from 'vitest';
import { createLlmClient, stripCodeFences } from '@/llm/client.ts';
import { createVisionAnalyzer } from '@/llm/vision.ts';
import { createTradeReasoner } from '@/llm/reasoner.ts';
import { CancellationError, ExternalServiceError, ValidationError } from '@/plan/errors.ts';
import { chart } from './fixtures.ts';
import type { MessagesApi } from '@/llm/types.ts';

const models = { fast: 'model-fast', balanced: 'model-balanced', deep: 'model-deep' };

const textReply = (text: string) => ({ content: [{ type: 'text', text }] });

const makeClient = (create: MessagesApi['create']) =>
  createLlmClient({ create }, { models, maxTokens: 256, timeoutMs: 5000 });

describe('stripCodeFences', () => {
  it('removes json fences', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });
});

describe('createLlmClient', () => {
  it('sends the tier model, system prompt and timeout', async () => {
    const create = vi.fn<MessagesApi['create']>().mockResolvedValue(textReply('hello'));
    const text = await makeClient(create).complete({ capability: 'reasoner', tier: 'deep', system: 'sys', content: 'hi' });

    expect(text).toBe('hello');
    expect(create).toHaveBeenCalledWith(
      {
        model: 'model-deep',
        max_tokens: 256,
        system: 'sys',
        messages: [{ role: 'user', content: 'hi' }],
      },
      { signal: undefined, timeout: 5000 },
    );
  });

  it('joins text blocks and skips the rest', async () => {
    const create = vi.fn<MessagesApi['create']>().mockResolvedValue({
      content: [{ type: 'text', text: 'one' }, { type: 'tool_use' }, { type: 'text', text: 'two' }],
    });
    expect(await makeClient(create).complete({ capability: 'vision', tier: 'fast', system: '', content: 'x' })).toBe(
      'one\ntwo',
    );
  });

  it('parses fenced JSON replies', async () => {
    const create = vi.fn<MessagesApi['create']>().mockResolvedValue(textReply('```json\n{"direction":"LONG"}\n```'));
    const reply = await makeClient(create).completeJson({ capability: 'reasoner', tier: 'deep', system: '', content: 'x' });
    expect(reply).toEqual({ direction: 'LONG' });
  });

  it('turns unparseable JSON into a validation error', async () => {
    const create = vi.fn<MessagesApi['create']>().mockResolvedValue(textReply('I think LONG'));
    await expect(
      makeClient(create).completeJson({ capability: 'reasoner', tier: 'deep', system: '', content: 'x' }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('treats an empty reply as a transient failure', async () => {
    const create = vi.fn<MessagesApi['create']>().mockResolvedValue({ content: [] });
    await expect(
      makeClient(create).complete({ capability: 'vision', tier: 'balanced', system: '', content: 'x' }),
    ).rejects.toMatchObject({ kind: 'ExternalServiceError', retryable: true });
  });

  it('maps API status errors by retryability', async () => {
    const overloaded = vi
      .fn<MessagesApi['create']>()
      .mockRejectedValue(new Anthropic.InternalServerError(529, undefined, 'Overloaded', new Headers()));
    const badRequest = vi
      .fn<MessagesApi['create']>()
      .mockRejectedValue(new Anthropic.BadRequestError(400, undefined, 'bad', new Headers()));
    const request = { capability: 'reasoner' as const, tier: 'deep' as const, system: '', content: 'x' };

    const retryable = await makeClient(overloaded).complete(request).catch((e: unknown) => e);
    const fatal = await makeClient(badRequest).complete(request).catch((e: unknown) => e);

    expect(retryable).toBeInstanceOf(ExternalServiceError);
    expect(retryable).toMatchObject({ status: 529, retryable: true, capability: 'reasoner' });
    expect(fatal).toMatchObject({ status: 400, retryable: false });
  });

  it('maps timeouts and aborts', async () => {
    const request = { capability: 'vision' as const, tier: 'fast' as const, system: '', content: 'x' };
    const timedOut = vi.fn<MessagesApi['create']>().mockRejectedValue(new Anthropic.APIConnectionTimeoutError());
    const aborted = vi.fn<MessagesApi['create']>().mockRejectedValue(new Anthropic.APIUserAbortError());

    await expect(makeClient(timedOut).complete(request)).rejects.toMatchObject({
      kind: 'ExternalServiceError',
      retryable: true,
      message: 'model-fast timed out',
    });
    await expect(makeClient(aborted).complete(request)).rejects.toBeInstanceOf(CancellationError);
  });
});

describe('LLM-backed capabilities', () => {
  it('sends the chart as a base64 image block', async () => {
    const create = vi.fn<MessagesApi['create']>().mockResolvedValue(textReply('An uptrend'));
    const vision = createVisionAnalyzer(makeClient(create));

    expect(await vision.analyze(chart, 'Describe it')).toBe('An uptrend');
    const [body] = create.mock.calls[0];
    expect(body.model).toBe('model-balanced');
    expect(body.messages[0].content).toEqual([
      { type: 'image', source: { type: 'base64', media_type: 'image/png', data: 'iVBORw0KGgo=' } },
      { type: 'text', text: 'Describe it' },
    ]);
  });

  it('asks the reasoner for JSON recommendations', async () => {
    const create = vi.fn<MessagesApi['create']>().mockResolvedValue(textReply('{"direction":"NO_TRADE"}'));
    const reasoner = createTradeReasoner(makeClient(create));

    const reply = await reasoner.recommend({
      symbol: 'ACME',
      prompt: null,
      chartAnalysis: 'Flat range',
      research: { headlines: [], pages: [] },
    });

    expect(reply).toEqual({ direction: 'NO_TRADE' });
    const [body] = create.mock.calls[0];
    expect(body.model).toBe('model-deep');
    expect(body.messages[0].content).toContain('Flat range');
    expect(body.messages[0].content).toContain('No recent news available.');
  });
});
