import { z } from 'zod';
import { TtlCache } from '@/cache/ttl-cache.ts';
import { SEARCH_CACHE_TTL_MS } from '@/utils/config.ts';
import { deepFreeze } from '@/utils/freeze.ts';
import { logger } from '@/utils/logger.ts';
import { CancellationError, ExternalServiceError, isRetryableStatus } from '@/plan/errors.ts';
import type { CapabilityName } from '@/plan/errors.ts';
import type { ResearchClient } from '@/plan/capabilities.ts';
import type { SearchResult } from '@/data-sources/types.ts';

export type SerperOptions = {
  apiKey: string;
  searchUrl: string;
  scrapeUrl: string;
  maxResults: number;
  timeoutMs: number;
  fetch?: typeof fetch;
  cacheTtlMs?: number;
};

const newsResponseSchema = z.object({
  news: z
    .array(
      z.object({
        title: z.string().default(''),
        snippet: z.string().default(''),
        source: z.string().default(''),
        date: z.string().default(''),
        link: z.string().default(''),
      }),
    )
    .default([]),
});

const scrapeResponseSchema = z.object({
  text: z.string().nullish(),
});

export const createSerperClient = (options: SerperOptions): ResearchClient => {
  const fetchFn = options.fetch ?? fetch;
  const cache = new TtlCache<readonly SearchResult[]>(options.cacheTtlMs ?? SEARCH_CACHE_TTL_MS);

  const post = async (
    capability: CapabilityName,
    url: string,
    body: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<unknown> => {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let res: Response;
    try {
      res = await fetchFn(url, {
        method: 'POST',
        headers: { 'X-API-KEY': options.apiKey, 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: combined,
      });
    } catch (err) {
      if (signal?.aborted) throw new CancellationError(`${capability} request aborted`, { cause: err });
      if (timeout.aborted) {
        throw new ExternalServiceError(capability, `Serper ${capability} timed out after ${options.timeoutMs}ms`, { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new ExternalServiceError(capability, `Serper ${capability} request failed: ${message}`, { cause: err });
    }

    if (!res.ok) {
      const text = await res.text();
      logger.warn(`Serper ${capability} returned ${res.status}`, { url, body: text.slice(0, 200) });
      throw new ExternalServiceError(capability, `Serper ${capability} ${res.status}: ${text.slice(0, 200)}`, {
        status: res.status,
        retryable: isRetryableStatus(res.status),
      });
    }

    try {
      return await res.json();
    } catch (err) {
      throw new ExternalServiceError(capability, `Serper ${capability} returned invalid JSON`, {
        retryable: false,
        cause: err,
      });
    }
  };

  const search = (query: string, signal?: AbortSignal): Promise<readonly SearchResult[]> =>
    cache.getOrLoad(query, async () => {
      const json = await post('search', options.searchUrl, { q: query, tbs: 'qdr:m' }, signal);
      const parsed = newsResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new ExternalServiceError('search', 'Serper search returned an unexpected payload', { retryable: false });
      }
      const results = parsed.data.news.slice(0, options.maxResults);
      logger.debug(`Serper search "${query}": ${results.length} result(s)`);
      return deepFreeze(results);
    });

  const scrape = async (url: string, signal?: AbortSignal): Promise<string> => {
    const json = await post('scrape', options.scrapeUrl, { url }, signal);
    const parsed = scrapeResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExternalServiceError('scrape', 'Serper scrape returned an unexpected payload', { retryable: false });
    }
    return parsed.data.text ?? '';
  };

  return { search, scrape };
};
