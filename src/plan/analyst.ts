import { deepFreeze } from '@/utils/freeze.ts';
import { createLogger } from '@/utils/logger.ts';
import { buildChartInstructions, buildNewsQuery } from '@/llm/prompts.ts';
import { callCapability } from '@/plan/boundary.ts';
import { ValidationError } from '@/plan/errors.ts';
import { analystReplySchema, formatIssues } from '@/plan/schemas.ts';
import type { RetryPolicy } from '@/utils/retry.ts';
import type { SearchResult, ScrapedPage } from '@/data-sources/types.ts';
import type { ResearchClient, TradeReasoner, VisionAnalyzer } from '@/plan/capabilities.ts';
import type { AnalystRecommendation, Clock, PlanRequest, ResearchDigest } from '@/plan/types.ts';

const logger = createLogger('analyst');

export type AnalystStageDeps = {
  vision: VisionAnalyzer;
  research: ResearchClient | null;
  reasoner: TradeReasoner;
  retry: RetryPolicy;
  scrapeLimit: number;
  clock: Clock;
};

export type AnalystStageResult = {
  recommendation: AnalystRecommendation;
  chartAnalysis: string;
  research: ResearchDigest;
};

const EMPTY_RESEARCH: ResearchDigest = Object.freeze({ headlines: [], pages: [] });

/** Values of settled calls; the first rejection in argument order is rethrown. */
const valuesOf = <T>(results: PromiseSettledResult<T>[]): T[] =>
  results.map((result) => {
    if (result.status === 'rejected') throw result.reason;
    return result.value;
  });

export const runAnalystStage = async (
  request: PlanRequest,
  deps: AnalystStageDeps,
  signal?: AbortSignal,
): Promise<AnalystStageResult> => {
  const boundary = { stage: 'analyst' as const, retry: deps.retry, signal };
  const { research } = deps;

  const visionCall = callCapability(
    'vision',
    (s) => deps.vision.analyze(request.chart, buildChartInstructions(request.symbol, request.prompt), s),
    boundary,
  );
  const searchCall: Promise<readonly SearchResult[]> = research
    ? callCapability('search', (s) => research.search(buildNewsQuery(request.symbol), s), boundary)
    : Promise.resolve([]);

  const [visionResult, searchResult] = await Promise.allSettled([visionCall, searchCall]);
  if (visionResult.status === 'rejected') throw visionResult.reason;
  if (searchResult.status === 'rejected') throw searchResult.reason;

  const chartAnalysis = visionResult.value;
  const headlines = searchResult.value;

  let pages: ScrapedPage[] = [];
  if (research && headlines.length > 0 && deps.scrapeLimit > 0) {
    const links = headlines
      .map((h) => h.link)
      .filter((link) => link.length > 0)
      .slice(0, deps.scrapeLimit);
    const scraped = await Promise.allSettled(
      links.map(async (url) => ({
        url,
        text: await callCapability('scrape', (s) => research.scrape(url, s), boundary),
      })),
    );
    pages = valuesOf(scraped);
  }

  const digest: ResearchDigest = research ? { headlines, pages } : EMPTY_RESEARCH;
  logger.debug(`gathered context for ${request.symbol}`, {
    chartAnalysisChars: chartAnalysis.length,
    headlines: digest.headlines.length,
    pages: digest.pages.length,
  });

  const reply = await callCapability(
    'reasoner',
    (s) =>
      deps.reasoner.recommend(
        { symbol: request.symbol, prompt: request.prompt, chartAnalysis, research: digest },
        s,
      ),
    boundary,
  );

  const parsed = analystReplySchema.safeParse(reply);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error), reply);
  }

  const rec = parsed.data;
  if (rec.direction !== 'NO_TRADE' && rec.technicalFactors.trend.length === 0) {
    throw new ValidationError(`technicalFactors.trend must not be empty for a ${rec.direction} recommendation`, reply);
  }

  const recommendation: AnalystRecommendation = deepFreeze({
    symbol: request.symbol,
    direction: rec.direction,
    conviction: rec.conviction,
    technicalFactors: rec.technicalFactors,
    fundamentalFactors: rec.fundamentalFactors ?? null,
    keyObservations: rec.keyObservations.filter((o) => o.length > 0),
    rationale: rec.rationale,
    createdAt: deps.clock().toISOString(),
  });

  return {
    recommendation,
    chartAnalysis,
    research: deepFreeze(digest),
  };
};
