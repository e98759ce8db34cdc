import { vi } from 'vitest';
import type { ChartImage, SearchResult } from '@/data-sources/types.ts';
import type { ResearchClient, TradeReasoner, VisionAnalyzer } from '@/plan/capabilities.ts';
import type { PipelineDeps } from '@/plan/pipeline.ts';
import type { AnalystRecommendation, PlanRequest, RunContext } from '@/plan/types.ts';
import type { RetryPolicy } from '@/utils/retry.ts';

export const NOW = '2026-01-02T03:04:05.000Z';
export const fixedClock = () => new Date(NOW);

export const instantRetry: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 0,
  maxDelayMs: 0,
  backoffMultiplier: 2,
};

export const chart: ChartImage = {
  fileName: 'chart.png',
  mediaType: 'image/png',
  data: 'iVBORw0KGgo=',
};

export const makeRequest = (overrides: Partial<PlanRequest> = {}): PlanRequest => ({
  chart,
  symbol: 'ACME',
  equity: 100_000,
  prompt: null,
  ...overrides,
});

export const longAnalystReply = {
  direction: 'LONG',
  conviction: 'MEDIUM',
  technicalFactors: {
    trend: 'Uptrend with higher lows',
    keyLevels: [{ price: 95, label: 'support' }],
    patternNotes: 'Bull flag',
  },
  fundamentalFactors: null,
  keyObservations: ['Volume rising on up days'],
  rationale: 'Trend and structure favour continuation.',
};

export const noTradeAnalystReply = {
  direction: 'NO_TRADE',
  conviction: 'LOW',
  technicalFactors: { trend: '', keyLevels: [], patternNotes: '' },
  keyObservations: [],
  rationale: 'Choppy range with no edge.',
};

export const longSetupReply = {
  direction: 'LONG',
  entry: 100,
  stopLoss: 95,
  takeProfits: [110, 120],
  chartStructure: 'Breakout above 99 resistance',
  rationale: 'Stop below the flag low.',
};

export const headline = (n: number): SearchResult => ({
  title: `Headline ${n}`,
  snippet: `Snippet ${n}`,
  source: 'Wire',
  date: '1 day ago',
  link: `https://news.example.com/${n}`,
});

export const makeVision = (text = 'Chart shows an uptrend.') => ({
  analyze: vi.fn<VisionAnalyzer['analyze']>().mockResolvedValue(text),
});

export const makeReasoner = (analystReply: unknown, setupReply: unknown = longSetupReply) => ({
  recommend: vi.fn<TradeReasoner['recommend']>().mockResolvedValue(analystReply),
  planSetup: vi.fn<TradeReasoner['planSetup']>().mockResolvedValue(setupReply),
});

export const makeResearch = (results: readonly SearchResult[] = [headline(1), headline(2)]) => ({
  search: vi.fn<ResearchClient['search']>().mockResolvedValue(results),
  scrape: vi.fn<ResearchClient['scrape']>().mockResolvedValue('Article body'),
});

export const makeDeps = (overrides: Partial<PipelineDeps> = {}): PipelineDeps => ({
  vision: makeVision(),
  research: null,
  reasoner: makeReasoner(longAnalystReply),
  retry: instantRetry,
  scrapeLimit: 1,
  clock: fixedClock,
  ...overrides,
});

export const longAnalyst: AnalystRecommendation = {
  symbol: 'ACME',
  direction: 'LONG',
  conviction: 'MEDIUM',
  technicalFactors: {
    trend: 'Uptrend with higher lows',
    keyLevels: [{ price: 95, label: 'support' }],
    patternNotes: 'Bull flag',
  },
  fundamentalFactors: null,
  keyObservations: ['Volume rising on up days'],
  rationale: 'Trend and structure favour continuation.',
  createdAt: NOW,
};

export const makeContext = (overrides: Partial<RunContext> = {}): RunContext => ({
  request: makeRequest(),
  chartAnalysis: 'Chart shows an uptrend.',
  research: { headlines: [], pages: [] },
  analyst: longAnalyst,
  ...overrides,
});
