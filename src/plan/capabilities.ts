import type { ChartImage, SearchResult } from '@/data-sources/types.ts';
import type { AnalystRecommendation, ResearchDigest } from '@/plan/types.ts';

// Contracts the stages depend on. Implementations throw ExternalServiceError
// (or CancellationError when the caller's signal fires); anything else they
// throw is classified as ExternalServiceError at the stage boundary.

export type VisionAnalyzer = {
  analyze: (image: ChartImage, instructions: string, signal?: AbortSignal) => Promise<string>;
};

export type ResearchClient = {
  search: (query: string, signal?: AbortSignal) => Promise<readonly SearchResult[]>;
  scrape: (url: string, signal?: AbortSignal) => Promise<string>;
};

export type AccountInfoProvider = {
  getEquity: (explicitValue: number | null | undefined) => Promise<number>;
};

export type AnalystReasoningRequest = Readonly<{
  symbol: string;
  prompt: string | null;
  chartAnalysis: string;
  research: ResearchDigest;
}>;

export type TraderReasoningRequest = Readonly<{
  symbol: string;
  prompt: string | null;
  chartAnalysis: string;
  research: ResearchDigest;
  analyst: AnalystRecommendation;
}>;

/**
 * The reasoning engine behind the Analyst and Trader roles. Replies are
 * untrusted JSON-like values; the stages validate them.
 */
export type TradeReasoner = {
  recommend: (request: AnalystReasoningRequest, signal?: AbortSignal) => Promise<unknown>;
  planSetup: (request: TraderReasoningRequest, signal?: AbortSignal) => Promise<unknown>;
};
