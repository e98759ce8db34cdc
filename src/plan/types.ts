import type { ChartImage, ScrapedPage, SearchResult } from '@/data-sources/types.ts';

export const TRADE_DIRECTIONS = ['LONG', 'SHORT', 'NO_TRADE'] as const;
export type TradeDirection = (typeof TRADE_DIRECTIONS)[number];
export type ActionableDirection = Exclude<TradeDirection, 'NO_TRADE'>;

export const CONVICTION_LEVELS = ['LOW', 'MEDIUM', 'HIGH'] as const;
export type ConvictionLevel = (typeof CONVICTION_LEVELS)[number];

const CONVICTION_RANK: Record<ConvictionLevel, number> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
};

export const compareConviction = (a: ConvictionLevel, b: ConvictionLevel): number =>
  CONVICTION_RANK[a] - CONVICTION_RANK[b];

export const isActionable = (direction: TradeDirection): direction is ActionableDirection =>
  direction !== 'NO_TRADE';

export type PriceLevel = Readonly<{
  price: number;
  label: string;
}>;

export type TechnicalFactors = Readonly<{
  trend: string;
  keyLevels: readonly PriceLevel[];
  patternNotes: string;
}>;

export type FundamentalFactors = Readonly<{
  news: string;
  macro: string;
  sector: string;
}>;

export type AnalystRecommendation = Readonly<{
  symbol: string;
  direction: TradeDirection;
  conviction: ConvictionLevel;
  technicalFactors: TechnicalFactors;
  fundamentalFactors: FundamentalFactors | null;
  keyObservations: readonly string[];
  rationale: string;
  createdAt: string;
}>;

export type TradingSetup = Readonly<{
  symbol: string;
  direction: ActionableDirection;
  entry: number;
  stopLoss: number;
  takeProfits: readonly number[];
  riskPerShare: number;
  rewardToRisk: number;
  chartStructure: string;
  rationale: string;
  createdAt: string;
}>;

export type RiskAllocation = Readonly<{
  equity: number;
  conviction: ConvictionLevel;
  riskPct: number;
  riskAmount: number;
  riskPerShare: number;
  positionSize: number;
  actualRiskAmount: number;
  positionValue: number;
  sizeable: boolean;
  rationale: string;
  createdAt: string;
}>;

type PlanBase = Readonly<{
  symbol: string;
  analyst: AnalystRecommendation;
  executiveSummary: string;
  isExecutable: boolean;
  createdAt: string;
}>;

export type NoTradePlan = PlanBase &
  Readonly<{
    status: 'NO_TRADE';
    setup: null;
    allocation: null;
  }>;

export type ActionablePlan = PlanBase &
  Readonly<{
    status: 'COMPLETE';
    setup: TradingSetup;
    allocation: RiskAllocation;
  }>;

export type CompleteTradePlan = NoTradePlan | ActionablePlan;

export type PlanRequest = Readonly<{
  chart: ChartImage;
  symbol: string;
  equity: number;
  prompt: string | null;
}>;

export type ResearchDigest = Readonly<{
  headlines: readonly SearchResult[];
  pages: readonly ScrapedPage[];
}>;

/** Everything a stage may read: the request plus whatever earlier stages produced. */
export type RunContext = Readonly<{
  request: PlanRequest;
  chartAnalysis: string;
  research: ResearchDigest;
  analyst: AnalystRecommendation;
}>;

export type RiskContext = RunContext &
  Readonly<{
    setup: TradingSetup;
  }>;

export type PartialArtifacts = {
  analyst?: AnalystRecommendation;
  setup?: TradingSetup;
  allocation?: RiskAllocation;
};

export type StageName = 'input' | 'analyst' | 'trader' | 'risk' | 'assembler';

export type Clock = () => Date;
