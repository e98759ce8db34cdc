import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  ANTHROPIC_API_KEY: z.string().default(''),
  ANTHROPIC_MODEL_FAST: z.string().default('claude-haiku-4-5-20251001'),
  ANTHROPIC_MODEL_BALANCED: z.string().default('claude-sonnet-4-5-20250929'),
  ANTHROPIC_MODEL_DEEP: z.string().default('claude-opus-4-1-20250805'),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  SERPER_API_KEY: z.string().default(''),
  SERPER_SCRAPE_LIMIT: z.coerce.number().int().min(0).max(5).default(1),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type AppConfig = {
  readonly anthropic: {
    readonly apiKey: string;
    readonly models: { readonly fast: string; readonly balanced: string; readonly deep: string };
    readonly maxTokens: number;
    readonly timeoutMs: number;
  };
  readonly serper: {
    readonly apiKey: string;
    readonly searchUrl: string;
    readonly scrapeUrl: string;
    readonly maxResults: number;
    readonly scrapeLimit: number;
    readonly timeoutMs: number;
  };
  readonly port: number;
  readonly logLevel: LogLevel;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment variables: ${issues.join('; ')}`);
  }

  const e = parsed.data;
  return {
    anthropic: {
      apiKey: e.ANTHROPIC_API_KEY,
      models: {
        fast: e.ANTHROPIC_MODEL_FAST,
        balanced: e.ANTHROPIC_MODEL_BALANCED,
        deep: e.ANTHROPIC_MODEL_DEEP,
      },
      maxTokens: e.LLM_MAX_TOKENS,
      timeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    serper: {
      apiKey: e.SERPER_API_KEY,
      searchUrl: 'https://google.serper.dev/news',
      scrapeUrl: 'https://scrape.serper.dev',
      maxResults: 5,
      scrapeLimit: e.SERPER_SCRAPE_LIMIT,
      timeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
  };
};

export const RISK = {
  minRiskPct: 0.005,
  maxRiskPct: 0.02,
  convictionRiskPct: {
    LOW: 0.005,
    MEDIUM: 0.01,
    HIGH: 0.02,
  },
} as const;

export const RETRY = {
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 4000,
  backoffMultiplier: 2,
} as const;

export const SEARCH_CACHE_TTL_MS = 15 * 60 * 1000;
