import type { AnalystReasoningRequest, TraderReasoningRequest } from '@/plan/capabilities.ts';
import type { ResearchDigest } from '@/plan/types.ts';

export const CHART_SYSTEM = `You are a technical chart reader. Describe exactly what the chart shows. Do not recommend trades.`;

export const buildChartInstructions = (symbol: string, prompt: string | null): string =>
  `Describe this ${symbol} price chart for a trading desk:
- timeframe and visible date range if shown
- prevailing trend and market structure (higher highs/lows, ranges, breaks)
- key support and resistance levels with their prices
- chart patterns, candlestick formations, indicator readings and volume
- the most recent price and where it sits relative to those levels${prompt ? `\n\nTrader's note: ${prompt}` : ''}`;

export const buildNewsQuery = (symbol: string): string => `${symbol} stock market news`;

export const ANALYST_SYSTEM = `You are a senior financial analyst. From a chart reading and recent news, decide whether a trade is warranted. Be decisive and evidence-based; NO_TRADE is a valid answer when the picture is unclear.

Output ONLY valid JSON with this exact structure:
{
  "direction": "<one of: LONG, SHORT, NO_TRADE>",
  "conviction": "<one of: LOW, MEDIUM, HIGH>",
  "technicalFactors": {
    "trend": "<prevailing trend; required unless NO_TRADE>",
    "keyLevels": [{ "price": <number>, "label": "<support, resistance, ...>" }],
    "patternNotes": "<patterns and indicator readings>"
  },
  "fundamentalFactors": { "news": "<...>", "macro": "<...>", "sector": "<...>" } or null,
  "keyObservations": ["<short observation>", ...],
  "rationale": "<two to four sentences>"
}`;

export const TRADER_SYSTEM = `You are a professional trader. Turn the analyst's directional call into a precise setup read from the chart structure.

Rules:
- direction must equal the analyst's direction
- LONG: stopLoss < entry < takeProfits[0] < takeProfits[1] < ...
- SHORT: stopLoss > entry > takeProfits[0] > takeProfits[1] > ...
- place the stop beyond the level that invalidates the idea

Output ONLY valid JSON with this exact structure:
{
  "direction": "<LONG or SHORT>",
  "entry": <number>,
  "stopLoss": <number>,
  "takeProfits": [<number>, ...],
  "chartStructure": "<levels and structure the setup is built on>",
  "rationale": "<two to three sentences>"
}`;

const formatResearch = (research: ResearchDigest): string => {
  if (research.headlines.length === 0) return 'No recent news available.';

  const headlines = research.headlines
    .map((h, i) => `${i + 1}. ${h.title}${h.source ? ` (${h.source}${h.date ? `, ${h.date}` : ''})` : ''}\n   ${h.snippet}`)
    .join('\n');
  const pages = research.pages
    .filter((p) => p.text.length > 0)
    .map((p) => `Source: ${p.url}\n${p.text.substring(0, 2000)}`)
    .join('\n\n');

  return pages ? `${headlines}\n\nArticle excerpts:\n${pages}` : headlines;
};

export const buildAnalystPrompt = (request: AnalystReasoningRequest): string =>
  `Symbol: ${request.symbol}

Chart reading:
${request.chartAnalysis}

Recent news:
${formatResearch(request.research)}
${request.prompt ? `\nTrader's note: ${request.prompt}\n` : ''}
Return your JSON recommendation.`;

export const buildTraderPrompt = (request: TraderReasoningRequest): string => {
  const { analyst } = request;
  const levels = analyst.technicalFactors.keyLevels
    .map((l) => `${l.price}${l.label ? ` (${l.label})` : ''}`)
    .join(', ');

  return `Symbol: ${request.symbol}

Analyst call: ${analyst.direction} with ${analyst.conviction} conviction
Trend: ${analyst.technicalFactors.trend}
Key levels: ${levels || 'none given'}
Patterns: ${analyst.technicalFactors.patternNotes || 'none given'}
Rationale: ${analyst.rationale}

Chart reading:
${request.chartAnalysis}
${request.prompt ? `\nTrader's note: ${request.prompt}\n` : ''}
Return your JSON setup.`;
};
