import { Elysia } from 'elysia';
import { z } from 'zod';
import { createChartImage } from '@/data-sources/chart-image.ts';
import { formatTradePlan } from '@/plan/report.ts';
import { formatIssues } from '@/plan/schemas.ts';
import { InputError, PipelineError } from '@/plan/errors.ts';
import { logger } from '@/utils/logger.ts';
import type { ErrorKind } from '@/plan/errors.ts';
import type { TradeAdvisor } from '@/plan/advisor.ts';
import type { ChartImage } from '@/data-sources/types.ts';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  InputError: 400,
  ValidationError: 422,
  ExternalServiceError: 502,
  CancellationError: 503,
};

const planBodySchema = z.object({
  symbol: z.string(),
  equity: z.number(),
  prompt: z.string().nullish(),
  chart: z.object({
    fileName: z.string(),
    data: z.string(),
  }),
});

const errorBody = (err: PipelineError) => ({
  error: {
    stage: err.stage,
    kind: err.kind,
    message: err.error.message,
    issues: err.issues,
    partial: err.partial,
  },
});

export const createPlanRoutes = (advisor: TradeAdvisor) =>
  new Elysia()
    .get('/api/health', () => ({ ok: true, research: advisor.hasResearch }))

    .post('/api/plan', async ({ body, query, request, set }) => {
      try {
        const parsed = planBodySchema.safeParse(body);
        if (!parsed.success) throw new PipelineError('input', new InputError(formatIssues(parsed.error)));

        let chart: ChartImage;
        try {
          chart = createChartImage(parsed.data.chart.fileName, parsed.data.chart.data);
        } catch (err) {
          if (err instanceof InputError) throw new PipelineError('input', err);
          throw err;
        }

        const plan = await advisor.submit(
          { symbol: parsed.data.symbol, equity: parsed.data.equity, prompt: parsed.data.prompt, chart },
          { signal: request.signal },
        );

        if (query.format === 'text') {
          set.headers['content-type'] = 'text/plain; charset=utf-8';
          return formatTradePlan(plan);
        }
        return { plan };
      } catch (err) {
        if (err instanceof PipelineError) {
          set.status = STATUS_BY_KIND[err.kind];
          return errorBody(err);
        }
        logger.error('Plan endpoint error', { error: err instanceof Error ? err.message : String(err) });
        set.status = 500;
        return { error: { stage: null, kind: 'InternalError', message: 'Internal error', issues: [], partial: {} } };
      }
    });
