import 'dotenv/config';
import { parseArgs } from 'node:util';
import { buildAdvisor } from '@/bootstrap.ts';
import { loadChartImage } from '@/data-sources/chart-image.ts';
import { formatTradePlan } from '@/plan/report.ts';
import { InputError, PipelineError } from '@/plan/errors.ts';
import { loadConfig } from '@/utils/config.ts';
import { logger, setLogLevel } from '@/utils/logger.ts';

const USAGE = 'usage: plan --chart <file> --symbol <symbol> --equity <amount> [--prompt <text>] [--json]';

const main = async () => {
  const { values } = parseArgs({
    options: {
      chart: { type: 'string' },
      symbol: { type: 'string' },
      equity: { type: 'string' },
      prompt: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
  });

  if (!values.chart) {
    throw new PipelineError('input', new InputError(['--chart is required', USAGE]));
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);

  const chart = await loadChartImage(values.chart).catch((err: unknown) => {
    throw err instanceof InputError ? new PipelineError('input', err) : err;
  });

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const plan = await buildAdvisor(config).submit(
    {
      symbol: values.symbol,
      equity: values.equity === undefined ? null : Number(values.equity),
      prompt: values.prompt,
      chart,
    },
    { signal: controller.signal },
  );

  console.log(values.json ? JSON.stringify(plan, null, 2) : formatTradePlan(plan));
};

main().catch((err) => {
  if (err instanceof PipelineError) {
    logger.error(`Plan failed at ${err.stage} (${err.kind})`, { issues: err.issues });
  } else {
    logger.error('Fatal error', { error: err instanceof Error ? err.message : String(err) });
  }
  process.exit(1);
});
