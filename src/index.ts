import 'dotenv/config';
import { Elysia } from 'elysia';
import { node } from '@elysiajs/node';
import { buildAdvisor } from '@/bootstrap.ts';
import { createPlanRoutes } from '@/server.ts';
import { loadConfig } from '@/utils/config.ts';
import { logger, setLogLevel } from '@/utils/logger.ts';

const main = async () => {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const advisor = buildAdvisor(config);
  new Elysia({ adapter: node() }).use(createPlanRoutes(advisor)).listen(config.port);

  logger.info(`Trade planner listening at http://localhost:${config.port}`, {
    research: advisor.hasResearch,
  });
};

main().catch((err) => {
  logger.error('Fatal startup error', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
