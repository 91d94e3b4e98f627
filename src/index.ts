import 'dotenv/config';
import pino from 'pino';
import { bootstrap } from './bootstrap';
import { loadConfig } from './config';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

// One cycle per invocation; an external cron is the scheduler.
async function main(): Promise<void> {
  const cfg = loadConfig();
  logger.info({ msg: 'crossover-trader starting', strategy: cfg.strategy, dryRun: cfg.dryRun });
  const { runner, store } = await bootstrap(cfg);
  try {
    const report = await runner.runCycle();
    logger.info({ status: report.status }, 'strategy execution completed');
  } finally {
    store.close();
  }
}

main().catch((err) => {
  logger.error({ err }, 'fatal error');
  process.exit(1);
});
