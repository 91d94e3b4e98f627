import pino from 'pino';
import type { AppConfig } from './config';
import { createSqliteStore } from './db';
import type { SqliteCycleStore } from './db';
import { createAlpacaGateway } from './exchanges/alpaca';
import { CrossoverRunner } from './runner';

export interface Bootstrapped {
  runner: CrossoverRunner;
  store: SqliteCycleStore;
  logger: pino.Logger;
}

export async function bootstrap(cfg: AppConfig): Promise<Bootstrapped> {
  const logger = pino({ level: cfg.logLevel });
  const gateway = createAlpacaGateway(cfg.alpaca);
  const store = await createSqliteStore(cfg.dbPath);
  const runner = new CrossoverRunner(
    cfg.strategy,
    { prices: gateway, clock: gateway, broker: gateway, store, logger },
    { dryRun: cfg.dryRun, seedPriorFromSeries: cfg.seedPriorFromSeries },
  );
  return { runner, store, logger };
}
