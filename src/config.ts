import { z } from 'zod';
import { InvalidConfigurationError } from './errors';
import type { StrategyConfig } from './strategy/types';

const configSchema = z.object({
  SYMBOL: z.string().trim().min(1).default('SPY'),
  SHORT_WINDOW: z.coerce.number().default(5),
  LONG_WINDOW: z.coerce.number().default(20),
  TRADE_QUANTITY: z.coerce.number().default(10),
  BAR_TIMEFRAME: z.string().min(1).default('1Min'),
  ALPACA_API_KEY_ID: z.string().min(1),
  ALPACA_API_SECRET_KEY: z.string().min(1),
  ALPACA_PAPER_BASE_URL: z.string().url().default('https://paper-api.alpaca.markets'),
  ALPACA_DATA_BASE_URL: z.string().url().default('https://data.alpaca.markets'),
  ALPACA_DATA_FEED: z.enum(['iex', 'sip', 'otc']).default('iex'),
  DB_PATH: z.string().min(1).default('data/crossover.sqlite'),
  LOG_LEVEL: z.string().default('info'),
  DRY_RUN: z.string().optional(),
  SEED_PRIOR_FROM_SERIES: z.string().optional(),
});

export interface AlpacaSettings {
  keyId: string;
  secretKey: string;
  paperBaseUrl: string;
  dataBaseUrl: string;
  dataFeed: 'iex' | 'sip' | 'otc';
  timeframe: string;
}

export type AppConfig = Readonly<{
  strategy: StrategyConfig;
  alpaca: AlpacaSettings;
  dbPath: string;
  logLevel: string;
  dryRun: boolean;
  seedPriorFromSeries: boolean;
}>;

/** Validates the strategy rules and returns a frozen copy. */
export function createStrategyConfig(input: {
  symbol: string;
  shortWindow: number;
  longWindow: number;
  tradeQuantity: number;
}): StrategyConfig {
  const issues: string[] = [];
  const symbol = input.symbol.trim().toUpperCase();
  if (!symbol) issues.push('symbol must not be empty');
  if (!Number.isInteger(input.shortWindow) || input.shortWindow <= 0) {
    issues.push(`short window must be a positive integer, got ${input.shortWindow}`);
  }
  if (!Number.isInteger(input.longWindow) || input.longWindow <= 0) {
    issues.push(`long window must be a positive integer, got ${input.longWindow}`);
  }
  if (input.shortWindow >= input.longWindow) {
    issues.push(`short window (${input.shortWindow}) must be less than long window (${input.longWindow})`);
  }
  if (!Number.isInteger(input.tradeQuantity) || input.tradeQuantity <= 0) {
    issues.push(`trade quantity must be a positive integer, got ${input.tradeQuantity}`);
  }
  if (issues.length) throw new InvalidConfigurationError(issues);
  return Object.freeze({
    symbol,
    shortWindow: input.shortWindow,
    longWindow: input.longWindow,
    tradeQuantity: input.tradeQuantity,
  });
}

function flag(value: string | undefined): boolean {
  return (value ?? 'false').toLowerCase() === 'true';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`),
    );
  }
  const cfg = parsed.data;
  return Object.freeze({
    strategy: createStrategyConfig({
      symbol: cfg.SYMBOL,
      shortWindow: cfg.SHORT_WINDOW,
      longWindow: cfg.LONG_WINDOW,
      tradeQuantity: cfg.TRADE_QUANTITY,
    }),
    alpaca: {
      keyId: cfg.ALPACA_API_KEY_ID,
      secretKey: cfg.ALPACA_API_SECRET_KEY,
      paperBaseUrl: cfg.ALPACA_PAPER_BASE_URL,
      dataBaseUrl: cfg.ALPACA_DATA_BASE_URL,
      dataFeed: cfg.ALPACA_DATA_FEED,
      timeframe: cfg.BAR_TIMEFRAME,
    },
    dbPath: cfg.DB_PATH,
    logLevel: cfg.LOG_LEVEL,
    dryRun: flag(cfg.DRY_RUN),
    seedPriorFromSeries: flag(cfg.SEED_PRIOR_FROM_SERIES),
  });
}
