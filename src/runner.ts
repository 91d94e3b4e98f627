import pino from 'pino';
import type { AccountSummary, BrokerGateway, CycleStore, MarketClock, OrderReceipt, PriceSource } from './exchanges/types';
import { derivePriorFromSeries, evaluateCycle } from './strategy/evaluateCycle';
import type { AveragePair, CycleResult, OrderAction, PositionState, PricePoint, StrategyConfig } from './strategy/types';

export interface RunnerDeps {
  prices: PriceSource;
  clock: MarketClock;
  broker: BrokerGateway;
  store: CycleStore;
  logger?: pino.Logger;
  now?: () => number;
}

export interface RunnerOptions {
  dryRun?: boolean;
  seedPriorFromSeries?: boolean;
}

export type Submission =
  | { outcome: 'none' }
  | { outcome: 'dry-run'; clientOrderId: string }
  | { outcome: 'submitted'; receipt: OrderReceipt }
  | { outcome: 'failed'; clientOrderId: string; error: string };

export type CycleReport =
  | { status: 'market-closed' }
  | { status: 'data-unavailable'; error: string }
  | {
      status: 'evaluated';
      prior: AveragePair | null;
      result: CycleResult;
      submission: Submission;
      account: AccountSummary | null;
    };

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs one scheduled evaluation for a single symbol. Holds no state between
 * calls: the prior pair lives in the store and the position at the broker.
 */
export class CrossoverRunner {
  private readonly logger: pino.Logger;
  private readonly now: () => number;

  constructor(
    private readonly config: StrategyConfig,
    private readonly deps: RunnerDeps,
    private readonly options: RunnerOptions = {},
  ) {
    this.logger = deps.logger ?? pino({ level: process.env.LOG_LEVEL ?? 'info' });
    this.now = deps.now ?? Date.now;
  }

  async runCycle(): Promise<CycleReport> {
    const { symbol, longWindow } = this.config;
    const ts = this.now();
    this.logger.info({ symbol }, 'running crossover cycle');

    const open = await this.deps.clock.isMarketOpen().catch((err: unknown) => {
      this.logger.error({ err }, 'market clock check failed; treating market as closed');
      return false;
    });
    if (!open) {
      this.logger.info({ symbol }, 'market is closed; no trading');
      return { status: 'market-closed' };
    }

    let prior = this.deps.store.loadPriorAverages(symbol);
    const seed = Boolean(this.options.seedPriorFromSeries) && prior === null;

    let points: PricePoint[];
    try {
      points = await this.deps.prices.getTrailingPrices(symbol, seed ? longWindow + 1 : longWindow);
    } catch (err) {
      this.logger.error({ err, symbol }, 'price fetch failed; prior averages left as they were');
      return { status: 'data-unavailable', error: describeError(err) };
    }
    const series = { symbol, points };
    this.logger.info({ symbol, points: points.length }, 'retrieved prices');

    if (seed) {
      prior = derivePriorFromSeries(series, this.config);
      this.logger.info({ symbol, prior }, 'seeded prior averages from series');
    }

    const position = await this.readPosition(symbol);
    const result = evaluateCycle({ config: this.config, series, prior, position });
    this.logResult(result, prior, position);

    // Saved ahead of submission: a crossover fires at most once, whatever the order outcome.
    this.deps.store.savePriorAverages(symbol, result.averages, ts);

    const submission = result.action.type === 'noop' ? { outcome: 'none' as const } : await this.execute(result.action, ts);
    const account = await this.reportAccount();
    return { status: 'evaluated', prior, result, submission, account };
  }

  private async readPosition(symbol: string): Promise<PositionState | null> {
    try {
      const position = await this.deps.broker.getPosition(symbol);
      this.logger.info({ symbol, quantity: position.quantity }, 'current position');
      return position;
    } catch (err) {
      this.logger.warn({ err, symbol }, 'position lookup failed');
      return null;
    }
  }

  private logResult(result: CycleResult, prior: AveragePair | null, position: PositionState | null): void {
    const fields = {
      symbol: this.config.symbol,
      shortMa: result.averages?.short,
      longMa: result.averages?.long,
      prior,
      state: result.state,
      event: result.event,
      quantity: position?.quantity,
      action: result.action,
    };
    if (result.condition === 'UnknownPositionState') {
      this.logger.warn({ ...fields, condition: result.condition, detail: result.detail }, 'position unknown; holding');
    } else if (result.condition) {
      this.logger.warn({ ...fields, condition: result.condition, detail: result.detail }, 'no signal this cycle');
    } else if (result.action.type === 'noop') {
      this.logger.info(fields, 'no trading signal; holding current position');
    } else {
      this.logger.info(fields, `${result.action.type.toUpperCase()} signal`);
    }
  }

  private async execute(order: OrderAction, ts: number): Promise<Submission> {
    const clientOrderId = `xo-${order.symbol}-${order.type}-${ts}`;
    const base = { ts, symbol: order.symbol, side: order.type, qty: order.quantity, clientOrderId };
    if (this.options.dryRun) {
      this.logger.info({ order, clientOrderId }, 'DRY_RUN order');
      this.deps.store.recordOrder({ ...base, status: 'DRY_RUN' });
      return { outcome: 'dry-run', clientOrderId };
    }
    try {
      const receipt = await this.deps.broker.submitOrder(order, clientOrderId);
      this.logger.info({ order, orderId: receipt.orderId, status: receipt.status }, 'order placed');
      this.deps.store.recordOrder({ ...base, status: receipt.status, orderId: receipt.orderId });
      return { outcome: 'submitted', receipt };
    } catch (err) {
      // Position is not rolled forward; the next cycle re-reads it from the broker.
      this.logger.error({ err, order, clientOrderId }, 'order failed; reconcile manually');
      this.deps.store.recordOrder({ ...base, status: 'ERROR' });
      return { outcome: 'failed', clientOrderId, error: describeError(err) };
    }
  }

  private async reportAccount(): Promise<AccountSummary | null> {
    try {
      const account = await this.deps.broker.getAccount();
      this.logger.info(
        { account: account.accountNumber, equity: account.equity, buyingPower: account.buyingPower },
        'account status',
      );
      return account;
    } catch (err) {
      this.logger.error({ err }, 'account lookup failed');
      return null;
    }
  }
}
