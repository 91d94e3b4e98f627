import pino from 'pino';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { AccountSummary, BrokerGateway, CycleStore, OrderReceipt, OrderRecord } from './exchanges/types';
import { CrossoverRunner } from './runner';
import type { RunnerOptions } from './runner';
import type { AveragePair, OrderAction, PositionState, PricePoint } from './strategy/types';
import { seriesOf, testConfig } from './testing/fixtures';

const NOW = 1_700_000_000_000;

class MemoryStore implements CycleStore {
  readonly pairs = new Map<string, AveragePair>();
  readonly orders: OrderRecord[] = [];

  loadPriorAverages(symbol: string): AveragePair | null {
    return this.pairs.get(symbol) ?? null;
  }

  savePriorAverages(symbol: string, pair: AveragePair | null): void {
    if (pair) this.pairs.set(symbol, pair);
    else this.pairs.delete(symbol);
  }

  recordOrder(order: OrderRecord): void {
    this.orders.push(order);
  }

  recentOrders(limit = 20): OrderRecord[] {
    return [...this.orders].reverse().slice(0, limit);
  }
}

/** Fills every order immediately. */
class FakeBroker implements BrokerGateway {
  quantity = 0;
  positionError: Error | null = null;
  orderError: Error | null = null;
  readonly submitted: Array<{ order: OrderAction; clientOrderId?: string }> = [];

  async getPosition(symbol: string): Promise<PositionState> {
    if (this.positionError) throw this.positionError;
    return { symbol, quantity: this.quantity };
  }

  async submitOrder(order: OrderAction, clientOrderId?: string): Promise<OrderReceipt> {
    this.submitted.push({ order, clientOrderId });
    if (this.orderError) throw this.orderError;
    this.quantity = order.type === 'buy' ? this.quantity + order.quantity : 0;
    return { orderId: `order-${this.submitted.length}`, clientOrderId: clientOrderId ?? 'generated', status: 'accepted' };
  }

  async getAccount(): Promise<AccountSummary> {
    return { accountNumber: 'PA-TEST', equity: 10_000, buyingPower: 20_000 };
  }
}

function points(prices: number[]): PricePoint[] {
  return [...seriesOf(prices).points];
}

describe('CrossoverRunner', () => {
  let store: MemoryStore;
  let broker: FakeBroker;
  let prices: number[];
  const getTrailingPrices = vi.fn(async (_symbol: string, count: number) => points(prices.slice(-count)));
  const isMarketOpen = vi.fn(async () => true);

  const createRunner = (options: RunnerOptions = {}): CrossoverRunner =>
    new CrossoverRunner(
      testConfig,
      {
        prices: { getTrailingPrices },
        clock: { isMarketOpen },
        broker,
        store,
        logger: pino({ level: 'silent' }),
        now: () => NOW,
      },
      options,
    );

  beforeEach(() => {
    store = new MemoryStore();
    broker = new FakeBroker();
    prices = [99, 99, 101, 101];
    getTrailingPrices.mockClear();
    isMarketOpen.mockReset();
    isMarketOpen.mockResolvedValue(true);
  });

  it('does nothing while the market is closed', async () => {
    isMarketOpen.mockResolvedValue(false);
    const report = await createRunner().runCycle();
    expect(report).toEqual({ status: 'market-closed' });
    expect(getTrailingPrices).not.toHaveBeenCalled();
  });

  it('treats a failed clock check as a closed market', async () => {
    isMarketOpen.mockRejectedValue(new Error('clock unavailable'));
    const report = await createRunner().runCycle();
    expect(report.status).toBe('market-closed');
    expect(broker.submitted).toHaveLength(0);
  });

  it('buys on a bullish crossover while flat and records the order', async () => {
    store.pairs.set('SPY', { short: 99.8, long: 100 });

    const report = await createRunner().runCycle();

    expect(getTrailingPrices).toHaveBeenCalledWith('SPY', 4);
    expect(broker.submitted).toEqual([
      { order: { type: 'buy', symbol: 'SPY', quantity: 10 }, clientOrderId: `xo-SPY-buy-${NOW}` },
    ]);
    expect(store.orders).toEqual([
      {
        ts: NOW,
        symbol: 'SPY',
        side: 'buy',
        qty: 10,
        status: 'accepted',
        orderId: 'order-1',
        clientOrderId: `xo-SPY-buy-${NOW}`,
      },
    ]);
    expect(store.pairs.get('SPY')).toEqual({ short: 101, long: 100 });
    expect(report.status === 'evaluated' && report.submission).toEqual({
      outcome: 'submitted',
      receipt: { orderId: 'order-1', clientOrderId: `xo-SPY-buy-${NOW}`, status: 'accepted' },
    });
  });

  it('places a single order across repeated cycles on the same signal', async () => {
    store.pairs.set('SPY', { short: 99.8, long: 100 });
    const runner = createRunner();

    await runner.runCycle();
    await runner.runCycle();

    expect(broker.submitted).toHaveLength(1);
    expect(broker.quantity).toBe(10);
  });

  it('sells the holding on a bearish crossover', async () => {
    broker.quantity = 10;
    store.pairs.set('SPY', { short: 100.1, long: 100 });
    prices = [101, 101, 99, 99];

    await createRunner().runCycle();

    expect(broker.submitted.map((s) => s.order)).toEqual([{ type: 'sell', symbol: 'SPY', quantity: 10 }]);
    expect(broker.quantity).toBe(0);
  });

  it('holds when the position cannot be read', async () => {
    store.pairs.set('SPY', { short: 99.8, long: 100 });
    broker.positionError = new Error('broker timeout');

    const report = await createRunner().runCycle();

    expect(broker.submitted).toHaveLength(0);
    expect(report.status).toBe('evaluated');
    if (report.status !== 'evaluated') return;
    expect(report.result.condition).toBe('UnknownPositionState');
    expect(report.result.action).toEqual({ type: 'noop' });
    expect(report.submission).toEqual({ outcome: 'none' });
    expect(store.pairs.get('SPY')).toEqual({ short: 101, long: 100 });
  });

  it('records a failed submission and does not retry it next cycle', async () => {
    store.pairs.set('SPY', { short: 99.8, long: 100 });
    broker.orderError = new Error('insufficient buying power');
    const runner = createRunner();

    const report = await runner.runCycle();

    expect(report.status === 'evaluated' && report.submission).toEqual({
      outcome: 'failed',
      clientOrderId: `xo-SPY-buy-${NOW}`,
      error: 'insufficient buying power',
    });
    expect(store.orders.map((o) => o.status)).toEqual(['ERROR']);
    expect(broker.quantity).toBe(0);
    expect(store.pairs.get('SPY')).toEqual({ short: 101, long: 100 });

    await runner.runCycle();
    expect(broker.submitted).toHaveLength(1);
  });

  it('logs but does not submit in dry-run mode', async () => {
    store.pairs.set('SPY', { short: 99.8, long: 100 });

    const report = await createRunner({ dryRun: true }).runCycle();

    expect(broker.submitted).toHaveLength(0);
    expect(store.orders.map((o) => o.status)).toEqual(['DRY_RUN']);
    expect(report.status === 'evaluated' && report.submission).toEqual({
      outcome: 'dry-run',
      clientOrderId: `xo-SPY-buy-${NOW}`,
    });
  });

  it('leaves the stored pair alone when prices cannot be fetched', async () => {
    store.pairs.set('SPY', { short: 99.8, long: 100 });
    getTrailingPrices.mockRejectedValueOnce(new Error('data feed down'));

    const report = await createRunner().runCycle();

    expect(report).toEqual({ status: 'data-unavailable', error: 'data feed down' });
    expect(store.pairs.get('SPY')).toEqual({ short: 99.8, long: 100 });
  });

  it('clears the stored pair during warm-up', async () => {
    store.pairs.set('SPY', { short: 99.8, long: 100 });
    prices = [100, 101, 102];

    const report = await createRunner().runCycle();

    expect(report.status === 'evaluated' && report.result.condition).toBe('InsufficientData');
    expect(store.pairs.has('SPY')).toBe(false);
    expect(broker.submitted).toHaveLength(0);
  });

  it('stays flat on the first cycle without seeding', async () => {
    const report = await createRunner().runCycle();
    expect(report.status === 'evaluated' && report.result.event).toBe('none');
    expect(broker.submitted).toHaveLength(0);
    expect(store.pairs.get('SPY')).toEqual({ short: 101, long: 100 });
  });

  it('derives the prior pair from the series when seeding is on', async () => {
    prices = [100, 100, 100, 98, 104];

    const report = await createRunner({ seedPriorFromSeries: true }).runCycle();

    expect(getTrailingPrices).toHaveBeenCalledWith('SPY', 5);
    expect(report.status === 'evaluated' && report.prior).toEqual({ short: 99, long: 99.5 });
    expect(broker.submitted.map((s) => s.order)).toEqual([{ type: 'buy', symbol: 'SPY', quantity: 10 }]);
    expect(store.pairs.get('SPY')).toEqual({ short: 101, long: 100.5 });
  });

  it('prefers the stored pair over seeding', async () => {
    store.pairs.set('SPY', { short: 102, long: 100 });
    prices = [100, 100, 100, 98, 104];

    await createRunner({ seedPriorFromSeries: true }).runCycle();

    expect(getTrailingPrices).toHaveBeenCalledWith('SPY', 4);
    expect(broker.submitted).toHaveLength(0);
  });

  it('reports the account after evaluating', async () => {
    const report = await createRunner().runCycle();
    expect(report.status === 'evaluated' && report.account).toEqual({
      accountNumber: 'PA-TEST',
      equity: 10_000,
      buyingPower: 20_000,
    });
  });
});
