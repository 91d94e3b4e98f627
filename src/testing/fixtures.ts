import type { PriceSeries, StrategyConfig } from '../strategy/types';

const BASE_TS = Date.UTC(2024, 0, 2, 15, 0, 0);

export const testConfig: StrategyConfig = Object.freeze({
  symbol: 'SPY',
  shortWindow: 2,
  longWindow: 4,
  tradeQuantity: 10,
});

/** One point per minute starting at BASE_TS. */
export function seriesOf(prices: number[], symbol = 'SPY'): PriceSeries {
  return {
    symbol,
    points: prices.map((price, i) => ({ timestamp: BASE_TS + i * 60_000, price })),
  };
}
