export interface PricePoint {
  timestamp: number; // epoch ms
  price: number;
}

export interface PriceSeries {
  symbol: string;
  points: readonly PricePoint[]; // oldest first
}

export interface MovingAverage {
  windowLength: number;
  value: number;
}

/** Short and long averages computed from one series snapshot. */
export interface AveragePair {
  short: number;
  long: number;
}

export type CrossoverState = 'bullish' | 'bearish' | 'neutral';

export type CrossoverEvent = 'bullish-crossover' | 'bearish-crossover' | 'none';

export interface PositionState {
  symbol: string;
  quantity: number; // whole shares, never negative
}

export type OrderSide = 'buy' | 'sell';

export type OrderAction = {
  type: OrderSide;
  symbol: string;
  quantity: number;
};

export type Action = OrderAction | { type: 'noop' };

export type StrategyConfig = Readonly<{
  symbol: string;
  shortWindow: number;
  longWindow: number;
  tradeQuantity: number;
}>;

export type CycleCondition = 'InsufficientData' | 'InvalidPriceSeries' | 'UnknownPositionState';

export interface CycleInput {
  config: StrategyConfig;
  series: PriceSeries;
  prior: AveragePair | null;
  position: PositionState | null; // null when the holding could not be read
}

export interface CycleResult {
  action: Action;
  /** Pair to carry into the next cycle; null clears it. */
  averages: AveragePair | null;
  state: CrossoverState;
  event: CrossoverEvent;
  nextPosition: PositionState | null;
  condition?: CycleCondition;
  detail?: string;
}
