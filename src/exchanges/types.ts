import type { AveragePair, OrderAction, OrderSide, PositionState, PricePoint } from '../strategy/types';

export interface PriceSource {
  /** Up to `count` most recent prices, oldest first. */
  getTrailingPrices(symbol: string, count: number): Promise<PricePoint[]>;
}

export interface MarketClock {
  isMarketOpen(): Promise<boolean>;
}

export interface OrderReceipt {
  orderId: string;
  clientOrderId: string;
  status: string;
}

export interface AccountSummary {
  accountNumber: string;
  equity: number;
  buyingPower: number;
}

export interface BrokerGateway {
  /** Resolves quantity 0 when nothing is held; rejects when the holding is unknown. */
  getPosition(symbol: string): Promise<PositionState>;
  submitOrder(order: OrderAction, clientOrderId?: string): Promise<OrderReceipt>;
  getAccount(): Promise<AccountSummary>;
}

export type OrderStatus = string; // broker status, or DRY_RUN / ERROR

export interface OrderRecord {
  ts: number;
  symbol: string;
  side: OrderSide;
  qty: number;
  status: OrderStatus;
  orderId?: string;
  clientOrderId?: string;
}

export interface CycleStore {
  loadPriorAverages(symbol: string): AveragePair | null;
  savePriorAverages(symbol: string, pair: AveragePair | null, ts: number): void;
  recordOrder(order: OrderRecord): void;
  recentOrders(limit?: number): OrderRecord[];
}
