import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { AlpacaSettings } from '../config';
import type { OrderAction, PositionState, PricePoint } from '../strategy/types';
import type { AccountSummary, BrokerGateway, MarketClock, OrderReceipt, PriceSource } from './types';

const LOOKBACK_MS = 30 * 24 * 3600 * 1000;

const barsSchema = z.object({
  bars: z
    .array(z.object({ t: z.string(), c: z.number() }))
    .nullable()
    .optional(),
});

const positionSchema = z.object({
  symbol: z.string(),
  qty: z.coerce.number(),
  side: z.enum(['long', 'short']).optional(),
});

const orderSchema = z.object({
  id: z.string(),
  client_order_id: z.string().optional(),
  status: z.string(),
});

const clockSchema = z.object({
  is_open: z.boolean(),
  next_open: z.string().optional(),
  next_close: z.string().optional(),
});

const accountSchema = z.object({
  account_number: z.string().optional(),
  id: z.string().optional(),
  status: z.string().optional(),
  equity: z.coerce.number().default(0),
  buying_power: z.coerce.number().default(0),
});

export interface PlaceOrderRequest {
  symbol: string;
  side: 'buy' | 'sell';
  type: 'market';
  time_in_force: 'day';
  qty: string; // whole shares as string
  client_order_id: string;
}

export type AlpacaGateway = PriceSource & MarketClock & BrokerGateway;

function authHeaders(settings: AlpacaSettings): Record<string, string> {
  return {
    'APCA-API-KEY-ID': settings.keyId,
    'APCA-API-SECRET-KEY': settings.secretKey,
  };
}

export function createAlpacaClient(settings: AlpacaSettings): AxiosInstance {
  return axios.create({ baseURL: settings.paperBaseUrl, headers: authHeaders(settings), timeout: 8000 });
}

export function createAlpacaDataClient(settings: AlpacaSettings): AxiosInstance {
  return axios.create({ baseURL: settings.dataBaseUrl, headers: authHeaders(settings), timeout: 8000 });
}

export function newClientOrderId(order: OrderAction): string {
  return `xo-${order.symbol}-${order.type}-${Date.now()}-${randomUUID().slice(0, 8)}`;
}

export function createAlpacaGateway(
  settings: AlpacaSettings,
  clients: { trading: AxiosInstance; data: AxiosInstance } = {
    trading: createAlpacaClient(settings),
    data: createAlpacaDataClient(settings),
  },
): AlpacaGateway {
  const { trading, data } = clients;
  return {
    async getTrailingPrices(symbol: string, count: number): Promise<PricePoint[]> {
      const res = await data.get(`/v2/stocks/${encodeURIComponent(symbol)}/bars`, {
        params: {
          timeframe: settings.timeframe,
          start: new Date(Date.now() - LOOKBACK_MS).toISOString(),
          limit: count,
          sort: 'desc',
          feed: settings.dataFeed,
        },
      });
      const bars = barsSchema.parse(res.data).bars ?? [];
      // newest first on the wire
      return bars.map((b) => ({ timestamp: Date.parse(b.t), price: b.c })).reverse();
    },

    async getPosition(symbol: string): Promise<PositionState> {
      try {
        const res = await trading.get(`/v2/positions/${encodeURIComponent(symbol)}`);
        const pos = positionSchema.parse(res.data);
        return { symbol: pos.symbol.toUpperCase(), quantity: pos.side === 'short' ? -pos.qty : pos.qty };
      } catch (err) {
        // Alpaca answers 404 when the account holds none of the symbol
        if (axios.isAxiosError(err) && err.response?.status === 404) return { symbol, quantity: 0 };
        throw err;
      }
    },

    async submitOrder(order: OrderAction, clientOrderId = newClientOrderId(order)): Promise<OrderReceipt> {
      const body: PlaceOrderRequest = {
        symbol: order.symbol,
        side: order.type,
        type: 'market',
        time_in_force: 'day',
        qty: String(order.quantity),
        client_order_id: clientOrderId,
      };
      const res = await trading.post('/v2/orders', body);
      const placed = orderSchema.parse(res.data);
      return { orderId: placed.id, clientOrderId: placed.client_order_id ?? clientOrderId, status: placed.status };
    },

    async isMarketOpen(): Promise<boolean> {
      const res = await trading.get('/v2/clock');
      return clockSchema.parse(res.data).is_open;
    },

    async getAccount(): Promise<AccountSummary> {
      const res = await trading.get('/v2/account');
      const account = accountSchema.parse(res.data);
      return {
        accountNumber: account.account_number ?? account.id ?? 'unknown',
        equity: account.equity,
        buyingPower: account.buying_power,
      };
    },
  };
}
