// ============================================================================
// CCXT EXCHANGE CLIENT (src/data/CCXTExchange.ts)
// ============================================================================

import * as ccxt from 'ccxt';
import { BotConfig, SupportedExchange } from '../config';
import { Balances, BalanceEntry, Candle, OrderBook, OrderResult, OrderSide, OrderType, PositionSide, Ticker } from '../types';
import { ExchangeError, errorMessage } from '../utils/errors';
import { log } from '../utils/logger';
import { ExchangeClient } from './types';

// Keys of a ccxt balance payload that are not currencies
const BALANCE_META_KEYS = new Set(['info', 'free', 'used', 'total', 'timestamp', 'datetime', 'debt']);

function num(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function isBalanceEntry(value: unknown): value is { free?: unknown; used?: unknown; total?: unknown } {
  return typeof value === 'object' && value !== null && ('free' in value || 'total' in value);
}

export interface CcxtOptions {
  apiKey?: string;
  secret?: string;
  password?: string;
  enableRateLimit: boolean;
  options: Record<string, unknown>;
}

export function createCcxtExchange(name: SupportedExchange, options: CcxtOptions): ccxt.Exchange {
  switch (name) {
    case 'binance':
      return new ccxt.binance(options);
    case 'okx':
      return new ccxt.okx(options);
    case 'bybit':
      return new ccxt.bybit(options);
  }
}

export class CCXTExchange implements ExchangeClient {
  private exchange: ccxt.Exchange;
  private readonly name: SupportedExchange;

  constructor(exchangeConfig: BotConfig['exchange'], exchangeName?: SupportedExchange) {
    this.name = exchangeName ?? exchangeConfig.name;
    this.exchange = createCcxtExchange(this.name, {
      apiKey: exchangeConfig.apiKey,
      secret: exchangeConfig.secret,
      password: exchangeConfig.password,
      enableRateLimit: true,
      options: {
        defaultType: exchangeConfig.defaultType,
        adjustForTimeDifference: true,
      },
    });

    if (exchangeConfig.sandbox) {
      this.exchange.setSandboxMode(true);
      log.info(`🧪 ${this.name} sandbox mode enabled`);
    }
  }

  getExchangeName(): string {
    return this.name;
  }

  async getTicker(symbol: string): Promise<Ticker> {
    const ticker = await this.call('fetchTicker', () => this.exchange.fetchTicker(symbol));
    const price = num(ticker.last) || num(ticker.close);
    if (price <= 0) {
      throw new ExchangeError('fetchTicker', `no last price for ${symbol}`);
    }

    return {
      symbol,
      price,
      change24h: num(ticker.percentage),
      volume: num(ticker.quoteVolume) || num(ticker.baseVolume),
      timestamp: num(ticker.timestamp) || Date.now(),
    };
  }

  async getCandles(symbol: string, timeframe: string, limit: number): Promise<Candle[]> {
    const rows = await this.call('fetchOHLCV', () =>
      this.exchange.fetchOHLCV(symbol, timeframe, undefined, limit)
    );

    return rows.map(candle => ({
      timestamp: num(candle[0]),
      open: num(candle[1]),
      high: num(candle[2]),
      low: num(candle[3]),
      close: num(candle[4]),
      volume: num(candle[5]),
    }));
  }

  async getOrderBook(symbol: string, depth: number): Promise<OrderBook> {
    const book = await this.call('fetchOrderBook', () => this.exchange.fetchOrderBook(symbol, depth));

    return {
      bids: book.bids.map(level => ({ price: num(level[0]), amount: num(level[1]) })),
      asks: book.asks.map(level => ({ price: num(level[0]), amount: num(level[1]) })),
      timestamp: num(book.timestamp) || Date.now(),
    };
  }

  async getBalance(): Promise<Balances> {
    const raw = await this.call('fetchBalance', () => this.exchange.fetchBalance());
    const balances: Balances = {};

    for (const [currency, value] of Object.entries(raw)) {
      if (BALANCE_META_KEYS.has(currency) || !isBalanceEntry(value)) continue;
      const entry: BalanceEntry = {
        free: num(value.free),
        used: num(value.used),
        total: num(value.total),
      };
      balances[currency] = entry;
    }

    return balances;
  }

  async createOrder(
    symbol: string,
    side: OrderSide,
    type: OrderType,
    quantity: number,
    price?: number
  ): Promise<OrderResult> {
    if (type === 'limit' && price === undefined) {
      throw new ExchangeError('createOrder', 'limit orders need a price');
    }

    const order = await this.call('createOrder', () =>
      this.exchange.createOrder(symbol, type, side, quantity, price)
    );

    return this.toOrderResult('createOrder', order, quantity, price ?? 0);
  }

  async closePosition(symbol: string, side: PositionSide, quantity: number): Promise<OrderResult> {
    const closeSide: OrderSide = side === 'long' ? 'sell' : 'buy';

    const order = await this.call('closePosition', () =>
      this.exchange.createOrder(symbol, 'market', closeSide, quantity, undefined, { reduceOnly: true })
    );

    return this.toOrderResult('closePosition', order, quantity, 0);
  }

  private toOrderResult(operation: string, order: ccxt.Order, quantity: number, fallbackPrice: number): OrderResult {
    if (!order.id) {
      throw new ExchangeError(operation, `${this.name} returned no order id`);
    }
    return {
      orderId: order.id,
      filledPrice: num(order.average) || num(order.price) || fallbackPrice,
      filledQuantity: num(order.filled) || quantity,
      status: order.status ?? 'unknown',
    };
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ExchangeError) throw error;
      throw new ExchangeError(operation, `${this.name}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
