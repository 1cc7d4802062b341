// ============================================================================
// PAPER TRADING EXCHANGE (src/data/PaperExchange.ts)
// ============================================================================

import { Balances, Candle, OrderBook, OrderResult, OrderSide, OrderType, PositionSide, Ticker } from '../types';
import { ExchangeError } from '../utils/errors';
import { ExchangeClient, MarketDataSource } from './types';

interface Inventory {
  quantity: number;
  avgPrice: number;
}

/**
 * Fills orders locally at the source's last price. Margin is not modelled:
 * the quote balance only moves by realized P&L when inventory is closed.
 */
export class PaperExchange implements ExchangeClient {
  private readonly source: MarketDataSource;
  private readonly quoteCurrency: string;
  private balance: number;
  private inventory: Map<string, Inventory> = new Map();
  private orderSeq: number = 0;

  constructor(source: MarketDataSource, startingBalance: number, quoteCurrency: string = 'USDT') {
    this.source = source;
    this.balance = startingBalance;
    this.quoteCurrency = quoteCurrency;
  }

  getExchangeName(): string {
    return this.source.getExchangeName();
  }

  getTicker(symbol: string): Promise<Ticker> {
    return this.source.getTicker(symbol);
  }

  getCandles(symbol: string, timeframe: string, limit: number): Promise<Candle[]> {
    return this.source.getCandles(symbol, timeframe, limit);
  }

  getOrderBook(symbol: string, depth: number): Promise<OrderBook> {
    return this.source.getOrderBook(symbol, depth);
  }

  async getBalance(): Promise<Balances> {
    return {
      [this.quoteCurrency]: { free: this.balance, used: 0, total: this.balance },
    };
  }

  async createOrder(
    symbol: string,
    side: OrderSide,
    type: OrderType,
    quantity: number,
    price?: number
  ): Promise<OrderResult> {
    if (!(quantity > 0)) {
      throw new ExchangeError('createOrder', `invalid quantity ${quantity}`);
    }

    const fillPrice = type === 'limit' && price !== undefined
      ? price
      : (await this.source.getTicker(symbol)).price;

    const key = this.key(symbol, side === 'buy' ? 'long' : 'short');
    const held = this.inventory.get(key) ?? { quantity: 0, avgPrice: 0 };
    const total = held.quantity + quantity;
    this.inventory.set(key, {
      quantity: total,
      avgPrice: (held.avgPrice * held.quantity + fillPrice * quantity) / total,
    });

    return this.fill(fillPrice, quantity);
  }

  async closePosition(symbol: string, side: PositionSide, quantity: number): Promise<OrderResult> {
    const key = this.key(symbol, side);
    const held = this.inventory.get(key);
    if (!held || held.quantity < quantity - 1e-12) {
      throw new ExchangeError('closePosition', `no ${side} inventory of ${quantity} for ${symbol}`);
    }

    const { price } = await this.source.getTicker(symbol);
    const pnl = side === 'long'
      ? (price - held.avgPrice) * quantity
      : (held.avgPrice - price) * quantity;
    this.balance += pnl;

    const remaining = held.quantity - quantity;
    if (remaining <= 1e-12) {
      this.inventory.delete(key);
    } else {
      this.inventory.set(key, { quantity: remaining, avgPrice: held.avgPrice });
    }

    return this.fill(price, quantity);
  }

  private fill(price: number, quantity: number): OrderResult {
    this.orderSeq += 1;
    return {
      orderId: `paper-${this.orderSeq}`,
      filledPrice: price,
      filledQuantity: quantity,
      status: 'closed',
    };
  }

  private key(symbol: string, side: PositionSide): string {
    return `${symbol}:${side}`;
  }
}
