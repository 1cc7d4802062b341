import { ExchangeClient } from '../../data/types';
import {
  Balances,
  Candle,
  OrderBook,
  OrderBookLevel,
  OrderResult,
  OrderSide,
  OrderType,
  PositionSide,
  ScannedSignal,
  StrategyParameters,
  Ticker,
} from '../../types';
import { ExchangeError } from '../../utils/errors';

export function candle(timestamp: number, open: number, high: number, low: number, close: number): Candle {
  return { timestamp, open, high, low, close, volume: 1 };
}

/**
 * Bullish gap between 1050 (first candle's low) and 950 (third candle's high);
 * the middle candle spans 280, so the gap ratio is 100 / 280.
 */
export function bullishGapCandles(): Candle[] {
  return [
    candle(1, 1055, 1060, 1050, 1055),
    candle(2, 1040, 1140, 860, 960),
    candle(3, 945, 950, 940, 945),
  ];
}

export function bearishGapCandles(): Candle[] {
  return [
    candle(1, 945, 950, 940, 945),
    candle(2, 960, 1140, 860, 1040),
    candle(3, 1055, 1060, 1050, 1055),
  ];
}

export function levels(count: number, firstPrice: number, step: number, amountAt: (i: number) => number): OrderBookLevel[] {
  return Array.from({ length: count }, (_, i) => ({ price: firstPrice + step * i, amount: amountAt(i) }));
}

/**
 * Book around 1000: six ask buckets of five levels holding 60, 5, 40, 5, 5, 5
 * (levels priced 1002, 1003, ...), and 30 evenly filled bid levels of 4 each.
 * The 1014 ask bucket is the best long target.
 */
export function zonedOrderBook(): OrderBook {
  const perLevel = [12, 1, 8, 1, 1, 1];
  return {
    bids: levels(30, 999, -1, () => 4),
    asks: levels(30, 1002, 1, i => perLevel[Math.floor(i / 5)]),
  };
}

/** Even book around 1000 with no standout bucket on either side. */
export function flatOrderBook(): OrderBook {
  return {
    bids: levels(30, 999, -1, () => 40),
    asks: levels(30, 1001, 1, () => 40),
  };
}

export function ticker(symbol: string, price: number, change24h: number = 3): Ticker {
  return { symbol, price, change24h, volume: 0, timestamp: 0 };
}

export function strategyParams(overrides: Partial<StrategyParameters> = {}): StrategyParameters {
  return {
    longThreshold: 0.02,
    shortThreshold: 0.02,
    defaultStopLossRatio: 0.05,
    sizing: { mode: 'fixed', positionSize: 1000 },
    leverage: 1,
    monitorIntervalMs: 50,
    ...overrides,
  };
}

export function scannedSignal(overrides: Partial<ScannedSignal> = {}): ScannedSignal {
  return {
    hasSignal: false,
    direction: 'none',
    entryPrice: 1000,
    stopLoss: null,
    takeProfit: null,
    takeProfitReason: null,
    confidence: 0,
    riskRewardRatio: 0,
    reason: 'no gap found',
    gap: null,
    liquidity: { bidVolume: 0, askVolume: 0, imbalanceRatio: 0, liquidityScore: 0, depthRatio: 0 },
    liquidityZones: [],
    symbol: 'BTC/USDT',
    exchange: 'binance',
    timeframe: '1h',
    scannedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

interface RecordedOrder {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  quantity: number;
}

interface RecordedClose {
  symbol: string;
  side: PositionSide;
  quantity: number;
}

/**
 * In-process exchange: fills at `price`, fails on demand.
 */
export class FakeExchange implements ExchangeClient {
  price: number = 100;
  change24h: number = 3;
  balance: number = 10000;
  candles: Candle[] = [];
  orderBook: OrderBook = { bids: [], asks: [] };

  failTicker: boolean = false;
  failClose: boolean = false;
  /** Number of upcoming createOrder calls to reject. */
  failCreateOrder: number = 0;

  orders: RecordedOrder[] = [];
  closes: RecordedClose[] = [];
  private seq: number = 0;

  constructor(private readonly name: string = 'binance') {}

  getExchangeName(): string {
    return this.name;
  }

  async getTicker(symbol: string): Promise<Ticker> {
    if (this.failTicker) throw new ExchangeError('fetchTicker', 'exchange unavailable');
    return ticker(symbol, this.price, this.change24h);
  }

  async getCandles(_symbol: string, _timeframe: string, _limit: number): Promise<Candle[]> {
    return this.candles;
  }

  async getOrderBook(_symbol: string, _depth: number): Promise<OrderBook> {
    return this.orderBook;
  }

  async getBalance(): Promise<Balances> {
    return { USDT: { free: this.balance, used: 0, total: this.balance } };
  }

  async createOrder(symbol: string, side: OrderSide, type: OrderType, quantity: number): Promise<OrderResult> {
    if (this.failCreateOrder > 0) {
      this.failCreateOrder -= 1;
      throw new ExchangeError('createOrder', 'order rejected');
    }
    this.orders.push({ symbol, side, type, quantity });
    return this.fill(quantity);
  }

  async closePosition(symbol: string, side: PositionSide, quantity: number): Promise<OrderResult> {
    if (this.failClose) throw new ExchangeError('closePosition', 'order rejected');
    this.closes.push({ symbol, side, quantity });
    return this.fill(quantity);
  }

  private fill(quantity: number): OrderResult {
    this.seq += 1;
    return { orderId: `order-${this.seq}`, filledPrice: this.price, filledQuantity: quantity, status: 'closed' };
  }
}
