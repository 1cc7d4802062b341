import { Balances, Candle, OrderBook, OrderResult, OrderSide, OrderType, PositionSide, Ticker } from '../types';

/**
 * Read-only market snapshots for one venue.
 */
export interface MarketDataSource {
  getExchangeName(): string;
  getTicker(symbol: string): Promise<Ticker>;
  getCandles(symbol: string, timeframe: string, limit: number): Promise<Candle[]>;
  getOrderBook(symbol: string, depth: number): Promise<OrderBook>;
}

/**
 * Market data plus account access and order routing.
 */
export interface ExchangeClient extends MarketDataSource {
  getBalance(): Promise<Balances>;
  createOrder(
    symbol: string,
    side: OrderSide,
    type: OrderType,
    quantity: number,
    price?: number
  ): Promise<OrderResult>;
  closePosition(symbol: string, side: PositionSide, quantity: number): Promise<OrderResult>;
}
