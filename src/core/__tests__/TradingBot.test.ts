import { TradingBot } from '../TradingBot';
import { BotConfig } from '../../config';
import { MemoryPositionStore } from '../../database/MemoryPositionStore';
import { ConfigurationError, NotFoundError } from '../../utils/errors';
import {
  FakeExchange,
  bullishGapCandles,
  candle,
  strategyParams,
  zonedOrderBook,
} from '../../__tests__/support/fakes';

// Exchanges are injected, and ccxt pulls in ESM-only packages Jest cannot load
jest.mock('ccxt', () => ({}));

const SYMBOL = 'BTC/USDT';

function testConfig(): BotConfig {
  return {
    server: { port: 0, host: '127.0.0.1' },
    exchange: {
      name: 'binance',
      sandbox: true,
      defaultType: 'future',
      paper: true,
      paperStartingBalance: 10000,
      quoteCurrency: 'USDT',
    },
    database: { poolSize: 1 },
    scanner: {
      intervalSeconds: 30,
      timeframes: ['1h'],
      candleLimit: 100,
      orderBookDepth: 20,
      busCapacity: 100,
    },
    engine: { maxReopenAttempts: 2 },
    signal: { minFvgRatio: 0.1, minConfidence: 40, minLiquidityScore: 30 },
  };
}

describe('TradingBot', () => {
  let exchange: FakeExchange;
  let store: MemoryPositionStore;
  let bot: TradingBot;

  beforeEach(() => {
    exchange = new FakeExchange();
    exchange.price = 1000;
    exchange.candles = bullishGapCandles();
    exchange.orderBook = zonedOrderBook();
    store = new MemoryPositionStore();
    bot = new TradingBot(testConfig(), { store, createExchange: () => exchange });
  });

  afterEach(async () => {
    await bot.stop();
  });

  describe('lifecycle', () => {
    it('should start the scanner and stop cleanly', async () => {
      await bot.start();
      expect(bot.isRunning).toBe(true);
      expect(bot.scanner.isRunning).toBe(true);

      await bot.stop();
      expect(bot.isRunning).toBe(false);
      expect(bot.scanner.isRunning).toBe(false);
    });

    it('should cache one client per venue', () => {
      expect(bot.getExchange('Binance')).toBe(bot.getExchange('binance'));
    });

    it('should reject an unsupported venue', () => {
      expect(() => bot.getExchange('nasdaq')).toThrow(ConfigurationError);
    });
  });

  describe('strategies', () => {
    it('should open both legs and report a running engine', async () => {
      const status = await bot.startStrategy('binance', SYMBOL, strategyParams());

      expect(status).toMatchObject({ exchange: 'binance', symbol: SYMBOL, openPositions: 2 });
      expect(exchange.orders.map(o => o.side)).toEqual(['buy', 'sell']);
      expect((await store.getStrategyConfig('binance', SYMBOL))?.parameters.monitorIntervalMs).toBe(50);
      expect(await bot.getStrategyStatus()).toHaveLength(1);
    });

    it('should refuse a second strategy on the same symbol', async () => {
      await bot.startStrategy('binance', SYMBOL, strategyParams());

      await expect(bot.startStrategy('binance', SYMBOL, strategyParams()))
        .rejects.toThrow('A strategy is already running for BTC/USDT');
    });

    it('should let only one of two concurrent starts through', async () => {
      const results = await Promise.allSettled([
        bot.startStrategy('binance', SYMBOL, strategyParams()),
        bot.startStrategy('binance', SYMBOL, strategyParams()),
      ]);

      expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected']);
      expect(await store.getOpenPositions('binance', SYMBOL)).toHaveLength(2);

      await bot.stopStrategy(SYMBOL);
      exchange.price = 1100;
      await new Promise(resolve => setTimeout(resolve, 120));
      expect(exchange.orders).toHaveLength(2);
    });

    it('should release the symbol when initialization fails', async () => {
      exchange.failCreateOrder = 1;

      await expect(bot.startStrategy('binance', SYMBOL, strategyParams())).rejects.toThrow('order rejected');
      await expect(bot.startStrategy('binance', SYMBOL, strategyParams())).resolves.toMatchObject({ openPositions: 2 });
    });

    it('should report whether a strategy was stopped', async () => {
      await bot.startStrategy('binance', SYMBOL, strategyParams());

      expect(await bot.stopStrategy(SYMBOL)).toBe(true);
      expect(await bot.stopStrategy(SYMBOL)).toBe(false);
      expect(await bot.getStrategyStatus()).toEqual([]);
    });

    it('should not pause an unknown strategy', () => {
      expect(() => bot.pauseStrategy(SYMBOL)).toThrow(NotFoundError);
      expect(() => bot.resumeStrategy(SYMBOL)).toThrow(NotFoundError);
    });

    it('should pause and resume a running strategy', async () => {
      await bot.startStrategy('binance', SYMBOL, strategyParams());

      bot.pauseStrategy(SYMBOL);
      expect((await bot.getStrategyStatus())[0].paused).toBe(true);

      bot.resumeStrategy(SYMBOL);
      expect((await bot.getStrategyStatus())[0].paused).toBe(false);
    });
  });

  describe('positions', () => {
    it('should close a position through the running engine', async () => {
      await bot.startStrategy('binance', SYMBOL, strategyParams());

      const closed = await bot.closePosition(1);

      expect(closed.state).toMatchObject({ status: 'closed', cause: 'close', pnl: 0 });
      expect(exchange.closes).toHaveLength(1);
    });

    it('should close a position from the saved config once its strategy has stopped', async () => {
      await bot.startStrategy('binance', SYMBOL, strategyParams());
      await bot.stopStrategy(SYMBOL);
      exchange.price = 1010;

      const closed = await bot.closePosition(2);

      expect(closed.state).toMatchObject({ status: 'closed', pnl: -10 });
    });

    it('should set an independent stop', async () => {
      await bot.startStrategy('binance', SYMBOL, strategyParams());

      await bot.setStopLoss(1, 950);

      expect((await store.getPosition(1))?.stopLossPrice).toBe(950);
    });

    it('should not find a missing position', async () => {
      await expect(bot.closePosition(42)).rejects.toThrow('Position 42 not found');
    });
  });

  describe('executeSignal', () => {
    it('should need a cached signal', async () => {
      await expect(bot.executeSignal(SYMBOL, '1h')).rejects.toThrow('No cached signal for BTC/USDT 1h');
    });

    it('should open a leg from the cached signal', async () => {
      bot.scanner.addWatched(SYMBOL, 'binance', ['1h']);
      await bot.scanner.scanOnce();
      await bot.startStrategy('binance', SYMBOL, strategyParams());

      const position = await bot.executeSignal(SYMBOL, '1h');

      expect(position).toMatchObject({ side: 'long', entryPrice: 1000, quantity: 1 });
      expect(position?.stopLossPrice).toBeCloseTo(931, 10);
    });

    it('should need a running strategy for the symbol', async () => {
      bot.scanner.addWatched(SYMBOL, 'binance', ['1h']);
      await bot.scanner.scanOnce();

      await expect(bot.executeSignal(SYMBOL, '1h')).rejects.toThrow('No strategy running for BTC/USDT');
    });
  });

  describe('suggestParameters', () => {
    it('should scale thresholds to the ATR', async () => {
      exchange.candles = Array.from({ length: 15 }, (_, i) => candle(i, 100, 101, 99, 100));

      expect(await bot.suggestParameters('binance', SYMBOL)).toMatchObject({
        exchange: 'binance',
        symbol: SYMBOL,
        timeframe: '1h',
        atr: 2,
        volatility: 'high',
        longThreshold: 0.02,
        shortThreshold: 0.02,
      });
    });

    it('should return null without enough history', async () => {
      expect(await bot.suggestParameters('binance', SYMBOL, '4h')).toBeNull();
    });
  });
});
