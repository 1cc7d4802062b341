// ============================================================================
// WATCHLIST SCANNER (src/monitoring/ScanScheduler.ts)
// ============================================================================

import { DateTime } from 'luxon';
import { MarketDataSource } from '../data/types';
import { SignalGenerator } from '../strategy/SignalGenerator';
import { ScannedSignal } from '../types';
import { log } from '../utils/logger';
import { SignalBus, SignalObserver } from './SignalBus';

export type ExchangeResolver = (exchange: string) => MarketDataSource;

export interface ScanSchedulerOptions {
  intervalSeconds?: number;
  candleLimit?: number;
  orderBookDepth?: number;
  defaultExchange?: string;
  defaultTimeframes?: string[];
}

export interface WatchedSymbol {
  symbol: string;
  exchange: string;
  timeframes: string[];
}

/**
 * Periodically runs the signal generator over every watched symbol and
 * timeframe. Watch-list and cache mutations are synchronous, so the event
 * loop serializes them; passes never overlap.
 */
export class ScanScheduler {
  private readonly resolveExchange: ExchangeResolver;
  private readonly generator: SignalGenerator;
  private readonly bus: SignalBus;
  private readonly intervalSeconds: number;
  private readonly candleLimit: number;
  private readonly orderBookDepth: number;
  private readonly defaultExchange: string;
  private readonly defaultTimeframes: string[];

  private watched: Map<string, WatchedSymbol> = new Map();
  private cache: Map<string, Map<string, ScannedSignal>> = new Map();
  private timer?: NodeJS.Timeout;
  private scanning: boolean = false;

  constructor(
    resolveExchange: ExchangeResolver,
    generator: SignalGenerator,
    bus: SignalBus,
    options: ScanSchedulerOptions = {}
  ) {
    this.resolveExchange = resolveExchange;
    this.generator = generator;
    this.bus = bus;
    this.intervalSeconds = options.intervalSeconds ?? 30;
    this.candleLimit = options.candleLimit ?? 100;
    this.orderBookDepth = options.orderBookDepth ?? 20;
    this.defaultExchange = options.defaultExchange ?? 'binance';
    this.defaultTimeframes = options.defaultTimeframes ?? ['5m', '1h', '1d'];
  }

  addWatched(symbol: string, exchange?: string, timeframes?: string[]): WatchedSymbol {
    const entry: WatchedSymbol = {
      symbol,
      exchange: exchange ?? this.defaultExchange,
      timeframes: timeframes && timeframes.length > 0 ? [...timeframes] : [...this.defaultTimeframes],
    };
    this.watched.set(symbol, entry);
    log.info(`👀 Watching ${symbol} on ${entry.exchange} (${entry.timeframes.join(', ')})`);
    return entry;
  }

  removeWatched(symbol: string): boolean {
    const removed = this.watched.delete(symbol);
    this.cache.delete(symbol);
    if (removed) log.info(`Stopped watching ${symbol}`);
    return removed;
  }

  listWatched(): WatchedSymbol[] {
    return [...this.watched.values()].map(w => ({ ...w, timeframes: [...w.timeframes] }));
  }

  /** Copies of the cached results, keyed by timeframe (and by symbol without one). */
  latestSignal(symbol: string): Record<string, ScannedSignal>;
  latestSignal(): Record<string, Record<string, ScannedSignal>>;
  latestSignal(symbol?: string): Record<string, ScannedSignal> | Record<string, Record<string, ScannedSignal>> {
    if (symbol !== undefined) {
      return structuredClone(Object.fromEntries(this.cache.get(symbol) ?? new Map<string, ScannedSignal>()));
    }

    const all: Record<string, Record<string, ScannedSignal>> = {};
    for (const [sym, byTimeframe] of this.cache) {
      all[sym] = Object.fromEntries(byTimeframe);
    }
    return structuredClone(all);
  }

  register(observer: SignalObserver): void {
    this.bus.subscribe(observer);
  }

  unregister(observer: SignalObserver): void {
    this.bus.unsubscribe(observer);
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * One pass over the watch list. Returns how many results were cached;
   * returns 0 without scanning if a pass is already in progress.
   */
  async scanOnce(): Promise<number> {
    if (this.scanning) return 0;
    this.scanning = true;

    let cached = 0;
    try {
      for (const entry of [...this.watched.values()]) {
        for (const timeframe of entry.timeframes) {
          const signal = await this.scan(entry, timeframe);
          if (!signal) continue;

          // Dropped from the watch list while we were fetching
          if (this.watched.get(entry.symbol) !== entry) break;

          let byTimeframe = this.cache.get(entry.symbol);
          if (!byTimeframe) {
            byTimeframe = new Map();
            this.cache.set(entry.symbol, byTimeframe);
          }
          byTimeframe.set(timeframe, signal);
          cached += 1;

          if (signal.hasSignal) {
            log.signal(entry.symbol, timeframe, signal.direction, signal.confidence);
          }
          this.bus.publish(entry.symbol, timeframe, signal);
        }
      }
    } finally {
      this.scanning = false;
    }

    return cached;
  }

  start(): void {
    if (this.timer) return;

    log.info(`🔍 Scanner started, every ${this.intervalSeconds}s`);
    this.runPass();
    this.timer = setInterval(() => this.runPass(), this.intervalSeconds * 1000);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    log.info('🔍 Scanner stopped');
  }

  private runPass(): void {
    this.scanOnce().catch((error) => {
      log.error('Scan pass crashed', { error });
    });
  }

  private async scan(entry: WatchedSymbol, timeframe: string): Promise<ScannedSignal | null> {
    try {
      const source = this.resolveExchange(entry.exchange);
      const candles = await source.getCandles(entry.symbol, timeframe, this.candleLimit);
      const ticker = await source.getTicker(entry.symbol);
      const orderBook = await source.getOrderBook(entry.symbol, this.orderBookDepth);

      const signal = this.generator.generate(candles, orderBook, ticker.price, ticker);
      return {
        ...signal,
        symbol: entry.symbol,
        exchange: entry.exchange,
        timeframe,
        scannedAt: DateTime.utc().toISO() ?? new Date().toISOString(),
      };
    } catch (error) {
      log.error(`Scan failed for ${entry.symbol} ${timeframe}`, { error });
      return null;
    }
  }
}
