// ============================================================================
// BOT ORCHESTRATION (src/core/TradingBot.ts)
// ============================================================================

import { BotConfig, SupportedExchange, parseExchangeName } from '../config';
import { SuggestedParameters, calculateAtr, suggestStrategyParameters } from '../analysis/indicators';
import { CCXTExchange } from '../data/CCXTExchange';
import { PaperExchange } from '../data/PaperExchange';
import { ExchangeClient } from '../data/types';
import { DatabaseClient } from '../database/client';
import { MemoryPositionStore } from '../database/MemoryPositionStore';
import { PositionRepository } from '../database/PositionRepository';
import { PositionStore } from '../database/types';
import { ScanScheduler } from '../monitoring/ScanScheduler';
import { SignalBus } from '../monitoring/SignalBus';
import { SignalGenerator } from '../strategy/SignalGenerator';
import { EngineStatus, PositionEngine } from '../trading/PositionEngine';
import { PositionRecord, StrategyParameters } from '../types';
import { ConfigurationError, NotFoundError, errorMessage } from '../utils/errors';
import { log } from '../utils/logger';

export interface TradingBotDependencies {
  store?: PositionStore;
  createExchange?: (name: SupportedExchange) => ExchangeClient;
}

export interface AtrSuggestion extends SuggestedParameters {
  exchange: string;
  symbol: string;
  timeframe: string;
}

export class TradingBot {
  readonly bus: SignalBus;
  readonly scanner: ScanScheduler;
  readonly signalGenerator: SignalGenerator;
  readonly store: PositionStore;

  private config: BotConfig;
  private db: DatabaseClient | null = null;
  private createExchange: (name: SupportedExchange) => ExchangeClient;
  private exchanges: Map<SupportedExchange, ExchangeClient> = new Map();
  private engines: Map<string, PositionEngine> = new Map();
  private engineRuns: Map<string, Promise<void>> = new Map();
  private running: boolean = false;

  constructor(config: BotConfig, deps: TradingBotDependencies = {}) {
    this.config = config;
    this.createExchange = deps.createExchange ?? (name => this.defaultExchange(name));

    if (deps.store) {
      this.store = deps.store;
    } else if (config.database.url) {
      this.db = new DatabaseClient({
        connectionString: config.database.url,
        poolSize: config.database.poolSize,
      });
      this.store = new PositionRepository(this.db);
    } else {
      this.store = new MemoryPositionStore();
    }

    this.signalGenerator = new SignalGenerator({
      minFvgRatio: config.signal.minFvgRatio,
      minConfidence: config.signal.minConfidence,
      minLiquidityScore: config.signal.minLiquidityScore,
    });
    this.bus = new SignalBus(config.scanner.busCapacity);
    this.scanner = new ScanScheduler(
      name => this.getExchange(name),
      this.signalGenerator,
      this.bus,
      {
        intervalSeconds: config.scanner.intervalSeconds,
        candleLimit: config.scanner.candleLimit,
        orderBookDepth: config.scanner.orderBookDepth,
        defaultExchange: config.exchange.name,
        defaultTimeframes: config.scanner.timeframes,
      }
    );
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    log.info(`🤖 Starting gap/liquidity bot (${this.config.exchange.paper ? 'paper' : 'live'} trading)`);

    if (this.db) {
      await this.db.connect();
    }
    const healthy = await this.store.healthCheck();
    if (!healthy) {
      throw new Error('Position store health check failed');
    }

    this.scanner.start();
    this.running = true;
    log.info('✅ Bot is running');
  }

  async stop(): Promise<void> {
    log.info('🛑 Stopping bot...');
    this.running = false;
    this.scanner.stop();

    for (const symbol of [...this.engines.keys()]) {
      await this.stopStrategy(symbol);
    }

    await this.bus.flush();
    this.bus.close();

    const stats = await this.store.getPerformance();
    log.info('📊 Final stats', { ...stats });

    await this.store.close();
    log.info('✅ Bot stopped');
  }

  /**
   * Resolves (and caches) the client for a venue. In paper mode orders are
   * filled locally against the venue's public market data.
   */
  getExchange(name: string): ExchangeClient {
    const venue = parseExchangeName(name);
    let exchange = this.exchanges.get(venue);
    if (!exchange) {
      exchange = this.createExchange(venue);
      this.exchanges.set(venue, exchange);
    }
    return exchange;
  }

  // ========== STRATEGIES ==========

  async startStrategy(exchangeName: string, symbol: string, params: StrategyParameters): Promise<EngineStatus> {
    if (this.engines.has(symbol)) {
      throw new ConfigurationError(`A strategy is already running for ${symbol}`);
    }

    const exchange = this.getExchange(exchangeName);
    const engine = new PositionEngine(exchange, this.store, symbol, params, {
      maxReopenAttempts: this.config.engine.maxReopenAttempts,
      quoteCurrency: this.config.exchange.quoteCurrency,
    });
    // Claimed before the first await so a concurrent start sees it
    this.engines.set(symbol, engine);

    try {
      await this.store.saveStrategyConfig(exchange.getExchangeName(), symbol, params);
      await engine.initialize();
    } catch (error) {
      this.engines.delete(symbol);
      throw error;
    }

    // Stopped while it was initializing
    if (this.engines.get(symbol) !== engine) return engine.getStatus();

    const run = engine.run()
      .catch((error) => {
        log.error(`Position engine for ${symbol} halted: ${errorMessage(error)}`, { error });
      })
      .finally(() => {
        if (this.engines.get(symbol) === engine) this.engines.delete(symbol);
        this.engineRuns.delete(symbol);
      });
    this.engineRuns.set(symbol, run);

    return engine.getStatus();
  }

  async stopStrategy(symbol: string): Promise<boolean> {
    const engine = this.engines.get(symbol);
    if (!engine) return false;

    engine.stop();
    this.engines.delete(symbol);
    await this.engineRuns.get(symbol);
    return true;
  }

  pauseStrategy(symbol: string): void {
    this.requireEngine(symbol).pause();
  }

  resumeStrategy(symbol: string): void {
    this.requireEngine(symbol).resume();
  }

  async getStrategyStatus(): Promise<EngineStatus[]> {
    return Promise.all([...this.engines.values()].map(engine => engine.getStatus()));
  }

  // ========== POSITIONS ==========

  async closePosition(positionId: number): Promise<PositionRecord> {
    const engine = await this.engineForPosition(positionId);
    return engine.closeManually(positionId);
  }

  async setStopLoss(positionId: number, stopLossPrice: number): Promise<void> {
    const engine = await this.engineForPosition(positionId);
    await engine.setStopLoss(positionId, stopLossPrice);
  }

  /**
   * Opens a position from the latest cached signal for a symbol/timeframe.
   * Returns null when that signal did not pass.
   */
  async executeSignal(symbol: string, timeframe: string): Promise<PositionRecord | null> {
    const signal = this.scanner.latestSignal(symbol)[timeframe];
    if (!signal) {
      throw new NotFoundError(`No cached signal for ${symbol} ${timeframe}`);
    }
    return this.requireEngine(symbol).openFromSignal(signal);
  }

  // ========== INDICATORS ==========

  async suggestParameters(exchangeName: string, symbol: string, timeframe: string = '1h'): Promise<AtrSuggestion | null> {
    const exchange = this.getExchange(exchangeName);
    const candles = await exchange.getCandles(symbol, timeframe, this.config.scanner.candleLimit);
    const atr = calculateAtr(candles);
    if (!atr) return null;

    return {
      exchange: exchange.getExchangeName(),
      symbol,
      timeframe,
      ...suggestStrategyParameters(atr),
    };
  }

  private requireEngine(symbol: string): PositionEngine {
    const engine = this.engines.get(symbol);
    if (!engine) {
      throw new NotFoundError(`No strategy running for ${symbol}`);
    }
    return engine;
  }

  /**
   * The running engine for the position's symbol, or a short-lived one
   * built from the symbol's saved config when its strategy is stopped.
   */
  private async engineForPosition(positionId: number): Promise<PositionEngine> {
    const position = await this.store.getPosition(positionId);
    if (!position) {
      throw new NotFoundError(`Position ${positionId} not found`);
    }

    const running = this.engines.get(position.symbol);
    if (running && running.exchangeName === position.exchange) return running;

    const saved = await this.store.getStrategyConfig(position.exchange, position.symbol);
    if (!saved) {
      throw new NotFoundError(`No strategy config for ${position.exchange} ${position.symbol}`);
    }
    return new PositionEngine(this.getExchange(position.exchange), this.store, position.symbol, saved.parameters, {
      quoteCurrency: this.config.exchange.quoteCurrency,
    });
  }

  private defaultExchange(name: SupportedExchange): ExchangeClient {
    const live = new CCXTExchange(this.config.exchange, name);
    if (!this.config.exchange.paper) return live;
    return new PaperExchange(live, this.config.exchange.paperStartingBalance, this.config.exchange.quoteCurrency);
  }
}
