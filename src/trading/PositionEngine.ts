// ============================================================================
// HEDGE-GRID POSITION ENGINE (src/trading/PositionEngine.ts)
// ============================================================================

import { ExchangeClient } from '../data/types';
import { PositionStore } from '../database/types';
import {
  CloseCause,
  PositionDecision,
  PositionRecord,
  PositionSide,
  SizingMode,
  StrategyParameters,
  TradeSignal,
} from '../types';
import { ExchangeError, NotFoundError, errorMessage } from '../utils/errors';
import { log } from '../utils/logger';

export interface PositionEngineOptions {
  maxReopenAttempts?: number;
  quoteCurrency?: string;
}

/** A leg closed at its threshold whose replacement has not been placed yet. */
export interface PendingReopen {
  closedPositionId: number;
  side: PositionSide;
  retries: number;
}

export interface EngineStatus {
  exchange: string;
  symbol: string;
  running: boolean;
  paused: boolean;
  lastPrice: number | null;
  lastTickAt: number | null;
  openPositions: number;
  pendingReopens: PendingReopen[];
  abandonedSides: PositionSide[];
  parameters: StrategyParameters;
}

type ThresholdParameters = Pick<StrategyParameters, 'longThreshold' | 'shortThreshold' | 'defaultStopLossRatio'>;

/**
 * Stop-loss check first, then the take-profit threshold. An independent
 * stop-loss price on the position overrides the default ratio.
 */
export function evaluatePosition(
  position: Pick<PositionRecord, 'side' | 'entryPrice' | 'stopLossPrice'>,
  price: number,
  params: ThresholdParameters
): PositionDecision {
  const { side, entryPrice } = position;

  const stopPrice = position.stopLossPrice ?? (side === 'long'
    ? entryPrice * (1 - params.defaultStopLossRatio)
    : entryPrice * (1 + params.defaultStopLossRatio));

  if (side === 'long' ? price <= stopPrice : price >= stopPrice) {
    return { action: 'stop_loss', stopPrice };
  }

  const triggerPrice = side === 'long'
    ? entryPrice * (1 + params.longThreshold)
    : entryPrice * (1 - params.shortThreshold);

  if (side === 'long' ? price >= triggerPrice : price <= triggerPrice) {
    return { action: 'close_and_reopen', triggerPrice };
  }

  return { action: 'hold' };
}

export function calculateQuantity(sizing: SizingMode, price: number, leverage: number, balance: number): number {
  if (price <= 0) return 0;
  const notional = sizing.mode === 'fixed' ? sizing.positionSize : balance * sizing.positionRatio;
  return (notional / price) * leverage;
}

export function calculatePnl(side: PositionSide, entryPrice: number, price: number, quantity: number): number {
  return side === 'long' ? (price - entryPrice) * quantity : (entryPrice - price) * quantity;
}

/**
 * Keeps one long and one short leg open on a symbol. A leg that reaches its
 * threshold is closed and reopened at the current price; a leg that hits its
 * stop is closed for good.
 *
 * Every operation that touches positions runs through one queue, so a manual
 * close can never interleave with a tick acting on the same position.
 */
export class PositionEngine {
  readonly symbol: string;
  private readonly exchange: ExchangeClient;
  private readonly store: PositionStore;
  private params: StrategyParameters;
  private readonly maxReopenAttempts: number;
  private readonly quoteCurrency: string;

  private running: boolean = false;
  private paused: boolean = false;
  private lastPrice: number | null = null;
  private lastTickAt: number | null = null;
  // Keyed by the closed position, so two same-side legs each keep their own retry count
  private pendingReopens: Map<number, PendingReopen> = new Map();
  private abandonedSides: Set<PositionSide> = new Set();
  private queue: Promise<void> = Promise.resolve();
  private wakeTimer?: NodeJS.Timeout;
  private wake?: () => void;

  constructor(
    exchange: ExchangeClient,
    store: PositionStore,
    symbol: string,
    params: StrategyParameters,
    options: PositionEngineOptions = {}
  ) {
    this.exchange = exchange;
    this.store = store;
    this.symbol = symbol;
    this.params = params;
    this.maxReopenAttempts = options.maxReopenAttempts ?? 5;
    this.quoteCurrency = options.quoteCurrency ?? 'USDT';
  }

  get exchangeName(): string {
    return this.exchange.getExchangeName();
  }

  get parameters(): StrategyParameters {
    return this.params;
  }

  /**
   * Opens the initial long and short legs. Any failure here is fatal.
   */
  async initialize(): Promise<PositionRecord[]> {
    return this.exclusive(async () => {
      const { price } = await this.exchange.getTicker(this.symbol);
      this.lastPrice = price;

      log.info(`🚀 Initializing hedge grid on ${this.exchangeName} ${this.symbol} @ ${price}`);

      const long = await this.openLeg('long', price, 'initialize');
      const short = await this.openLeg('short', price, 'initialize');
      return [long, short];
    });
  }

  /**
   * One monitoring cycle. Exchange failures are logged and the affected
   * position is retried next cycle; store failures propagate.
   */
  async tick(): Promise<void> {
    return this.exclusive(async () => {
      if (this.paused) return;

      let price: number;
      try {
        price = (await this.exchange.getTicker(this.symbol)).price;
      } catch (error) {
        if (!(error instanceof ExchangeError)) throw error;
        log.warn(`Price fetch failed for ${this.symbol}, retrying next tick`, { error });
        return;
      }

      this.lastPrice = price;
      this.lastTickAt = Date.now();

      await this.retryReopens(price);

      const positions = await this.store.getOpenPositions(this.exchangeName, this.symbol);
      for (const position of positions) {
        await this.store.updatePosition(position.id, { currentPrice: price });
        const decision = evaluatePosition(position, price, this.params);

        switch (decision.action) {
          case 'hold':
            break;
          case 'stop_loss':
            await this.tryClose(position, price, 'stop_loss');
            break;
          case 'close_and_reopen':
            if (await this.tryClose(position, price, 'close')) {
              await this.tryReopen(position, price);
            }
            break;
        }
      }
    });
  }

  /**
   * Ticks every monitorIntervalMs until stop() is called.
   */
  async run(): Promise<void> {
    if (this.running) return;
    this.running = true;
    log.info(`▶️ Position engine running for ${this.symbol} every ${this.params.monitorIntervalMs}ms`);

    try {
      while (this.running) {
        await this.tick();
        if (!this.running) break;
        await this.waitForNextTick();
      }
    } finally {
      this.running = false;
      log.info(`⏹️ Position engine stopped for ${this.symbol}`);
    }
  }

  stop(): void {
    this.running = false;
    if (this.wakeTimer) clearTimeout(this.wakeTimer);
    if (this.wake) this.wake();
  }

  pause(): void {
    this.paused = true;
    log.info(`⏸️ Position engine paused for ${this.symbol}`);
  }

  resume(): void {
    this.paused = false;
    log.info(`▶️ Position engine resumed for ${this.symbol}`);
  }

  updateParameters(params: StrategyParameters): void {
    this.params = params;
  }

  /**
   * Closes a position at market without reopening it.
   */
  async closeManually(positionId: number): Promise<PositionRecord> {
    return this.exclusive(async () => {
      const position = await this.requireOpenPosition(positionId);
      const { price } = await this.exchange.getTicker(this.symbol);
      await this.closeLeg(position, price, 'close');
      const closed = await this.store.getPosition(positionId);
      if (!closed) throw new NotFoundError(`Position ${positionId} not found`);
      return closed;
    });
  }

  async setStopLoss(positionId: number, stopLossPrice: number): Promise<void> {
    if (!(stopLossPrice > 0)) {
      throw new RangeError(`Stop-loss price must be positive, got ${stopLossPrice}`);
    }
    return this.exclusive(async () => {
      await this.requireOpenPosition(positionId);
      await this.store.updatePosition(positionId, { stopLossPrice });
      log.info(`🛡️ Stop-loss for position ${positionId} set to ${stopLossPrice}`);
    });
  }

  /**
   * Opens one leg in the signal's direction, guarded by the signal's stop.
   */
  async openFromSignal(signal: TradeSignal): Promise<PositionRecord | null> {
    if (!signal.hasSignal || signal.direction === 'none') return null;
    const side = signal.direction;

    return this.exclusive(() =>
      this.openLeg(side, signal.entryPrice, 'signal', signal.stopLoss ?? undefined, {
        confidence: signal.confidence,
        reason: signal.reason,
      })
    );
  }

  async getStatus(): Promise<EngineStatus> {
    const open = await this.store.getOpenPositions(this.exchangeName, this.symbol);
    return {
      exchange: this.exchangeName,
      symbol: this.symbol,
      running: this.running,
      paused: this.paused,
      lastPrice: this.lastPrice,
      lastTickAt: this.lastTickAt,
      openPositions: open.length,
      pendingReopens: [...this.pendingReopens.values()].map(pending => ({ ...pending })),
      abandonedSides: [...this.abandonedSides],
      parameters: this.params,
    };
  }

  // ========== LEGS ==========

  private async openLeg(
    side: PositionSide,
    price: number,
    trigger: string,
    stopLossPrice?: number,
    extra: Record<string, unknown> = {}
  ): Promise<PositionRecord> {
    const balances = await this.exchange.getBalance();
    const balance = balances[this.quoteCurrency];
    const quantity = calculateQuantity(this.params.sizing, price, this.params.leverage, balance ? balance.free : 0);
    if (!(quantity > 0)) {
      throw new ExchangeError('openPosition', `insufficient ${this.quoteCurrency} balance to size ${side} on ${this.symbol}`);
    }

    const order = await this.exchange.createOrder(this.symbol, side === 'long' ? 'buy' : 'sell', 'market', quantity);
    const entryPrice = order.filledPrice > 0 ? order.filledPrice : price;
    const filledQuantity = order.filledQuantity > 0 ? order.filledQuantity : quantity;

    const position = await this.store.transaction(async (store) => {
      const created = await store.createPosition({
        exchange: this.exchangeName,
        symbol: this.symbol,
        side,
        entryPrice,
        quantity: filledQuantity,
        leverage: this.params.leverage,
        stopLossPrice,
        initialBalance: balance ? balance.total : undefined,
      });
      await store.createTradeLog({
        exchange: this.exchangeName,
        symbol: this.symbol,
        action: 'open',
        side,
        price: entryPrice,
        quantity: filledQuantity,
        orderId: order.orderId,
        orderType: 'market',
        metadata: { trigger, positionId: created.id, ...extra },
      });
      return created;
    });

    log.open(this.symbol, side, entryPrice, filledQuantity);
    return position;
  }

  private async closeLeg(position: PositionRecord, price: number, cause: CloseCause): Promise<number> {
    const order = await this.exchange.closePosition(this.symbol, position.side, position.quantity);
    const pnl = calculatePnl(position.side, position.entryPrice, price, position.quantity);

    await this.store.transaction(async (store) => {
      await store.closePosition(position.id, pnl, cause === 'stop_loss');
      await store.createTradeLog({
        exchange: this.exchangeName,
        symbol: this.symbol,
        action: cause,
        side: position.side,
        price,
        quantity: position.quantity,
        pnl,
        orderId: order.orderId,
        orderType: 'market',
        metadata: { positionId: position.id, entryPrice: position.entryPrice },
      });
    });

    if (cause === 'stop_loss') {
      log.stopLoss(this.symbol, position.side, price, pnl);
    } else {
      log.close(this.symbol, position.side, price, pnl);
    }
    return pnl;
  }

  private async tryClose(position: PositionRecord, price: number, cause: CloseCause): Promise<boolean> {
    try {
      await this.closeLeg(position, price, cause);
      return true;
    } catch (error) {
      if (!(error instanceof ExchangeError)) throw error;
      log.error(`Close of position ${position.id} failed, retrying next tick`, { error });
      return false;
    }
  }

  private async tryReopen(closed: PositionRecord, price: number): Promise<void> {
    try {
      await this.openLeg(closed.side, price, 'reopen', undefined, { closedPositionId: closed.id });
    } catch (error) {
      if (!(error instanceof ExchangeError)) throw error;
      log.error(`Reopen of ${closed.side} after position ${closed.id} on ${this.symbol} failed, queued for retry`, { error });
      this.pendingReopens.set(closed.id, { closedPositionId: closed.id, side: closed.side, retries: 0 });
    }
  }

  private async retryReopens(price: number): Promise<void> {
    for (const pending of [...this.pendingReopens.values()]) {
      const { closedPositionId, side } = pending;
      try {
        await this.openLeg(side, price, 'reopen-retry', undefined, { closedPositionId });
        this.pendingReopens.delete(closedPositionId);
      } catch (error) {
        if (!(error instanceof ExchangeError)) throw error;

        const attempts = pending.retries + 1;
        if (attempts >= this.maxReopenAttempts) {
          this.pendingReopens.delete(closedPositionId);
          this.abandonedSides.add(side);
          log.error(`🚨 Giving up on ${side} leg for ${this.symbol} (closed position ${closedPositionId}) after ${attempts} retries: ${errorMessage(error)}`);
        } else {
          this.pendingReopens.set(closedPositionId, { ...pending, retries: attempts });
          log.warn(`Reopen retry ${attempts}/${this.maxReopenAttempts} failed for ${side} on ${this.symbol}`);
        }
      }
    }
  }

  // ========== HELPERS ==========

  private async requireOpenPosition(positionId: number): Promise<PositionRecord> {
    const position = await this.store.getPosition(positionId);
    if (
      !position ||
      position.symbol !== this.symbol ||
      position.exchange !== this.exchangeName ||
      position.state.status !== 'open'
    ) {
      throw new NotFoundError(`No open position ${positionId} on ${this.symbol}`);
    }
    return position;
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const result = this.queue.then(work);
    // The caller of `result` sees the failure; the queue only needs to move on
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private waitForNextTick(): Promise<void> {
    return new Promise(resolve => {
      this.wake = resolve;
      this.wakeTimer = setTimeout(resolve, this.params.monitorIntervalMs);
    });
  }
}
