import {
  PerformanceStats,
  PositionCreate,
  PositionRecord,
  PositionUpdate,
  StrategyConfigRecord,
  StrategyParameters,
  TradeLogCreate,
  TradeLogFilter,
  TradeLogRecord,
} from '../types';
import { PersistenceError } from '../utils/errors';
import { PositionStore } from './types';

interface StoreState {
  positions: Map<number, PositionRecord>;
  tradeLogs: TradeLogRecord[];
  configs: Map<number, StrategyConfigRecord>;
  nextPositionId: number;
  nextTradeLogId: number;
  nextConfigId: number;
}

/**
 * Process-local store used in paper mode and by tests. Transactions snapshot
 * the whole state and restore it if the work throws.
 */
export class MemoryPositionStore implements PositionStore {
  private state: StoreState = {
    positions: new Map(),
    tradeLogs: [],
    configs: new Map(),
    nextPositionId: 1,
    nextTradeLogId: 1,
    nextConfigId: 1,
  };
  private inTransaction: boolean = false;

  async createPosition(input: PositionCreate): Promise<PositionRecord> {
    const position: PositionRecord = {
      id: this.state.nextPositionId++,
      exchange: input.exchange,
      symbol: input.symbol,
      side: input.side,
      entryPrice: input.entryPrice,
      currentPrice: input.entryPrice,
      quantity: input.quantity,
      leverage: input.leverage,
      stopLossPrice: input.stopLossPrice ?? null,
      initialBalance: input.initialBalance ?? null,
      openedAt: Date.now(),
      state: { status: 'open' },
    };
    this.state.positions.set(position.id, position);
    return { ...position };
  }

  async updatePosition(id: number, update: PositionUpdate): Promise<void> {
    const position = this.state.positions.get(id);
    if (!position) {
      throw new PersistenceError('updatePosition', `position ${id} not found`);
    }
    if (update.currentPrice !== undefined) position.currentPrice = update.currentPrice;
    if (update.stopLossPrice !== undefined) position.stopLossPrice = update.stopLossPrice;
  }

  async closePosition(id: number, pnl: number, isStopped: boolean): Promise<void> {
    const position = this.state.positions.get(id);
    if (!position || position.state.status !== 'open') {
      throw new PersistenceError('closePosition', `position ${id} is not open`);
    }
    position.state = {
      status: 'closed',
      cause: isStopped ? 'stop_loss' : 'close',
      pnl,
      closedAt: Date.now(),
    };
  }

  async getPosition(id: number): Promise<PositionRecord | null> {
    const position = this.state.positions.get(id);
    return position ? { ...position } : null;
  }

  async getOpenPositions(exchange: string, symbol: string): Promise<PositionRecord[]> {
    return [...this.state.positions.values()]
      .filter(p => p.exchange === exchange && p.symbol === symbol && p.state.status === 'open')
      .map(p => ({ ...p }));
  }

  async listPositions(status?: 'open' | 'closed', limit: number = 200): Promise<PositionRecord[]> {
    return [...this.state.positions.values()]
      .filter(p => !status || p.state.status === status)
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map(p => ({ ...p }));
  }

  async createTradeLog(entry: TradeLogCreate): Promise<TradeLogRecord> {
    const record: TradeLogRecord = {
      ...entry,
      id: this.state.nextTradeLogId++,
      createdAt: Date.now(),
    };
    this.state.tradeLogs.push(record);
    return { ...record };
  }

  async getTradeLogs(limit: number = 100, filter: TradeLogFilter = {}): Promise<TradeLogRecord[]> {
    return this.state.tradeLogs
      .filter(l =>
        (!filter.exchange || l.exchange === filter.exchange) &&
        (!filter.symbol || l.symbol === filter.symbol) &&
        (!filter.action || l.action === filter.action)
      )
      .slice()
      .reverse()
      .slice(0, limit);
  }

  async getPerformance(): Promise<PerformanceStats> {
    const closed = this.state.tradeLogs.filter(l => l.pnl !== undefined);
    const winning = closed.filter(l => (l.pnl ?? 0) > 0);
    const totalPnl = closed.reduce((acc, l) => acc + (l.pnl ?? 0), 0);
    return {
      totalTrades: this.state.tradeLogs.length,
      closedTrades: closed.length,
      winningTrades: winning.length,
      totalPnl,
      winRate: closed.length > 0 ? winning.length / closed.length : 0,
    };
  }

  async saveStrategyConfig(
    exchange: string,
    symbol: string,
    parameters: StrategyParameters
  ): Promise<StrategyConfigRecord> {
    const existing = [...this.state.configs.values()].find(c => c.exchange === exchange && c.symbol === symbol);
    const record: StrategyConfigRecord = {
      id: existing ? existing.id : this.state.nextConfigId++,
      exchange,
      symbol,
      parameters,
      isActive: true,
      updatedAt: Date.now(),
    };
    this.state.configs.set(record.id, record);
    return { ...record };
  }

  async getStrategyConfig(exchange: string, symbol: string): Promise<StrategyConfigRecord | null> {
    const found = [...this.state.configs.values()].find(c => c.exchange === exchange && c.symbol === symbol);
    return found ? { ...found } : null;
  }

  async listStrategyConfigs(activeOnly: boolean = false): Promise<StrategyConfigRecord[]> {
    return [...this.state.configs.values()]
      .filter(c => !activeOnly || c.isActive)
      .sort((a, b) => a.id - b.id)
      .map(c => ({ ...c }));
  }

  async deleteStrategyConfig(id: number): Promise<boolean> {
    return this.state.configs.delete(id);
  }

  async transaction<T>(work: (store: PositionStore) => Promise<T>): Promise<T> {
    // Nested work joins the outer transaction
    if (this.inTransaction) return work(this);

    const snapshot = structuredClone(this.state);
    this.inTransaction = true;
    try {
      return await work(this);
    } catch (error) {
      this.state = snapshot;
      throw error;
    } finally {
      this.inTransaction = false;
    }
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  // Nothing to release
  async close(): Promise<void> {
    return;
  }
}
