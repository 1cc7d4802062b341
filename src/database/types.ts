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

/**
 * System of record for positions, trade logs and strategy configs.
 * Implementations report failures as PersistenceError.
 */
export interface PositionStore {
  createPosition(input: PositionCreate): Promise<PositionRecord>;
  updatePosition(id: number, update: PositionUpdate): Promise<void>;
  /** Closes an open position; closing twice is an error. */
  closePosition(id: number, pnl: number, isStopped: boolean): Promise<void>;
  getPosition(id: number): Promise<PositionRecord | null>;
  getOpenPositions(exchange: string, symbol: string): Promise<PositionRecord[]>;
  listPositions(status?: 'open' | 'closed', limit?: number): Promise<PositionRecord[]>;

  createTradeLog(entry: TradeLogCreate): Promise<TradeLogRecord>;
  getTradeLogs(limit?: number, filter?: TradeLogFilter): Promise<TradeLogRecord[]>;
  getPerformance(): Promise<PerformanceStats>;

  saveStrategyConfig(exchange: string, symbol: string, parameters: StrategyParameters): Promise<StrategyConfigRecord>;
  getStrategyConfig(exchange: string, symbol: string): Promise<StrategyConfigRecord | null>;
  listStrategyConfigs(activeOnly?: boolean): Promise<StrategyConfigRecord[]>;
  deleteStrategyConfig(id: number): Promise<boolean>;

  /** Runs `work` against a store whose writes commit together or not at all. */
  transaction<T>(work: (store: PositionStore) => Promise<T>): Promise<T>;

  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
