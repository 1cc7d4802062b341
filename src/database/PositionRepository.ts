// ============================================================================
// POSTGRES POSITION STORE (src/database/PositionRepository.ts)
// ============================================================================

import { parseStrategyParameters, toStrategyInput } from '../config/strategy';
import {
  CloseCause,
  OrderType,
  PerformanceStats,
  PositionCreate,
  PositionRecord,
  PositionSide,
  PositionUpdate,
  StrategyConfigRecord,
  StrategyParameters,
  TradeAction,
  TradeLogCreate,
  TradeLogFilter,
  TradeLogRecord,
} from '../types';
import { PersistenceError, errorMessage } from '../utils/errors';
import { SqlExecutor } from './client';
import { PositionStore } from './types';

// BIGINT columns come back from pg as strings
type PositionRow = {
  id: number;
  exchange: string;
  symbol: string;
  side: PositionSide;
  entry_price: number;
  current_price: number | null;
  quantity: number;
  leverage: number;
  stop_loss_price: number | null;
  initial_balance: number | null;
  status: 'open' | 'closed';
  close_cause: CloseCause | null;
  pnl: number | null;
  is_stopped: boolean;
  opened_at: string;
  closed_at: string | null;
};

type TradeLogRow = {
  id: number;
  exchange: string;
  symbol: string;
  action: TradeAction;
  side: PositionSide;
  price: number;
  quantity: number;
  pnl: number | null;
  order_type: OrderType | null;
  order_id: string | null;
  metadata: Record<string, unknown> | null;
  created_at: string;
};

type StrategyConfigRow = {
  id: number;
  exchange: string;
  symbol: string;
  long_threshold: number;
  short_threshold: number;
  stop_loss_ratio: number;
  position_size: number | null;
  position_ratio: number | null;
  leverage: number;
  monitor_interval_ms: number;
  is_active: boolean;
  updated_at: string;
};

type PerformanceRow = {
  total_trades: string;
  closed_trades: string;
  winning_trades: string;
  total_pnl: number | null;
};

export function rowToPosition(row: PositionRow): PositionRecord {
  return {
    id: row.id,
    exchange: row.exchange,
    symbol: row.symbol,
    side: row.side,
    entryPrice: row.entry_price,
    currentPrice: row.current_price,
    quantity: row.quantity,
    leverage: row.leverage,
    stopLossPrice: row.stop_loss_price,
    initialBalance: row.initial_balance,
    openedAt: Number(row.opened_at),
    state: row.status === 'open'
      ? { status: 'open' }
      : {
          status: 'closed',
          cause: row.close_cause ?? (row.is_stopped ? 'stop_loss' : 'close'),
          pnl: row.pnl ?? 0,
          closedAt: row.closed_at ? Number(row.closed_at) : Number(row.opened_at),
        },
  };
}

function rowToTradeLog(row: TradeLogRow): TradeLogRecord {
  return {
    id: row.id,
    exchange: row.exchange,
    symbol: row.symbol,
    action: row.action,
    side: row.side,
    price: row.price,
    quantity: row.quantity,
    pnl: row.pnl ?? undefined,
    orderId: row.order_id ?? undefined,
    orderType: row.order_type ?? undefined,
    metadata: row.metadata ?? {},
    createdAt: Number(row.created_at),
  };
}

function rowToStrategyConfig(row: StrategyConfigRow): StrategyConfigRecord {
  return {
    id: row.id,
    exchange: row.exchange,
    symbol: row.symbol,
    parameters: parseStrategyParameters({
      longThreshold: row.long_threshold,
      shortThreshold: row.short_threshold,
      defaultStopLossRatio: row.stop_loss_ratio,
      positionSize: row.position_size ?? undefined,
      positionRatio: row.position_ratio ?? undefined,
      leverage: row.leverage,
      monitorIntervalMs: row.monitor_interval_ms,
    }),
    isActive: row.is_active,
    updatedAt: Number(row.updated_at),
  };
}

export class PositionRepository implements PositionStore {
  constructor(private readonly db: SqlExecutor & { healthCheck?: () => Promise<boolean>; close?: () => Promise<void> }) {}

  // ========== POSITION OPERATIONS ==========

  async createPosition(input: PositionCreate): Promise<PositionRecord> {
    const result = await this.run('createPosition', () =>
      this.db.query<PositionRow>(
        `INSERT INTO positions (
          exchange, symbol, side, entry_price, current_price, quantity,
          leverage, stop_loss_price, initial_balance, status, opened_at
        ) VALUES ($1, $2, $3, $4, $4, $5, $6, $7, $8, 'open', $9)
        RETURNING *`,
        [
          input.exchange,
          input.symbol,
          input.side,
          input.entryPrice,
          input.quantity,
          input.leverage,
          input.stopLossPrice ?? null,
          input.initialBalance ?? null,
          Date.now(),
        ]
      )
    );

    return rowToPosition(result.rows[0]);
  }

  async updatePosition(id: number, update: PositionUpdate): Promise<void> {
    const fields: string[] = [];
    const values: unknown[] = [];
    let paramCount = 1;

    if (update.currentPrice !== undefined) {
      fields.push(`current_price = $${paramCount++}`);
      values.push(update.currentPrice);
    }
    if (update.stopLossPrice !== undefined) {
      fields.push(`stop_loss_price = $${paramCount++}`);
      values.push(update.stopLossPrice);
    }

    if (fields.length === 0) return;

    values.push(id);
    const query = `UPDATE positions SET ${fields.join(', ')} WHERE id = $${paramCount}`;
    const result = await this.run('updatePosition', () => this.db.query(query, values));

    if (result.rowCount === 0) {
      throw new PersistenceError('updatePosition', `position ${id} not found`);
    }
  }

  async closePosition(id: number, pnl: number, isStopped: boolean): Promise<void> {
    const result = await this.run('closePosition', () =>
      this.db.query(
        `UPDATE positions
         SET status = 'closed', close_cause = $1, pnl = $2, is_stopped = $3, closed_at = $4
         WHERE id = $5 AND status = 'open'`,
        [isStopped ? 'stop_loss' : 'close', pnl, isStopped, Date.now(), id]
      )
    );

    if (result.rowCount === 0) {
      throw new PersistenceError('closePosition', `position ${id} is not open`);
    }
  }

  async getPosition(id: number): Promise<PositionRecord | null> {
    const result = await this.run('getPosition', () =>
      this.db.query<PositionRow>('SELECT * FROM positions WHERE id = $1', [id])
    );
    return result.rows.length > 0 ? rowToPosition(result.rows[0]) : null;
  }

  async getOpenPositions(exchange: string, symbol: string): Promise<PositionRecord[]> {
    const result = await this.run('getOpenPositions', () =>
      this.db.query<PositionRow>(
        `SELECT * FROM positions
         WHERE exchange = $1 AND symbol = $2 AND status = 'open'
         ORDER BY id ASC`,
        [exchange, symbol]
      )
    );
    return result.rows.map(rowToPosition);
  }

  async listPositions(status?: 'open' | 'closed', limit: number = 200): Promise<PositionRecord[]> {
    const result = await this.run('listPositions', () =>
      status
        ? this.db.query<PositionRow>(
            'SELECT * FROM positions WHERE status = $1 ORDER BY id DESC LIMIT $2',
            [status, limit]
          )
        : this.db.query<PositionRow>('SELECT * FROM positions ORDER BY id DESC LIMIT $1', [limit])
    );
    return result.rows.map(rowToPosition);
  }

  // ========== TRADE LOG OPERATIONS ==========

  async createTradeLog(entry: TradeLogCreate): Promise<TradeLogRecord> {
    const result = await this.run('createTradeLog', () =>
      this.db.query<TradeLogRow>(
        `INSERT INTO trade_logs (
          exchange, symbol, action, side, price, quantity, pnl,
          order_type, order_id, metadata, created_at
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
        RETURNING *`,
        [
          entry.exchange,
          entry.symbol,
          entry.action,
          entry.side,
          entry.price,
          entry.quantity,
          entry.pnl ?? null,
          entry.orderType ?? null,
          entry.orderId ?? null,
          JSON.stringify(entry.metadata),
          Date.now(),
        ]
      )
    );
    return rowToTradeLog(result.rows[0]);
  }

  async getTradeLogs(limit: number = 100, filter: TradeLogFilter = {}): Promise<TradeLogRecord[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filter.exchange) {
      values.push(filter.exchange);
      conditions.push(`exchange = $${values.length}`);
    }
    if (filter.symbol) {
      values.push(filter.symbol);
      conditions.push(`symbol = $${values.length}`);
    }
    if (filter.action) {
      values.push(filter.action);
      conditions.push(`action = $${values.length}`);
    }
    values.push(limit);

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.run('getTradeLogs', () =>
      this.db.query<TradeLogRow>(
        `SELECT * FROM trade_logs ${where} ORDER BY created_at DESC, id DESC LIMIT $${values.length}`,
        values
      )
    );
    return result.rows.map(rowToTradeLog);
  }

  async getPerformance(): Promise<PerformanceStats> {
    const result = await this.run('getPerformance', () =>
      this.db.query<PerformanceRow>(`
        SELECT
          COUNT(*) AS total_trades,
          COUNT(*) FILTER (WHERE pnl IS NOT NULL) AS closed_trades,
          COUNT(*) FILTER (WHERE pnl > 0) AS winning_trades,
          COALESCE(SUM(pnl), 0) AS total_pnl
        FROM trade_logs
      `)
    );

    const row = result.rows[0];
    const closedTrades = Number(row.closed_trades);
    const winningTrades = Number(row.winning_trades);
    return {
      totalTrades: Number(row.total_trades),
      closedTrades,
      winningTrades,
      totalPnl: row.total_pnl ?? 0,
      winRate: closedTrades > 0 ? winningTrades / closedTrades : 0,
    };
  }

  // ========== STRATEGY CONFIG OPERATIONS ==========

  async saveStrategyConfig(
    exchange: string,
    symbol: string,
    parameters: StrategyParameters
  ): Promise<StrategyConfigRecord> {
    const input = toStrategyInput(parameters);
    const result = await this.run('saveStrategyConfig', () =>
      this.db.query<StrategyConfigRow>(
        `INSERT INTO strategy_configs (
          exchange, symbol, long_threshold, short_threshold, stop_loss_ratio,
          position_size, position_ratio, leverage, monitor_interval_ms, is_active, updated_at
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, TRUE, $10)
        ON CONFLICT (exchange, symbol) DO UPDATE SET
          long_threshold = EXCLUDED.long_threshold,
          short_threshold = EXCLUDED.short_threshold,
          stop_loss_ratio = EXCLUDED.stop_loss_ratio,
          position_size = EXCLUDED.position_size,
          position_ratio = EXCLUDED.position_ratio,
          leverage = EXCLUDED.leverage,
          monitor_interval_ms = EXCLUDED.monitor_interval_ms,
          is_active = TRUE,
          updated_at = EXCLUDED.updated_at
        RETURNING *`,
        [
          exchange,
          symbol,
          input.longThreshold,
          input.shortThreshold,
          input.defaultStopLossRatio,
          input.positionSize ?? null,
          input.positionRatio ?? null,
          parameters.leverage,
          parameters.monitorIntervalMs,
          Date.now(),
        ]
      )
    );
    return rowToStrategyConfig(result.rows[0]);
  }

  async getStrategyConfig(exchange: string, symbol: string): Promise<StrategyConfigRecord | null> {
    const result = await this.run('getStrategyConfig', () =>
      this.db.query<StrategyConfigRow>(
        'SELECT * FROM strategy_configs WHERE exchange = $1 AND symbol = $2',
        [exchange, symbol]
      )
    );
    return result.rows.length > 0 ? rowToStrategyConfig(result.rows[0]) : null;
  }

  async listStrategyConfigs(activeOnly: boolean = false): Promise<StrategyConfigRecord[]> {
    const result = await this.run('listStrategyConfigs', () =>
      activeOnly
        ? this.db.query<StrategyConfigRow>('SELECT * FROM strategy_configs WHERE is_active ORDER BY id ASC')
        : this.db.query<StrategyConfigRow>('SELECT * FROM strategy_configs ORDER BY id ASC')
    );
    return result.rows.map(rowToStrategyConfig);
  }

  async deleteStrategyConfig(id: number): Promise<boolean> {
    const result = await this.run('deleteStrategyConfig', () =>
      this.db.query('DELETE FROM strategy_configs WHERE id = $1', [id])
    );
    return (result.rowCount ?? 0) > 0;
  }

  // ========== TRANSACTIONS & LIFECYCLE ==========

  transaction<T>(work: (store: PositionStore) => Promise<T>): Promise<T> {
    return this.db.transaction(tx => work(new PositionRepository(tx)));
  }

  async healthCheck(): Promise<boolean> {
    return this.db.healthCheck ? this.db.healthCheck() : true;
  }

  async close(): Promise<void> {
    if (this.db.close) await this.db.close();
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(operation, errorMessage(error), { cause: error });
    }
  }
}
