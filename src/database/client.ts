// src/database/client.ts
import { EventEmitter } from 'events';
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { log } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface SqlExecutor {
  query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>>;
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;
}

export interface DatabaseOptions {
  connectionString: string;
  poolSize?: number;
  healthIntervalMs?: number;
}

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS positions (
    id SERIAL PRIMARY KEY,
    exchange VARCHAR(50) NOT NULL,
    symbol VARCHAR(50) NOT NULL,
    side VARCHAR(10) NOT NULL CHECK (side IN ('long', 'short')),
    entry_price DOUBLE PRECISION NOT NULL,
    current_price DOUBLE PRECISION,
    quantity DOUBLE PRECISION NOT NULL,
    leverage INTEGER NOT NULL DEFAULT 1,
    stop_loss_price DOUBLE PRECISION,
    initial_balance DOUBLE PRECISION,
    status VARCHAR(20) NOT NULL DEFAULT 'open' CHECK (status IN ('open', 'closed')),
    close_cause VARCHAR(20) CHECK (close_cause IN ('close', 'stop_loss')),
    pnl DOUBLE PRECISION,
    is_stopped BOOLEAN NOT NULL DEFAULT FALSE,
    opened_at BIGINT NOT NULL,
    closed_at BIGINT,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS trade_logs (
    id SERIAL PRIMARY KEY,
    exchange VARCHAR(50) NOT NULL,
    symbol VARCHAR(50) NOT NULL,
    action VARCHAR(20) NOT NULL CHECK (action IN ('open', 'close', 'stop_loss')),
    side VARCHAR(10) NOT NULL CHECK (side IN ('long', 'short')),
    price DOUBLE PRECISION NOT NULL,
    quantity DOUBLE PRECISION NOT NULL,
    pnl DOUBLE PRECISION,
    order_type VARCHAR(20),
    order_id VARCHAR(100),
    metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
    created_at BIGINT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS strategy_configs (
    id SERIAL PRIMARY KEY,
    exchange VARCHAR(50) NOT NULL,
    symbol VARCHAR(50) NOT NULL,
    long_threshold DOUBLE PRECISION NOT NULL,
    short_threshold DOUBLE PRECISION NOT NULL,
    stop_loss_ratio DOUBLE PRECISION NOT NULL,
    position_size DOUBLE PRECISION,
    position_ratio DOUBLE PRECISION,
    leverage INTEGER NOT NULL DEFAULT 1,
    monitor_interval_ms INTEGER NOT NULL DEFAULT 1000,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    updated_at BIGINT NOT NULL,
    UNIQUE (exchange, symbol),
    CHECK ((position_size IS NULL) <> (position_ratio IS NULL))
  );

  CREATE INDEX IF NOT EXISTS idx_positions_open ON positions(exchange, symbol, status);
  CREATE INDEX IF NOT EXISTS idx_trade_logs_created_at ON trade_logs(created_at);
  CREATE INDEX IF NOT EXISTS idx_trade_logs_symbol_action ON trade_logs(symbol, action);
`;

/**
 * Statements run on the connection that opened the transaction.
 */
class TransactionExecutor implements SqlExecutor {
  constructor(private readonly client: PoolClient) {}

  query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>> {
    return this.client.query<R>(text, params);
  }

  // Already inside a transaction: nested work joins it
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    return work(this);
  }
}

export class DatabaseClient extends EventEmitter implements SqlExecutor {
  private pool: Pool;
  private isHealthy: boolean = false;
  private healthIntervalMs: number;
  private healthTimer?: NodeJS.Timeout;
  private shuttingDown: boolean = false;

  constructor(options: DatabaseOptions) {
    super();

    this.healthIntervalMs = options.healthIntervalMs ?? 5000;
    this.pool = new Pool({
      connectionString: options.connectionString,
      ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : false,
      max: options.poolSize ?? 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });

    this.pool.on('error', (err) => {
      log.error('Idle database client error', { error: err });
    });
  }

  /**
   * Creates the schema and starts the periodic health check.
   */
  async connect(): Promise<void> {
    await this.pool.query(SCHEMA_SQL);
    this.isHealthy = true;
    this.emit('connected');
    log.info('📊 Database schema ready');
    this.startHealthCheck();
  }

  private startHealthCheck(): void {
    if (this.healthTimer) clearInterval(this.healthTimer);

    this.healthTimer = setInterval(() => {
      if (this.shuttingDown) return;
      this.healthCheck().catch((err) => {
        log.error('Database health check crashed', { error: err });
      });
    }, this.healthIntervalMs);
    this.healthTimer.unref();
  }

  async query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>> {
    if (this.shuttingDown) {
      throw new Error('DatabaseClient is shutting down');
    }
    return this.pool.query<R>(text, params);
  }

  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    if (this.shuttingDown) {
      throw new Error('DatabaseClient is shutting down');
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(new TransactionExecutor(client));
      await client.query('COMMIT');
      return result;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rbErr) {
        log.error('Rollback failed', { error: rbErr });
      }
      throw err;
    } finally {
      client.release();
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      if (!this.isHealthy) {
        log.info('✅ Database connection restored');
        this.isHealthy = true;
        this.emit('reconnected');
      }
      return true;
    } catch (err) {
      if (this.isHealthy) {
        log.error(`⚠️ Database health check failed: ${errorMessage(err)}`);
        this.isHealthy = false;
        this.emit('disconnected', err);
      }
      return false;
    }
  }

  async close(): Promise<void> {
    this.shuttingDown = true;
    if (this.healthTimer) clearInterval(this.healthTimer);
    try {
      await this.pool.end();
      log.info('📊 Database connection closed');
    } catch (err) {
      log.error('Error closing DB pool', { error: err });
    }
  }
}
