// ============================================================================
// CONFIG (src/config/index.ts)
// ============================================================================

import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors';
dotenv.config();

export type SupportedExchange = 'binance' | 'okx' | 'bybit';

export interface BotConfig {
  server: {
    port: number;
    host: string;
  };
  exchange: {
    name: SupportedExchange;
    apiKey?: string;
    secret?: string;
    password?: string;     // okx passphrase
    sandbox: boolean;
    defaultType: string;   // 'future' | 'swap' | 'spot'
    paper: boolean;
    paperStartingBalance: number;
    quoteCurrency: string;
  };
  database: {
    url?: string;
    poolSize: number;
  };
  scanner: {
    intervalSeconds: number;
    timeframes: string[];
    candleLimit: number;
    orderBookDepth: number;
    busCapacity: number;
  };
  engine: {
    maxReopenAttempts: number;
  };
  signal: {
    minFvgRatio: number;
    minConfidence: number;
    minLiquidityScore: number;
  };
}

const SUPPORTED_EXCHANGES: SupportedExchange[] = ['binance', 'okx', 'bybit'];

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function booleanFromEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw === 'true' || raw === '1';
}

export function parseExchangeName(raw: string): SupportedExchange {
  const name = raw.toLowerCase();
  const match = SUPPORTED_EXCHANGES.find(e => e === name);
  if (!match) {
    throw new ConfigurationError(
      `Unsupported exchange "${raw}" (expected one of ${SUPPORTED_EXCHANGES.join(', ')})`
    );
  }
  return match;
}

export function loadConfig(): BotConfig {
  return {
    server: {
      port: numberFromEnv('PORT', 3000),
      host: process.env.HOST || '0.0.0.0',
    },
    exchange: {
      name: parseExchangeName(process.env.EXCHANGE || 'binance'),
      apiKey: process.env.EXCHANGE_API_KEY || undefined,
      secret: process.env.EXCHANGE_API_SECRET || undefined,
      password: process.env.EXCHANGE_PASSWORD || undefined,
      sandbox: booleanFromEnv('EXCHANGE_SANDBOX', true),
      defaultType: process.env.EXCHANGE_MARKET_TYPE || 'future',
      paper: booleanFromEnv('PAPER_TRADING', true),
      paperStartingBalance: numberFromEnv('PAPER_STARTING_BALANCE', 10000),
      quoteCurrency: process.env.QUOTE_CURRENCY || 'USDT',
    },
    database: {
      url: process.env.DATABASE_URL || undefined,
      poolSize: numberFromEnv('DATABASE_POOL_SIZE', 10),
    },
    scanner: {
      intervalSeconds: numberFromEnv('SCAN_INTERVAL_SECONDS', 30),
      timeframes: (process.env.SCAN_TIMEFRAMES || '5m,1h,1d')
        .split(',')
        .map(t => t.trim())
        .filter(t => t.length > 0),
      candleLimit: numberFromEnv('SCAN_CANDLE_LIMIT', 100),
      orderBookDepth: numberFromEnv('SCAN_ORDERBOOK_DEPTH', 20),
      busCapacity: numberFromEnv('SIGNAL_BUS_CAPACITY', 1000),
    },
    engine: {
      maxReopenAttempts: numberFromEnv('MAX_REOPEN_ATTEMPTS', 5),
    },
    signal: {
      minFvgRatio: numberFromEnv('MIN_FVG_RATIO', 0.1),
      minConfidence: numberFromEnv('MIN_SIGNAL_CONFIDENCE', 40),
      minLiquidityScore: numberFromEnv('MIN_LIQUIDITY_SCORE', 30),
    },
  };
}

export const config: BotConfig = loadConfig();

/**
 * Live order routing needs exchange credentials; paper trading only reads
 * public market data.
 */
export function assertRuntimeEnv(cfg: BotConfig): void {
  if (cfg.exchange.paper) return;

  const missing: string[] = [];
  if (!cfg.exchange.apiKey) missing.push('EXCHANGE_API_KEY');
  if (!cfg.exchange.secret) missing.push('EXCHANGE_API_SECRET');
  if (cfg.exchange.name === 'okx' && !cfg.exchange.password) missing.push('EXCHANGE_PASSWORD');

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}\n` +
      'Please check your .env file or set PAPER_TRADING=true.'
    );
  }
}
