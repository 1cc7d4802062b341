// ============================================================================
// SHARED TYPES (src/types/index.ts)
// ============================================================================

// ---------- Market data ----------

export interface Candle {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface OrderBookLevel {
  price: number;
  amount: number;
}

export interface OrderBook {
  bids: OrderBookLevel[]; // best (highest) price first
  asks: OrderBookLevel[]; // best (lowest) price first
  timestamp?: number;
}

export interface Ticker {
  symbol: string;
  price: number;
  change24h: number; // percent
  volume: number;
  timestamp: number;
}

export interface BalanceEntry {
  free: number;
  used: number;
  total: number;
}

export type Balances = Record<string, BalanceEntry>;

export type OrderSide = 'buy' | 'sell';
export type OrderType = 'market' | 'limit';

export interface OrderResult {
  orderId: string;
  filledPrice: number;
  filledQuantity: number;
  status: string;
}

// ---------- Analysis ----------

export type GapType = 'bullish' | 'bearish';

export interface Gap {
  type: GapType;
  gapHigh: number;
  gapLow: number;
  size: number;
  ratio: number;
  confidence: number;
  timestamp: number;
}

export type ZoneType = 'buy' | 'sell';

export interface LiquidityZone {
  type: ZoneType;
  price: number;
  volume: number;
  distance: number; // percent from current price
  orderCount: number;
}

export interface LiquidityMetrics {
  bidVolume: number;
  askVolume: number;
  imbalanceRatio: number;
  liquidityScore: number;
  depthRatio: number;
}

export type TradeDirection = 'long' | 'short';
export type SignalDirection = TradeDirection | 'none';

export interface TradeSignal {
  hasSignal: boolean;
  direction: SignalDirection;
  entryPrice: number;
  stopLoss: number | null;
  takeProfit: number | null;
  takeProfitReason: string | null;
  confidence: number;
  riskRewardRatio: number;
  reason: string;
  gap: Gap | null;
  liquidity: LiquidityMetrics;
  liquidityZones: LiquidityZone[];
}

export interface ScannedSignal extends TradeSignal {
  symbol: string;
  exchange: string;
  timeframe: string;
  scannedAt: string;
}

// ---------- Positions ----------

export type PositionSide = TradeDirection;
export type CloseCause = 'close' | 'stop_loss';
export type TradeAction = 'open' | CloseCause;

export type PositionState =
  | { status: 'open' }
  | { status: 'closed'; cause: CloseCause; pnl: number; closedAt: number };

export interface PositionRecord {
  id: number;
  exchange: string;
  symbol: string;
  side: PositionSide;
  entryPrice: number;
  currentPrice: number | null;
  quantity: number;
  leverage: number;
  stopLossPrice: number | null;
  initialBalance: number | null;
  openedAt: number;
  state: PositionState;
}

export interface PositionCreate {
  exchange: string;
  symbol: string;
  side: PositionSide;
  entryPrice: number;
  quantity: number;
  leverage: number;
  stopLossPrice?: number;
  initialBalance?: number;
}

export interface PositionUpdate {
  currentPrice?: number;
  stopLossPrice?: number | null;
}

export interface TradeLogCreate {
  exchange: string;
  symbol: string;
  action: TradeAction;
  side: PositionSide;
  price: number;
  quantity: number;
  pnl?: number;
  orderId?: string;
  orderType?: OrderType;
  metadata: Record<string, unknown>;
}

export interface TradeLogRecord extends TradeLogCreate {
  id: number;
  createdAt: number;
}

export interface TradeLogFilter {
  exchange?: string;
  symbol?: string;
  action?: TradeAction;
}

export interface PerformanceStats {
  totalTrades: number;
  closedTrades: number;
  winningTrades: number;
  totalPnl: number;
  winRate: number;
}

// ---------- Strategy ----------

export type SizingMode =
  | { mode: 'fixed'; positionSize: number }
  | { mode: 'ratio'; positionRatio: number };

export interface StrategyParameters {
  longThreshold: number;
  shortThreshold: number;
  defaultStopLossRatio: number;
  sizing: SizingMode;
  leverage: number;
  monitorIntervalMs: number;
}

export interface StrategyConfigRecord {
  id: number;
  exchange: string;
  symbol: string;
  parameters: StrategyParameters;
  isActive: boolean;
  updatedAt: number;
}

export type PositionDecision =
  | { action: 'hold' }
  | { action: 'stop_loss'; stopPrice: number }
  | { action: 'close_and_reopen'; triggerPrice: number };
