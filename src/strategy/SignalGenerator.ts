// ============================================================================
// GAP + LIQUIDITY SIGNAL GENERATOR (src/strategy/SignalGenerator.ts)
// ============================================================================

import { GapDetector } from '../analysis/GapDetector';
import { LiquidityAnalyzer } from '../analysis/LiquidityAnalyzer';
import { calculateAtr } from '../analysis/indicators';
import {
  Candle,
  Gap,
  LiquidityMetrics,
  LiquidityZone,
  OrderBook,
  Ticker,
  TradeDirection,
  TradeSignal,
} from '../types';
import { clamp } from '../utils/helpers';

export interface SignalGeneratorOptions {
  minFvgRatio?: number;
  minConfidence?: number;
  minLiquidityScore?: number;
  maxGapDistance?: number;   // fraction of price
  stopLossBuffer?: number;   // fraction beyond the gap's far edge
  atrPeriod?: number;
  atrMultiplier?: number;
  fallbackRiskReward?: number;
}

export interface ConfidenceBreakdown {
  gap: number;
  liquidity: number;
  proximity: number;
  volatility: number;
  riskReward: number;
  total: number;
}

const WEIGHTS = {
  gap: 0.35,
  liquidity: 0.25,
  proximity: 0.2,
  volatility: 0.1,
  riskReward: 0.1,
};

export class SignalGenerator {
  private readonly gapDetector: GapDetector;
  private readonly liquidityAnalyzer: LiquidityAnalyzer;
  private readonly minConfidence: number;
  private readonly minLiquidityScore: number;
  private readonly maxGapDistance: number;
  private readonly stopLossBuffer: number;
  private readonly atrPeriod: number;
  private readonly atrMultiplier: number;
  private readonly fallbackRiskReward: number;

  constructor(options: SignalGeneratorOptions = {}) {
    this.gapDetector = new GapDetector({ minFvgRatio: options.minFvgRatio });
    this.liquidityAnalyzer = new LiquidityAnalyzer();
    this.minConfidence = options.minConfidence ?? 40;
    this.minLiquidityScore = options.minLiquidityScore ?? 30;
    this.maxGapDistance = options.maxGapDistance ?? 0.02;
    this.stopLossBuffer = options.stopLossBuffer ?? 0.02;
    this.atrPeriod = options.atrPeriod ?? 14;
    this.atrMultiplier = options.atrMultiplier ?? 2.5;
    this.fallbackRiskReward = options.fallbackRiskReward ?? 2.5;
  }

  generate(candles: Candle[], orderBook: OrderBook, currentPrice: number, ticker: Ticker): TradeSignal {
    const liquidity = this.liquidityAnalyzer.analyze(orderBook, currentPrice);
    const liquidityZones = this.liquidityAnalyzer.findZones(orderBook, currentPrice);

    const gaps = this.gapDetector.detect(candles);
    if (gaps.length === 0) {
      return this.reject(currentPrice, 'no gap found', liquidity, liquidityZones);
    }

    // Strongest gap; the earliest one wins a tie
    const gap = gaps.reduce((best, g) => (g.confidence > best.confidence ? g : best));

    const atr = calculateAtr(candles, this.atrPeriod);

    if (!this.isPriceNearGap(gap, currentPrice)) {
      return this.reject(currentPrice, 'price too far from gap', liquidity, liquidityZones, gap);
    }

    const direction: TradeDirection = gap.type === 'bullish' ? 'long' : 'short';
    const sign = direction === 'long' ? 1 : -1;
    const entryPrice = currentPrice;
    const stopLoss = direction === 'long'
      ? gap.gapLow * (1 - this.stopLossBuffer)
      : gap.gapHigh * (1 + this.stopLossBuffer);
    const risk = (entryPrice - stopLoss) * sign;

    let takeProfit: number;
    let takeProfitReason: string;
    const zone = this.liquidityAnalyzer.findTargetZone(orderBook, currentPrice, direction);
    if (zone) {
      takeProfit = zone.price;
      takeProfitReason = `liquidity zone @ ${zone.price.toFixed(4)} ` +
        `(${zone.volume.toFixed(2)} across ${zone.orderCount} levels, ${zone.distance.toFixed(2)}% away)`;
    } else if (atr) {
      takeProfit = entryPrice + sign * atr.atr * this.atrMultiplier;
      takeProfitReason = `ATR(${atr.period}) x${this.atrMultiplier} = ${(atr.atr * this.atrMultiplier).toFixed(4)}`;
    } else {
      takeProfit = entryPrice + sign * risk * this.fallbackRiskReward;
      takeProfitReason = `fixed ${this.fallbackRiskReward}:1 risk/reward`;
    }

    const reward = (takeProfit - entryPrice) * sign;
    const riskRewardRatio = risk > 0 && reward > 0 ? reward / risk : 0;

    const { total: confidence } = this.scoreConfidence(gap, liquidity, currentPrice, ticker, riskRewardRatio);

    if (confidence < this.minConfidence) {
      return this.reject(
        currentPrice,
        `confidence too low (${confidence.toFixed(1)}%)`,
        liquidity,
        liquidityZones,
        gap,
        confidence
      );
    }

    if (liquidity.liquidityScore < this.minLiquidityScore) {
      return this.reject(
        currentPrice,
        `insufficient liquidity (score ${liquidity.liquidityScore.toFixed(1)})`,
        liquidity,
        liquidityZones,
        gap,
        confidence
      );
    }

    return {
      hasSignal: true,
      direction,
      entryPrice,
      stopLoss,
      takeProfit,
      takeProfitReason,
      confidence,
      riskRewardRatio,
      reason: `${gap.type.toUpperCase()} gap signal`,
      gap,
      liquidity,
      liquidityZones,
    };
  }

  /**
   * Weighted confidence; every component is clamped to [0, 100] before weighting.
   */
  scoreConfidence(
    gap: Gap,
    liquidity: LiquidityMetrics,
    currentPrice: number,
    ticker: Ticker,
    riskRewardRatio: number
  ): ConfidenceBreakdown {
    const gapScore = clamp(gap.confidence, 0, 100);
    const liquidityScore = clamp(liquidity.liquidityScore, 0, 100);
    const proximityScore = clamp(this.proximityScore(gap, currentPrice), 0, 100);
    const volatilityScore = this.volatilityScore(ticker.change24h);
    const riskRewardScore = this.riskRewardScore(riskRewardRatio);

    const total = Math.min(
      gapScore * WEIGHTS.gap +
      liquidityScore * WEIGHTS.liquidity +
      proximityScore * WEIGHTS.proximity +
      volatilityScore * WEIGHTS.volatility +
      riskRewardScore * WEIGHTS.riskReward,
      100
    );

    return {
      gap: gapScore,
      liquidity: liquidityScore,
      proximity: proximityScore,
      volatility: volatilityScore,
      riskReward: riskRewardScore,
      total,
    };
  }

  private isPriceNearGap(gap: Gap, price: number): boolean {
    if (price <= 0) return false;
    if (gap.type === 'bullish') {
      return price >= gap.gapLow || Math.abs(price - gap.gapLow) / price <= this.maxGapDistance;
    }
    return price <= gap.gapHigh || Math.abs(price - gap.gapHigh) / price <= this.maxGapDistance;
  }

  private proximityScore(gap: Gap, price: number): number {
    if (price >= gap.gapLow && price <= gap.gapHigh) return 100;

    const edgeDistance = Math.min(Math.abs(price - gap.gapLow), Math.abs(price - gap.gapHigh));
    const distance = edgeDistance / price;
    return Math.max(0, 100 - distance * 5000);
  }

  private volatilityScore(change24h: number): number {
    const change = Math.abs(change24h);
    if (change < 2) return 50;
    if (change > 8) return 80;
    return 100;
  }

  private riskRewardScore(ratio: number): number {
    if (ratio >= 2.0) return 100;
    if (ratio >= 1.5) return 80;
    if (ratio >= 1.0) return 60;
    return 40;
  }

  private reject(
    currentPrice: number,
    reason: string,
    liquidity: LiquidityMetrics,
    liquidityZones: LiquidityZone[],
    gap: Gap | null = null,
    confidence: number = 0
  ): TradeSignal {
    return {
      hasSignal: false,
      direction: 'none',
      entryPrice: currentPrice,
      stopLoss: null,
      takeProfit: null,
      takeProfitReason: null,
      confidence,
      riskRewardRatio: 0,
      reason,
      gap,
      liquidity,
      liquidityZones,
    };
  }
}
