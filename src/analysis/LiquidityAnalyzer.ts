// ============================================================================
// ORDER BOOK LIQUIDITY ANALYZER (src/analysis/LiquidityAnalyzer.ts)
// ============================================================================

import { LiquidityMetrics, LiquidityZone, OrderBook, OrderBookLevel, TradeDirection, ZoneType } from '../types';
import { sum } from '../utils/helpers';

const BUCKET_SIZE = 5;
const DEPTH_LEVELS = 5;
const ZONE_VOLUME_MULTIPLIER = 1.5;
const MAX_ZONES = 10;

// [minimum total volume (exclusive), points], checked top-down
const VOLUME_TIERS: Array<[number, number]> = [
  [1_000_000, 50],
  [500_000, 45],
  [100_000, 40],
  [50_000, 30],
  [10_000, 20],
  [1_000, 10],
];
const VOLUME_FLOOR_SCORE = 5;

export interface ScoredZone {
  zone: LiquidityZone;
  distanceScore: number;
  volumeScore: number;
  totalScore: number;
}

export class LiquidityAnalyzer {
  analyze(orderBook: OrderBook, _currentPrice: number): LiquidityMetrics {
    const { bids, asks } = orderBook;
    const bidVolume = sum(bids.map(l => l.amount));
    const askVolume = sum(asks.map(l => l.amount));

    if (bids.length === 0 || asks.length === 0) {
      return {
        bidVolume,
        askVolume,
        imbalanceRatio: 0,
        liquidityScore: 0,
        depthRatio: 0,
      };
    }

    const totalVolume = bidVolume + askVolume;
    // positive = more resting bids than asks
    const imbalanceRatio = totalVolume === 0 ? 0 : (bidVolume - askVolume) / totalVolume;
    const depthRatio = this.depthRatio(bids, asks, bidVolume, askVolume);

    return {
      bidVolume,
      askVolume,
      imbalanceRatio,
      liquidityScore: this.liquidityScore(bidVolume, askVolume, depthRatio),
      depthRatio,
    };
  }

  /**
   * Groups each side into runs of five consecutive levels and keeps the runs
   * holding well above that side's average volume.
   */
  findZones(orderBook: OrderBook, currentPrice: number): LiquidityZone[] {
    const zones = [
      ...this.sideZones(orderBook.bids, 'buy', currentPrice),
      ...this.sideZones(orderBook.asks, 'sell', currentPrice),
    ];

    zones.sort((a, b) => b.volume - a.volume);
    return zones.slice(0, MAX_ZONES);
  }

  findTargetZone(orderBook: OrderBook, currentPrice: number, direction: TradeDirection): LiquidityZone | null {
    const ranked = this.rankTargetZones(orderBook, currentPrice, direction);
    return ranked.length > 0 ? ranked[0].zone : null;
  }

  /**
   * Candidate take-profit zones in the trade direction, best first.
   */
  rankTargetZones(orderBook: OrderBook, currentPrice: number, direction: TradeDirection): ScoredZone[] {
    const candidates = this.findZones(orderBook, currentPrice).filter(zone =>
      direction === 'long'
        ? zone.type === 'sell' && zone.price > currentPrice
        : zone.type === 'buy' && zone.price < currentPrice
    );

    if (candidates.length === 0) return [];

    const maxVolume = Math.max(...candidates.map(z => z.volume));

    const scored = candidates.map(zone => {
      const distanceScore = this.distanceScore(Math.abs(zone.distance));
      const volumeScore = maxVolume > 0 ? zone.volume / maxVolume : 0;
      return {
        zone,
        distanceScore,
        volumeScore,
        totalScore: distanceScore * 0.6 + volumeScore * 0.4,
      };
    });

    // stable sort keeps the larger-volume zone first on ties
    return scored.sort((a, b) => b.totalScore - a.totalScore);
  }

  private depthRatio(
    bids: OrderBookLevel[],
    asks: OrderBookLevel[],
    totalBids: number,
    totalAsks: number
  ): number {
    if (totalBids === 0 || totalAsks === 0) return 0;

    const topBids = sum(bids.slice(0, DEPTH_LEVELS).map(l => l.amount));
    const topAsks = sum(asks.slice(0, DEPTH_LEVELS).map(l => l.amount));

    return (topBids + topAsks) / (totalBids + totalAsks);
  }

  private liquidityScore(bidVolume: number, askVolume: number, depthRatio: number): number {
    const totalVolume = bidVolume + askVolume;

    const tier = VOLUME_TIERS.find(([min]) => totalVolume > min);
    const volumeScore = tier ? tier[1] : VOLUME_FLOOR_SCORE;

    const depthScore = Math.min(depthRatio * 30, 30);

    const balance = totalVolume > 0 ? Math.min(bidVolume, askVolume) / totalVolume : 0;
    const balanceScore = Math.min(balance * 40, 20);

    return Math.min(volumeScore + depthScore + balanceScore, 100);
  }

  private sideZones(levels: OrderBookLevel[], type: ZoneType, currentPrice: number): LiquidityZone[] {
    if (levels.length === 0 || currentPrice <= 0) return [];

    const buckets: LiquidityZone[] = [];
    const bucketVolumes: number[] = [];
    for (let start = 0; start < levels.length; start += BUCKET_SIZE) {
      const bucket = levels.slice(start, start + BUCKET_SIZE);
      const volume = sum(bucket.map(l => l.amount));
      bucketVolumes.push(volume);
      if (volume <= 0) continue;

      const price = sum(bucket.map(l => l.price * l.amount)) / volume;
      const distance = type === 'buy'
        ? ((currentPrice - price) / currentPrice) * 100
        : ((price - currentPrice) / currentPrice) * 100;

      buckets.push({ type, price, volume, distance, orderCount: bucket.length });
    }

    const meanVolume = sum(bucketVolumes) / bucketVolumes.length;
    return buckets.filter(b => b.volume > meanVolume * ZONE_VOLUME_MULTIPLIER);
  }

  private distanceScore(distancePct: number): number {
    if (distancePct >= 0.5 && distancePct <= 3.0) return 1.0;
    if (distancePct >= 0.3 && distancePct <= 5.0) return 0.7;
    return 0.4;
  }
}
