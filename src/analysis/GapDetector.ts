// ============================================================================
// GAP (FVG) DETECTOR (src/analysis/GapDetector.ts)
// ============================================================================

import { Candle, Gap, GapType } from '../types';

export interface GapDetectorOptions {
  minFvgRatio?: number;
}

/**
 * Finds three-candle price imbalances: the outer candles' wicks leave an
 * interval neither of them traded through. The gap is scored by its size
 * relative to the middle candle's range.
 */
export class GapDetector {
  private readonly minFvgRatio: number;

  constructor(options: GapDetectorOptions = {}) {
    this.minFvgRatio = options.minFvgRatio ?? 0.1;
  }

  detect(candles: Candle[]): Gap[] {
    const gaps: Gap[] = [];

    if (candles.length < 3) {
      return gaps;
    }

    for (let i = 1; i < candles.length - 1; i++) {
      const prev = candles[i - 1];
      const curr = candles[i];
      const next = candles[i + 1];
      const candleRange = curr.high - curr.low;

      let type: GapType;
      let gapHigh: number;
      let gapLow: number;

      if (prev.low > next.high) {
        type = 'bullish';
        gapHigh = prev.low;
        gapLow = next.high;
      } else if (prev.high < next.low) {
        type = 'bearish';
        gapHigh = next.low;
        gapLow = prev.high;
      } else {
        continue;
      }

      const size = gapHigh - gapLow;
      if (size <= 0 || candleRange <= 0) continue;

      const ratio = size / candleRange;
      if (ratio < this.minFvgRatio) continue;

      gaps.push({
        type,
        gapHigh,
        gapLow,
        size,
        ratio,
        confidence: this.scoreConfidence(ratio),
        timestamp: curr.timestamp,
      });
    }

    return gaps;
  }

  /**
   * First gap whose (slightly widened) interval contains the price.
   */
  findGapAtPrice(gaps: Gap[], price: number, tolerance: number = 0.001): Gap | null {
    for (const gap of gaps) {
      if (gap.gapLow * (1 - tolerance) <= price && price <= gap.gapHigh * (1 + tolerance)) {
        return gap;
      }
    }
    return null;
  }

  mostRecent(gaps: Gap[], limit: number = 10): Gap[] {
    return [...gaps].sort((a, b) => b.timestamp - a.timestamp).slice(0, limit);
  }

  private scoreConfidence(ratio: number): number {
    let confidence: number;
    if (ratio >= 0.5) confidence = 90;
    else if (ratio >= 0.3) confidence = 80;
    else if (ratio >= 0.2) confidence = 70;
    else if (ratio >= 0.1) confidence = 60;
    else if (ratio >= 0.05) confidence = 50;
    else confidence = 40;

    // Every emitted gap has a recognized type
    confidence += 5;

    return Math.min(confidence, 100);
  }
}
