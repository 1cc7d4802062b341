import { SignalGenerator } from '../SignalGenerator';
import { Candle, Gap, LiquidityMetrics } from '../../types';
import {
  bearishGapCandles,
  bullishGapCandles,
  candle,
  flatOrderBook,
  ticker,
  zonedOrderBook,
} from '../../__tests__/support/fakes';

// Thirteen quiet candles (true range 20) ahead of the bullish gap
function candlesWithHistory(): Candle[] {
  const quiet = Array.from({ length: 13 }, (_, i) => candle(i, 1040, 1050, 1030, 1040));
  const gap = bullishGapCandles().map((c, i) => ({ ...c, timestamp: 13 + i }));
  return [...quiet, ...gap];
}

describe('SignalGenerator', () => {
  let generator: SignalGenerator;

  beforeEach(() => {
    generator = new SignalGenerator();
  });

  describe('generate', () => {
    it('should go long from a bullish gap and target the best sell zone', () => {
      const signal = generator.generate(bullishGapCandles(), zonedOrderBook(), 1000, ticker('BTC/USDT', 1000));

      expect(signal.hasSignal).toBe(true);
      expect(signal.direction).toBe('long');
      expect(signal.entryPrice).toBe(1000);
      expect(signal.stopLoss).toBeCloseTo(931, 10);
      expect(signal.takeProfit).toBe(1014);
      expect(signal.takeProfitReason).toBe('liquidity zone @ 1014.0000 (40.00 across 5 levels, 1.40% away)');
      expect(signal.riskRewardRatio).toBeCloseTo(14 / 69, 10);
      expect(signal.reason).toBe('BULLISH gap signal');
      expect(signal.gap?.gapHigh).toBe(1050);
      expect(signal.liquidity.liquidityScore).toBeCloseTo(35, 10);
      // 85*.35 + 35*.25 + 100*.2 + 100*.1 + 40*.1
      expect(signal.confidence).toBeCloseTo(72.5, 10);
      expect(signal.liquidityZones).toHaveLength(2);
    });

    it('should fall back to an ATR target when no zone qualifies', () => {
      const signal = generator.generate(candlesWithHistory(), flatOrderBook(), 1000, ticker('BTC/USDT', 1000));

      // Last 14 true ranges: eleven quiet ones of 20, then 20, 280 and 20
      const atr = (11 * 20 + 20 + 280 + 20) / 14;
      expect(signal.hasSignal).toBe(true);
      expect(signal.takeProfit).toBeCloseTo(1000 + atr * 2.5, 8);
      expect(signal.takeProfitReason).toBe(`ATR(14) x2.5 = ${(atr * 2.5).toFixed(4)}`);
    });

    it('should fall back to a fixed risk/reward without enough history', () => {
      const signal = generator.generate(bullishGapCandles(), flatOrderBook(), 1000, ticker('BTC/USDT', 1000));

      expect(signal.hasSignal).toBe(true);
      expect(signal.takeProfit).toBeCloseTo(1000 + 69 * 2.5, 8);
      expect(signal.takeProfitReason).toBe('fixed 2.5:1 risk/reward');
      expect(signal.riskRewardRatio).toBeCloseTo(2.5, 8);
    });

    it('should go short from a bearish gap', () => {
      const signal = generator.generate(bearishGapCandles(), flatOrderBook(), 1000, ticker('BTC/USDT', 1000));

      expect(signal.hasSignal).toBe(true);
      expect(signal.direction).toBe('short');
      expect(signal.stopLoss).toBeCloseTo(1071, 8);
      expect(signal.takeProfit).toBeCloseTo(1000 - 71 * 2.5, 8);
      expect(signal.reason).toBe('BEARISH gap signal');
    });

    it('should reject when there is no gap', () => {
      const candles = [
        candle(1, 100, 104, 100, 102),
        candle(2, 101, 110, 90, 101),
        candle(3, 100, 101, 96, 99),
      ];

      const signal = generator.generate(candles, zonedOrderBook(), 1000, ticker('BTC/USDT', 1000));

      expect(signal).toMatchObject({
        hasSignal: false,
        direction: 'none',
        stopLoss: null,
        takeProfit: null,
        confidence: 0,
        reason: 'no gap found',
        gap: null,
      });
      expect(signal.liquidity.liquidityScore).toBeCloseTo(35, 10);
    });

    it('should reject when price is too far from the gap', () => {
      const signal = generator.generate(bullishGapCandles(), zonedOrderBook(), 900, ticker('BTC/USDT', 900));

      expect(signal.hasSignal).toBe(false);
      expect(signal.reason).toBe('price too far from gap');
      expect(signal.gap?.type).toBe('bullish');
    });

    it('should reject low confidence before checking liquidity', () => {
      const strict = new SignalGenerator({ minConfidence: 90, minLiquidityScore: 90 });

      const signal = strict.generate(bullishGapCandles(), zonedOrderBook(), 1000, ticker('BTC/USDT', 1000));

      expect(signal.hasSignal).toBe(false);
      expect(signal.reason).toBe('confidence too low (72.5%)');
      expect(signal.confidence).toBeCloseTo(72.5, 10);
    });

    it('should reject thin books', () => {
      const picky = new SignalGenerator({ minLiquidityScore: 50 });

      const signal = picky.generate(bullishGapCandles(), zonedOrderBook(), 1000, ticker('BTC/USDT', 1000));

      expect(signal.hasSignal).toBe(false);
      expect(signal.reason).toBe('insufficient liquidity (score 35.0)');
    });

    it('should give the same verdict for the same inputs', () => {
      const inputs = [bullishGapCandles(), zonedOrderBook(), 900, ticker('BTC/USDT', 900)] as const;

      const first = generator.generate(...inputs);
      const second = generator.generate(...inputs);

      expect(second.hasSignal).toBe(first.hasSignal);
      expect(second.reason).toBe(first.reason);
    });
  });

  describe('scoreConfidence', () => {
    const gap: Gap = { type: 'bullish', gapHigh: 1050, gapLow: 950, size: 100, ratio: 0.5, confidence: 95, timestamp: 1 };
    const liquidity: LiquidityMetrics = {
      bidVolume: 1,
      askVolume: 1,
      imbalanceRatio: 0,
      liquidityScore: 40,
      depthRatio: 1,
    };

    it('should decay proximity with distance from the nearest edge', () => {
      const breakdown = generator.scoreConfidence(gap, liquidity, 1060, ticker('BTC/USDT', 1060), 2);

      expect(breakdown.proximity).toBeCloseTo(100 - (10 / 1060) * 5000, 8);
    });

    it.each([
      [1, 50],
      [5, 100],
      [-5, 100],
      [10, 80],
    ])('should score a %d%% daily move as %d volatility', (change, expected) => {
      expect(generator.scoreConfidence(gap, liquidity, 1000, ticker('BTC/USDT', 1000, change), 2).volatility)
        .toBe(expected);
    });

    it.each([
      [2.5, 100],
      [1.5, 80],
      [1, 60],
      [0.5, 40],
    ])('should score risk/reward %s as %d', (ratio, expected) => {
      expect(generator.scoreConfidence(gap, liquidity, 1000, ticker('BTC/USDT', 1000), ratio).riskReward)
        .toBe(expected);
    });

    it('should weight the components into a bounded total', () => {
      const breakdown = generator.scoreConfidence(gap, liquidity, 1000, ticker('BTC/USDT', 1000), 2);

      // 95*.35 + 40*.25 + 100*.2 + 100*.1 + 100*.1
      expect(breakdown.total).toBeCloseTo(83.25, 10);
    });
  });
});
