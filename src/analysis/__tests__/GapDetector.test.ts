import { GapDetector } from '../GapDetector';
import { Candle, Gap } from '../../types';
import { bearishGapCandles, bullishGapCandles, candle } from '../../__tests__/support/fakes';

// Outer candles leave 100..110 untouched; the middle candle's range sets the ratio
function seriesWithMiddle(high: number, low: number): Candle[] {
  return [
    candle(1, 112, 115, 110, 112),
    candle(2, 105, high, low, 105),
    candle(3, 98, 100, 95, 98),
  ];
}

// Deterministic pseudo-random walk
function randomWalk(count: number, seed: number): Candle[] {
  let state = seed;
  const next = () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };

  const candles: Candle[] = [];
  let price = 100;
  for (let i = 0; i < count; i++) {
    const open = price;
    const close = open + (next() - 0.5) * 20;
    const high = Math.max(open, close) + next() * 5;
    const low = Math.min(open, close) - next() * 5;
    candles.push(candle(i, open, high, low, close));
    price = close;
  }
  return candles;
}

describe('GapDetector', () => {
  let detector: GapDetector;

  beforeEach(() => {
    detector = new GapDetector();
  });

  describe('detect', () => {
    it('should return nothing for fewer than three candles', () => {
      expect(detector.detect([])).toEqual([]);
      expect(detector.detect(bullishGapCandles().slice(0, 2))).toEqual([]);
    });

    it('should find a bullish gap between the outer candles', () => {
      const gaps = detector.detect(bullishGapCandles());

      expect(gaps).toHaveLength(1);
      expect(gaps[0].type).toBe('bullish');
      expect(gaps[0].gapHigh).toBe(1050);
      expect(gaps[0].gapLow).toBe(950);
      expect(gaps[0].size).toBe(100);
      expect(gaps[0].ratio).toBeCloseTo(100 / 280, 10);
      expect(gaps[0].confidence).toBe(85);
      expect(gaps[0].timestamp).toBe(2);
    });

    it('should find a bearish gap between the outer candles', () => {
      const gaps = detector.detect(bearishGapCandles());

      expect(gaps).toHaveLength(1);
      expect(gaps[0].type).toBe('bearish');
      expect(gaps[0].gapHigh).toBe(1050);
      expect(gaps[0].gapLow).toBe(950);
    });

    it('should ignore overlapping wicks', () => {
      const candles = [
        candle(1, 102, 104, 100, 102),
        candle(2, 101, 110, 90, 101),
        candle(3, 100, 101, 96, 99),
      ];

      expect(detector.detect(candles)).toEqual([]);
    });

    it('should drop gaps below the minimum ratio', () => {
      // size 10 over a range of 200
      expect(detector.detect(seriesWithMiddle(205, 5))).toEqual([]);
    });

    it.each([
      [125, 105, 95],  // ratio 0.5
      [120, 90, 85],   // ratio 1/3
      [130, 80, 75],   // ratio 0.2
      [125, 85, 75],   // ratio 0.25
      [150, 50, 65],   // ratio 0.1
    ])('should score a middle candle of %d..%d at %d', (high, low, expected) => {
      const gaps = detector.detect(seriesWithMiddle(high, low));
      expect(gaps).toHaveLength(1);
      expect(gaps[0].confidence).toBe(expected);
    });

    it('should score small gaps when the minimum ratio allows them', () => {
      const lenient = new GapDetector({ minFvgRatio: 0.01 });

      expect(lenient.detect(seriesWithMiddle(200, 0))[0].confidence).toBe(55);
      expect(lenient.detect(seriesWithMiddle(500, 0))[0].confidence).toBe(45);
    });

    it('should only report windows the outer candles never traded through', () => {
      const candles = randomWalk(300, 42);
      const gaps = detector.detect(candles);

      for (const gap of gaps) {
        const index = candles.findIndex(c => c.timestamp === gap.timestamp);
        const prev = candles[index - 1];
        const next = candles[index + 1];

        expect(gap.gapHigh).toBeGreaterThan(gap.gapLow);
        expect(gap.confidence).toBeGreaterThanOrEqual(45);
        expect(gap.confidence).toBeLessThanOrEqual(100);
        if (gap.type === 'bullish') {
          expect(prev.low).toBeGreaterThanOrEqual(gap.gapHigh);
          expect(next.high).toBeLessThanOrEqual(gap.gapLow);
        } else {
          expect(prev.high).toBeLessThanOrEqual(gap.gapLow);
          expect(next.low).toBeGreaterThanOrEqual(gap.gapHigh);
        }
      }
    });
  });

  describe('findGapAtPrice', () => {
    const gap: Gap = {
      type: 'bullish',
      gapHigh: 110,
      gapLow: 100,
      size: 10,
      ratio: 0.5,
      confidence: 95,
      timestamp: 1,
    };

    it('should match prices inside the widened interval', () => {
      expect(detector.findGapAtPrice([gap], 105)).toBe(gap);
      expect(detector.findGapAtPrice([gap], 110.1)).toBe(gap);
      expect(detector.findGapAtPrice([gap], 99.95)).toBe(gap);
    });

    it('should return null outside the tolerance', () => {
      expect(detector.findGapAtPrice([gap], 110.2)).toBeNull();
      expect(detector.findGapAtPrice([gap], 99.8)).toBeNull();
    });
  });

  describe('mostRecent', () => {
    it('should sort newest first without touching the input', () => {
      const base: Gap = { type: 'bullish', gapHigh: 2, gapLow: 1, size: 1, ratio: 0.5, confidence: 95, timestamp: 0 };
      const gaps = [1, 3, 2].map(timestamp => ({ ...base, timestamp }));

      const recent = detector.mostRecent(gaps, 2);

      expect(recent.map(g => g.timestamp)).toEqual([3, 2]);
      expect(gaps.map(g => g.timestamp)).toEqual([1, 3, 2]);
    });
  });
});
