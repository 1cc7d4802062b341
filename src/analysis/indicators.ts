import { Candle } from '../types';
import { clamp } from '../utils/helpers';

export type VolatilityLevel = 'low' | 'medium' | 'high';

export interface AtrResult {
  atr: number;
  atrPercentage: number; // ATR as % of the last close
  currentPrice: number;
  period: number;
  volatility: VolatilityLevel;
}

export interface SuggestedParameters {
  longThreshold: number;
  shortThreshold: number;
  defaultStopLossRatio: number;
  atr: number;
  atrPercentage: number;
  volatility: VolatilityLevel;
}

/**
 * Average True Range as a simple mean of the last `period` true ranges.
 * Returns null when there are not at least period + 1 candles.
 */
export function calculateAtr(candles: Candle[], period: number = 14): AtrResult | null {
  if (period < 1 || candles.length < period + 1) {
    return null;
  }

  const trueRanges: number[] = [];
  for (let i = 1; i < candles.length; i++) {
    const { high, low } = candles[i];
    const prevClose = candles[i - 1].close;
    trueRanges.push(Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose)));
  }

  const window = trueRanges.slice(-period);
  const atr = window.reduce((a, b) => a + b, 0) / window.length;
  const currentPrice = candles[candles.length - 1].close;
  const atrPercentage = currentPrice > 0 ? (atr / currentPrice) * 100 : 0;

  let volatility: VolatilityLevel;
  if (atrPercentage < 0.5) volatility = 'low';
  else if (atrPercentage < 1.5) volatility = 'medium';
  else volatility = 'high';

  return { atr, atrPercentage, currentPrice, period, volatility };
}

/**
 * Threshold and stop-loss ratios scaled to current volatility. Quiet markets
 * get tighter thresholds with a wider stop multiple; busy markets the reverse.
 */
export function suggestStrategyParameters(result: AtrResult): SuggestedParameters {
  const pct = result.atrPercentage;

  let threshold: number;
  let stopLoss: number;
  switch (result.volatility) {
    case 'low':
      threshold = Math.max(pct * 1.5, 0.5);
      stopLoss = Math.max(pct * 3, 1.0);
      break;
    case 'medium':
      threshold = Math.max(pct * 1.2, 0.8);
      stopLoss = Math.max(pct * 2.5, 1.5);
      break;
    default:
      threshold = Math.max(pct * 1.0, 1.0);
      stopLoss = Math.max(pct * 2.0, 2.0);
      break;
  }

  const ratio = clamp(threshold / 100, 0.005, 0.05);

  return {
    longThreshold: ratio,
    shortThreshold: ratio,
    defaultStopLossRatio: clamp(stopLoss / 100, 0.01, 0.1),
    atr: result.atr,
    atrPercentage: result.atrPercentage,
    volatility: result.volatility,
  };
}
