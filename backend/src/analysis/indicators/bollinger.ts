import { PriceBar } from '../../market-data/interfaces';

/**
 * Calculate Simple Moving Average (SMA) of the trailing window
 * @returns SMA value or null if insufficient data
 */
export function calculateSMA(values: readonly number[], period: number): number | null {
  if (period < 1 || values.length < period) {
    return null;
  }

  const slice = values.slice(-period);
  return slice.reduce((sum, val) => sum + val, 0) / period;
}

/**
 * Population standard deviation of the trailing window
 * @returns Standard deviation or null if insufficient data
 */
export function calculateStdDev(values: readonly number[], period: number): number | null {
  const mean = calculateSMA(values, period);
  if (mean === null) {
    return null;
  }

  const slice = values.slice(-period);
  const variance = slice.reduce((sum, val) => sum + (val - mean) * (val - mean), 0) / period;

  return Math.sqrt(variance);
}

/**
 * Bollinger Bands result
 */
export interface BollingerBands {
  upper: number;
  middle: number;
  lower: number;
}

/**
 * Calculate Bollinger Bands
 * @param bars Price bars (oldest first)
 * @param period BB period (typically 20)
 * @param stdDevMultiplier Standard deviation multiplier (typically 2.0)
 * @returns Bollinger Bands or null if insufficient data
 */
export function calculateBollingerBands(
  bars: readonly PriceBar[],
  period: number = 20,
  stdDevMultiplier: number = 2.0,
): BollingerBands | null {
  const closes = bars.map((b) => b.close);
  const middle = calculateSMA(closes, period);
  const stdDev = calculateStdDev(closes, period);

  if (middle === null || stdDev === null) {
    return null;
  }

  return {
    upper: middle + stdDev * stdDevMultiplier,
    middle,
    lower: middle - stdDev * stdDevMultiplier,
  };
}
