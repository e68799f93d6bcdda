import { PriceBar } from '../../market-data/interfaces';

/**
 * Calculate Exponential Moving Average (EMA)
 * @param bars Price bars (oldest first)
 * @param period EMA period
 * @returns EMA value or null if insufficient data
 */
export function calculateEMA(bars: readonly PriceBar[], period: number): number | null {
  if (bars.length < period) {
    return null;
  }

  const closes = bars.map((b) => b.close);
  return calculateEMAFromValues(closes, period);
}

/**
 * Calculate EMA from price values
 * Seeded with the SMA of the first `period` values, then k = 2 / (period + 1)
 * @param values Prices (oldest first)
 * @param period EMA period
 * @returns EMA value or null if insufficient data
 */
export function calculateEMAFromValues(values: readonly number[], period: number): number | null {
  const series = calculateEMASeriesFromValues(values, period);
  return series.length > 0 ? series[series.length - 1] : null;
}

/**
 * Calculate EMA series from values
 * @param values Prices (oldest first)
 * @param period EMA period
 * @returns One EMA per value from index period - 1 onward (empty if insufficient data)
 */
export function calculateEMASeriesFromValues(values: readonly number[], period: number): number[] {
  if (period < 1 || values.length < period) {
    return [];
  }

  const multiplier = 2 / (period + 1);

  // Initialize with SMA for first EMA value
  let ema = values.slice(0, period).reduce((sum, val) => sum + val, 0) / period;
  const result = [ema];

  for (let i = period; i < values.length; i++) {
    ema = (values[i] - ema) * multiplier + ema;
    result.push(ema);
  }

  return result;
}
