import { PriceBar } from '../../market-data/interfaces';

export interface StochasticResult {
  /** %K in [0, 100] */
  k: number;
  /** SMA of the last `dPeriod` %K values */
  d: number;
}

/**
 * %K of the window ending at `end` (inclusive)
 * A window with no range (highest high = lowest low) reads 50
 */
function percentK(bars: readonly PriceBar[], end: number, period: number): number {
  const window = bars.slice(end - period + 1, end + 1);
  const highestHigh = Math.max(...window.map((b) => b.high));
  const lowestLow = Math.min(...window.map((b) => b.low));

  if (highestHigh === lowestLow) {
    return 50;
  }
  return ((bars[end].close - lowestLow) / (highestHigh - lowestLow)) * 100;
}

/**
 * Calculate the Stochastic Oscillator (14, 3)
 * @param bars Price bars (oldest first)
 * @returns %K and %D for the last bar or null if insufficient data
 */
export function calculateStochastic(
  bars: readonly PriceBar[],
  period: number = 14,
  dPeriod: number = 3,
): StochasticResult | null {
  if (period < 1 || dPeriod < 1 || bars.length < period + dPeriod - 1) {
    return null;
  }

  const last = bars.length - 1;
  const ks: number[] = [];
  for (let end = last - dPeriod + 1; end <= last; end++) {
    ks.push(percentK(bars, end, period));
  }

  return {
    k: ks[ks.length - 1],
    d: ks.reduce((sum, k) => sum + k, 0) / dPeriod,
  };
}
