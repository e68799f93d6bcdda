import { PriceBar } from '../../market-data/interfaces';
import { calculateEMASeriesFromValues } from './ema';

export interface MACDResult {
  line: number;
  signal: number;
  histogram: number;
}

/**
 * Bars needed before the signal line exists: the MACD line starts at bar
 * `slow`, and its EMA needs `signalPeriod` MACD values
 */
export function macdMinimumBars(fast: number = 12, slow: number = 26, signalPeriod: number = 9): number {
  return Math.max(fast, slow) + signalPeriod - 1;
}

/**
 * Calculate MACD (12, 26, 9)
 * line = EMA(fast) - EMA(slow); signal = EMA(line, signalPeriod); histogram = line - signal
 * @param bars Price bars (oldest first)
 * @returns MACD for the last bar or null if insufficient data
 */
export function calculateMACD(
  bars: readonly PriceBar[],
  fast: number = 12,
  slow: number = 26,
  signalPeriod: number = 9,
): MACDResult | null {
  if (bars.length < macdMinimumBars(fast, slow, signalPeriod)) {
    return null;
  }

  const closes = bars.map((b) => b.close);
  const fastSeries = calculateEMASeriesFromValues(closes, fast);
  const slowSeries = calculateEMASeriesFromValues(closes, slow);

  // Align both series on the bars where each EMA exists
  const fastOffset = fastSeries.length - slowSeries.length;
  const macdLine = slowSeries.map((slowEma, i) => fastSeries[i + fastOffset] - slowEma);

  const signalSeries = calculateEMASeriesFromValues(macdLine, signalPeriod);
  if (signalSeries.length === 0) {
    return null;
  }

  const line = macdLine[macdLine.length - 1];
  const signal = signalSeries[signalSeries.length - 1];

  return { line, signal, histogram: line - signal };
}
