import { PriceBar } from '../../market-data/interfaces';

/**
 * Calculate True Range for a single bar
 * TR = max(high - low, |high - prevClose|, |low - prevClose|)
 */
export function calculateTrueRange(current: PriceBar, previous: PriceBar): number {
  const highLow = current.high - current.low;
  const highPrevClose = Math.abs(current.high - previous.close);
  const lowPrevClose = Math.abs(current.low - previous.close);

  return Math.max(highLow, highPrevClose, lowPrevClose);
}

/**
 * Calculate Average True Range (ATR)
 * @param bars Price bars (oldest first)
 * @param period ATR period (typically 14)
 * @returns ATR value or null if insufficient data
 */
export function calculateATR(bars: readonly PriceBar[], period: number = 14): number | null {
  if (period < 1 || bars.length < period + 1) {
    return null;
  }

  const trueRanges: number[] = [];
  for (let i = 1; i < bars.length; i++) {
    trueRanges.push(calculateTrueRange(bars[i], bars[i - 1]));
  }

  const multiplier = 1 / period;

  // Initialize ATR with SMA of first 'period' true ranges
  let atr = trueRanges.slice(0, period).reduce((sum, tr) => sum + tr, 0) / period;

  // Wilder's smoothing
  for (let i = period; i < trueRanges.length; i++) {
    atr = atr * (1 - multiplier) + trueRanges[i] * multiplier;
  }

  return atr;
}
