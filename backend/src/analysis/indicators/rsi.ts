import { PriceBar } from '../../market-data/interfaces';

/**
 * Closes needed for an RSI of the given period (period changes)
 */
export function rsiMinimumBars(period: number): number {
  return period + 1;
}

/**
 * Calculate RSI (Relative Strength Index) with Wilder smoothing
 * @param bars Price bars (oldest first)
 * @param period RSI period (typically 14)
 * @returns RSI in [0, 100] or null if insufficient data
 */
export function calculateRSI(bars: readonly PriceBar[], period: number = 14): number | null {
  return calculateRSIFromValues(
    bars.map((b) => b.close),
    period,
  );
}

export function calculateRSIFromValues(closes: readonly number[], period: number = 14): number | null {
  if (period < 1 || closes.length < rsiMinimumBars(period)) {
    return null;
  }

  const changes = closes.slice(1).map((close, i) => close - closes[i]);

  let avgGain = 0;
  let avgLoss = 0;

  // Initial average
  for (let i = 0; i < period; i++) {
    if (changes[i] > 0) avgGain += changes[i];
    else avgLoss += Math.abs(changes[i]);
  }
  avgGain /= period;
  avgLoss /= period;

  // Wilder smoothing for subsequent values
  for (let i = period; i < changes.length; i++) {
    const gain = changes[i] > 0 ? changes[i] : 0;
    const loss = changes[i] < 0 ? Math.abs(changes[i]) : 0;
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
  }

  if (avgLoss === 0) return 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}
