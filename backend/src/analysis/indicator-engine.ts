import { InsufficientDataError } from '../common/errors/trading.errors';
import { deepFreeze, DeepReadonly } from '../common/utils/deep-freeze';
import { PriceBar } from '../market-data/interfaces';
import {
  BollingerBands,
  MACDResult,
  StochasticResult,
  calculateATR,
  calculateBollingerBands,
  calculateEMA,
  calculateMACD,
  calculateRSI,
  calculateSMA,
  calculateStochastic,
  macdMinimumBars,
} from './indicators';

export const RSI_PERIOD = 14;
export const EMA_FAST_PERIOD = 12;
export const EMA_SLOW_PERIOD = 26;
export const MACD_SIGNAL_PERIOD = 9;
export const BOLLINGER_PERIOD = 20;
export const BOLLINGER_STD_DEV = 2;
export const ATR_PERIOD = 14;
export const SMA_LONG_PERIOD = 50;
export const STOCHASTIC_PERIOD = 14;
export const STOCHASTIC_D_PERIOD = 3;

/**
 * Bars needed for a complete IndicatorSet (MACD signal line is the longest window)
 */
export const INDICATOR_MIN_BARS = macdMinimumBars(EMA_FAST_PERIOD, EMA_SLOW_PERIOD, MACD_SIGNAL_PERIOD);

export interface IndicatorValues {
  pair: string;
  rsi: number;
  macd: MACDResult;
  bollinger: BollingerBands;
  sma20: number;
  /** Null until SMA_LONG_PERIOD bars are stored */
  sma50: number | null;
  ema12: number;
  ema26: number;
  atr14: number;
  stochastic: StochasticResult;
  /** Last close */
  close: number;
  barCount: number;
  /** Timestamp of the last bar */
  asOf: number;
}

export type IndicatorSet = DeepReadonly<IndicatorValues>;

function required<T>(value: T | null, indicator: string, minimum: number, available: number): T {
  if (value === null) {
    throw new InsufficientDataError(indicator, minimum, available);
  }
  return value;
}

/**
 * Compute every indicator for the most recent bar
 * Pure function of the input window: identical bars give identical results
 * @param pair Pair the bars belong to
 * @param bars Price bars (oldest first)
 * @throws InsufficientDataError when fewer than INDICATOR_MIN_BARS bars are given
 */
export function computeIndicators(pair: string, bars: readonly PriceBar[]): IndicatorSet {
  const count = bars.length;
  if (count < INDICATOR_MIN_BARS) {
    throw new InsufficientDataError('MACD', INDICATOR_MIN_BARS, count);
  }

  const closes = bars.map((b) => b.close);
  const last = bars[count - 1];

  return deepFreeze<IndicatorValues>({
    pair,
    rsi: required(calculateRSI(bars, RSI_PERIOD), 'RSI', RSI_PERIOD + 1, count),
    macd: required(
      calculateMACD(bars, EMA_FAST_PERIOD, EMA_SLOW_PERIOD, MACD_SIGNAL_PERIOD),
      'MACD',
      INDICATOR_MIN_BARS,
      count,
    ),
    bollinger: required(
      calculateBollingerBands(bars, BOLLINGER_PERIOD, BOLLINGER_STD_DEV),
      'Bollinger',
      BOLLINGER_PERIOD,
      count,
    ),
    sma20: required(calculateSMA(closes, BOLLINGER_PERIOD), 'SMA', BOLLINGER_PERIOD, count),
    sma50: calculateSMA(closes, SMA_LONG_PERIOD),
    ema12: required(calculateEMA(bars, EMA_FAST_PERIOD), 'EMA', EMA_FAST_PERIOD, count),
    ema26: required(calculateEMA(bars, EMA_SLOW_PERIOD), 'EMA', EMA_SLOW_PERIOD, count),
    atr14: required(calculateATR(bars, ATR_PERIOD), 'ATR', ATR_PERIOD + 1, count),
    stochastic: required(
      calculateStochastic(bars, STOCHASTIC_PERIOD, STOCHASTIC_D_PERIOD),
      'Stochastic',
      STOCHASTIC_PERIOD + STOCHASTIC_D_PERIOD - 1,
      count,
    ),
    close: last.close,
    barCount: count,
    asOf: last.timestamp,
  });
}
