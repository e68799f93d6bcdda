/**
 * OHLC bar for a currency pair
 * Bars are ordered oldest first and never modified once stored
 */
export interface PriceBar {
  timestamp: number; // Unix timestamp in ms (bar open)
  open: number;
  high: number;
  low: number;
  close: number;
}

/**
 * Intraday bar intervals supported by the data provider
 */
export type IntradayInterval = '1min' | '5min' | '15min' | '30min' | '60min';

export const INTRADAY_INTERVALS: readonly IntradayInterval[] = ['1min', '5min', '15min', '30min', '60min'];

export type SeriesOutputSize = 'compact' | 'full';

/**
 * Bar interval for on-demand analysis: the daily series or one of the intraday ones
 */
export type SeriesInterval = 'daily' | IntradayInterval;

export function isSeriesInterval(value: string): value is SeriesInterval {
  return value === 'daily' || INTRADAY_INTERVALS.some((interval) => interval === value);
}
