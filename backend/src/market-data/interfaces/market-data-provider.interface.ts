import { IntradayInterval, PriceBar, SeriesOutputSize } from './price-bar.interface';
import { Quote } from './quote.interface';

/**
 * Market Data Provider
 * Source of quotes and bar series for the monitor and the on-demand tools.
 *
 * Implementations reject with DataProviderError so callers can tell rate
 * limits and authentication failures apart from transient network errors.
 * Every call accepts an AbortSignal; an aborted call rejects with an AbortError.
 */
export interface MarketDataProvider {
  getQuote(pair: string, signal?: AbortSignal): Promise<Quote>;

  /**
   * @returns Daily bars, oldest first
   */
  getDailySeries(pair: string, outputSize: SeriesOutputSize, signal?: AbortSignal): Promise<PriceBar[]>;

  /**
   * @returns Intraday bars, oldest first
   */
  getIntradaySeries(pair: string, interval: IntradayInterval, signal?: AbortSignal): Promise<PriceBar[]>;
}

export const MARKET_DATA_PROVIDER = 'MARKET_DATA_PROVIDER';
