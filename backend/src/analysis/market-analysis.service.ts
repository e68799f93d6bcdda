import { Inject, Injectable } from '@nestjs/common';
import { errorMessage, TradingError } from '../common/errors/trading.errors';
import { CustomLoggerService } from '../common/logging/custom-logger.service';
import { midPrice, spreadPips } from '../market-data/currency-pair';
import { MARKET_DATA_PROVIDER, MarketDataProvider, PriceBar, Quote, SeriesInterval } from '../market-data/interfaces';
import { computeIndicators, IndicatorSet } from './indicator-engine';
import { analyzeSeries, SignalDirection, TradingSignal } from './signal-generator';

const CONTEXT = 'MarketAnalysis';

export interface QuoteView {
  quote: Quote;
  mid: number;
  spreadPips: number;
}

export enum MarketSentiment {
  BULLISH = 'bullish',
  BEARISH = 'bearish',
  NEUTRAL = 'neutral',
}

export interface PairOverview {
  pair: string;
  quote: QuoteView | null;
  rsi: number | null;
  signal: TradingSignal | null;
  /** Why the pair has no signal (or no quote) */
  error: string | null;
}

export interface MarketOverview {
  pairsAnalyzed: number;
  sentiment: MarketSentiment;
  distribution: { buy: number; sell: number; hold: number };
  pairs: PairOverview[];
  summary: string;
  generatedAt: number;
}

/**
 * More buys than sells is bullish, more sells bearish, anything else neutral
 */
export function marketSentiment(signals: readonly TradingSignal[]): MarketSentiment {
  const buy = signals.filter((s) => s.direction === SignalDirection.BUY).length;
  const sell = signals.filter((s) => s.direction === SignalDirection.SELL).length;
  if (buy > sell) {
    return MarketSentiment.BULLISH;
  }
  if (sell > buy) {
    return MarketSentiment.BEARISH;
  }
  return MarketSentiment.NEUTRAL;
}

/**
 * Market Analysis Service
 * On-demand path: fetches straight from the provider, independent of the
 * monitoring loop and its price store.
 */
@Injectable()
export class MarketAnalysisService {
  constructor(
    @Inject(MARKET_DATA_PROVIDER)
    private readonly marketData: MarketDataProvider,
    private readonly logger: CustomLoggerService,
  ) {}

  async getQuote(pair: string): Promise<QuoteView> {
    const quote = await this.marketData.getQuote(pair);
    return { quote, mid: midPrice(quote), spreadPips: spreadPips(quote) };
  }

  /**
   * Indicators over the compact daily series, or an intraday one
   * @throws InsufficientDataError when the provider returns too few bars
   */
  async getTechnicalAnalysis(pair: string, interval: SeriesInterval = 'daily'): Promise<IndicatorSet> {
    const bars = await this.fetchSeries(pair, interval);
    return computeIndicators(pair, bars);
  }

  async generateSignal(pair: string, interval: SeriesInterval = 'daily'): Promise<TradingSignal> {
    const [quote, bars] = await Promise.all([this.marketData.getQuote(pair), this.fetchSeries(pair, interval)]);
    return analyzeSeries(quote.pair, bars, quote).signal;
  }

  /**
   * Signals across several pairs; a pair that fails is reported, never fatal
   */
  async analyzeMarketOverview(pairs: readonly string[]): Promise<MarketOverview> {
    const entries = await Promise.all(pairs.map((pair) => this.overviewEntry(pair)));

    const signals: TradingSignal[] = [];
    for (const entry of entries) {
      if (entry.signal) {
        signals.push(entry.signal);
      }
    }

    const distribution = {
      buy: signals.filter((s) => s.direction === SignalDirection.BUY).length,
      sell: signals.filter((s) => s.direction === SignalDirection.SELL).length,
      hold: signals.filter((s) => s.direction === SignalDirection.HOLD).length,
    };

    return {
      pairsAnalyzed: entries.length,
      sentiment: marketSentiment(signals),
      distribution,
      pairs: entries,
      summary: `Market analysis complete for ${entries.length} pairs: ${distribution.buy} buy, ${distribution.sell} sell, ${distribution.hold} hold`,
      generatedAt: Date.now(),
    };
  }

  private async overviewEntry(pair: string): Promise<PairOverview> {
    let quote: Quote;
    try {
      quote = await this.marketData.getQuote(pair);
    } catch (error) {
      this.logger.warn(`Overview: quote for ${pair} failed: ${errorMessage(error)}`, CONTEXT);
      return { pair, quote: null, rsi: null, signal: null, error: errorMessage(error) };
    }

    const view: QuoteView = { quote, mid: midPrice(quote), spreadPips: spreadPips(quote) };
    try {
      const { indicators, signal } = analyzeSeries(quote.pair, await this.fetchSeries(pair), quote);
      return { pair: quote.pair, quote: view, rsi: indicators.rsi, signal, error: null };
    } catch (error) {
      if (!(error instanceof TradingError)) {
        throw error;
      }
      this.logger.warn(`Overview: analysis for ${quote.pair} failed: ${error.message}`, CONTEXT);
      return { pair: quote.pair, quote: view, rsi: null, signal: null, error: error.message };
    }
  }

  private fetchSeries(pair: string, interval: SeriesInterval = 'daily'): Promise<PriceBar[]> {
    return interval === 'daily'
      ? this.marketData.getDailySeries(pair, 'compact')
      : this.marketData.getIntradaySeries(pair, interval);
  }
}
