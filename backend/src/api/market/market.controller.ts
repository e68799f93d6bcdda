import { Controller, Get, Param, Query } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IndicatorSet } from '../../analysis/indicator-engine';
import { MarketOverview, QuoteView } from '../../analysis/market-analysis.service';
import { TradingSignal } from '../../analysis/signal-generator';
import { loadMonitoringConfig } from '../../common/config/monitoring.config';
import { toHttpException } from '../../common/errors/http-error';
import { ConfigurationError } from '../../common/errors/trading.errors';
import { INTRADAY_INTERVALS, isSeriesInterval, SeriesInterval } from '../../market-data/interfaces';
import { CoreToolsService } from '../../tools/core-tools.service';

function parseInterval(interval?: string): SeriesInterval {
  if (interval === undefined || interval === '') {
    return 'daily';
  }
  if (!isSeriesInterval(interval)) {
    throw new ConfigurationError([`interval must be daily or one of ${INTRADAY_INTERVALS.join(', ')}`]);
  }
  return interval;
}

/**
 * On-demand market analysis API
 * Pairs are addressed as /api/market/EUR/USD/...
 */
@Controller('api/market')
export class MarketController {
  constructor(
    private readonly tools: CoreToolsService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * GET /api/market/overview?pairs=EUR/USD,USD/JPY
   * Without pairs, the configured monitoring pairs are used
   */
  @Get('overview')
  async getOverview(@Query('pairs') pairs?: string): Promise<{ success: boolean; data: MarketOverview }> {
    const list = pairs
      ? pairs
          .split(',')
          .map((p) => p.trim())
          .filter((p) => p.length > 0)
      : loadMonitoringConfig(this.configService).pairs;

    try {
      const overview = await this.tools.invoke('analyze_market_overview', { pairs: list });
      return { success: true, data: overview };
    } catch (error) {
      throw toHttpException(error, 'Market overview failed');
    }
  }

  /**
   * GET /api/market/:base/:quote/quote
   */
  @Get(':base/:quote/quote')
  async getQuote(
    @Param('base') base: string,
    @Param('quote') quote: string,
  ): Promise<{ success: boolean; data: QuoteView }> {
    try {
      return { success: true, data: await this.tools.invoke('get_quote', { pair: `${base}/${quote}` }) };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  /**
   * GET /api/market/:base/:quote/analysis?interval=daily|1min|5min|15min|30min|60min
   */
  @Get(':base/:quote/analysis')
  async getAnalysis(
    @Param('base') base: string,
    @Param('quote') quote: string,
    @Query('interval') interval?: string,
  ): Promise<{ success: boolean; data: IndicatorSet }> {
    try {
      return {
        success: true,
        data: await this.tools.invoke('get_technical_analysis', {
          pair: `${base}/${quote}`,
          interval: parseInterval(interval),
        }),
      };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  /**
   * GET /api/market/:base/:quote/signal?interval=daily
   */
  @Get(':base/:quote/signal')
  async getSignal(
    @Param('base') base: string,
    @Param('quote') quote: string,
    @Query('interval') interval?: string,
  ): Promise<{ success: boolean; data: TradingSignal }> {
    try {
      return {
        success: true,
        data: await this.tools.invoke('generate_trading_signal', {
          pair: `${base}/${quote}`,
          interval: parseInterval(interval),
        }),
      };
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
