import { Module } from '@nestjs/common';
import { AlphaVantageProvider } from './alpha-vantage.provider';
import { MARKET_DATA_PROVIDER } from './interfaces';
import { RateLimiterService } from './rate-limiter.service';

/**
 * Market Data Module
 * Binds the MarketDataProvider token to the Alpha Vantage client
 */
@Module({
  providers: [
    RateLimiterService,
    AlphaVantageProvider,
    {
      provide: MARKET_DATA_PROVIDER,
      useExisting: AlphaVantageProvider,
    },
  ],
  exports: [MARKET_DATA_PROVIDER, RateLimiterService],
})
export class MarketDataModule {}
