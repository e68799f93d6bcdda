import { Module } from '@nestjs/common';
import { MarketDataModule } from '../market-data/market-data.module';
import { MarketAnalysisService } from './market-analysis.service';

@Module({
  imports: [MarketDataModule],
  providers: [MarketAnalysisService],
  exports: [MarketAnalysisService],
})
export class AnalysisModule {}
