import { Module } from '@nestjs/common';
import { MarketDataModule } from '../market-data/market-data.module';
import { PortfolioModule } from '../portfolio/portfolio.module';
import { AlertService } from './alert.service';
import { MonitorOrchestratorService } from './monitor-orchestrator.service';

/**
 * Monitor Module
 *
 * Owns the monitoring loop and the alert channel. The loop is idle until
 * started through the API.
 */
@Module({
  imports: [MarketDataModule, PortfolioModule],
  providers: [AlertService, MonitorOrchestratorService],
  exports: [AlertService, MonitorOrchestratorService],
})
export class MonitorModule {}
