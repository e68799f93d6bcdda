import { Module } from '@nestjs/common';
import { MarketDataModule } from '../market-data/market-data.module';
import { MonitorModule } from '../monitor/monitor.module';
import { PortfolioModule } from '../portfolio/portfolio.module';
import { ToolsModule } from '../tools/tools.module';

// Controllers
import { MonitorController } from './monitor/monitor.controller';
import { MarketController } from './market/market.controller';
import { PortfolioController } from './portfolio/portfolio.controller';

@Module({
  imports: [MarketDataModule, MonitorModule, PortfolioModule, ToolsModule],
  controllers: [MonitorController, MarketController, PortfolioController],
})
export class ApiModule {}
