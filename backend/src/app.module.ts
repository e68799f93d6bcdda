import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { DatabaseModule } from './common/database/database.module';
import { LoggingModule } from './common/logging/logging.module';
import { MarketDataModule } from './market-data/market-data.module';
import { AnalysisModule } from './analysis/analysis.module';
import { PortfolioModule } from './portfolio/portfolio.module';
import { MonitorModule } from './monitor/monitor.module';
import { ToolsModule } from './tools/tools.module';
import { WebSocketModule } from './websocket/websocket.module';
import { ApiModule } from './api/api.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),

    // Registry for the monitor's inter-tick timeout
    ScheduleModule.forRoot(),

    // Alerts and tick reports fan out to the WebSocket gateway
    EventEmitterModule.forRoot(),

    // Database
    DatabaseModule,

    // Logging
    LoggingModule,

    // Feature modules
    MarketDataModule,
    AnalysisModule,
    PortfolioModule,
    MonitorModule,
    ToolsModule,
    WebSocketModule,
    ApiModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
