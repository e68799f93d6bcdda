import { Module } from '@nestjs/common';
import { AnalysisModule } from '../analysis/analysis.module';
import { MonitorModule } from '../monitor/monitor.module';
import { CoreToolsService } from './core-tools.service';

@Module({
  imports: [AnalysisModule, MonitorModule],
  providers: [CoreToolsService],
  exports: [CoreToolsService],
})
export class ToolsModule {}
