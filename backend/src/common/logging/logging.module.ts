import { Module, Global } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CustomLoggerService } from './custom-logger.service';
import { MonitorLog } from '../../entities/monitor-log.entity';
import { SystemLog } from '../../entities/system-log.entity';

@Global()
@Module({
  imports: [
    TypeOrmModule.forFeature([MonitorLog, SystemLog]),
  ],
  providers: [CustomLoggerService],
  exports: [CustomLoggerService],
})
export class LoggingModule {}
