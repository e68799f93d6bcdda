import { Module } from '@nestjs/common';
import { MonitorWebSocketGateway } from './websocket.gateway';
import { MonitorModule } from '../monitor/monitor.module';

@Module({
  imports: [MonitorModule],
  providers: [MonitorWebSocketGateway],
  exports: [MonitorWebSocketGateway],
})
export class WebSocketModule {}
