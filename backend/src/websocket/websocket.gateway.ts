import {
  WebSocketGateway,
  WebSocketServer,
  OnGatewayInit,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { OnEvent } from '@nestjs/event-emitter';
import { Server, Socket } from 'socket.io';
import { CustomLoggerService } from '../common/logging/custom-logger.service';
import { Alert, TickReport } from '../monitor/interfaces';
import { MonitorOrchestratorService } from '../monitor/monitor-orchestrator.service';
import { MONITOR_EVENTS, MonitorStateChange } from '../monitor/monitor.events';

const CONTEXT = 'WebSocketGateway';

/**
 * Compact tick payload; full reports stay on the REST API
 */
export interface TickSummaryEvent {
  tick: number;
  finishedAt: number;
  durationMs: number;
  nextSleepMs: number;
  signals: { pair: string; direction: string; strength: number; confidence: number }[];
  failures: { pair: string; message: string }[];
  transactions: number;
  totalValue: number;
  totalPnl: number;
  currency: string;
}

export function summarizeTick(report: TickReport): TickSummaryEvent {
  return {
    tick: report.tick,
    finishedAt: report.finishedAt,
    durationMs: report.durationMs,
    nextSleepMs: report.nextSleepMs,
    signals: report.signals.map((s) => ({
      pair: s.pair,
      direction: s.direction,
      strength: s.strength,
      confidence: s.confidence,
    })),
    failures: report.failures.map((f) => ({ pair: f.pair, message: f.message })),
    transactions: report.transactions.length,
    totalValue: report.portfolio.totalValue,
    totalPnl: report.portfolio.totalPnl,
    currency: report.portfolio.currency,
  };
}

/**
 * WebSocket Gateway for real-time monitor updates
 *
 * Events: 'alert', 'monitor:tick', 'monitor:state', and 'monitor:status'
 * (sent once to each client on connect)
 */
@WebSocketGateway({
  cors: {
    origin: process.env.FRONTEND_URL || 'http://localhost:3000',
    credentials: true,
  },
})
export class MonitorWebSocketGateway implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect {
  @WebSocketServer()
  server!: Server;

  constructor(
    private readonly logger: CustomLoggerService,
    private readonly monitor: MonitorOrchestratorService,
  ) {}

  afterInit(): void {
    this.logger.log('WebSocket Gateway initialized', CONTEXT);
  }

  handleConnection(client: Socket): void {
    this.logger.log(`Client connected: ${client.id}`, CONTEXT);
    client.emit('monitor:status', this.monitor.getStatus());
  }

  handleDisconnect(client: Socket): void {
    this.logger.log(`Client disconnected: ${client.id}`, CONTEXT);
  }

  @OnEvent(MONITOR_EVENTS.ALERT_RAISED)
  emitAlert(alert: Alert): void {
    this.server.emit('alert', alert);
  }

  @OnEvent(MONITOR_EVENTS.TICK_COMPLETED)
  emitTick(report: TickReport): void {
    this.server.emit('monitor:tick', summarizeTick(report));
  }

  @OnEvent(MONITOR_EVENTS.STATE_CHANGED)
  emitStateChange(change: MonitorStateChange): void {
    this.server.emit('monitor:state', { ...change, timestamp: Date.now() });
  }
}
