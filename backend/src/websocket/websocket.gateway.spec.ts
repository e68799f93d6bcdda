import { Test } from '@nestjs/testing';
import { Server } from 'socket.io';
import { SignalDirection } from '../analysis/signal-generator';
import { CustomLoggerService } from '../common/logging/custom-logger.service';
import { AlertService } from '../monitor/alert.service';
import { AlertKind, AlertSeverity, TickReport } from '../monitor/interfaces';
import { MonitorOrchestratorService } from '../monitor/monitor-orchestrator.service';
import { MonitorState } from '../monitor/state-machine/monitor-state';
import { PortfolioLedger } from '../portfolio/portfolio-ledger';
import { createLoggerStub } from '../testing/logger.stub';
import { makeSignal } from '../testing/signals';
import { MonitorWebSocketGateway, summarizeTick } from './websocket.gateway';

function makeReport(): TickReport {
  const ledger = PortfolioLedger.open({ initialAmount: 10000, currency: 'USD' });
  return {
    tick: 4,
    startedAt: 1000,
    finishedAt: 1250,
    durationMs: 250,
    phases: { polling: 200, analyzing: 20, deciding: 10, executing: 0, alerting: 20 },
    signals: [makeSignal('EUR/USD', SignalDirection.BUY, 55, { confidence: 60 })],
    alerts: [],
    transactions: [],
    failures: [
      { pair: 'GBP/USD', code: 'DATA_PROVIDER', kind: 'Network', message: 'Network error: timeout', consecutiveFailures: 1 },
    ],
    portfolio: ledger.snapshot(1250),
    nextSleepMs: 60000,
  };
}

describe('MonitorWebSocketGateway', () => {
  let gateway: MonitorWebSocketGateway;
  let emit: jest.SpyInstance;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        MonitorWebSocketGateway,
        { provide: CustomLoggerService, useValue: createLoggerStub() },
        { provide: MonitorOrchestratorService, useValue: { getStatus: jest.fn() } },
      ],
    }).compile();

    gateway = moduleRef.get(MonitorWebSocketGateway);
    gateway.server = new Server();
    emit = jest.spyOn(gateway.server, 'emit').mockImplementation(() => true);
  });

  it('pushes alerts unchanged', () => {
    const alert = AlertService.create({
      kind: AlertKind.PAIR_DEGRADED,
      pair: 'GBP/USD',
      message: 'GBP/USD degraded: 3 consecutive fetch failures',
      severity: AlertSeverity.CRITICAL,
    });

    gateway.emitAlert(alert);

    expect(emit).toHaveBeenCalledWith('alert', alert);
  });

  it('pushes a compact tick summary', () => {
    gateway.emitTick(makeReport());

    expect(emit).toHaveBeenCalledWith('monitor:tick', {
      tick: 4,
      finishedAt: 1250,
      durationMs: 250,
      nextSleepMs: 60000,
      signals: [{ pair: 'EUR/USD', direction: 'Buy', strength: 55, confidence: 60 }],
      failures: [{ pair: 'GBP/USD', message: 'Network error: timeout' }],
      transactions: 0,
      totalValue: 10000,
      totalPnl: 0,
      currency: 'USD',
    });
  });

  it('stamps state changes', () => {
    gateway.emitStateChange({ from: MonitorState.SLEEPING, to: MonitorState.POLLING, tick: 2 });

    expect(emit).toHaveBeenCalledWith(
      'monitor:state',
      expect.objectContaining({ from: MonitorState.SLEEPING, to: MonitorState.POLLING, tick: 2 }),
    );
  });
});

describe('summarizeTick', () => {
  it('counts transactions instead of copying them', () => {
    const summary = summarizeTick(makeReport());
    expect(summary.transactions).toBe(0);
    expect(summary.signals).toHaveLength(1);
  });
});
