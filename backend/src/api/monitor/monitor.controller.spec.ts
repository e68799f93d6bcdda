import { HttpException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { ConfigurationError, MonitorStateError } from '../../common/errors/trading.errors';
import { RateLimiterService } from '../../market-data/rate-limiter.service';
import { AlertService } from '../../monitor/alert.service';
import { MonitorOrchestratorService } from '../../monitor/monitor-orchestrator.service';
import { MonitorController } from './monitor.controller';

describe('MonitorController', () => {
  let controller: MonitorController;
  const monitor = {
    start: jest.fn(),
    stop: jest.fn(),
    triggerTick: jest.fn(),
    getStatus: jest.fn(),
    getLatestSignals: jest.fn(),
  };
  const alertService = { recent: jest.fn(), getStatus: jest.fn() };
  const rateLimiter = { getStatus: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();
    monitor.getStatus.mockReturnValue({ running: false, tick: 0, pairs: [] });

    const moduleRef = await Test.createTestingModule({
      controllers: [MonitorController],
      providers: [
        { provide: MonitorOrchestratorService, useValue: monitor },
        { provide: AlertService, useValue: alertService },
        { provide: RateLimiterService, useValue: rateLimiter },
      ],
    }).compile();

    controller = moduleRef.get(MonitorController);
  });

  it('starts the monitor with the request overrides', async () => {
    monitor.start.mockResolvedValue({ running: true, pairs: [{}, {}], config: { intervalSeconds: 30 } });

    const result = await controller.startMonitor({ pairs: ['EUR/USD', 'USD/JPY'], intervalSeconds: 30 });

    expect(monitor.start).toHaveBeenCalledWith({ pairs: ['EUR/USD', 'USD/JPY'], intervalSeconds: 30 });
    expect(result.success).toBe(true);
    expect(result.message).toBe('Monitoring 2 pairs every 30s');
  });

  it('reports an already running monitor without restarting it', async () => {
    monitor.getStatus.mockReturnValue({ running: true, tick: 3, pairs: [] });

    const result = await controller.startMonitor({});

    expect(result).toMatchObject({ success: false, message: 'Monitor already running' });
    expect(monitor.start).not.toHaveBeenCalled();
  });

  it('answers 400 for an invalid configuration', async () => {
    monitor.start.mockRejectedValue(new ConfigurationError(['at least one pair must be tracked']));

    let caught: unknown;
    try {
      await controller.startMonitor({ pairs: [] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(HttpException);
    if (caught instanceof HttpException) {
      expect(caught.getStatus()).toBe(400);
      expect(caught.getResponse()).toEqual({
        success: false,
        message: 'Failed to start monitor: Invalid configuration: at least one pair must be tracked',
        code: 'CONFIGURATION',
      });
    }
  });

  it('answers 409 for a manual tick while the loop is busy', async () => {
    monitor.triggerTick.mockRejectedValue(new MonitorStateError('A manual tick needs a sleeping monitor (state is POLLING)'));

    await expect(controller.triggerTick()).rejects.toMatchObject({ status: 409 });
  });

  it('reports the alert channel and provider budget with the loop status', () => {
    alertService.getStatus.mockReturnValue({ queued: 4, dropped: 0, capacity: 500 });
    rateLimiter.getStatus.mockReturnValue({ requestsLastMinute: 3, remainingRequests: 2 });

    expect(controller.getStatus()).toEqual({
      success: true,
      data: {
        running: false,
        tick: 0,
        pairs: [],
        alertChannel: { queued: 4, dropped: 0, capacity: 500 },
        rateLimit: { requestsLastMinute: 3, remainingRequests: 2 },
      },
    });
  });

  it('falls back to 50 alerts for a bad limit', () => {
    alertService.recent.mockReturnValue([]);

    controller.getAlerts('many');

    expect(alertService.recent).toHaveBeenCalledWith(50);
  });
});
