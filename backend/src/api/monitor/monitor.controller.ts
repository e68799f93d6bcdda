import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { TradingSignal } from '../../analysis/signal-generator';
import { toHttpException } from '../../common/errors/http-error';
import { RateLimitStatus, RateLimiterService } from '../../market-data/rate-limiter.service';
import { AlertChannelStatus, AlertService } from '../../monitor/alert.service';
import { Alert, TickReport } from '../../monitor/interfaces';
import { MonitorOrchestratorService, MonitorStatus } from '../../monitor/monitor-orchestrator.service';
import { StartMonitorDto } from './start-monitor.dto';

export interface MonitorStatusView extends MonitorStatus {
  alertChannel: AlertChannelStatus;
  rateLimit: RateLimitStatus;
}

/**
 * Monitoring Loop Control API
 */
@Controller('api/monitor')
export class MonitorController {
  constructor(
    private readonly monitor: MonitorOrchestratorService,
    private readonly alertService: AlertService,
    private readonly rateLimiter: RateLimiterService,
  ) {}

  /**
   * Start monitoring
   * POST /api/monitor/start
   * Body: StartMonitorDto, every field optional
   */
  @Post('start')
  @HttpCode(HttpStatus.OK)
  async startMonitor(@Body() body: StartMonitorDto): Promise<{ success: boolean; message: string; data: MonitorStatus }> {
    try {
      if (this.monitor.getStatus().running) {
        return { success: false, message: 'Monitor already running', data: this.monitor.getStatus() };
      }

      const status = await this.monitor.start(body);
      return {
        success: true,
        message: `Monitoring ${status.pairs.length} pairs every ${status.config?.intervalSeconds}s`,
        data: status,
      };
    } catch (error) {
      throw toHttpException(error, 'Failed to start monitor');
    }
  }

  /**
   * Stop monitoring
   * POST /api/monitor/stop
   */
  @Post('stop')
  @HttpCode(HttpStatus.OK)
  async stopMonitor(): Promise<{ success: boolean; message: string; data: MonitorStatus }> {
    try {
      const status = await this.monitor.stop();
      return { success: true, message: `Monitor stopped after ${status.tick} ticks`, data: status };
    } catch (error) {
      throw toHttpException(error, 'Failed to stop monitor');
    }
  }

  /**
   * Run the next tick now instead of waiting out the interval
   * POST /api/monitor/tick
   */
  @Post('tick')
  @HttpCode(HttpStatus.OK)
  async triggerTick(): Promise<{ success: boolean; data: TickReport }> {
    try {
      const report = await this.monitor.triggerTick();
      return { success: true, data: report };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  /**
   * Loop state with the alert channel and provider request budget
   * GET /api/monitor/status
   */
  @Get('status')
  getStatus(): { success: boolean; data: MonitorStatusView } {
    return {
      success: true,
      data: {
        ...this.monitor.getStatus(),
        alertChannel: this.alertService.getStatus(),
        rateLimit: this.rateLimiter.getStatus(),
      },
    };
  }

  /**
   * Recent alerts, oldest first
   * GET /api/monitor/alerts?limit=50
   */
  @Get('alerts')
  getAlerts(@Query('limit') limit?: string): { success: boolean; data: Alert[] } {
    const count = limit ? parseInt(limit) : 50;
    return { success: true, data: this.alertService.recent(Number.isNaN(count) ? 50 : count) };
  }

  /**
   * Latest signal per tracked pair
   * GET /api/monitor/signals
   */
  @Get('signals')
  getSignals(): { success: boolean; data: TradingSignal[] } {
    return { success: true, data: this.monitor.getLatestSignals() };
  }
}
