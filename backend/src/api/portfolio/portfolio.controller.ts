import { Controller, Get, Query } from '@nestjs/common';
import { toHttpException } from '../../common/errors/http-error';
import { DeepReadonly } from '../../common/utils/deep-freeze';
import { PortfolioAccount } from '../../entities/portfolio-account.entity';
import { MonitorOrchestratorService } from '../../monitor/monitor-orchestrator.service';
import { PortfolioSnapshot, Transaction } from '../../portfolio/interfaces';
import { PortfolioPersistenceService } from '../../portfolio/portfolio-persistence.service';
import { CoreToolsService } from '../../tools/core-tools.service';

@Controller('api/portfolio')
export class PortfolioController {
  constructor(
    private readonly tools: CoreToolsService,
    private readonly monitor: MonitorOrchestratorService,
    private readonly persistence: PortfolioPersistenceService,
  ) {}

  /**
   * GET /api/portfolio
   */
  @Get()
  async getPortfolio(): Promise<{ success: boolean; data: DeepReadonly<PortfolioSnapshot> }> {
    try {
      return { success: true, data: await this.tools.invoke('get_portfolio_snapshot', {}) };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  /**
   * Transaction log, newest last
   * GET /api/portfolio/transactions?limit=100
   */
  @Get('transactions')
  getTransactions(@Query('limit') limit?: string): { success: boolean; data: Transaction[] } {
    const all = this.monitor.getTransactions();
    const count = limit ? parseInt(limit) : all.length;
    return { success: true, data: count > 0 ? all.slice(-count) : [] };
  }

  /**
   * Stored accounts, for resuming
   * GET /api/portfolio/accounts
   */
  @Get('accounts')
  async getAccounts(): Promise<{ success: boolean; data: PortfolioAccount[] }> {
    try {
      return { success: true, data: await this.persistence.listAccounts() };
    } catch (error) {
      throw toHttpException(error, 'Failed to list accounts');
    }
  }
}
