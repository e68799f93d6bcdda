import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CustomLoggerService } from '../common/logging/custom-logger.service';
import { errorMessage } from '../common/errors/trading.errors';
import { PortfolioAccount } from '../entities/portfolio-account.entity';
import { LedgerTransaction } from '../entities/ledger-transaction.entity';
import { SystemEventType } from '../entities/system-log.entity';
import { PositionLevels, StoredPortfolio, TradeSide, Transaction } from './interfaces';
import { PortfolioLedger } from './portfolio-ledger';

/**
 * Portfolio Persistence Service
 * Stores accounts and their transaction logs so a run can be resumed by replay.
 * Writes never throw: a failed write is logged and reported as false.
 */
@Injectable()
export class PortfolioPersistenceService {
  constructor(
    @InjectRepository(PortfolioAccount)
    private readonly accountRepo: Repository<PortfolioAccount>,
    @InjectRepository(LedgerTransaction)
    private readonly transactionRepo: Repository<LedgerTransaction>,
    private readonly logger: CustomLoggerService,
  ) {}

  async saveAccount(ledger: PortfolioLedger, trackedPairs: string[]): Promise<boolean> {
    try {
      await this.accountRepo.save({
        id: ledger.accountId,
        currency: ledger.currency,
        initial_amount: ledger.initialValue,
        opened_at: ledger.createdAt,
        tracked_pairs: trackedPairs,
      });
      return true;
    } catch (error) {
      await this.reportFailure(`Failed to save account ${ledger.accountId}`, error, { accountId: ledger.accountId });
      return false;
    }
  }

  /**
   * @param levels Protective levels of the position this transaction opens
   */
  async saveTransaction(
    accountId: string,
    sequence: number,
    tx: Transaction,
    levels: PositionLevels | null = null,
  ): Promise<boolean> {
    try {
      await this.transactionRepo.save({
        id: tx.id,
        account_id: accountId,
        sequence,
        pair: tx.pair,
        side: tx.side,
        amount: tx.amount,
        price: tx.price,
        currency_given: tx.currencyGiven,
        currency_received: tx.currencyReceived,
        amount_received: tx.amountReceived,
        realized_pnl: tx.realizedPnl,
        reason: tx.reason,
        stop_loss: levels ? levels.stopLoss : null,
        take_profit: levels ? levels.takeProfit : null,
        executed_at: tx.timestamp,
      });
      return true;
    } catch (error) {
      await this.reportFailure(`Failed to save transaction ${tx.id}`, error, { accountId, transactionId: tx.id });
      return false;
    }
  }

  /**
   * Stored account, its log in replay order, and the levels of the positions
   * the log leaves open
   * @returns null when no account has this id
   */
  async loadRecord(accountId: string): Promise<StoredPortfolio | null> {
    const account = await this.accountRepo.findOne({ where: { id: accountId } });
    if (!account) {
      return null;
    }

    const rows = await this.transactionRepo.find({
      where: { account_id: accountId },
      order: { sequence: 'ASC' },
    });

    const levels = new Map<string, PositionLevels>();
    for (const row of rows) {
      if (row.side === TradeSide.SELL) {
        levels.delete(row.pair);
      } else if (typeof row.stop_loss === 'number' && typeof row.take_profit === 'number') {
        levels.set(row.pair, { stopLoss: row.stop_loss, takeProfit: row.take_profit });
      }
    }

    return {
      accountId: account.id,
      currency: account.currency,
      initialAmount: account.initial_amount,
      createdAt: account.opened_at,
      transactions: rows.map((row) => ({
        id: row.id,
        pair: row.pair,
        side: row.side,
        amount: row.amount,
        price: row.price,
        timestamp: row.executed_at,
        currencyGiven: row.currency_given,
        currencyReceived: row.currency_received,
        amountReceived: row.amount_received,
        realizedPnl: row.realized_pnl,
        reason: row.reason,
      })),
      levels: Object.fromEntries(levels),
    };
  }

  async listAccounts(): Promise<PortfolioAccount[]> {
    return this.accountRepo.find({ order: { created_at: 'DESC' } });
  }

  private async reportFailure(message: string, error: unknown, metadata: Record<string, unknown>): Promise<void> {
    await this.logger.logSystem({
      level: 'error',
      eventType: SystemEventType.DATABASE_ERROR,
      message: `${message}: ${errorMessage(error)}`,
      component: 'PortfolioPersistence',
      metadata,
    });
  }
}
