import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PortfolioAccount } from '../entities/portfolio-account.entity';
import { LedgerTransaction } from '../entities/ledger-transaction.entity';
import { PortfolioPersistenceService } from './portfolio-persistence.service';

@Module({
  imports: [TypeOrmModule.forFeature([PortfolioAccount, LedgerTransaction])],
  providers: [PortfolioPersistenceService],
  exports: [PortfolioPersistenceService],
})
export class PortfolioModule {}
