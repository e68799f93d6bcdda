import { Transaction } from './transaction.interface';

export interface PositionView {
  pair: string;
  /** Foreign currency held */
  currency: string;
  /** Foreign units held */
  amount: number;
  /** Ledger-currency cost of the units still held */
  costBasis: number;
  /** Foreign-amount-weighted pair rate of the buys */
  averageEntryPrice: number;
  /** Liquidation rate of the last mark, null if never marked */
  markPrice: number | null;
  markedAt: number | null;
  /** In ledger currency; cost basis until first marked */
  marketValue: number;
  unrealizedPnl: number;
}

export interface PairBreakdown {
  pair: string;
  realizedPnl: number;
  unrealizedPnl: number;
  marketValue: number;
  position: PositionView | null;
}

export interface PortfolioSnapshot {
  accountId: string;
  currency: string;
  initialValue: number;
  cashBalance: number;
  /** cashBalance + Σ position market value */
  totalValue: number;
  realizedPnl: number;
  unrealizedPnl: number;
  /** totalValue - initialValue */
  totalPnl: number;
  totalPnlPercent: number;
  positions: PositionView[];
  breakdown: PairBreakdown[];
  transactionCount: number;
  takenAt: number;
}

/**
 * Everything needed to rebuild a ledger by replay
 */
export interface PortfolioRecord {
  accountId: string;
  currency: string;
  initialAmount: number;
  createdAt: number;
  transactions: Transaction[];
}

/**
 * Stop-loss and take-profit of an open position, as pair rates
 */
export interface PositionLevels {
  stopLoss: number;
  takeProfit: number;
}

/**
 * A stored account: its replay record plus the levels of positions still open
 */
export interface StoredPortfolio extends PortfolioRecord {
  levels: Record<string, PositionLevels>;
}
