export { TradeSide, TransactionRequest, Transaction } from './transaction.interface';
export {
  PositionView,
  PairBreakdown,
  PortfolioSnapshot,
  PortfolioRecord,
  PositionLevels,
  StoredPortfolio,
} from './portfolio-snapshot.interface';
