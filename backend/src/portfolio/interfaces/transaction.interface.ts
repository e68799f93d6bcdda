/**
 * Side relative to the pair's foreign currency (the side that is not the ledger currency)
 * BUY converts ledger currency into foreign, SELL converts foreign back
 */
export enum TradeSide {
  BUY = 'Buy',
  SELL = 'Sell',
}

export interface TransactionRequest {
  pair: string;
  side: TradeSide;
  /** In the currency given up: ledger currency for BUY, foreign for SELL */
  amount: number;
  /** Pair rate, QUOTE per 1 BASE */
  price: number;
  /** Generated when omitted */
  id?: string;
  /** Unix ms; now when omitted */
  timestamp?: number;
  reason?: string;
}

/**
 * Executed transaction. Append-only: never edited or deleted
 */
export interface Transaction {
  id: string;
  pair: string;
  side: TradeSide;
  amount: number;
  price: number;
  timestamp: number;
  currencyGiven: string;
  currencyReceived: string;
  amountReceived: number;
  /** Set on SELL: proceeds minus the cost basis sold */
  realizedPnl: number | null;
  reason: string | null;
}
