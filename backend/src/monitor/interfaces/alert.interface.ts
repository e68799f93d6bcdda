export enum AlertKind {
  RATE_CHANGE = 'RateChange',
  SIGNAL_TRIGGERED = 'SignalTriggered',
  STOP_LOSS_HIT = 'StopLossHit',
  TAKE_PROFIT_HIT = 'TakeProfitHit',
  DATA_FETCH_FAILED = 'DataFetchFailed',
  PAIR_DEGRADED = 'PairDegraded',
  ANALYSIS_FAILED = 'AnalysisFailed',
  TRADE_EXECUTED = 'TradeExecuted',
  TRADE_REJECTED = 'TradeRejected',
}

export enum AlertSeverity {
  INFO = 'Info',
  WARNING = 'Warning',
  CRITICAL = 'Critical',
}

/**
 * Alert raised by the monitoring loop
 * Ephemeral: held in a bounded in-memory channel and pushed to clients
 */
export interface Alert {
  id: string;
  kind: AlertKind;
  pair: string;
  message: string;
  severity: AlertSeverity;
  timestamp: number;
  data?: Record<string, unknown>;
}
