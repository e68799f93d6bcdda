import { TradingSignal } from '../../analysis/signal-generator';
import { DeepReadonly } from '../../common/utils/deep-freeze';
import { PortfolioSnapshot, Transaction } from '../../portfolio/interfaces';
import { Alert } from './alert.interface';

export interface PairFailure {
  pair: string;
  /** TradingErrorCode, or 'UNKNOWN' */
  code: string;
  /** DataProviderErrorKind for provider failures */
  kind?: string;
  message: string;
  consecutiveFailures: number;
}

/**
 * Summary of one completed tick, published on the event bus
 */
export interface TickReport {
  tick: number;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
  /** Per phase, in ms */
  phases: {
    polling: number;
    analyzing: number;
    deciding: number;
    executing: number;
    alerting: number;
  };
  signals: TradingSignal[];
  alerts: Alert[];
  transactions: Transaction[];
  failures: PairFailure[];
  portfolio: DeepReadonly<PortfolioSnapshot>;
  /** Sleep before the next tick, including any rate-limit backoff */
  nextSleepMs: number;
}
