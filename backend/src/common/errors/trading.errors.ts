/**
 * Error kinds raised by the trading core.
 *
 * Computation errors (indicators, signals) are returned to the monitor, which
 * turns them into per-pair alerts. Ledger errors reject a single transaction.
 * ConfigurationError is fatal at startup.
 */

export enum TradingErrorCode {
  INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',
  INVALID_QUOTE = 'INVALID_QUOTE',
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  INSUFFICIENT_HOLDINGS = 'INSUFFICIENT_HOLDINGS',
  INVALID_TRANSACTION = 'INVALID_TRANSACTION',
  DATA_PROVIDER = 'DATA_PROVIDER',
  CONFIGURATION = 'CONFIGURATION',
  MONITOR_STATE = 'MONITOR_STATE',
}

export abstract class TradingError extends Error {
  abstract readonly code: TradingErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InsufficientDataError extends TradingError {
  readonly code = TradingErrorCode.INSUFFICIENT_DATA;

  constructor(
    readonly indicator: string,
    readonly required: number,
    readonly available: number,
  ) {
    super(`${indicator} needs at least ${required} bars, got ${available}`);
  }
}

export class InvalidQuoteError extends TradingError {
  readonly code = TradingErrorCode.INVALID_QUOTE;

  constructor(
    readonly pair: string,
    readonly bid: number,
    readonly ask: number,
  ) {
    super(`Invalid quote for ${pair}: bid=${bid} ask=${ask}`);
  }
}

export class InsufficientFundsError extends TradingError {
  readonly code = TradingErrorCode.INSUFFICIENT_FUNDS;

  constructor(
    readonly currency: string,
    readonly requested: number,
    readonly available: number,
  ) {
    super(`Insufficient ${currency} balance: requested ${requested}, available ${available}`);
  }
}

export class InsufficientHoldingsError extends TradingError {
  readonly code = TradingErrorCode.INSUFFICIENT_HOLDINGS;

  constructor(
    readonly pair: string,
    readonly currency: string,
    readonly requested: number,
    readonly available: number,
  ) {
    super(`Insufficient ${currency} holdings on ${pair}: requested ${requested}, available ${available}`);
  }
}

export class InvalidTransactionError extends TradingError {
  readonly code = TradingErrorCode.INVALID_TRANSACTION;
}

export enum DataProviderErrorKind {
  RATE_LIMITED = 'RateLimited',
  AUTH_FAILED = 'AuthFailed',
  NOT_FOUND = 'NotFound',
  NETWORK = 'Network',
  MALFORMED = 'Malformed',
}

export class DataProviderError extends TradingError {
  readonly code = TradingErrorCode.DATA_PROVIDER;

  constructor(
    readonly kind: DataProviderErrorKind,
    message: string,
    readonly pair?: string,
    readonly retryAfterMs?: number,
  ) {
    super(message);
  }

  get isRateLimited(): boolean {
    return this.kind === DataProviderErrorKind.RATE_LIMITED;
  }
}

export class ConfigurationError extends TradingError {
  readonly code = TradingErrorCode.CONFIGURATION;

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

/**
 * Operation not valid in the monitoring loop's current state
 */
export class MonitorStateError extends TradingError {
  readonly code = TradingErrorCode.MONITOR_STATE;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

/**
 * True for the rejection produced by an aborted fetch or cancellable wait
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
