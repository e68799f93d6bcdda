import { SignalDirection, TradingSignal } from '../analysis/signal-generator';
import { MonitoringConfig } from '../common/config/monitoring.config';
import { CurrencyPair } from '../market-data/currency-pair';
import { Quote } from '../market-data/interfaces';
import { PositionLevels, PositionView } from '../portfolio/interfaces';
import { entryRate, foreignCurrency, liquidationRate } from '../portfolio/portfolio-ledger';

/** Smallest trade worth executing, in ledger currency */
export const MIN_TRADE_AMOUNT = 0.01;

export type ExitReason = 'signal' | 'stop-loss' | 'take-profit';

/**
 * Protective levels of an open position, from the signal that opened it
 * `long` when the position gains as the pair rate rises (ledger currency is the quote)
 */
export interface ProtectiveLevels extends PositionLevels {
  long: boolean;
}

export type ExecutionDecision =
  | { action: 'open'; pair: string; price: number; levels: ProtectiveLevels }
  | { action: 'close'; pair: string; amount: number; price: number; reason: ExitReason }
  | { action: 'none'; pair: string; reason: string };

export interface ExecutionInput {
  pair: CurrencyPair;
  /** Null when analysis failed this tick; protective exits still apply */
  signal: TradingSignal | null;
  quote: Quote;
  currency: string;
  position: PositionView | null;
  levels: ProtectiveLevels | null;
  now: number;
  config: Pick<MonitoringConfig, 'autoTrade' | 'maxQuoteAgeSeconds'>;
}

/**
 * Whether a signal moves value toward the pair's foreign currency
 * (BUY when the ledger currency is the quote, SELL when it is the base)
 */
export function favoursForeign(direction: SignalDirection, pair: CurrencyPair, currency: string): boolean {
  return (
    (direction === SignalDirection.BUY && pair.quote === currency) ||
    (direction === SignalDirection.SELL && pair.base === currency)
  );
}

export function favoursLedgerCurrency(direction: SignalDirection, pair: CurrencyPair, currency: string): boolean {
  return (
    (direction === SignalDirection.BUY && pair.base === currency) ||
    (direction === SignalDirection.SELL && pair.quote === currency)
  );
}

/**
 * Stop-loss or take-profit crossed at the quote's liquidation rate
 */
export function checkProtectiveLevels(
  levels: ProtectiveLevels,
  pair: CurrencyPair,
  currency: string,
  quote: Quote,
): 'stop-loss' | 'take-profit' | null {
  const rate = liquidationRate(pair, currency, quote);
  if (levels.long) {
    if (rate <= levels.stopLoss) return 'stop-loss';
    if (rate >= levels.takeProfit) return 'take-profit';
  } else {
    if (rate >= levels.stopLoss) return 'stop-loss';
    if (rate <= levels.takeProfit) return 'take-profit';
  }
  return null;
}

/**
 * Cash to commit to a new position
 * @returns 0 when the amount would be below MIN_TRADE_AMOUNT
 */
export function positionSize(cashBalance: number, totalValue: number, maxRiskPerTradePercent: number): number {
  const amount = Math.min(cashBalance, (totalValue * maxRiskPerTradePercent) / 100);
  return amount > MIN_TRADE_AMOUNT ? amount : 0;
}

/**
 * Decide what to do with one pair this tick
 * Protective exits come first, then the signal: one position per pair,
 * opened when the signal favours the foreign currency, closed in full when
 * it favours the ledger currency.
 */
export function decideExecution(input: ExecutionInput): ExecutionDecision {
  const { pair, signal, quote, currency, position, levels, config } = input;
  const symbol = pair.symbol;

  if (!config.autoTrade) {
    return { action: 'none', pair: symbol, reason: 'auto-trade disabled' };
  }
  if (foreignCurrency(pair, currency) === null) {
    return { action: 'none', pair: symbol, reason: `pair does not involve ${currency}` };
  }
  if (input.now - quote.timestamp > config.maxQuoteAgeSeconds * 1000) {
    return { action: 'none', pair: symbol, reason: 'quote is stale' };
  }

  if (position && levels) {
    const hit = checkProtectiveLevels(levels, pair, currency, quote);
    if (hit) {
      return {
        action: 'close',
        pair: symbol,
        amount: position.amount,
        price: liquidationRate(pair, currency, quote),
        reason: hit,
      };
    }
  }

  if (!signal) {
    return { action: 'none', pair: symbol, reason: 'no signal' };
  }
  if (signal.direction === SignalDirection.HOLD) {
    return { action: 'none', pair: symbol, reason: 'hold' };
  }

  if (favoursForeign(signal.direction, pair, currency)) {
    if (position) {
      return { action: 'none', pair: symbol, reason: 'position already open' };
    }
    return {
      action: 'open',
      pair: symbol,
      price: entryRate(pair, currency, quote),
      levels: { long: pair.quote === currency, stopLoss: signal.stopLoss, takeProfit: signal.takeProfit },
    };
  }

  if (favoursLedgerCurrency(signal.direction, pair, currency) && position) {
    return {
      action: 'close',
      pair: symbol,
      amount: position.amount,
      price: liquidationRate(pair, currency, quote),
      reason: 'signal',
    };
  }

  return { action: 'none', pair: symbol, reason: 'no open position' };
}
