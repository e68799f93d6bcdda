import { v4 as uuidv4 } from 'uuid';
import {
  ConfigurationError,
  InsufficientFundsError,
  InsufficientHoldingsError,
  InvalidQuoteError,
  InvalidTransactionError,
} from '../common/errors/trading.errors';
import { deepFreeze, DeepReadonly } from '../common/utils/deep-freeze';
import { assertValidQuote, CurrencyPair, isCurrencyCode, parsePair } from '../market-data/currency-pair';
import { Quote } from '../market-data/interfaces';
import {
  PairBreakdown,
  PortfolioRecord,
  PortfolioSnapshot,
  PositionView,
  TradeSide,
  Transaction,
  TransactionRequest,
} from './interfaces';

/** Balances within this distance are treated as equal */
export const LEDGER_TOLERANCE = 1e-9;

interface PositionState {
  pair: CurrencyPair;
  currency: string;
  amount: number;
  costBasis: number;
  averageEntryPrice: number;
  markPrice: number | null;
  markedAt: number | null;
}

export interface OpenLedgerOptions {
  initialAmount: number;
  currency: string;
  accountId?: string;
  createdAt?: number;
}

/**
 * Rate at which the ledger currency buys the foreign side of the pair
 * (ask when the ledger currency is the quote, bid when it is the base)
 */
export function entryRate(pair: CurrencyPair, currency: string, quote: Quote): number {
  return pair.quote === currency ? quote.ask : quote.bid;
}

/**
 * Rate at which a foreign holding converts back into the ledger currency
 * (bid when the ledger currency is the quote, ask when it is the base)
 */
export function liquidationRate(pair: CurrencyPair, currency: string, quote: Quote): number {
  return pair.quote === currency ? quote.bid : quote.ask;
}

/**
 * Foreign currency of a pair for a ledger currency, null when the pair does not involve it
 */
export function foreignCurrency(pair: CurrencyPair, currency: string): string | null {
  if (pair.base === currency) return pair.quote;
  if (pair.quote === currency) return pair.base;
  return null;
}

/**
 * Amount received for `amount` of the given-up currency at `price` (QUOTE per BASE)
 */
function convert(pair: CurrencyPair, currency: string, side: TradeSide, amount: number, price: number): number {
  const givingBase = side === TradeSide.BUY ? pair.base === currency : pair.base !== currency;
  return givingBase ? amount * price : amount / price;
}

function valueOf(position: PositionState, currency: string): number {
  if (position.markPrice === null) {
    return position.costBasis;
  }
  return position.pair.quote === currency
    ? position.amount * position.markPrice
    : position.amount / position.markPrice;
}

/**
 * Portfolio Ledger
 * Paper-trading account in one ledger currency: cash, one position per pair,
 * and an append-only transaction log that replays to the same state.
 *
 * Not safe for concurrent writers: one owner mutates it, readers take snapshots.
 */
export class PortfolioLedger {
  private cash: number;
  private readonly positions = new Map<string, PositionState>();
  private readonly realizedByPair = new Map<string, number>();
  private readonly log: Transaction[] = [];
  private readonly ids = new Set<string>();

  private constructor(
    readonly accountId: string,
    readonly currency: string,
    readonly initialValue: number,
    readonly createdAt: number,
  ) {
    this.cash = initialValue;
  }

  /**
   * @throws ConfigurationError for a non-positive amount or malformed currency
   */
  static open(options: OpenLedgerOptions): PortfolioLedger {
    const issues: string[] = [];
    if (!Number.isFinite(options.initialAmount) || options.initialAmount <= 0) {
      issues.push(`initial amount must be a positive number (got ${options.initialAmount})`);
    }
    const currency = options.currency.trim().toUpperCase();
    if (!isCurrencyCode(currency)) {
      issues.push(`initial currency must be a 3-letter code (got "${options.currency}")`);
    }
    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }

    return new PortfolioLedger(
      options.accountId ?? uuidv4(),
      currency,
      options.initialAmount,
      options.createdAt ?? Date.now(),
    );
  }

  /**
   * Rebuild a ledger by applying a stored transaction log from the start
   */
  static replay(record: PortfolioRecord): PortfolioLedger {
    const ledger = PortfolioLedger.open({
      initialAmount: record.initialAmount,
      currency: record.currency,
      accountId: record.accountId,
      createdAt: record.createdAt,
    });

    for (const tx of record.transactions) {
      ledger.apply({
        id: tx.id,
        pair: tx.pair,
        side: tx.side,
        amount: tx.amount,
        price: tx.price,
        timestamp: tx.timestamp,
        reason: tx.reason ?? undefined,
      });
    }

    return ledger;
  }

  get cashBalance(): number {
    return this.cash;
  }

  /**
   * Validate and append a transaction, then update cash and the pair's position
   * @throws InvalidTransactionError for bad amounts, prices, pairs or a duplicate id
   * @throws InsufficientFundsError when a BUY exceeds the cash balance
   * @throws InsufficientHoldingsError when a SELL exceeds the open position
   */
  apply(request: TransactionRequest): Transaction {
    const pair = parsePair(request.pair);
    if (!pair) {
      throw new InvalidTransactionError(`Malformed pair "${request.pair}"`);
    }
    const foreign = foreignCurrency(pair, this.currency);
    if (foreign === null) {
      throw new InvalidTransactionError(`Pair ${pair.symbol} does not involve ledger currency ${this.currency}`);
    }
    if (!Number.isFinite(request.amount) || request.amount <= 0) {
      throw new InvalidTransactionError(`Amount must be positive (got ${request.amount})`);
    }
    if (!Number.isFinite(request.price) || request.price <= 0) {
      throw new InvalidTransactionError(`Price must be positive (got ${request.price})`);
    }
    const id = request.id ?? uuidv4();
    if (this.ids.has(id)) {
      throw new InvalidTransactionError(`Duplicate transaction id ${id}`);
    }

    const received = convert(pair, this.currency, request.side, request.amount, request.price);
    const realizedPnl =
      request.side === TradeSide.BUY
        ? this.applyBuy(pair, foreign, request.amount, request.price, received)
        : this.applySell(pair, foreign, request.amount, received);

    const transaction: Transaction = Object.freeze({
      id,
      pair: pair.symbol,
      side: request.side,
      amount: request.amount,
      price: request.price,
      timestamp: request.timestamp ?? Date.now(),
      currencyGiven: request.side === TradeSide.BUY ? this.currency : foreign,
      currencyReceived: request.side === TradeSide.BUY ? foreign : this.currency,
      amountReceived: received,
      realizedPnl,
      reason: request.reason ?? null,
    });

    this.log.push(transaction);
    this.ids.add(id);
    return transaction;
  }

  private applyBuy(pair: CurrencyPair, foreign: string, amount: number, price: number, received: number): null {
    if (amount > this.cash + LEDGER_TOLERANCE) {
      throw new InsufficientFundsError(this.currency, amount, this.cash);
    }
    this.cash = Math.max(0, this.cash - amount);

    const existing = this.positions.get(pair.symbol);
    if (existing) {
      const total = existing.amount + received;
      existing.averageEntryPrice = (existing.averageEntryPrice * existing.amount + price * received) / total;
      existing.amount = total;
      existing.costBasis += amount;
    } else {
      this.positions.set(pair.symbol, {
        pair,
        currency: foreign,
        amount: received,
        costBasis: amount,
        averageEntryPrice: price,
        markPrice: null,
        markedAt: null,
      });
    }
    return null;
  }

  private applySell(pair: CurrencyPair, foreign: string, amount: number, proceeds: number): number {
    const position = this.positions.get(pair.symbol);
    const held = position ? position.amount : 0;
    if (!position || amount > held + LEDGER_TOLERANCE) {
      throw new InsufficientHoldingsError(pair.symbol, foreign, amount, held);
    }

    let costSold: number;
    if (amount >= held - LEDGER_TOLERANCE) {
      // Whole position
      costSold = position.costBasis;
      this.positions.delete(pair.symbol);
    } else {
      costSold = position.costBasis * (amount / held);
      position.amount = held - amount;
      position.costBasis -= costSold;
    }

    const realized = proceeds - costSold;
    this.cash += proceeds;
    this.realizedByPair.set(pair.symbol, (this.realizedByPair.get(pair.symbol) ?? 0) + realized);
    return realized;
  }

  /**
   * Revalue the pair's open position at the quote's liquidation rate
   * Realized figures are untouched
   * @returns Unrealized P&L of the position, or null when none is open
   * @throws InvalidQuoteError when the quote is inconsistent or for another pair
   */
  markToMarket(pair: string, quote: Quote): number | null {
    assertValidQuote(quote);
    const parsed = parsePair(pair);
    const quoted = parsePair(quote.pair);
    if (!parsed || !quoted || parsed.symbol !== quoted.symbol) {
      throw new InvalidQuoteError(quote.pair, quote.bid, quote.ask);
    }

    const position = this.positions.get(parsed.symbol);
    if (!position) {
      return null;
    }

    position.markPrice = liquidationRate(position.pair, this.currency, quote);
    position.markedAt = quote.timestamp;
    return valueOf(position, this.currency) - position.costBasis;
  }

  position(pair: string): PositionView | null {
    const parsed = parsePair(pair);
    const position = parsed ? this.positions.get(parsed.symbol) : undefined;
    return position ? this.view(position) : null;
  }

  openPositions(): PositionView[] {
    return [...this.positions.values()].map((p) => this.view(p));
  }

  totalValue(): number {
    let total = this.cash;
    for (const position of this.positions.values()) {
      total += valueOf(position, this.currency);
    }
    return total;
  }

  /**
   * Read-only, frozen view of the account; no side effects
   */
  snapshot(takenAt: number = Date.now()): DeepReadonly<PortfolioSnapshot> {
    const positions = this.openPositions();
    const pairs = new Set<string>([...this.realizedByPair.keys(), ...positions.map((p) => p.pair)]);

    const breakdown: PairBreakdown[] = [...pairs].sort().map((pair) => {
      const position = positions.find((p) => p.pair === pair) ?? null;
      return {
        pair,
        realizedPnl: this.realizedByPair.get(pair) ?? 0,
        unrealizedPnl: position ? position.unrealizedPnl : 0,
        marketValue: position ? position.marketValue : 0,
        position,
      };
    });

    const realizedPnl = breakdown.reduce((sum, b) => sum + b.realizedPnl, 0);
    const unrealizedPnl = breakdown.reduce((sum, b) => sum + b.unrealizedPnl, 0);
    const totalValue = this.cash + positions.reduce((sum, p) => sum + p.marketValue, 0);
    const totalPnl = totalValue - this.initialValue;

    return deepFreeze<PortfolioSnapshot>({
      accountId: this.accountId,
      currency: this.currency,
      initialValue: this.initialValue,
      cashBalance: this.cash,
      totalValue,
      realizedPnl,
      unrealizedPnl,
      totalPnl,
      totalPnlPercent: (totalPnl / this.initialValue) * 100,
      positions,
      breakdown,
      transactionCount: this.log.length,
      takenAt,
    });
  }

  /**
   * Transaction log in application order
   */
  transactions(): readonly Transaction[] {
    return [...this.log];
  }

  toRecord(): PortfolioRecord {
    return {
      accountId: this.accountId,
      currency: this.currency,
      initialAmount: this.initialValue,
      createdAt: this.createdAt,
      transactions: this.log.map((tx) => ({ ...tx })),
    };
  }

  private view(position: PositionState): PositionView {
    const marketValue = valueOf(position, this.currency);
    return {
      pair: position.pair.symbol,
      currency: position.currency,
      amount: position.amount,
      costBasis: position.costBasis,
      averageEntryPrice: position.averageEntryPrice,
      markPrice: position.markPrice,
      markedAt: position.markedAt,
      marketValue,
      unrealizedPnl: marketValue - position.costBasis,
    };
  }
}
