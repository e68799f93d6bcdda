import { InvalidQuoteError } from '../common/errors/trading.errors';
import { Quote } from './interfaces';

const CURRENCY_CODE = /^[A-Z]{3}$/;

export interface CurrencyPair {
  base: string;
  quote: string;
  symbol: string; // 'BASE/QUOTE'
}

/**
 * Parse 'EUR/USD' (or 'eur/usd', ' EUR / USD ') into its two currency codes
 * @returns null when the text is not two distinct 3-letter codes
 */
export function parsePair(text: string): CurrencyPair | null {
  const parts = text.split('/').map((p) => p.trim().toUpperCase());
  if (parts.length !== 2) {
    return null;
  }

  const [base, quote] = parts;
  if (!CURRENCY_CODE.test(base) || !CURRENCY_CODE.test(quote) || base === quote) {
    return null;
  }

  return { base, quote, symbol: `${base}/${quote}` };
}

export function isCurrencyCode(code: string): boolean {
  return CURRENCY_CODE.test(code);
}

/**
 * Smallest standard increment: 0.01 for JPY-quoted pairs, 0.0001 otherwise
 */
export function pipSize(pair: CurrencyPair): number {
  return pair.quote === 'JPY' ? 0.01 : 0.0001;
}

/**
 * Spread in pips, rounded to one decimal (fractional pip)
 */
export function spreadPips(quote: Quote): number {
  const pair = parsePair(quote.pair);
  const size = pair ? pipSize(pair) : 0.0001;
  return Math.round(((quote.ask - quote.bid) / size) * 10) / 10;
}

export function midPrice(quote: Quote): number {
  return (quote.bid + quote.ask) / 2;
}

/**
 * Reject quotes the core cannot price against
 * @throws InvalidQuoteError when bid >= ask or either side is not a positive number
 */
export function assertValidQuote(quote: Quote): void {
  const { bid, ask } = quote;
  if (!Number.isFinite(bid) || !Number.isFinite(ask) || bid <= 0 || ask <= 0 || bid >= ask) {
    throw new InvalidQuoteError(quote.pair, bid, ask);
  }
}
