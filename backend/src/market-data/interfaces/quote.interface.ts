/**
 * Latest bid/ask for a currency pair
 */
export interface Quote {
  pair: string;  // BASE/QUOTE, e.g. 'EUR/USD'
  bid: number;
  ask: number;
  timestamp: number; // Unix timestamp in ms
}
