import { PriceBar, Quote } from '../market-data/interfaces';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const START_MS = Date.UTC(2024, 0, 1);

/**
 * Bars from closes: open = previous close, high/low = close ± halfRange
 */
export function makeBars(closes: readonly number[], halfRange = 0.0005, start = START_MS, stepMs = DAY_MS): PriceBar[] {
  return closes.map((close, i) => ({
    timestamp: start + i * stepMs,
    open: i === 0 ? close : closes[i - 1],
    high: close + halfRange,
    low: close - halfRange,
    close,
  }));
}

/**
 * Closes rising from `from` in fixed steps, rounded to 4 decimals
 */
export function rampCloses(count: number, from = 1.1, step = 0.001): number[] {
  return Array.from({ length: count }, (_, i) => Number((from + i * step).toFixed(4)));
}

/**
 * Deterministic random walk (LCG), for property-style checks
 */
export function randomWalkCloses(count: number, seed: number, start = 1.1, volatility = 0.004): number[] {
  let state = seed >>> 0;
  const next = () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };

  const closes: number[] = [];
  let price = start;
  for (let i = 0; i < count; i++) {
    price = Math.max(0.0001, price * (1 + (next() - 0.5) * 2 * volatility));
    closes.push(price);
  }
  return closes;
}

export function makeQuote(pair: string, bid: number, ask: number, timestamp = START_MS): Quote {
  return { pair, bid, ask, timestamp };
}
