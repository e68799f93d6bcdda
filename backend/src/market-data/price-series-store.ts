import { PriceBar, Quote } from './interfaces';

export const DEFAULT_SERIES_CAPACITY = 500;

export interface AppendResult {
  appended: number;
  ignored: number;
}

export interface QuoteUpdate {
  current: Quote;
  previous: Quote | null;
}

/**
 * In-memory bar series and latest quotes per pair
 *
 * Stored bars are ascending with unique timestamps. Incoming bars that are not
 * newer than the last stored bar are ignored, so a stored bar never changes.
 */
export class PriceSeriesStore {
  private readonly series: Map<string, PriceBar[]> = new Map();
  private readonly quotes: Map<string, Quote> = new Map();

  constructor(private readonly capacity: number = DEFAULT_SERIES_CAPACITY) {}

  appendBars(pair: string, bars: PriceBar[]): AppendResult {
    const stored = this.series.get(pair) ?? [];
    const incoming = [...bars].sort((a, b) => a.timestamp - b.timestamp);

    let lastTimestamp = stored.length > 0 ? stored[stored.length - 1].timestamp : -Infinity;
    let appended = 0;

    for (const bar of incoming) {
      if (bar.timestamp <= lastTimestamp) {
        continue;
      }
      stored.push(Object.freeze({ ...bar }));
      lastTimestamp = bar.timestamp;
      appended++;
    }

    if (stored.length > this.capacity) {
      stored.splice(0, stored.length - this.capacity);
    }

    this.series.set(pair, stored);
    return { appended, ignored: bars.length - appended };
  }

  /**
   * @param count Number of most recent bars (all when omitted)
   * @returns Bars oldest first
   */
  getBars(pair: string, count?: number): PriceBar[] {
    const stored = this.series.get(pair) ?? [];
    return count === undefined ? [...stored] : stored.slice(-count);
  }

  barCount(pair: string): number {
    return this.series.get(pair)?.length ?? 0;
  }

  setQuote(quote: Quote): QuoteUpdate {
    const previous = this.quotes.get(quote.pair) ?? null;
    const current = Object.freeze({ ...quote });
    this.quotes.set(quote.pair, current);
    return { current, previous };
  }

  getQuote(pair: string): Quote | null {
    return this.quotes.get(pair) ?? null;
  }
}
