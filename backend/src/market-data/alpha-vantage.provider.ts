import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CustomLoggerService } from '../common/logging/custom-logger.service';
import {
  DataProviderError,
  DataProviderErrorKind,
  errorMessage,
  isAbortError,
} from '../common/errors/trading.errors';
import { CurrencyPair, parsePair } from './currency-pair';
import { IntradayInterval, MarketDataProvider, PriceBar, Quote, SeriesOutputSize } from './interfaces';
import { RateLimiterService } from './rate-limiter.service';

const DEFAULT_BASE_URL = 'https://www.alphavantage.co/query';
const RATE_LIMIT_RETRY_MS = 60 * 1000;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Alpha Vantage Market Data Provider
 * - CURRENCY_EXCHANGE_RATE for quotes
 * - FX_DAILY / FX_INTRADAY for bar series
 *
 * Alpha Vantage reports most failures with HTTP 200 and a message field
 * ('Error Message', 'Note', 'Information'); those are classified here.
 */
@Injectable()
export class AlphaVantageProvider implements MarketDataProvider {
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly rateLimiter: RateLimiterService,
    private readonly logger: CustomLoggerService,
  ) {
    this.apiKey = this.configService.get<string>('ALPHA_VANTAGE_API_KEY', '');
    this.baseUrl = this.configService.get<string>('ALPHA_VANTAGE_BASE_URL', DEFAULT_BASE_URL);
  }

  async getQuote(pair: string, signal?: AbortSignal): Promise<Quote> {
    const parsed = this.requirePair(pair);
    const body = await this.request(
      {
        function: 'CURRENCY_EXCHANGE_RATE',
        from_currency: parsed.base,
        to_currency: parsed.quote,
      },
      parsed.symbol,
      signal,
    );

    const rate = body['Realtime Currency Exchange Rate'];
    if (!isJsonObject(rate)) {
      throw this.malformed(parsed.symbol, 'missing "Realtime Currency Exchange Rate"');
    }

    this.requireUtc(rate['7. Time Zone'], parsed.symbol);
    const bid = this.readNumber(rate, '8. Bid Price', parsed.symbol);
    const ask = this.readNumber(rate, '9. Ask Price', parsed.symbol);
    const refreshed = rate['6. Last Refreshed'];
    const timestamp = typeof refreshed === 'string' ? parseUtcTimestamp(refreshed) : NaN;
    if (Number.isNaN(timestamp)) {
      throw this.malformed(parsed.symbol, 'invalid "6. Last Refreshed"');
    }

    return { pair: parsed.symbol, bid, ask, timestamp };
  }

  async getDailySeries(pair: string, outputSize: SeriesOutputSize, signal?: AbortSignal): Promise<PriceBar[]> {
    const parsed = this.requirePair(pair);
    const body = await this.request(
      {
        function: 'FX_DAILY',
        from_symbol: parsed.base,
        to_symbol: parsed.quote,
        outputsize: outputSize,
      },
      parsed.symbol,
      signal,
    );
    return this.parseSeries(body, 'Time Series FX (Daily)', parsed.symbol);
  }

  async getIntradaySeries(pair: string, interval: IntradayInterval, signal?: AbortSignal): Promise<PriceBar[]> {
    const parsed = this.requirePair(pair);
    const body = await this.request(
      {
        function: 'FX_INTRADAY',
        from_symbol: parsed.base,
        to_symbol: parsed.quote,
        interval,
        outputsize: 'compact',
      },
      parsed.symbol,
      signal,
    );
    return this.parseSeries(body, `Time Series FX (${interval})`, parsed.symbol);
  }

  /**
   * Perform one rate-limited request and classify failures
   */
  private async request(params: Record<string, string>, pair: string, signal?: AbortSignal): Promise<JsonObject> {
    if (!this.apiKey) {
      throw new DataProviderError(DataProviderErrorKind.AUTH_FAILED, 'ALPHA_VANTAGE_API_KEY is not configured', pair);
    }

    await this.rateLimiter.acquire(signal);

    const query = new URLSearchParams({ ...params, apikey: this.apiKey });
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}?${query.toString()}`, { signal });
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      this.logger.warn(`Network error fetching ${params.function} for ${pair}: ${errorMessage(error)}`, 'AlphaVantage');
      throw new DataProviderError(DataProviderErrorKind.NETWORK, `Network error: ${errorMessage(error)}`, pair);
    }

    if (!response.ok) {
      throw this.fromHttpStatus(response.status, pair);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw this.malformed(pair, 'response is not JSON');
    }

    if (!isJsonObject(body)) {
      throw this.malformed(pair, 'response is not an object');
    }

    this.checkApiMessages(body, pair);
    return body;
  }

  private fromHttpStatus(status: number, pair: string): DataProviderError {
    switch (status) {
      case 401:
      case 403:
        return new DataProviderError(DataProviderErrorKind.AUTH_FAILED, `Authentication failed (HTTP ${status})`, pair);
      case 429:
        return new DataProviderError(
          DataProviderErrorKind.RATE_LIMITED,
          'Rate limit exceeded (HTTP 429)',
          pair,
          RATE_LIMIT_RETRY_MS,
        );
      case 404:
        return new DataProviderError(DataProviderErrorKind.NOT_FOUND, 'Endpoint not found (HTTP 404)', pair);
      default:
        return new DataProviderError(DataProviderErrorKind.NETWORK, `Request failed (HTTP ${status})`, pair);
    }
  }

  /**
   * Alpha Vantage error payloads arrive with HTTP 200
   */
  private checkApiMessages(body: JsonObject, pair: string): void {
    const errorText = body['Error Message'];
    if (typeof errorText === 'string') {
      if (/api ?key/i.test(errorText)) {
        throw new DataProviderError(DataProviderErrorKind.AUTH_FAILED, errorText, pair);
      }
      throw new DataProviderError(DataProviderErrorKind.NOT_FOUND, errorText, pair);
    }

    for (const field of ['Note', 'Information']) {
      const note = body[field];
      if (typeof note !== 'string') {
        continue;
      }
      if (/call frequency|rate limit|requests per/i.test(note)) {
        throw new DataProviderError(DataProviderErrorKind.RATE_LIMITED, note, pair, RATE_LIMIT_RETRY_MS);
      }
      if (/api ?key|premium/i.test(note)) {
        throw new DataProviderError(DataProviderErrorKind.AUTH_FAILED, note, pair);
      }
      // Informational notes may accompany a valid payload
    }
  }

  private parseSeries(body: JsonObject, key: string, pair: string): PriceBar[] {
    const meta = body['Meta Data'];
    if (isJsonObject(meta)) {
      const zoneKey = Object.keys(meta).find((k) => k.endsWith('Time Zone'));
      if (zoneKey) {
        this.requireUtc(meta[zoneKey], pair);
      }
    }

    const series = body[key];
    if (!isJsonObject(series)) {
      throw this.malformed(pair, `missing "${key}"`);
    }

    const bars: PriceBar[] = [];
    for (const [time, values] of Object.entries(series)) {
      if (!isJsonObject(values)) {
        throw this.malformed(pair, `bar ${time} is not an object`);
      }
      const timestamp = parseUtcTimestamp(time);
      if (Number.isNaN(timestamp)) {
        throw this.malformed(pair, `bar time "${time}" is not a date`);
      }
      bars.push({
        timestamp,
        open: this.readNumber(values, '1. open', pair),
        high: this.readNumber(values, '2. high', pair),
        low: this.readNumber(values, '3. low', pair),
        close: this.readNumber(values, '4. close', pair),
      });
    }

    // Alpha Vantage lists newest first
    return bars.sort((a, b) => a.timestamp - b.timestamp);
  }

  private readNumber(source: JsonObject, field: string, pair: string): number {
    const raw = source[field];
    const value = typeof raw === 'string' ? Number(raw) : NaN;
    if (!Number.isFinite(value)) {
      throw this.malformed(pair, `"${field}" is not a number`);
    }
    return value;
  }

  /**
   * Timestamps are read as UTC; any other reported zone is rejected
   * An absent zone is taken as UTC
   */
  private requireUtc(zone: unknown, pair: string): void {
    if (zone === undefined || (typeof zone === 'string' && zone.trim().toUpperCase() === 'UTC')) {
      return;
    }
    throw this.malformed(pair, `unsupported time zone "${String(zone)}"`);
  }

  private requirePair(pair: string): CurrencyPair {
    const parsed = parsePair(pair);
    if (!parsed) {
      throw new DataProviderError(DataProviderErrorKind.NOT_FOUND, `Unknown currency pair "${pair}"`, pair);
    }
    return parsed;
  }

  private malformed(pair: string, detail: string): DataProviderError {
    return new DataProviderError(DataProviderErrorKind.MALFORMED, `Malformed response for ${pair}: ${detail}`, pair);
  }
}

/**
 * Parse 'YYYY-MM-DD' or 'YYYY-MM-DD HH:mm:ss' as UTC
 */
export function parseUtcTimestamp(text: string): number {
  const trimmed = text.trim();
  if (/^\d{4}-\d{2}-\d{2}$/.test(trimmed)) {
    return Date.parse(`${trimmed}T00:00:00Z`);
  }
  if (/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}(:\d{2})?$/.test(trimmed)) {
    return Date.parse(`${trimmed.replace(' ', 'T')}Z`);
  }
  return NaN;
}
