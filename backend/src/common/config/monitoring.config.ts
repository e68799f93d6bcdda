import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../errors/trading.errors';
import { isCurrencyCode, parsePair } from '../../market-data/currency-pair';
import { INTRADAY_INTERVALS, IntradayInterval } from '../../market-data/interfaces';

export type SeriesSource = 'daily' | 'intraday';

/**
 * Monitoring Loop Configuration
 */
export interface MonitoringConfig {
  /** Starting ledger balance */
  initialAmount: number;
  /** Ledger currency (3-letter code) */
  initialCurrency: string;
  /** Wall-clock seconds between ticks */
  intervalSeconds: number;
  /** Tracked pairs, BASE/QUOTE */
  pairs: string[];
  /** Mid-price move (percent) that raises a RateChange alert */
  significantChangePercent: number;
  /** Share of portfolio value one trade may spend (percent) */
  maxRiskPerTradePercent: number;
  /** Act on Buy/Sell signals; when off the loop only analyses and alerts */
  autoTrade: boolean;
  /** Bar series feeding the indicator engine */
  seriesSource: SeriesSource;
  intradayInterval: IntradayInterval;
  /** Re-fetch the bar series after this many seconds */
  seriesRefreshSeconds: number;
  /** Quotes older than this are not traded on */
  maxQuoteAgeSeconds: number;
  /** Cap for the rate-limit backoff sleep */
  maxBackoffSeconds: number;
  /** Resume a stored account by replaying its transaction log */
  resumeAccountId?: string;
}

/**
 * Default monitoring configuration
 */
export const DEFAULT_MONITORING_CONFIG: MonitoringConfig = {
  initialAmount: 10000,
  initialCurrency: 'USD',
  intervalSeconds: 60,
  pairs: ['USD/EUR', 'USD/GBP', 'USD/JPY', 'EUR/GBP', 'GBP/JPY', 'USD/CHF', 'USD/CAD', 'AUD/USD'],
  significantChangePercent: 0.5,
  maxRiskPerTradePercent: 10,
  autoTrade: true,
  seriesSource: 'daily',
  intradayInterval: '5min',
  seriesRefreshSeconds: 3600,
  maxQuoteAgeSeconds: 900,
  maxBackoffSeconds: 900,
};

function readNumber(configService: ConfigService, key: string, fallback: number): number {
  const raw = configService.get<string>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  return Number(raw);
}

function readIntradayInterval(raw: string | undefined, fallback: IntradayInterval): IntradayInterval {
  return INTRADAY_INTERVALS.find((interval) => interval === raw) ?? fallback;
}

/**
 * Build the monitoring defaults from MONITOR_* environment variables
 * Values are not validated here; see validateMonitoringConfig
 */
export function loadMonitoringConfig(configService: ConfigService): MonitoringConfig {
  const defaults = DEFAULT_MONITORING_CONFIG;
  const pairs = configService.get<string>('MONITOR_PAIRS');
  const source = configService.get<string>('MONITOR_SERIES_SOURCE');

  return {
    initialAmount: readNumber(configService, 'MONITOR_INITIAL_AMOUNT', defaults.initialAmount),
    initialCurrency: configService.get<string>('MONITOR_INITIAL_CURRENCY', defaults.initialCurrency),
    intervalSeconds: readNumber(configService, 'MONITOR_INTERVAL_SECONDS', defaults.intervalSeconds),
    pairs: pairs
      ? pairs
          .split(',')
          .map((p) => p.trim())
          .filter((p) => p.length > 0)
      : [...defaults.pairs],
    significantChangePercent: readNumber(
      configService,
      'MONITOR_SIGNIFICANT_CHANGE_PERCENT',
      defaults.significantChangePercent,
    ),
    maxRiskPerTradePercent: readNumber(
      configService,
      'MONITOR_MAX_RISK_PER_TRADE_PERCENT',
      defaults.maxRiskPerTradePercent,
    ),
    autoTrade: configService.get<string>('MONITOR_AUTO_TRADE', 'true') !== 'false',
    seriesSource: source === 'intraday' ? 'intraday' : defaults.seriesSource,
    intradayInterval: readIntradayInterval(
      configService.get<string>('MONITOR_INTRADAY_INTERVAL'),
      defaults.intradayInterval,
    ),
    seriesRefreshSeconds: readNumber(configService, 'MONITOR_SERIES_REFRESH_SECONDS', defaults.seriesRefreshSeconds),
    maxQuoteAgeSeconds: readNumber(configService, 'MONITOR_MAX_QUOTE_AGE_SECONDS', defaults.maxQuoteAgeSeconds),
    maxBackoffSeconds: readNumber(configService, 'MONITOR_MAX_BACKOFF_SECONDS', defaults.maxBackoffSeconds),
    resumeAccountId: configService.get<string>('MONITOR_RESUME_ACCOUNT_ID') || undefined,
  };
}

/**
 * Apply start-request overrides; undefined fields keep the base value
 */
export function mergeMonitoringConfig(base: MonitoringConfig, overrides: Partial<MonitoringConfig>): MonitoringConfig {
  return {
    initialAmount: overrides.initialAmount ?? base.initialAmount,
    initialCurrency: overrides.initialCurrency ?? base.initialCurrency,
    intervalSeconds: overrides.intervalSeconds ?? base.intervalSeconds,
    pairs: overrides.pairs ?? base.pairs,
    significantChangePercent: overrides.significantChangePercent ?? base.significantChangePercent,
    maxRiskPerTradePercent: overrides.maxRiskPerTradePercent ?? base.maxRiskPerTradePercent,
    autoTrade: overrides.autoTrade ?? base.autoTrade,
    seriesSource: overrides.seriesSource ?? base.seriesSource,
    intradayInterval: overrides.intradayInterval ?? base.intradayInterval,
    seriesRefreshSeconds: overrides.seriesRefreshSeconds ?? base.seriesRefreshSeconds,
    maxQuoteAgeSeconds: overrides.maxQuoteAgeSeconds ?? base.maxQuoteAgeSeconds,
    maxBackoffSeconds: overrides.maxBackoffSeconds ?? base.maxBackoffSeconds,
    resumeAccountId: overrides.resumeAccountId ?? base.resumeAccountId,
  };
}

/**
 * Validate a monitoring configuration before the first tick
 * @returns The configuration with pairs and currency normalized ('eur/usd' → 'EUR/USD')
 * @throws ConfigurationError listing every problem found
 */
export function validateMonitoringConfig(config: MonitoringConfig): MonitoringConfig {
  const issues: string[] = [];

  if (!Number.isFinite(config.initialAmount) || config.initialAmount <= 0) {
    issues.push(`initial amount must be a positive number (got ${config.initialAmount})`);
  }

  const currency = config.initialCurrency.trim().toUpperCase();
  if (!isCurrencyCode(currency)) {
    issues.push(`initial currency must be a 3-letter code (got "${config.initialCurrency}")`);
  }

  if (!Number.isFinite(config.intervalSeconds) || config.intervalSeconds < 1) {
    issues.push(`interval must be at least 1 second (got ${config.intervalSeconds})`);
  }

  const pairs: string[] = [];
  if (config.pairs.length === 0) {
    issues.push('at least one pair must be tracked');
  }
  for (const text of config.pairs) {
    const pair = parsePair(text);
    if (!pair) {
      issues.push(`malformed pair "${text}"`);
      continue;
    }
    if (pairs.includes(pair.symbol)) {
      issues.push(`duplicate pair ${pair.symbol}`);
      continue;
    }
    pairs.push(pair.symbol);
  }

  if (pairs.length > 0 && isCurrencyCode(currency)) {
    const tradable = pairs.some((symbol) => symbol.split('/').includes(currency));
    if (!tradable) {
      issues.push(`no tracked pair contains the portfolio currency ${currency}`);
    }
  }

  if (
    !Number.isFinite(config.maxRiskPerTradePercent) ||
    config.maxRiskPerTradePercent <= 0 ||
    config.maxRiskPerTradePercent > 100
  ) {
    issues.push(`max risk per trade must be in (0, 100] percent (got ${config.maxRiskPerTradePercent})`);
  }

  if (!Number.isFinite(config.significantChangePercent) || config.significantChangePercent <= 0) {
    issues.push(`significant change percent must be positive (got ${config.significantChangePercent})`);
  }

  for (const [name, value] of [
    ['series refresh', config.seriesRefreshSeconds],
    ['max quote age', config.maxQuoteAgeSeconds],
    ['max backoff', config.maxBackoffSeconds],
  ] as const) {
    if (!Number.isFinite(value) || value <= 0) {
      issues.push(`${name} seconds must be positive (got ${value})`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return { ...config, initialCurrency: currency, pairs };
}
