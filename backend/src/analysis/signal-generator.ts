import { deepFreeze, DeepReadonly } from '../common/utils/deep-freeze';
import { assertValidQuote } from '../market-data/currency-pair';
import { PriceBar, Quote } from '../market-data/interfaces';
import { computeIndicators, IndicatorSet } from './indicator-engine';
import { SIGNAL_CONFIG, SignalConfig } from './signal.config';

export enum SignalDirection {
  BUY = 'Buy',
  SELL = 'Sell',
  HOLD = 'Hold',
}

export type SignalFactorName = 'RSI' | 'MACD' | 'Trend';

export interface SignalFactor {
  name: SignalFactorName;
  /** Raw factor score in [-100, 100] */
  value: number;
  /** Weighted share of the net score */
  contribution: number;
  description: string;
}

export interface TradingSignalValues {
  pair: string;
  direction: SignalDirection;
  /** |score|, in [0, 100] */
  strength: number;
  /** In [0, 100] */
  confidence: number;
  /** Net weighted score in [-100, 100] */
  score: number;
  entryPrice: number;
  stopLoss: number;
  takeProfit: number;
  /** Contributing factors, heaviest first */
  reasoning: string[];
  factors: SignalFactor[];
  generatedAt: number;
}

export type TradingSignal = DeepReadonly<TradingSignalValues>;

export interface SignalOptions {
  config?: SignalConfig;
  generatedAt?: number;
}

/**
 * RSI factor: oversold is bullish, overbought bearish, in between scaled by distance from 50
 */
export function rsiFactor(rsi: number, config: SignalConfig = SIGNAL_CONFIG): number {
  const { oversold, overbought } = config.rsi;

  if (rsi < oversold) {
    return 50 + ((oversold - rsi) / oversold) * 50;
  }
  if (rsi > overbought) {
    return -(50 + ((rsi - overbought) / (100 - overbought)) * 50);
  }
  return (50 - rsi) * (50 / (50 - oversold));
}

/**
 * MACD factor: direction of the histogram, scaled by its size relative to ATR
 */
export function macdFactor(histogram: number, atr: number): number {
  if (histogram === 0) {
    return 0;
  }
  const sign = Math.sign(histogram);
  if (atr <= 0) {
    return sign * 100;
  }
  return sign * Math.min(100, 50 + (50 * Math.abs(histogram)) / atr);
}

export function trendFactor(emaFast: number, emaSlow: number): number {
  if (emaFast > emaSlow) return 100;
  if (emaFast < emaSlow) return -100;
  return 0;
}

function formatContribution(contribution: number): string {
  const sign = contribution > 0 ? '+' : '';
  return `${sign}${contribution.toFixed(1)}`;
}

function describeRsi(rsi: number, config: SignalConfig): string {
  const value = rsi.toFixed(1);
  if (rsi < config.rsi.oversold) {
    return `RSI ${value} is oversold (below ${config.rsi.oversold}): bullish`;
  }
  if (rsi > config.rsi.overbought) {
    return `RSI ${value} is overbought (above ${config.rsi.overbought}): bearish`;
  }
  return rsi < 50 ? `RSI ${value} is below the 50 midline: mildly bullish` : `RSI ${value} is above the 50 midline: mildly bearish`;
}

function describeMacd(histogram: number): string {
  const size = Math.abs(histogram).toPrecision(3);
  return histogram > 0
    ? `MACD line above signal line (histogram +${size}): bullish momentum`
    : `MACD line below signal line (histogram -${size}): bearish momentum`;
}

function describeTrend(emaFast: number, emaSlow: number): string {
  return emaFast > emaSlow ? 'EMA12 above EMA26: uptrend confirmed' : 'EMA12 below EMA26: downtrend confirmed';
}

/**
 * Score the three factors
 * @returns Factors in RSI, MACD, trend order
 */
export function scoreFactors(indicators: IndicatorSet, config: SignalConfig = SIGNAL_CONFIG): SignalFactor[] {
  const r = rsiFactor(indicators.rsi, config);
  const m = macdFactor(indicators.macd.histogram, indicators.atr14);
  const t = trendFactor(indicators.ema12, indicators.ema26);

  return [
    {
      name: 'RSI',
      value: r,
      contribution: r * config.weights.rsi,
      description: describeRsi(indicators.rsi, config),
    },
    {
      name: 'MACD',
      value: m,
      contribution: m * config.weights.macd,
      description: describeMacd(indicators.macd.histogram),
    },
    {
      name: 'Trend',
      value: t,
      contribution: t * config.weights.trend,
      description: describeTrend(indicators.ema12, indicators.ema26),
    },
  ];
}

interface ExitLevels {
  entryPrice: number;
  stopLoss: number;
  takeProfit: number;
}

/**
 * Entry and exit levels for one side, from the volatility width max(ATR, spread)
 * The stop is pulled in to the Bollinger band on the stop side when that band lies inside it
 */
export function calculateExitLevels(
  indicators: IndicatorSet,
  quote: Quote,
  long: boolean,
  config: SignalConfig = SIGNAL_CONFIG,
): ExitLevels {
  const width = Math.max(indicators.atr14, quote.ask - quote.bid);
  const { lower, upper } = indicators.bollinger;

  if (long) {
    const entryPrice = quote.ask;
    let stopLoss = entryPrice - config.exits.stopLossWidth * width;
    if (lower > stopLoss && lower < entryPrice) {
      stopLoss = lower;
    }
    return { entryPrice, stopLoss, takeProfit: entryPrice + config.exits.takeProfitWidth * width };
  }

  const entryPrice = quote.bid;
  let stopLoss = entryPrice + config.exits.stopLossWidth * width;
  if (upper < stopLoss && upper > entryPrice) {
    stopLoss = upper;
  }
  return { entryPrice, stopLoss, takeProfit: entryPrice - config.exits.takeProfitWidth * width };
}

/**
 * Combine an IndicatorSet and the current quote into one TradingSignal
 * @throws InvalidQuoteError when bid >= ask or either side is not positive
 */
export function generateSignal(indicators: IndicatorSet, quote: Quote, options: SignalOptions = {}): TradingSignal {
  const config = options.config ?? SIGNAL_CONFIG;
  assertValidQuote(quote);

  const factors = scoreFactors(indicators, config);
  const score = factors.reduce((sum, f) => sum + f.contribution, 0);

  let direction = SignalDirection.HOLD;
  if (score > config.thresholds.buy) {
    direction = SignalDirection.BUY;
  } else if (score < config.thresholds.sell) {
    direction = SignalDirection.SELL;
  }

  const scoreSign = Math.sign(score);
  const agreeing = scoreSign === 0 ? 0 : factors.filter((f) => Math.sign(f.value) === scoreSign).length;
  const confidence = (config.baseConfidence * agreeing) / factors.length;

  // Hold signals carry the levels of the side the score leans to
  const long = direction === SignalDirection.BUY || (direction === SignalDirection.HOLD && score >= 0);
  const levels = calculateExitLevels(indicators, quote, long, config);

  // Stable sort keeps RSI, MACD, trend order on ties
  const contributing = factors
    .filter((f) => f.contribution !== 0)
    .sort((a, b) => Math.abs(b.contribution) - Math.abs(a.contribution));
  const reasoning =
    contributing.length > 0
      ? contributing.map((f) => `${f.description} (${formatContribution(f.contribution)})`)
      : ['No indicator favours either direction: neutral'];

  return deepFreeze<TradingSignalValues>({
    pair: indicators.pair,
    direction,
    strength: Math.abs(score),
    confidence,
    score,
    ...levels,
    reasoning,
    factors,
    generatedAt: options.generatedAt ?? Date.now(),
  });
}

/**
 * Indicators and signal from a bar series in one step
 * @throws InsufficientDataError when the series is too short for a full IndicatorSet
 * @throws InvalidQuoteError when the quote is inconsistent
 */
export function analyzeSeries(
  pair: string,
  bars: readonly PriceBar[],
  quote: Quote,
  options: SignalOptions = {},
): { indicators: IndicatorSet; signal: TradingSignal } {
  const indicators = computeIndicators(pair, bars);
  return { indicators, signal: generateSignal(indicators, quote, options) };
}
