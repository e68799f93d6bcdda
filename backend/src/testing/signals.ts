import { SignalDirection, TradingSignal } from '../analysis/signal-generator';
import { CurrencyPair, parsePair } from '../market-data/currency-pair';

export function pairOf(text: string): CurrencyPair {
  const pair = parsePair(text);
  if (!pair) {
    throw new Error(`Bad test pair ${text}`);
  }
  return pair;
}

/**
 * Hand-built signal for policy and alert tests
 */
export function makeSignal(
  pair: string,
  direction: SignalDirection,
  strength: number,
  levels: { entryPrice?: number; stopLoss?: number; takeProfit?: number; confidence?: number } = {},
): TradingSignal {
  const sign = direction === SignalDirection.SELL ? -1 : 1;
  return {
    pair,
    direction,
    strength,
    confidence: levels.confidence ?? 90,
    score: sign * strength,
    entryPrice: levels.entryPrice ?? 1.1,
    stopLoss: levels.stopLoss ?? 1.09,
    takeProfit: levels.takeProfit ?? 1.12,
    reasoning: [],
    factors: [],
    generatedAt: 1000,
  };
}
