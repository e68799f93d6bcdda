import { SignalDirection, TradingSignal } from '../analysis/signal-generator';
import { midPrice } from '../market-data/currency-pair';
import { Quote } from '../market-data/interfaces';
import { AlertKind, AlertSeverity } from './interfaces';
import { NewAlert } from './alert.service';

/** Buy/Sell signals at or above this strength always alert */
export const STRONG_SIGNAL_STRENGTH = 50;

/**
 * Percent change of the mid price between two quotes
 */
export function midChangePercent(previous: Quote, current: Quote): number {
  const before = midPrice(previous);
  return ((midPrice(current) - before) / before) * 100;
}

/**
 * RateChange alert when the mid moved at least `thresholdPercent`
 * Warning from twice the threshold
 */
export function rateChangeAlert(
  previous: Quote | null,
  current: Quote,
  thresholdPercent: number,
): NewAlert | null {
  if (!previous) {
    return null;
  }

  const change = midChangePercent(previous, current);
  if (Math.abs(change) < thresholdPercent) {
    return null;
  }

  const direction = change > 0 ? 'up' : 'down';
  return {
    kind: AlertKind.RATE_CHANGE,
    pair: current.pair,
    severity: Math.abs(change) >= 2 * thresholdPercent ? AlertSeverity.WARNING : AlertSeverity.INFO,
    message: `${current.pair} moved ${direction} ${Math.abs(change).toFixed(2)}% (${midPrice(previous).toFixed(5)} → ${midPrice(current).toFixed(5)})`,
    timestamp: current.timestamp,
    data: { changePercent: change, previousMid: midPrice(previous), currentMid: midPrice(current) },
  };
}

/**
 * SignalTriggered alert for a strong Buy/Sell, or when the direction flipped
 */
export function signalAlert(previous: TradingSignal | null, signal: TradingSignal): NewAlert | null {
  const directional = signal.direction !== SignalDirection.HOLD;
  const strong = directional && signal.strength >= STRONG_SIGNAL_STRENGTH;
  const changed = previous !== null && previous.direction !== signal.direction;

  if (!strong && !changed) {
    return null;
  }

  const summary = `${signal.direction} ${signal.pair} (strength ${signal.strength.toFixed(1)}, confidence ${signal.confidence.toFixed(0)}%)`;
  return {
    kind: AlertKind.SIGNAL_TRIGGERED,
    pair: signal.pair,
    severity: strong ? AlertSeverity.WARNING : AlertSeverity.INFO,
    message: changed && previous ? `${summary}, was ${previous.direction}` : summary,
    timestamp: signal.generatedAt,
    data: {
      direction: signal.direction,
      strength: signal.strength,
      confidence: signal.confidence,
      entryPrice: signal.entryPrice,
      stopLoss: signal.stopLoss,
      takeProfit: signal.takeProfit,
      reasoning: [...signal.reasoning],
    },
  };
}
