import { SignalDirection } from '../analysis/signal-generator';
import { makeQuote } from '../testing/price-bars';
import { makeSignal } from '../testing/signals';
import { midChangePercent, rateChangeAlert, signalAlert } from './alert-rules';
import { AlertKind, AlertSeverity } from './interfaces';

describe('rateChangeAlert', () => {
  const before = makeQuote('EUR/USD', 1.0999, 1.1001, 0);

  it('needs a previous quote', () => {
    expect(rateChangeAlert(null, before, 0.5)).toBeNull();
  });

  it('ignores moves below the threshold', () => {
    const after = makeQuote('EUR/USD', 1.1029, 1.1031, 1);

    expect(midChangePercent(before, after)).toBeCloseTo(0.2727, 4);
    expect(rateChangeAlert(before, after, 0.5)).toBeNull();
  });

  it('raises an Info alert at the threshold', () => {
    const after = makeQuote('EUR/USD', 1.1065, 1.1067, 60000);

    const alert = rateChangeAlert(before, after, 0.5);

    expect(alert).toMatchObject({
      kind: AlertKind.RATE_CHANGE,
      pair: 'EUR/USD',
      severity: AlertSeverity.INFO,
      message: 'EUR/USD moved up 0.60% (1.10000 → 1.10660)',
      timestamp: 60000,
    });
  });

  it('escalates to Warning from twice the threshold', () => {
    const after = makeQuote('EUR/USD', 1.0867, 1.0869, 60000);

    const alert = rateChangeAlert(before, after, 0.5);

    expect(alert?.severity).toBe(AlertSeverity.WARNING);
    expect(alert?.message).toBe('EUR/USD moved down 1.20% (1.10000 → 1.08680)');
  });
});

describe('signalAlert', () => {
  it('alerts on a strong directional signal', () => {
    const alert = signalAlert(null, makeSignal('EUR/USD', SignalDirection.BUY, 60));

    expect(alert).toMatchObject({
      kind: AlertKind.SIGNAL_TRIGGERED,
      severity: AlertSeverity.WARNING,
      message: 'Buy EUR/USD (strength 60.0, confidence 90%)',
      timestamp: 1000,
    });
  });

  it('alerts with Info when the direction changes', () => {
    const previous = makeSignal('EUR/USD', SignalDirection.BUY, 30);
    const alert = signalAlert(previous, makeSignal('EUR/USD', SignalDirection.HOLD, 5, { confidence: 30 }));

    expect(alert?.severity).toBe(AlertSeverity.INFO);
    expect(alert?.message).toBe('Hold EUR/USD (strength 5.0, confidence 30%), was Buy');
  });

  it('stays quiet for weak signals that keep their direction', () => {
    expect(signalAlert(null, makeSignal('EUR/USD', SignalDirection.SELL, 25))).toBeNull();
    expect(
      signalAlert(makeSignal('EUR/USD', SignalDirection.SELL, 22), makeSignal('EUR/USD', SignalDirection.SELL, 25)),
    ).toBeNull();
  });

  it('never treats a Hold as strong', () => {
    expect(signalAlert(null, makeSignal('EUR/USD', SignalDirection.HOLD, 15))).toBeNull();
  });
});
