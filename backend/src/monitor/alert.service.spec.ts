import { EventEmitter2 } from '@nestjs/event-emitter';
import { ALERT_CHANNEL_CAPACITY, AlertService } from './alert.service';
import { Alert, AlertKind, AlertSeverity } from './interfaces';
import { MONITOR_EVENTS } from './monitor.events';

function alertFor(pair: string, timestamp: number): Alert {
  return AlertService.create({
    kind: AlertKind.RATE_CHANGE,
    pair,
    message: `${pair} moved`,
    severity: AlertSeverity.INFO,
    timestamp,
  });
}

describe('AlertService', () => {
  let eventEmitter: EventEmitter2;
  let service: AlertService;

  beforeEach(() => {
    eventEmitter = new EventEmitter2();
    service = new AlertService(eventEmitter);
  });

  it('creates frozen alerts with unique ids', () => {
    const a = alertFor('EUR/USD', 1);
    const b = alertFor('EUR/USD', 1);

    expect(a.id).not.toBe(b.id);
    expect(Object.isFrozen(a)).toBe(true);
    expect(a.timestamp).toBe(1);
  });

  it('queues and emits every published alert', () => {
    const received: Alert[] = [];
    eventEmitter.on(MONITOR_EVENTS.ALERT_RAISED, (alert: Alert) => received.push(alert));

    const alert = alertFor('USD/JPY', 5);
    service.publish(alert);

    expect(received).toEqual([alert]);
    expect(service.recent()).toEqual([alert]);
  });

  it('drops the oldest alerts beyond capacity', () => {
    for (let i = 0; i < ALERT_CHANNEL_CAPACITY + 3; i++) {
      service.publish(alertFor('EUR/USD', i));
    }

    expect(service.getStatus()).toEqual({ queued: ALERT_CHANNEL_CAPACITY, dropped: 3, capacity: ALERT_CHANNEL_CAPACITY });
    expect(service.recent(1)[0].timestamp).toBe(ALERT_CHANNEL_CAPACITY + 2);
    expect(service.recent(ALERT_CHANNEL_CAPACITY)[0].timestamp).toBe(3);
  });

  it('returns nothing for a non-positive limit', () => {
    service.publish(alertFor('EUR/USD', 1));

    expect(service.recent(0)).toEqual([]);
  });
});
