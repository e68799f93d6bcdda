import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { v4 as uuidv4 } from 'uuid';
import { Alert, AlertKind, AlertSeverity } from './interfaces';
import { MONITOR_EVENTS } from './monitor.events';

export const ALERT_CHANNEL_CAPACITY = 500;

export interface AlertChannelStatus {
  queued: number;
  dropped: number;
  capacity: number;
}

export interface NewAlert {
  kind: AlertKind;
  pair: string;
  message: string;
  severity: AlertSeverity;
  timestamp?: number;
  data?: Record<string, unknown>;
}

/**
 * Alert Channel
 * Bounded queue of recent alerts (oldest dropped first); every alert is
 * also emitted on the event bus for push delivery.
 */
@Injectable()
export class AlertService {
  private readonly queue: Alert[] = [];
  private dropped = 0;

  constructor(private readonly eventEmitter: EventEmitter2) {}

  static create(input: NewAlert): Alert {
    return Object.freeze({
      id: uuidv4(),
      kind: input.kind,
      pair: input.pair,
      message: input.message,
      severity: input.severity,
      timestamp: input.timestamp ?? Date.now(),
      data: input.data,
    });
  }

  publish(alert: Alert): void {
    this.queue.push(alert);
    if (this.queue.length > ALERT_CHANNEL_CAPACITY) {
      this.queue.shift();
      this.dropped++;
    }
    this.eventEmitter.emit(MONITOR_EVENTS.ALERT_RAISED, alert);
  }

  /**
   * Most recent alerts, oldest first
   */
  recent(limit: number = 50): Alert[] {
    return limit > 0 ? this.queue.slice(-limit) : [];
  }

  getStatus(): AlertChannelStatus {
    return { queued: this.queue.length, dropped: this.dropped, capacity: ALERT_CHANNEL_CAPACITY };
  }
}
