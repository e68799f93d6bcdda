import { MonitorState } from './state-machine/monitor-state';

/**
 * Event bus names (EventEmitter2)
 */
export const MONITOR_EVENTS = {
  ALERT_RAISED: 'alert.raised',
  TICK_COMPLETED: 'monitor.tick',
  STATE_CHANGED: 'monitor.state',
} as const;

/**
 * Payload of MONITOR_EVENTS.STATE_CHANGED
 */
export interface MonitorStateChange {
  from: MonitorState;
  to: MonitorState;
  tick: number;
}
