/**
 * Monitoring Loop State Machine
 *
 * State flow per tick:
 * IDLE → POLLING → ANALYZING → DECIDING → EXECUTING → ALERTING → SLEEPING → POLLING ...
 *
 * EXECUTING is skipped when the tick has no ledger write to make.
 * IDLE is re-entered only on an explicit stop.
 */

export enum MonitorState {
  /** Not running */
  IDLE = 'IDLE',

  /** Fetching quotes and bar series for every tracked pair */
  POLLING = 'POLLING',

  /** Computing indicator sets */
  ANALYZING = 'ANALYZING',

  /** Generating signals and execution decisions */
  DECIDING = 'DECIDING',

  /** Single writer phase: marking and trading on the ledger */
  EXECUTING = 'EXECUTING',

  /** Publishing the tick's alerts */
  ALERTING = 'ALERTING',

  /** Waiting for the next tick */
  SLEEPING = 'SLEEPING',
}

export enum MonitorEvent {
  START = 'START',
  DATA_FETCHED = 'DATA_FETCHED',
  ANALYSIS_DONE = 'ANALYSIS_DONE',
  /** Decisions include a ledger write */
  EXECUTE = 'EXECUTE',
  /** Nothing to write this tick */
  SKIP_EXECUTION = 'SKIP_EXECUTION',
  EXECUTION_DONE = 'EXECUTION_DONE',
  ALERTS_EMITTED = 'ALERTS_EMITTED',
  WAKE = 'WAKE',
  STOP = 'STOP',
}

export interface MonitorStateContext {
  state: MonitorState;

  /** Ticks started since the loop was started */
  tick: number;

  /** Unix ms of the last transition */
  enteredAt: number;
}

export function createInitialMonitorContext(now: number = Date.now()): MonitorStateContext {
  return {
    state: MonitorState.IDLE,
    tick: 0,
    enteredAt: now,
  };
}

/**
 * States in which an external stop is honoured
 * EXECUTING is absent: a ledger write phase always completes
 */
export function isStoppable(context: MonitorStateContext): boolean {
  return context.state !== MonitorState.IDLE && context.state !== MonitorState.EXECUTING;
}

export function isRunningState(state: MonitorState): boolean {
  return state !== MonitorState.IDLE;
}
