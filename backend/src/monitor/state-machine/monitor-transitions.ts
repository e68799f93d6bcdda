import { MonitorEvent, MonitorState, MonitorStateContext } from './monitor-state';

/**
 * State transition result
 */
export interface MonitorTransitionResult {
  /** New state after transition */
  newState: MonitorState;

  /** Whether transition occurred */
  transitioned: boolean;

  /** Updated context */
  context: MonitorStateContext;
}

type TransitionFn = (ctx: MonitorStateContext, now: number) => MonitorTransitionResult;

function to(state: MonitorState, nextTick = false): TransitionFn {
  return (ctx, now) => ({
    newState: state,
    transitioned: true,
    context: {
      ...ctx,
      state,
      tick: nextTick ? ctx.tick + 1 : ctx.tick,
      enteredAt: now,
    },
  });
}

const stop: TransitionFn = (ctx, now) => ({
  newState: MonitorState.IDLE,
  transitioned: true,
  context: { ...ctx, state: MonitorState.IDLE, enteredAt: now },
});

/**
 * State transition table
 * Defines valid transitions; anything else is ignored
 */
const transitionTable: Record<MonitorState, Partial<Record<MonitorEvent, TransitionFn>>> = {
  [MonitorState.IDLE]: {
    [MonitorEvent.START]: (_ctx, now) => ({
      newState: MonitorState.POLLING,
      transitioned: true,
      context: { state: MonitorState.POLLING, tick: 1, enteredAt: now },
    }),
  },

  [MonitorState.POLLING]: {
    [MonitorEvent.DATA_FETCHED]: to(MonitorState.ANALYZING),
    [MonitorEvent.STOP]: stop,
  },

  [MonitorState.ANALYZING]: {
    [MonitorEvent.ANALYSIS_DONE]: to(MonitorState.DECIDING),
    [MonitorEvent.STOP]: stop,
  },

  [MonitorState.DECIDING]: {
    [MonitorEvent.EXECUTE]: to(MonitorState.EXECUTING),
    [MonitorEvent.SKIP_EXECUTION]: to(MonitorState.ALERTING),
    [MonitorEvent.STOP]: stop,
  },

  [MonitorState.EXECUTING]: {
    [MonitorEvent.EXECUTION_DONE]: to(MonitorState.ALERTING),
  },

  [MonitorState.ALERTING]: {
    [MonitorEvent.ALERTS_EMITTED]: to(MonitorState.SLEEPING),
    [MonitorEvent.STOP]: stop,
  },

  [MonitorState.SLEEPING]: {
    [MonitorEvent.WAKE]: to(MonitorState.POLLING, true),
    [MonitorEvent.STOP]: stop,
  },
};

/**
 * Process a state transition
 * @param context Current state context
 * @param event Event to process
 * @returns Transition result; unchanged context when the event is not valid in this state
 */
export function processMonitorTransition(
  context: MonitorStateContext,
  event: MonitorEvent,
  now: number = Date.now(),
): MonitorTransitionResult {
  const transitionFn = transitionTable[context.state][event];

  if (!transitionFn) {
    return {
      newState: context.state,
      transitioned: false,
      context,
    };
  }

  return transitionFn(context, now);
}
