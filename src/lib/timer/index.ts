import {
  addMinutes,
  diffMinutes,
  formatDuration,
  formatTimestamp,
  parseTimestamp,
} from '../clock/index.js';
import { StateError, ValidationError } from '../errors.js';
import {
  breakCycle,
  createTimer,
  cycleStart,
  isOpen,
  livePausedTotal,
  workCycle,
} from '../timeline/index.js';
import type { OutputMode, TimerState } from '../timeline/types.js';
import type { TimerAction, TimerActionType } from './types.js';

export type { TimerAction, TimerActionType } from './types.js';

// ---------------------------------------------------------------------------
// State transitions
// ---------------------------------------------------------------------------

/**
 * Open a cycle from stopped, or resume from paused.
 *
 * From stopped the gap since the last stop is recorded as a break. The very
 * first start sets the anchor. `backdateMinutes` moves the anchor earlier on
 * the first cycle and shortens the new break on later ones.
 */
export function startTimer(state: TimerState, now: Date, backdateMinutes = 0): TimerState {
  switch (state.status) {
    case 'running':
      return state;
    case 'paused':
      return resumeTimer(state, now, backdateMinutes);
    case 'stopped':
      return openCycle(state, now, backdateMinutes);
  }
}

/** Suspend the open cycle. `extraMinutes` backdates the start of the pause. */
export function pauseTimer(state: TimerState, now: Date, extraMinutes = 0): TimerState {
  if (state.status !== 'running') return state;

  if (extraMinutes > 0) {
    const elapsedSinceOpen = diffMinutes(cycleStart(state), now);
    if (state.livePausedMinutes + extraMinutes > elapsedSinceOpen) {
      throw new ValidationError('Cannot pause longer than currently elapsed time.');
    }
  }

  return {
    ...state,
    status: 'paused',
    pauseStartTime: formatTimestamp(addMinutes(now, -extraMinutes)),
  };
}

/**
 * Close the open cycle into a work entry. A timeline that already ends in work
 * (left behind by a drop-merge) absorbs the cycle instead of gaining a new entry.
 */
export function stopTimer(state: TimerState, now: Date): TimerState {
  if (!isOpen(state)) return state;

  const pausedTotal = livePausedTotal(state, now);
  const workMinutes = Math.max(0, diffMinutes(cycleStart(state), now) - pausedTotal);

  const last = state.timeline[state.timeline.length - 1];
  const timeline =
    last !== undefined && last.type === 'work'
      ? [
          ...state.timeline.slice(0, -1),
          workCycle(last.minutes + workMinutes, last.pausedMinutes + pausedTotal),
        ]
      : [...state.timeline, workCycle(workMinutes, pausedTotal)];

  return {
    ...state,
    status: 'stopped',
    timeline,
    livePausedMinutes: 0,
    pauseStartTime: null,
    lastStopTime: formatTimestamp(now),
  };
}

/** Stop, record a zero-minute break, and open the next cycle straight away. */
export function nextCycle(state: TimerState, now: Date): TimerState {
  if (!isOpen(state)) return state;

  const stopped = stopTimer(state, now);
  return {
    ...stopped,
    status: 'running',
    timeline: [...stopped.timeline, breakCycle(0)],
    lastStopTime: null,
  };
}

/** Discard everything but the output mode. */
export function resetTimer(mode: OutputMode): TimerState {
  return createTimer(mode);
}

export function setMode(state: TimerState, mode: OutputMode): TimerState {
  return { ...state, mode };
}

/** Apply a dispatched action. */
export function applyAction(state: TimerState, action: TimerAction): TimerState {
  switch (action.type) {
    case 'start':
      return startTimer(state, action.now, action.backdateMinutes);
    case 'pause':
      return pauseTimer(state, action.now, action.addMinutes);
    case 'stop':
      return stopTimer(state, action.now);
    case 'next':
      return nextCycle(state, action.now);
  }
}

/** Throw the informational StateError for an action the status does not allow. */
export function assertTransition(state: TimerState, action: TimerActionType): void {
  const message = invalidTransitionMessage(state, action);
  if (message !== null) {
    throw new StateError(message);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function invalidTransitionMessage(state: TimerState, action: TimerActionType): string | null {
  switch (action) {
    case 'start':
      return state.status === 'running' ? 'Already running.' : null;
    case 'pause':
      if (state.status === 'paused') return 'Timer already paused.';
      if (state.status === 'stopped') return 'Cannot pause stopped timer.';
      return null;
    case 'stop':
    case 'next':
      return state.status === 'stopped' ? 'Timer already stopped.' : null;
  }
}

function resumeTimer(state: TimerState, now: Date, backdateMinutes: number): TimerState {
  if (backdateMinutes > 0) {
    throw new ValidationError('Cannot backdate start time - no break to reduce.');
  }
  return {
    ...state,
    status: 'running',
    livePausedMinutes: livePausedTotal(state, now),
    pauseStartTime: null,
  };
}

function openCycle(state: TimerState, now: Date, backdateMinutes: number): TimerState {
  const running: TimerState = {
    ...state,
    status: 'running',
    livePausedMinutes: 0,
    pauseStartTime: null,
    lastStopTime: null,
  };

  if (state.anchorTime === null) {
    return { ...running, anchorTime: formatTimestamp(addMinutes(now, -backdateMinutes)) };
  }

  if (state.lastStopTime === null) {
    if (backdateMinutes > 0) {
      throw new ValidationError('Cannot backdate start time - no break to reduce.');
    }
    return running;
  }

  // A clock that went backwards yields an empty break, never a negative one.
  const breakMinutes = Math.max(0, diffMinutes(parseTimestamp(state.lastStopTime), now));
  if (backdateMinutes > breakMinutes) {
    throw new ValidationError(
      `Cannot reduce break below 0. Break was ${formatDuration(breakMinutes)}, ` +
        `tried to subtract ${formatDuration(backdateMinutes)}.`,
    );
  }

  return {
    ...running,
    timeline: [...state.timeline, breakCycle(breakMinutes - backdateMinutes)],
  };
}
