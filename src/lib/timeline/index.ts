import { addMinutes, diffMinutes, parseTimestamp } from '../clock/index.js';
import { StateError } from '../errors.js';
import type {
  BreakCycle,
  Cycle,
  EntryBoundary,
  OutputMode,
  TimelineTotals,
  TimerState,
  WorkCycle,
} from './types.js';

export type {
  Cycle,
  WorkCycle,
  BreakCycle,
  TimerState,
  TimerStatus,
  OutputMode,
  EntryBoundary,
  TimelineTotals,
  Direction,
} from './types.js';

export { OUTPUT_MODES } from './types.js';

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Create an empty, stopped timer with no anchor. */
export function createTimer(mode: OutputMode = 'silent'): TimerState {
  return {
    status: 'stopped',
    anchorTime: null,
    timeline: [],
    livePausedMinutes: 0,
    pauseStartTime: null,
    lastStopTime: null,
    mode,
  };
}

// ---------------------------------------------------------------------------
// Cycle helpers
// ---------------------------------------------------------------------------

export function workCycle(minutes: number, pausedMinutes = 0): WorkCycle {
  return { type: 'work', minutes, pausedMinutes };
}

export function breakCycle(minutes: number): BreakCycle {
  return { type: 'break', minutes };
}

/** Wall-clock minutes the cycle spans. */
export function elapsed(cycle: Cycle): number {
  switch (cycle.type) {
    case 'work':
      return cycle.minutes + cycle.pausedMinutes;
    case 'break':
      return cycle.minutes;
  }
}

/** Minutes the cycle advances the projected timeline by. */
export function duration(cycle: Cycle): number {
  return elapsed(cycle);
}

/** True while a cycle is open (running or paused). */
export function isOpen(timer: TimerState): boolean {
  return timer.status === 'running' || timer.status === 'paused';
}

// ---------------------------------------------------------------------------
// Projection
// ---------------------------------------------------------------------------

/** The anchor as a Date. Throws when the timer has never been started. */
export function anchorOf(timer: TimerState): Date {
  if (timer.anchorTime === null) {
    throw new StateError('No day start recorded.');
  }
  return parseTimestamp(timer.anchorTime);
}

/**
 * Start of the open (or next) cycle: the anchor advanced by every completed
 * cycle's duration. Recomputed from scratch on every call.
 */
export function cycleStart(timer: TimerState): Date {
  const minutes = timer.timeline.reduce((sum, cycle) => sum + duration(cycle), 0);
  return addMinutes(anchorOf(timer), minutes);
}

/** Start and end of every completed cycle, in order. */
export function entryBoundaries(timer: TimerState): EntryBoundary[] {
  const boundaries: EntryBoundary[] = [];
  let start = anchorOf(timer);
  timer.timeline.forEach((cycle, i) => {
    const end = addMinutes(start, duration(cycle));
    boundaries.push({ index: i + 1, cycle, start, end });
    start = end;
  });
  return boundaries;
}

/** Pause minutes of the open cycle, including a pause still in progress. */
export function livePausedTotal(timer: TimerState, now: Date): number {
  switch (timer.status) {
    case 'stopped':
      return 0;
    case 'running':
      return timer.livePausedMinutes;
    case 'paused':
      return timer.livePausedMinutes + currentPauseMinutes(timer, now);
  }
}

/** Work minutes of the open cycle. Zero while stopped, never negative. */
export function liveElapsedWorkMinutes(timer: TimerState, now: Date): number {
  if (!isOpen(timer)) return 0;
  const elapsedSinceOpen = diffMinutes(cycleStart(timer), now);
  return Math.max(0, elapsedSinceOpen - livePausedTotal(timer, now));
}

/** Work minutes across completed cycles. */
export function completedWorkMinutes(timer: TimerState): number {
  return timelineTotals(timer).work;
}

export function timelineTotals(timer: TimerState): TimelineTotals {
  const totals: TimelineTotals = { work: 0, break: 0, paused: 0 };
  for (const cycle of timer.timeline) {
    if (cycle.type === 'work') {
      totals.work += cycle.minutes;
      totals.paused += cycle.pausedMinutes;
    } else {
      totals.break += cycle.minutes;
    }
  }
  return totals;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** A pause start later than `now` counts as no pause yet. */
function currentPauseMinutes(timer: TimerState, now: Date): number {
  if (timer.pauseStartTime === null) return 0;
  return Math.max(0, diffMinutes(parseTimestamp(timer.pauseStartTime), now));
}
