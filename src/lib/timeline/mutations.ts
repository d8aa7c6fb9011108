import { addMinutes, formatDuration, formatTimestamp, parseTimestamp } from '../clock/index.js';
import { OutOfRangeError, StateError, ValidationError } from '../errors.js';
import { anchorOf, breakCycle, elapsed, isOpen, workCycle } from './index.js';
import type { BreakCycle, Cycle, Direction, TimerState, WorkCycle } from './types.js';

/** What a drop did to the surrounding entries. */
export type DropOutcome =
  | { kind: 'removed' }
  /** A break between two work entries became work; `minutes` is the merged work. */
  | { kind: 'work-merged'; minutes: number }
  /** A work entry became break time; `minutes` is the merged break. */
  | { kind: 'break-merged'; minutes: number }
  /** The trailing work and break were folded into the open cycle. */
  | { kind: 'live-merged' };

export interface DropResult {
  timer: TimerState;
  outcome: DropOutcome;
}

// ---------------------------------------------------------------------------
// Anchor
// ---------------------------------------------------------------------------

/**
 * Move the anchor, and with it every projected timestamp. While the first
 * cycle is still open and paused, the pause start moves along with it.
 */
export function modStart(timer: TimerState, direction: Direction, minutes: number): TimerState {
  if (timer.anchorTime === null) {
    throw new StateError('No day start to modify.');
  }
  const delta = signed(direction, minutes);
  const anchorTime = formatTimestamp(addMinutes(anchorOf(timer), delta));

  const pauseStartTime =
    timer.timeline.length === 0 && timer.status === 'paused' && timer.pauseStartTime !== null
      ? formatTimestamp(addMinutes(parseTimestamp(timer.pauseStartTime), delta))
      : timer.pauseStartTime;

  return { ...timer, anchorTime, pauseStartTime };
}

// ---------------------------------------------------------------------------
// Duration
// ---------------------------------------------------------------------------

/** Adjust the recorded minutes of a completed entry. */
export function modDuration(
  timer: TimerState,
  index: number,
  direction: Direction,
  minutes: number,
): TimerState {
  if (isOpenSlot(timer, index)) {
    throw new ValidationError(
      [
        'Cannot modify duration of current running cycle.',
        'To adjust when this cycle started, modify the previous cycle or break duration.',
        `To adjust paused time: wt mod ${index} pause <add|sub> <time>`,
      ].join('\n'),
    );
  }
  const cycle = completedAt(timer, index, timer.timeline.length);

  const next = applyDelta(cycle.minutes, direction, minutes, 'Duration');
  return replaceAt(timer, index, { ...cycle, minutes: next });
}

// ---------------------------------------------------------------------------
// Pause
// ---------------------------------------------------------------------------

/**
 * Adjust paused minutes of a completed work entry, or of the open cycle while
 * it is running.
 */
export function modPause(
  timer: TimerState,
  index: number,
  direction: Direction,
  minutes: number,
): TimerState {
  if (isOpenSlot(timer, index)) {
    if (timer.status === 'paused') {
      throw new ValidationError(
        "Cannot modify pause time while paused.\nResume first with 'wt start', then modify pause time.",
      );
    }
    const livePausedMinutes = applyDelta(timer.livePausedMinutes, direction, minutes, 'Paused time');
    return { ...timer, livePausedMinutes };
  }

  const cycle = completedAt(timer, index, maxIndex(timer));
  if (cycle.type !== 'work') {
    throw new ValidationError(
      `Cycle ${index} is a break. Paused time can only be modified for work cycles.`,
    );
  }
  const pausedMinutes = applyDelta(cycle.pausedMinutes, direction, minutes, 'Paused time');
  return replaceAt(timer, index, { ...cycle, pausedMinutes });
}

// ---------------------------------------------------------------------------
// Drop
// ---------------------------------------------------------------------------

/**
 * Remove a completed entry and reclassify its interval so the neighbours stay
 * contiguous. A dropped break between work becomes work; a dropped work entry
 * becomes break time.
 */
export function dropEntry(timer: TimerState, index: number): DropResult {
  const cycle = completedAt(timer, index, timer.timeline.length);
  switch (cycle.type) {
    case 'break':
      return dropBreak(timer, index - 1);
    case 'work':
      return dropWork(timer, index - 1, cycle);
  }
}

function dropBreak(timer: TimerState, at: number): DropResult {
  const { timeline } = timer;
  const prev: Cycle | undefined = timeline[at - 1];
  const next: Cycle | undefined = timeline[at + 1];
  const isLast = at === timeline.length - 1;

  if (prev?.type === 'work' && isLast && isOpen(timer)) {
    return {
      timer: {
        ...timer,
        timeline: timeline.slice(0, at - 1),
        livePausedMinutes: timer.livePausedMinutes + prev.pausedMinutes,
      },
      outcome: { kind: 'live-merged' },
    };
  }

  if (prev?.type === 'work' && next?.type === 'work') {
    const merged = workCycle(
      prev.minutes + timeline[at].minutes + next.minutes,
      prev.pausedMinutes + next.pausedMinutes,
    );
    return {
      timer: { ...timer, timeline: splice(timeline, at - 1, 3, merged) },
      outcome: { kind: 'work-merged', minutes: merged.minutes },
    };
  }

  return {
    timer: { ...timer, timeline: splice(timeline, at, 1) },
    outcome: { kind: 'removed' },
  };
}

function dropWork(timer: TimerState, at: number, work: WorkCycle): DropResult {
  const { timeline } = timer;
  const prev: Cycle | undefined = timeline[at - 1];
  const next: Cycle | undefined = timeline[at + 1];
  const workMinutes = elapsed(work);

  let merged: BreakCycle;
  let updated: Cycle[];
  if (prev?.type === 'break' && next?.type === 'break') {
    merged = breakCycle(prev.minutes + workMinutes + next.minutes);
    updated = splice(timeline, at - 1, 3, merged);
  } else if (prev?.type === 'break') {
    merged = breakCycle(prev.minutes + workMinutes);
    updated = splice(timeline, at - 1, 2, merged);
  } else if (next?.type === 'break') {
    merged = breakCycle(workMinutes + next.minutes);
    updated = splice(timeline, at, 2, merged);
  } else {
    merged = breakCycle(workMinutes);
    updated = splice(timeline, at, 1, merged);
  }

  return {
    timer: { ...timer, timeline: updated },
    outcome: { kind: 'break-merged', minutes: merged.minutes },
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Highest addressable index: completed entries plus the open cycle, if any. */
export function maxIndex(timer: TimerState): number {
  return timer.timeline.length + (isOpen(timer) ? 1 : 0);
}

function isOpenSlot(timer: TimerState, index: number): boolean {
  return isOpen(timer) && index === timer.timeline.length + 1;
}

function completedAt(timer: TimerState, index: number, reportedMax: number): Cycle {
  if (!Number.isInteger(index) || index < 1 || index > timer.timeline.length) {
    throw new OutOfRangeError(index, reportedMax);
  }
  return timer.timeline[index - 1];
}

function signed(direction: Direction, minutes: number): number {
  return direction === 'add' ? minutes : -minutes;
}

function applyDelta(current: number, direction: Direction, minutes: number, label: string): number {
  const next = current + signed(direction, minutes);
  if (next < 0) {
    throw new ValidationError(
      `Error: ${label} would be negative. Current: ${formatDuration(current)}`,
    );
  }
  return next;
}

function replaceAt(timer: TimerState, index: number, cycle: Cycle): TimerState {
  return { ...timer, timeline: splice(timer.timeline, index - 1, 1, cycle) };
}

/** Non-mutating splice. */
function splice(cycles: Cycle[], start: number, deleteCount: number, ...items: Cycle[]): Cycle[] {
  return [...cycles.slice(0, start), ...items, ...cycles.slice(start + deleteCount)];
}
