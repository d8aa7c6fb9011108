import { describe, it, expect } from 'vitest';
import {
  addMinutes,
  formatTime,
  formatTimestamp,
  parseTimestamp,
} from '../../clock/index.js';
import { StateError } from '../../errors.js';
import {
  breakCycle,
  completedWorkMinutes,
  createTimer,
  cycleStart,
  duration,
  elapsed,
  entryBoundaries,
  liveElapsedWorkMinutes,
  livePausedTotal,
  timelineTotals,
  workCycle,
} from '../index.js';
import type { TimerState } from '../types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function at(hhmm: string): Date {
  return parseTimestamp(`2026-01-15 ${hhmm}`);
}

function timer(overrides: Partial<TimerState>): TimerState {
  return { ...createTimer(), anchorTime: '2026-01-15 09:00', ...overrides };
}

const dayTimeline = [workCycle(30, 5), breakCycle(10), workCycle(20)];

// ---------------------------------------------------------------------------
// Cycles
// ---------------------------------------------------------------------------

describe('cycle helpers', () => {
  it('counts paused time into the elapsed span of work', () => {
    expect(elapsed(workCycle(30, 5))).toBe(35);
    expect(duration(workCycle(30, 5))).toBe(35);
  });

  it('uses minutes for breaks', () => {
    expect(elapsed(breakCycle(10))).toBe(10);
    expect(duration(breakCycle(10))).toBe(10);
  });

  it('creates an empty stopped timer', () => {
    const empty = createTimer();
    expect(empty.status).toBe('stopped');
    expect(empty.anchorTime).toBeNull();
    expect(empty.timeline).toEqual([]);
    expect(empty.mode).toBe('silent');
  });
});

// ---------------------------------------------------------------------------
// Projection
// ---------------------------------------------------------------------------

describe('cycleStart', () => {
  it('is the anchor when nothing has completed', () => {
    expect(formatTimestamp(cycleStart(timer({})))).toBe('2026-01-15 09:00');
  });

  it('advances the anchor by every duration', () => {
    expect(formatTime(cycleStart(timer({ timeline: dayTimeline })))).toBe('10:05');
  });

  it('throws without an anchor', () => {
    expect(() => cycleStart(createTimer())).toThrow(StateError);
  });
});

describe('entryBoundaries', () => {
  it('projects each completed cycle', () => {
    const spans = entryBoundaries(timer({ timeline: dayTimeline })).map(
      (b) => `${b.index} ${b.cycle.type} ${formatTime(b.start)}-${formatTime(b.end)}`,
    );
    expect(spans).toEqual(['1 work 09:00-09:35', '2 break 09:35-09:45', '3 work 09:45-10:05']);
  });

  it('keeps every boundary contiguous with the anchor-plus-prefix sum', () => {
    const state = timer({ timeline: dayTimeline });
    const boundaries = entryBoundaries(state);
    const anchor = at('09:00');

    let prefix = 0;
    boundaries.forEach((b, i) => {
      expect(b.start.getTime()).toBe(addMinutes(anchor, prefix).getTime());
      prefix += duration(b.cycle);
      expect(b.end.getTime()).toBe(addMinutes(anchor, prefix).getTime());
      if (i > 0) {
        expect(b.start.getTime()).toBe(boundaries[i - 1].end.getTime());
      }
    });
    expect(cycleStart(state).getTime()).toBe(addMinutes(anchor, prefix).getTime());
  });

  it('is pure: repeated calls give the same result', () => {
    const state = timer({ timeline: dayTimeline });
    expect(entryBoundaries(state)).toEqual(entryBoundaries(state));
    expect(cycleStart(state)).toEqual(cycleStart(state));
  });

  it('reflects an edit on the very next call', () => {
    const state = timer({ timeline: dayTimeline });
    const edited = { ...state, timeline: [workCycle(40, 5), ...state.timeline.slice(1)] };
    expect(formatTime(entryBoundaries(edited)[1].start)).toBe('09:45');
    expect(formatTime(cycleStart(edited))).toBe('10:15');
  });
});

// ---------------------------------------------------------------------------
// Live cycle
// ---------------------------------------------------------------------------

describe('liveElapsedWorkMinutes', () => {
  it('is zero while stopped', () => {
    expect(liveElapsedWorkMinutes(timer({ timeline: [workCycle(30)] }), at('10:00'))).toBe(0);
  });

  it('subtracts folded pause time while running', () => {
    const running = timer({ status: 'running', timeline: [workCycle(30)], livePausedMinutes: 5 });
    expect(liveElapsedWorkMinutes(running, at('10:00'))).toBe(25);
  });

  it('subtracts the pause in progress while paused', () => {
    const paused = timer({
      status: 'paused',
      timeline: [workCycle(30)],
      livePausedMinutes: 5,
      pauseStartTime: '2026-01-15 09:50',
    });
    expect(livePausedTotal(paused, at('10:00'))).toBe(15);
    expect(liveElapsedWorkMinutes(paused, at('10:00'))).toBe(15);
  });

  it('never goes negative', () => {
    const running = timer({ status: 'running', livePausedMinutes: 40 });
    expect(liveElapsedWorkMinutes(running, at('09:30'))).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Totals
// ---------------------------------------------------------------------------

describe('timelineTotals', () => {
  it('sums work, break and paused minutes', () => {
    const state = timer({ timeline: dayTimeline });
    expect(timelineTotals(state)).toEqual({ work: 50, break: 10, paused: 5 });
    expect(completedWorkMinutes(state)).toBe(50);
  });
});
