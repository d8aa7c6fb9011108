/** Possible timer statuses. */
export type TimerStatus = 'stopped' | 'running' | 'paused';

/** Output verbosity. Not part of the timeline invariants. */
export type OutputMode = 'silent' | 'normal' | 'verbose';

export const OUTPUT_MODES: readonly OutputMode[] = ['silent', 'normal', 'verbose'];

/** A completed work interval. `pausedMinutes` is time suspended inside it. */
export interface WorkCycle {
  type: 'work';
  minutes: number;
  pausedMinutes: number;
}

export interface BreakCycle {
  type: 'break';
  minutes: number;
}

/** One timeline entry. */
export type Cycle = WorkCycle | BreakCycle;

/**
 * The persisted aggregate. Timestamps are `YYYY-MM-DD HH:mm` local strings.
 *
 * Only `anchorTime` locates the timeline; every cycle boundary is derived
 * by folding cycle durations forward from it.
 */
export interface TimerState {
  status: TimerStatus;
  /** Start of the first cycle. Set once, on the first start. */
  anchorTime: string | null;
  /** Completed cycles, oldest first. */
  timeline: Cycle[];
  /** Pause minutes already folded into the open cycle. */
  livePausedMinutes: number;
  /** Start of the pause in progress. Non-null only while paused. */
  pauseStartTime: string | null;
  /** Most recent stop. Used to size the next break. */
  lastStopTime: string | null;
  mode: OutputMode;
}

/** Position of a completed cycle on the projected timeline. */
export interface EntryBoundary {
  /** 1-based cycle number. */
  index: number;
  cycle: Cycle;
  start: Date;
  end: Date;
}

/** Sums over the completed timeline. */
export interface TimelineTotals {
  work: number;
  break: number;
  paused: number;
}

/** Direction of a minute adjustment. */
export type Direction = 'add' | 'sub';
