import {
  addMinutes,
  dayDifference,
  formatDate,
  formatDuration,
  formatDurationSpaced,
  formatTime,
} from '../clock/index.js';
import {
  anchorOf,
  completedWorkMinutes,
  cycleStart,
  entryBoundaries,
  isOpen,
  liveElapsedWorkMinutes,
  livePausedTotal,
  timelineTotals,
} from '../timeline/index.js';
import type { EntryBoundary, TimerState } from '../timeline/types.js';

/** Aggregate figures for the one-line report. */
export interface DaySummary {
  start: Date;
  end: Date;
  work: number;
  break: number;
  paused: number;
  /** Wall-clock minutes from the anchor to `end`. */
  total: number;
  /** Calendar days between `start` and `end`. */
  days: number;
}

// ---------------------------------------------------------------------------
// Cycle log
// ---------------------------------------------------------------------------

/** One line per completed cycle, plus the open cycle if there is one. */
export function renderLog(timer: TimerState, now: Date): string[] {
  if (timer.timeline.length === 0 && !isOpen(timer)) {
    return ['No work cycles recorded.'];
  }

  const lines: string[] = [];
  let runningTotal = 0;

  for (const boundary of entryBoundaries(timer)) {
    if (boundary.cycle.type === 'work') {
      runningTotal += boundary.cycle.minutes;
    }
    lines.push(renderEntry(boundary, runningTotal));
  }

  if (isOpen(timer)) {
    const start = cycleStart(timer);
    const current = liveElapsedWorkMinutes(timer, now);
    const status = timer.status === 'paused' ? ' (paused)' : '';
    lines.push(
      `${pad2(timer.timeline.length + 1)}. [${formatTime(start)} => .....] Work${status}: ` +
        `${formatDuration(current)}${pausedTag(livePausedTotal(timer, now))} ` +
        `(${formatDuration(runningTotal + current)})${dayTag(dayDifference(start, now), '  ')}`,
    );
  }

  return lines;
}

function renderEntry({ index, cycle, start, end }: EntryBoundary, runningTotal: number): string {
  const span = `${pad2(index)}. [${formatTime(start)} => ${formatTime(end)}]`;
  switch (cycle.type) {
    case 'work':
      return (
        `${span} Work: ${formatDuration(cycle.minutes)}${pausedTag(cycle.pausedMinutes)} ` +
        `(${formatDuration(runningTotal)})${dayTag(dayDifference(start, end), '  ')}`
      );
    case 'break':
      return `${span} Break: ${formatDuration(cycle.minutes)}`;
  }
}

// ---------------------------------------------------------------------------
// Status line
// ---------------------------------------------------------------------------

/** `<current> STATUS |PPm| (<total>)`, e.g. `0h 25m RUNNING (1h 10m)`. */
export function renderCheck(timer: TimerState, now: Date): string {
  const current = liveElapsedWorkMinutes(timer, now);
  const total = current + completedWorkMinutes(timer);
  const currentStr = isOpen(timer) ? formatDurationSpaced(current) : '--:--';
  return (
    `${currentStr} ${timer.status.toUpperCase()}${pausedTag(livePausedTotal(timer, now))} ` +
    `(${formatDurationSpaced(total)})`
  );
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

/** Totals from the anchor to the end of the last (or open) cycle. Null before the first start. */
export function summarize(timer: TimerState, now: Date): DaySummary | null {
  if (timer.anchorTime === null) return null;

  const totals = timelineTotals(timer);
  const currentWork = liveElapsedWorkMinutes(timer, now);
  const currentPaused = livePausedTotal(timer, now);

  const work = totals.work + currentWork;
  const paused = totals.paused + currentPaused;
  const start = anchorOf(timer);
  const end = addMinutes(cycleStart(timer), currentWork + currentPaused);

  return {
    start,
    end,
    work,
    break: totals.break,
    paused,
    total: work + totals.break + paused,
    days: dayDifference(start, end),
  };
}

/** One-line summary of the day. */
export function renderReport(timer: TimerState, now: Date): string {
  const summary = summarize(timer, now);
  if (summary === null) return 'No work recorded today.';

  return (
    `${formatDate(summary.start)} | ${formatTime(summary.start)} -> ${formatTime(summary.end)} | ` +
    `Work: ${formatDuration(summary.work)} | Break: ${formatDuration(summary.break)} | ` +
    `Paused: ${formatDuration(summary.paused)} | Total: ${formatDuration(summary.total)}` +
    dayTag(summary.days, ' ')
  );
}

/**
 * Line archived to the daily-report file on reset. Null when nothing was
 * recorded. Paused minutes are neither shown nor counted in its total.
 */
export function renderDailyReportLine(timer: TimerState, now: Date): string | null {
  const summary = summarize(timer, now);
  if (summary === null) return null;

  return (
    `${formatDate(summary.start)} | ${formatTime(summary.start)} -> ${formatTime(summary.end)} | ` +
    `Work: ${formatDuration(summary.work)} | Break: ${formatDuration(summary.break)} | ` +
    `Total: ${formatDuration(summary.work + summary.break)}${dayTag(summary.days, ' ')}`
  );
}

export function renderModUsage(): string[] {
  return [
    'Usage:',
    '  wt mod start <add|sub> <time>       - adjust day start time',
    '  wt mod <num> <add|sub> <time>       - adjust cycle duration',
    '  wt mod <num> pause <add|sub> <time> - adjust paused time',
    '  wt mod <num> drop                   - remove cycle',
  ];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

function pausedTag(minutes: number): string {
  return minutes > 0 ? ` |${pad2(minutes)}m|` : '';
}

function dayTag(days: number, separator: string): string {
  return days > 0 ? `${separator}[+${days} day]` : '';
}
