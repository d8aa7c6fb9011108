import { formatDuration, parseMinutes } from '../lib/clock/index.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import {
  renderCheck,
  renderDailyReportLine,
  renderLog,
  renderModUsage,
  renderReport,
} from '../lib/report/index.js';
import { encodeTimer } from '../lib/storage/index.js';
import { createTimer, liveElapsedWorkMinutes, OUTPUT_MODES } from '../lib/timeline/index.js';
import { dropEntry, modDuration, modPause, modStart } from '../lib/timeline/mutations.js';
import type { DropOutcome } from '../lib/timeline/mutations.js';
import type { Direction, OutputMode, TimerState } from '../lib/timeline/types.js';
import {
  assertTransition,
  nextCycle,
  pauseTimer,
  resetTimer,
  setMode,
  startTimer,
  stopTimer,
} from '../lib/timer/index.js';
import { announce, commit } from './context.js';
import type { CommandContext } from './context.js';

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

export function start(ctx: CommandContext, time?: string): void {
  const backdate = time === undefined ? 0 : parseMinutes(time);
  const timer = ctx.store.load();
  assertTransition(timer, 'start');

  const message = timer.status === 'paused' ? 'Resuming timer.' : 'Starting timer.';
  const next = startTimer(timer, ctx.now, backdate);
  commit(ctx, next, withArg('start', time));
  announce(ctx, next, message);
}

export function stop(ctx: CommandContext): void {
  const timer = ctx.store.load();
  assertTransition(timer, 'stop');

  const next = stopTimer(timer, ctx.now);
  commit(ctx, next, 'stop');
  announce(ctx, next, 'Timer stopped.');
}

export function pause(ctx: CommandContext, time?: string): void {
  const extra = time === undefined ? 0 : parseMinutes(time);
  const timer = ctx.store.load();
  assertTransition(timer, 'pause');

  const next = pauseTimer(timer, ctx.now, extra);
  commit(ctx, next, withArg('pause', time));
  announce(ctx, next, extra > 0 ? `Paused timer (added ${extra}m pause time)` : 'Paused timer');
}

export function next(ctx: CommandContext): void {
  const timer = ctx.store.load();
  assertTransition(timer, 'next');

  const updated = nextCycle(timer, ctx.now);
  commit(ctx, updated, 'next');
  announce(ctx, updated, 'Next cycle started.');
}

// ---------------------------------------------------------------------------
// Read-only views
// ---------------------------------------------------------------------------

export function check(ctx: CommandContext): void {
  ctx.output.log(renderCheck(ctx.store.load(), ctx.now));
}

export function log(ctx: CommandContext, type?: string): void {
  if (type !== undefined && type !== 'info' && type !== 'debug') {
    throw new ValidationError(`Invalid log type: ${type}. Use one of: ['info', 'debug']`);
  }
  const timer = ctx.store.load();

  if (type === 'debug') {
    for (const line of ctx.store.readDebug().split('\n')) {
      if (line !== '') ctx.output.log(line);
    }
    return;
  }
  for (const line of renderLog(timer, ctx.now)) {
    ctx.output.log(line);
  }
}

export function report(ctx: CommandContext): void {
  ctx.output.log(renderReport(ctx.store.load(), ctx.now));
}

export function status(ctx: CommandContext): void {
  ctx.output.log(ctx.store.exists() ? ctx.store.load().status : 'stopped');
}

export function debug(ctx: CommandContext): void {
  const { timerFile } = ctx.store.paths;
  ctx.output.log(`timer file = ${timerFile}`);
  if (!ctx.store.exists()) {
    ctx.output.log(`No file at ${timerFile}`);
    return;
  }
  ctx.output.log(JSON.stringify(encodeTimer(ctx.store.load()), null, 4));
}

// ---------------------------------------------------------------------------
// Mode
// ---------------------------------------------------------------------------

export function mode(ctx: CommandContext, value?: string): void {
  const timer = ctx.store.load();
  if (value === undefined) {
    ctx.output.log(timer.mode);
    return;
  }
  if (!isOutputMode(value)) {
    throw new ValidationError(`Unhandled mode: ${value}`);
  }
  const updated = setMode(timer, value);
  ctx.store.save(updated);
  announce(ctx, updated, `Timer mode set to ${value}`);
}

// ---------------------------------------------------------------------------
// Historical edits
// ---------------------------------------------------------------------------

/**
 * `wt mod start <add|sub> <time>`, `wt mod <n> <add|sub> <time>`,
 * `wt mod <n> pause <add|sub> <time>` or `wt mod <n> drop`.
 */
export function mod(ctx: CommandContext, args: string[]): void {
  if (args.length === 3 && args[0] === 'start') {
    return modifyStart(ctx, args[1], args[2]);
  }
  if (args.length === 2 && args[1] === 'drop') {
    return drop(ctx, args[0]);
  }
  if (args.length === 4 && args[1] === 'pause') {
    return modifyPause(ctx, args[0], args[2], args[3]);
  }
  if (args.length === 3) {
    return modifyDuration(ctx, args[0], args[1], args[2]);
  }
  for (const line of renderModUsage()) {
    ctx.output.log(line);
  }
}

function modifyStart(ctx: CommandContext, op: string, time: string): void {
  const direction = parseDirection(op);
  const minutes = parseMinutes(time);
  const updated = modStart(ctx.store.load(), direction, minutes);
  commit(ctx, updated, `mod start ${op} ${time}`);
  announce(ctx, updated, `Day start adjusted by ${sign(direction)}${formatDuration(minutes)}`);
}

function modifyDuration(ctx: CommandContext, cycle: string, op: string, time: string): void {
  const index = parseIndex(cycle);
  const direction = parseDirection(op);
  const minutes = parseMinutes(time);
  const updated = modDuration(ctx.store.load(), index, direction, minutes);
  commit(ctx, updated, `mod ${cycle} ${op} ${time}`);
  announce(
    ctx,
    updated,
    `Modified cycle ${index} duration by ${sign(direction)}${formatDuration(minutes)}`,
  );
}

function modifyPause(ctx: CommandContext, cycle: string, op: string, time: string): void {
  const index = parseIndex(cycle);
  const direction = parseDirection(op);
  const minutes = parseMinutes(time);
  const timer = ctx.store.load();
  const updated = modPause(timer, index, direction, minutes);
  commit(ctx, updated, `mod ${cycle} pause ${op} ${time}`);

  const target = index > timer.timeline.length ? 'current cycle' : `cycle ${index}`;
  announce(
    ctx,
    updated,
    `Modified ${target} paused time by ${sign(direction)}${formatDuration(minutes)}`,
  );
}

function drop(ctx: CommandContext, cycle: string): void {
  const index = parseIndex(cycle);
  const { timer, outcome } = dropEntry(ctx.store.load(), index);
  commit(ctx, timer, `mod ${cycle} drop`);
  announce(ctx, timer, `Removed cycle ${index}${describeDrop(outcome, timer, ctx.now)}`);
}

function describeDrop(outcome: DropOutcome, timer: TimerState, now: Date): string {
  switch (outcome.kind) {
    case 'removed':
      return '';
    case 'work-merged':
      return ` (merged adjacent work cycles: ${formatDuration(outcome.minutes)})`;
    case 'break-merged':
      return ` (merged into break: ${formatDuration(outcome.minutes)})`;
    case 'live-merged':
      return ` (merged with running cycle: ${formatDuration(liveElapsedWorkMinutes(timer, now))})`;
  }
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

/**
 * Replace the timer with an empty one after confirmation, archiving the old
 * day to the daily report. Returns false when the user declined.
 */
export async function reset(ctx: CommandContext, message = 'Timer reset.'): Promise<boolean> {
  let keptMode: OutputMode = 'silent';
  if (ctx.store.exists()) {
    const old = loadIfReadable(ctx);
    if (!(await ctx.confirm('Reset timer?'))) return false;

    if (old !== null) {
      keptMode = old.mode;
      const line = renderDailyReportLine(old, ctx.now);
      if (line !== null) {
        ctx.store.prependDailyReport(line);
      }
    }
  }

  ctx.store.reset();
  const timer = resetTimer(keptMode);
  ctx.store.save(timer);
  announce(ctx, timer, message);
  return true;
}

export async function restart(ctx: CommandContext, time?: string): Promise<void> {
  if (time !== undefined) parseMinutes(time);
  if (await reset(ctx)) {
    start(ctx, time);
  }
}

export async function remove(ctx: CommandContext): Promise<void> {
  if (!ctx.store.exists()) {
    throw new NotFoundError();
  }
  const timer = loadIfReadable(ctx) ?? createTimer();
  if (!(await ctx.confirm('Remove timer?'))) return;

  ctx.store.remove();
  announce(ctx, timer, 'Timer removed.');
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** The saved timer, or null when the file no longer decodes. */
function loadIfReadable(ctx: CommandContext): TimerState | null {
  try {
    return ctx.store.load();
  } catch (err) {
    if (err instanceof ValidationError) return null;
    throw err;
  }
}

function withArg(command: string, arg?: string): string {
  return arg === undefined ? command : `${command} ${arg}`;
}

function parseDirection(op: string): Direction {
  if (op !== 'add' && op !== 'sub') {
    throw new ValidationError(`Invalid operation: ${op}. Use 'add' or 'sub'`);
  }
  return op;
}

function parseIndex(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`Invalid cycle number: ${value}`);
  }
  return Number(value);
}

function sign(direction: Direction): string {
  return direction === 'add' ? '+' : '-';
}

function isOutputMode(value: string): value is OutputMode {
  return OUTPUT_MODES.some((m) => m === value);
}
