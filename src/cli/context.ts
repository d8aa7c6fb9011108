import { renderCheck } from '../lib/report/index.js';
import { formatDebugEntry } from '../lib/storage/index.js';
import type { TimerStore } from '../lib/storage/index.js';
import type { TimerState } from '../lib/timeline/types.js';

/** Where command output goes. */
export interface Output {
  log(line: string): void;
  error(line: string): void;
}

/** Everything a command needs for one invocation. `now` is sampled once. */
export interface Runtime {
  store: TimerStore;
  now: Date;
  confirm(message: string): Promise<boolean>;
}

export interface CommandContext extends Runtime {
  output: Output;
}

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

/** Record the debug event, then persist. Called only after the operation succeeded. */
export function commit(ctx: CommandContext, timer: TimerState, command: string): void {
  ctx.store.appendDebug(formatDebugEntry(ctx.now, command));
  ctx.store.save(timer);
}

/** Print an action message unless silent; verbose mode adds the status line. */
export function announce(ctx: CommandContext, timer: TimerState, message: string): void {
  if (timer.mode !== 'silent') {
    ctx.output.log(message);
  }
  if (timer.mode === 'verbose') {
    ctx.output.log(renderCheck(timer, ctx.now));
  }
}
