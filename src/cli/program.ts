import { Command } from 'commander';
import { isSoftError } from '../lib/errors.js';
import * as commands from './commands.js';
import type { CommandContext, Output, Runtime } from './context.js';

export interface ProgramDeps {
  output: Output;
  /** Resolved when a command runs, so `--help` works without configuration. */
  resolveRuntime(): Runtime;
}

/**
 * Build the `wt` command tree. Validation, state and range errors are printed
 * and swallowed; anything else propagates to the caller.
 */
export function createProgram(deps: ProgramDeps): Command {
  const run =
    <A extends unknown[]>(handler: (ctx: CommandContext, ...args: A) => void | Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        const ctx: CommandContext = { ...deps.resolveRuntime(), output: deps.output };
        await handler(ctx, ...args);
      } catch (err) {
        if (isSoftError(err)) {
          deps.output.log(err.message);
          return;
        }
        throw err;
      }
    };

  const program = new Command('wt')
    .description('Work timer for tracking pomodoro-style work/break cycles')
    .action(run((ctx) => commands.check(ctx)));

  program
    .command('start')
    .description('Starts a new timer or continues paused timer')
    .argument('[time]', 'HHMM to backdate the first start or shorten the preceding break')
    .action(run((ctx, time?: string) => commands.start(ctx, time)));

  program
    .command('stop')
    .description('Stops running or paused timer')
    .action(run((ctx) => commands.stop(ctx)));

  program
    .command('pause')
    .description('Pauses currently running timer')
    .argument('[time]', 'HHMM of pause time that already passed')
    .action(run((ctx, time?: string) => commands.pause(ctx, time)));

  program
    .command('check')
    .description('Prints current and total time along with status')
    .action(run((ctx) => commands.check(ctx)));

  program
    .command('log')
    .description('Show log of timer activity')
    .argument('[type]', "'info' (default) or 'debug'")
    .action(run((ctx, type?: string) => commands.log(ctx, type)));

  program
    .command('mod')
    .description('Modify timeline entries (work and break cycles)')
    .argument('[args...]', 'start|<num> [drop|pause|add|sub] [...]')
    .addHelpText(
      'after',
      [
        '',
        'Examples:',
        '  wt mod start sub 30    - started 30min earlier',
        '  wt mod 3 add 15        - add 15min to cycle 3',
        '  wt mod 5 pause add 10  - add 10min paused time to cycle 5',
        '  wt mod 2 drop          - remove cycle 2',
      ].join('\n'),
    )
    .action(run((ctx, args: string[] = []) => commands.mod(ctx, args)));

  program
    .command('next')
    .description('Stop current timer and start next')
    .action(run((ctx) => commands.next(ctx)));

  program
    .command('reset')
    .description('Stops and sets current and total timers to zero')
    .action(
      run(async (ctx) => {
        await commands.reset(ctx);
      }),
    );

  program
    .command('restart')
    .description('Reset and start new timer')
    .argument('[time]', 'HHMM to backdate the start')
    .action(run((ctx, time?: string) => commands.restart(ctx, time)));

  program
    .command('new')
    .description('Creates a new timer (alias for reset)')
    .action(
      run(async (ctx) => {
        await commands.reset(ctx, 'New timer initialized.');
      }),
    );

  program
    .command('remove')
    .description('Deletes the timer and related files')
    .action(run((ctx) => commands.remove(ctx)));

  program
    .command('status')
    .description('Print current status (stopped/running/paused)')
    .action(run((ctx) => commands.status(ctx)));

  program
    .command('mode')
    .description('Change output verbosity: silent, normal or verbose')
    .argument('[type]', 'prints the current mode when omitted')
    .action(run((ctx, type?: string) => commands.mode(ctx, type)));

  program
    .command('report')
    .description("Print a one-line summary of the day's work")
    .action(run((ctx) => commands.report(ctx)));

  program
    .command('debug')
    .description('Prints debug info')
    .action(run((ctx) => commands.debug(ctx)));

  return program;
}
