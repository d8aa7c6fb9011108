import { afterEach, describe, it, expect, vi } from 'vitest';
import { parseTimestamp } from '../../lib/clock/index.js';
import { createTimer } from '../../lib/timeline/index.js';
import { announce, consoleOutput } from '../context.js';
import type { CommandContext } from '../context.js';
import { MemoryTimerStore } from './memory-store.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('consoleOutput', () => {
  it('sends notices to stdout and failures to stderr', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    consoleOutput.log('Timer stopped.');
    consoleOutput.error('No timer exists.');

    expect(log).toHaveBeenCalledWith('Timer stopped.');
    expect(error).toHaveBeenCalledWith('No timer exists.');
  });
});

describe('announce', () => {
  function context(lines: string[]): CommandContext {
    return {
      store: new MemoryTimerStore(),
      now: parseTimestamp('2026-01-15 09:00'),
      confirm: async () => true,
      output: { log: (line) => lines.push(line), error: (line) => lines.push(line) },
    };
  }

  it('stays quiet in silent mode', () => {
    const lines: string[] = [];
    announce(context(lines), createTimer('silent'), 'Timer stopped.');
    expect(lines).toEqual([]);
  });

  it('adds the status line in verbose mode', () => {
    const lines: string[] = [];
    announce(context(lines), createTimer('verbose'), 'Timer stopped.');
    expect(lines).toEqual(['Timer stopped.', '--:-- STOPPED (0h 00m)']);
  });
});
