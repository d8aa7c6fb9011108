#!/usr/bin/env node
import { loadConfig } from '../config.js';
import { createClock } from '../lib/clock/index.js';
import { FileTimerStore, resolvePaths } from '../lib/storage/index.js';
import { consoleOutput } from './context.js';
import type { Runtime } from './context.js';
import { createProgram } from './program.js';
import { promptYesNo } from './prompt.js';

function resolveRuntime(): Runtime {
  const config = loadConfig();
  return {
    store: new FileTimerStore(resolvePaths(config.root, config.reportFile)),
    now: createClock(config.mockTime)(),
    confirm: config.skipPrompts ? async () => true : promptYesNo,
  };
}

createProgram({ output: consoleOutput, resolveRuntime })
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    consoleOutput.error(message);
    process.exitCode = 1;
  });
