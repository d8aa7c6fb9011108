import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { formatTimestamp } from '../clock/index.js';
import { NotFoundError, ValidationError } from '../errors.js';
import type { TimerState } from '../timeline/types.js';
import { decodeTimer, encodeTimer } from './schema.js';

export { decodeTimer, encodeTimer, migrateLivePausedMinutes, TimerRecordSchema } from './schema.js';
export type { TimerRecord, CycleRecord } from './schema.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const OUTPUT_FOLDER = '.out';
export const TIMER_FILE_NAME = 'wt.json';
export const DEBUG_LOG_NAME = 'debug-log';
export const DAILY_REPORT_NAME = 'daily-reports';

/** Where the timer and its side files live. */
export interface StoragePaths {
  outputDir: string;
  timerFile: string;
  debugLog: string;
  dailyReport: string;
}

/** Load/save boundary for the timer aggregate and its side files. */
export interface TimerStore {
  readonly paths: StoragePaths;
  exists(): boolean;
  /** Throws NotFoundError when no timer has been saved. */
  load(): TimerState;
  save(timer: TimerState): void;
  /** Drop the timer and empty the debug log. Daily reports are kept. */
  reset(): void;
  /** Delete the timer, the debug log and the daily reports. */
  remove(): void;
  appendDebug(entry: string): void;
  readDebug(): string;
  /** Add a line to the top of the daily-report file. */
  prependDailyReport(line: string): void;
}

export function resolvePaths(root: string, reportFile?: string): StoragePaths {
  const outputDir = join(root, OUTPUT_FOLDER);
  return {
    outputDir,
    timerFile: join(outputDir, TIMER_FILE_NAME),
    debugLog: join(outputDir, DEBUG_LOG_NAME),
    dailyReport: reportFile ?? join(outputDir, DAILY_REPORT_NAME),
  };
}

/** `[YYYY-MM-DD HH:mm] wt <command>` */
export function formatDebugEntry(now: Date, command: string): string {
  return `[${formatTimestamp(now)}] wt ${command}`;
}

// ---------------------------------------------------------------------------
// File store
// ---------------------------------------------------------------------------

export class FileTimerStore implements TimerStore {
  constructor(readonly paths: StoragePaths) {}

  exists(): boolean {
    return existsSync(this.paths.timerFile);
  }

  load(): TimerState {
    if (!this.exists()) {
      throw new NotFoundError();
    }
    const text = readFileSync(this.paths.timerFile, 'utf8');
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationError(`Invalid timer file: ${reason}`);
    }
    return decodeTimer(raw);
  }

  save(timer: TimerState): void {
    mkdirSync(this.paths.outputDir, { recursive: true });
    writeFileSync(this.paths.timerFile, JSON.stringify(encodeTimer(timer), null, 4));
  }

  reset(): void {
    rmSync(this.paths.timerFile, { force: true });
    mkdirSync(this.paths.outputDir, { recursive: true });
    writeFileSync(this.paths.debugLog, '');
  }

  remove(): void {
    rmSync(this.paths.timerFile, { force: true });
    rmSync(this.paths.debugLog, { force: true });
    rmSync(this.paths.dailyReport, { force: true });
  }

  appendDebug(entry: string): void {
    mkdirSync(this.paths.outputDir, { recursive: true });
    appendFileSync(this.paths.debugLog, `${entry}\n`);
  }

  readDebug(): string {
    return existsSync(this.paths.debugLog) ? readFileSync(this.paths.debugLog, 'utf8') : '';
  }

  prependDailyReport(line: string): void {
    const existing = existsSync(this.paths.dailyReport)
      ? readFileSync(this.paths.dailyReport, 'utf8')
      : '';
    mkdirSync(dirname(this.paths.dailyReport), { recursive: true });
    writeFileSync(this.paths.dailyReport, `${line}\n${existing}`);
  }
}
