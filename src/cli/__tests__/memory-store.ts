import { NotFoundError } from '../../lib/errors.js';
import { resolvePaths } from '../../lib/storage/index.js';
import type { StoragePaths, TimerStore } from '../../lib/storage/index.js';
import type { TimerState } from '../../lib/timeline/types.js';

/** In-process TimerStore for command tests. */
export class MemoryTimerStore implements TimerStore {
  readonly paths: StoragePaths = resolvePaths('/virtual');
  timer: TimerState | null = null;
  debugEntries: string[] = [];
  dailyReports: string[] = [];

  exists(): boolean {
    return this.timer !== null;
  }

  load(): TimerState {
    if (this.timer === null) {
      throw new NotFoundError();
    }
    return this.timer;
  }

  save(timer: TimerState): void {
    this.timer = timer;
  }

  reset(): void {
    this.timer = null;
    this.debugEntries = [];
  }

  remove(): void {
    this.timer = null;
    this.debugEntries = [];
    this.dailyReports = [];
  }

  appendDebug(entry: string): void {
    this.debugEntries.push(entry);
  }

  readDebug(): string {
    return this.debugEntries.map((entry) => `${entry}\n`).join('');
  }

  prependDailyReport(line: string): void {
    this.dailyReports.unshift(line);
  }
}
