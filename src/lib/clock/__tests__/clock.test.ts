import { describe, it, expect } from 'vitest';
import {
  createClock,
  dayDifference,
  diffMinutes,
  formatDuration,
  formatDurationSpaced,
  formatTime,
  formatTimestamp,
  parseMinutes,
  parseTimestamp,
} from '../index.js';
import { ValidationError } from '../../errors.js';

/** Local time on a fixed day. */
function at(hour: number, minute: number, second = 0): Date {
  return new Date(2026, 0, 15, hour, minute, second);
}

// ---------------------------------------------------------------------------
// Minute text
// ---------------------------------------------------------------------------

describe('parseMinutes', () => {
  it('reads one or two digits as plain minutes', () => {
    expect(parseMinutes('5')).toBe(5);
    expect(parseMinutes('45')).toBe(45);
    expect(parseMinutes('00')).toBe(0);
  });

  it('reads three digits as HMM', () => {
    expect(parseMinutes('130')).toBe(90);
  });

  it('reads four digits as HHMM', () => {
    expect(parseMinutes('0130')).toBe(90);
    expect(parseMinutes('1000')).toBe(600);
  });

  it('rejects a minutes field above 59', () => {
    expect(() => parseMinutes('75')).toThrow('Incorrect time format. Minutes cannot exceed 59.');
    expect(() => parseMinutes('175')).toThrow(ValidationError);
  });

  it('rejects non-digits and more than four digits', () => {
    for (const bad of ['', 'ab', '-5', '12345', '1 0']) {
      expect(() => parseMinutes(bad)).toThrow('Incorrect time format. Should be 1-4 digit HHMM.');
    }
  });
});

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

describe('formatDuration', () => {
  it('formats hours and zero-padded minutes', () => {
    expect(formatDuration(0)).toBe('0h:00m');
    expect(formatDuration(65)).toBe('1h:05m');
    expect(formatDuration(600)).toBe('10h:00m');
  });

  it('has a spaced variant for the status line', () => {
    expect(formatDurationSpaced(65)).toBe('1h 05m');
  });
});

describe('timestamps', () => {
  it('round-trips the persisted format', () => {
    expect(formatTimestamp(parseTimestamp('2026-01-15 09:05'))).toBe('2026-01-15 09:05');
  });

  it('parses strictly', () => {
    expect(() => parseTimestamp('2026-01-15T09:05')).toThrow(ValidationError);
    expect(() => parseTimestamp('')).toThrow(ValidationError);
  });

  it('formats the clock time', () => {
    expect(formatTime(at(7, 3))).toBe('07:03');
  });
});

// ---------------------------------------------------------------------------
// Arithmetic
// ---------------------------------------------------------------------------

describe('diffMinutes', () => {
  it('counts whole minutes', () => {
    expect(diffMinutes(at(9, 0), at(9, 30))).toBe(30);
  });

  it('truncates partial minutes', () => {
    expect(diffMinutes(at(9, 0), at(9, 30, 59))).toBe(30);
  });

  it('is negative when the end is earlier', () => {
    expect(diffMinutes(at(9, 30), at(9, 0))).toBe(-30);
  });
});

describe('dayDifference', () => {
  it('counts calendar days crossed', () => {
    expect(dayDifference(at(23, 30), new Date(2026, 0, 16, 0, 30))).toBe(1);
    expect(dayDifference(at(0, 5), at(23, 55))).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Time source
// ---------------------------------------------------------------------------

describe('createClock', () => {
  it('returns the fixed time when one is configured', () => {
    const clock = createClock('2026-01-15 09:15');
    expect(formatTimestamp(clock())).toBe('2026-01-15 09:15');
    expect(clock()).not.toBe(clock());
  });

  it('falls back to the wall clock, truncated to the minute', () => {
    for (const clock of [createClock(), createClock('not a time')]) {
      const now = clock();
      expect(now.getSeconds()).toBe(0);
      expect(now.getMilliseconds()).toBe(0);
    }
  });
});
