import moment from 'moment';
import { ValidationError } from '../errors.js';

// ---------------------------------------------------------------------------
// Formats
// ---------------------------------------------------------------------------

/** Persisted timestamp format. Local time, minute resolution. */
export const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm';
export const TIME_FORMAT = 'HH:mm';
export const DATE_FORMAT = 'YYYY-MM-DD';

/** A source of "now". Sampled once per command. */
export type Clock = () => Date;

// ---------------------------------------------------------------------------
// Time source
// ---------------------------------------------------------------------------

/**
 * Create a clock truncated to the minute. When `fixed` holds a parsable
 * timestamp the clock always returns it, otherwise the wall clock is used.
 */
export function createClock(fixed?: string): Clock {
  if (fixed) {
    const parsed = moment(fixed, TIMESTAMP_FORMAT, true);
    if (parsed.isValid()) {
      const date = parsed.toDate();
      return () => new Date(date.getTime());
    }
  }
  return () => moment().startOf('minute').toDate();
}

// ---------------------------------------------------------------------------
// Parsing and formatting
// ---------------------------------------------------------------------------

/** Parse a persisted `YYYY-MM-DD HH:mm` timestamp. */
export function parseTimestamp(value: string): Date {
  const parsed = moment(value, TIMESTAMP_FORMAT, true);
  if (!parsed.isValid()) {
    throw new ValidationError(`Invalid timestamp: ${value}`);
  }
  return parsed.toDate();
}

export function isTimestamp(value: string): boolean {
  return moment(value, TIMESTAMP_FORMAT, true).isValid();
}

export function formatTimestamp(date: Date): string {
  return moment(date).format(TIMESTAMP_FORMAT);
}

export function formatTime(date: Date): string {
  return moment(date).format(TIME_FORMAT);
}

export function formatDate(date: Date): string {
  return moment(date).format(DATE_FORMAT);
}

// ---------------------------------------------------------------------------
// Arithmetic
// ---------------------------------------------------------------------------

export function addMinutes(date: Date, minutes: number): Date {
  return moment(date).add(minutes, 'minutes').toDate();
}

/** Whole minutes from `from` to `to`, truncated toward zero. */
export function diffMinutes(from: Date, to: Date): number {
  return moment(to).diff(moment(from), 'minutes');
}

/** Number of calendar-day boundaries crossed between two instants. */
export function dayDifference(from: Date, to: Date): number {
  return moment(to).startOf('day').diff(moment(from).startOf('day'), 'days');
}

/** Format a minute count as `Hh:MMm`, e.g. `1h:05m`. */
export function formatDuration(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${h}h:${m.toString().padStart(2, '0')}m`;
}

/** Format a minute count as `Hh MMm`, used by the status line. */
export function formatDurationSpaced(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${h}h ${m.toString().padStart(2, '0')}m`;
}

// ---------------------------------------------------------------------------
// Minute text input
// ---------------------------------------------------------------------------

const DIGITS = /^\d{1,4}$/;

/**
 * Parse 1–4 digit minute text. Three or four digits read as `HMM`/`HHMM`,
 * one or two digits as plain minutes. The trailing two digits may not exceed 59.
 */
export function parseMinutes(text: string): number {
  if (!DIGITS.test(text)) {
    throw new ValidationError('Incorrect time format. Should be 1-4 digit HHMM.');
  }
  if (text.length >= 2 && Number(text.slice(-2)) > 59) {
    throw new ValidationError('Incorrect time format. Minutes cannot exceed 59.');
  }
  if (text.length <= 2) {
    return Number(text);
  }
  const hours = Number(text.slice(0, -2));
  const minutes = Number(text.slice(-2));
  return hours * 60 + minutes;
}
