import { z } from 'zod';
import { isTimestamp } from '../clock/index.js';
import { ValidationError } from '../errors.js';
import type { Cycle, TimerState } from '../timeline/types.js';

// ---------------------------------------------------------------------------
// On-disk record
// ---------------------------------------------------------------------------

const minutes = z.number().int().nonnegative();

/** Empty string means "absent". */
const timestampField = z
  .string()
  .refine((value) => value === '' || isTimestamp(value), {
    message: 'Expected a YYYY-MM-DD HH:mm timestamp',
  })
  .default('');

const CycleRecordSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('work'), minutes, paused_minutes: minutes.optional() }),
  z.object({ type: z.literal('break'), minutes, paused_minutes: minutes.optional() }),
]);

export const TimerRecordSchema = z
  .object({
    status: z.enum(['stopped', 'running', 'paused']),
    pause_start_str: timestampField,
    stop_datetime_str: timestampField,
    paused_minutes: minutes.optional(),
    /** Older files kept the open cycle's pause total here. */
    accumulated_minutes: minutes.optional(),
    mode: z.enum(['silent', 'normal', 'verbose']).default('silent'),
    timeline: z.array(CycleRecordSchema).nullable().default([]),
    day_start: timestampField,
  })
  .superRefine((record, ctx) => {
    if (record.status !== 'stopped' && record.day_start === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['day_start'],
        message: `A ${record.status} timer needs a day start`,
      });
    }
    if (record.status === 'paused' && record.pause_start_str === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pause_start_str'],
        message: 'A paused timer needs a pause start',
      });
    }
  });

export type TimerRecord = z.infer<typeof TimerRecordSchema>;
export type CycleRecord = z.infer<typeof CycleRecordSchema>;

// ---------------------------------------------------------------------------
// Migration
// ---------------------------------------------------------------------------

/**
 * Pause minutes of the open cycle. `accumulated_minutes` wins only when
 * `paused_minutes` is missing or zero.
 */
export function migrateLivePausedMinutes(record: TimerRecord): number {
  const current = record.paused_minutes ?? 0;
  if (record.accumulated_minutes !== undefined && current === 0) {
    return record.accumulated_minutes;
  }
  return current;
}

// ---------------------------------------------------------------------------
// Decode / encode
// ---------------------------------------------------------------------------

/** Validate a parsed JSON document and convert it into a TimerState. */
export function decodeTimer(raw: unknown): TimerState {
  const result = TimerRecordSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ValidationError(`Invalid timer file${where}: ${issue.message}`);
  }
  const record = result.data;

  return {
    status: record.status,
    anchorTime: nullIfEmpty(record.day_start),
    timeline: (record.timeline ?? []).map(decodeCycle),
    livePausedMinutes: migrateLivePausedMinutes(record),
    pauseStartTime: record.status === 'paused' ? nullIfEmpty(record.pause_start_str) : null,
    lastStopTime: record.status === 'stopped' ? nullIfEmpty(record.stop_datetime_str) : null,
    mode: record.mode,
  };
}

/** Convert a TimerState into its on-disk record. */
export function encodeTimer(state: TimerState): TimerRecord {
  return {
    status: state.status,
    pause_start_str: state.pauseStartTime ?? '',
    stop_datetime_str: state.lastStopTime ?? '',
    paused_minutes: state.livePausedMinutes,
    mode: state.mode,
    timeline: state.timeline.map(encodeCycle),
    day_start: state.anchorTime ?? '',
  };
}

function decodeCycle(record: CycleRecord): Cycle {
  switch (record.type) {
    case 'work':
      return { type: 'work', minutes: record.minutes, pausedMinutes: record.paused_minutes ?? 0 };
    case 'break':
      return { type: 'break', minutes: record.minutes };
  }
}

function encodeCycle(cycle: Cycle): CycleRecord {
  switch (cycle.type) {
    case 'work':
      return cycle.pausedMinutes > 0
        ? { type: 'work', minutes: cycle.minutes, paused_minutes: cycle.pausedMinutes }
        : { type: 'work', minutes: cycle.minutes };
    case 'break':
      return { type: 'break', minutes: cycle.minutes };
  }
}

function nullIfEmpty(value: string): string | null {
  return value === '' ? null : value;
}
