/** Actions that can be dispatched to the timer state machine. */
export type TimerAction =
  | { type: 'start'; now: Date; backdateMinutes?: number }
  | { type: 'pause'; now: Date; addMinutes?: number }
  | { type: 'stop'; now: Date }
  | { type: 'next'; now: Date };

export type TimerActionType = TimerAction['type'];
