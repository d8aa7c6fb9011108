/** Base class for every error the timer reports to the user. */
export class WorkTimerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed input or an edit that would break a minute-field invariant. */
export class ValidationError extends WorkTimerError {}

/** Operation not valid for the current status. Informational, never fatal. */
export class StateError extends WorkTimerError {}

/** A cycle index outside the addressable range. */
export class OutOfRangeError extends WorkTimerError {
  constructor(
    readonly index: number,
    readonly max: number,
  ) {
    super(`Cycle ${index} does not exist. Valid range: 1-${max}`);
  }
}

/** Required configuration is missing. */
export class ConfigError extends WorkTimerError {}

/** No persisted timer exists. */
export class NotFoundError extends WorkTimerError {
  constructor(message = 'No timer exists.') {
    super(message);
  }
}

/** Errors that are reported to the user without a failing exit status. */
export function isSoftError(err: unknown): err is ValidationError | StateError | OutOfRangeError {
  return (
    err instanceof ValidationError || err instanceof StateError || err instanceof OutOfRangeError
  );
}
