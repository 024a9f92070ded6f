// --------------------------------------------------------------------------
// Error types
// --------------------------------------------------------------------------

export type DaylogErrorCode =
  | 'resolution_timeout'
  | 'auth_failure'
  | 'navigation_failure'
  | 'environment_fault'
  | 'invalid_date';

export class DaylogError extends Error {
  constructor(
    message: string,
    public readonly code: DaylogErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'DaylogError';
  }
}

/** A required field or control never appeared within its bound. */
export class ResolutionTimeoutError extends DaylogError {
  constructor(
    public readonly role: string,
    public readonly attempts: number,
  ) {
    super(`No element found for ${role} after ${attempts} candidate(s)`, 'resolution_timeout');
    this.name = 'ResolutionTimeoutError';
  }
}

export class AuthFailureError extends DaylogError {
  constructor(reason: string) {
    super(`Authentication failed: ${reason}`, 'auth_failure');
    this.name = 'AuthFailureError';
  }
}

export class NavigationFailureError extends DaylogError {
  constructor(message = 'Entry form unreachable by every navigation strategy') {
    super(message, 'navigation_failure');
    this.name = 'NavigationFailureError';
  }
}

/** The browser engine itself is unusable (missing executable, launch crash). */
export class EnvironmentFaultError extends DaylogError {
  constructor(message: string, cause?: unknown) {
    super(message, 'environment_fault', cause);
    this.name = 'EnvironmentFaultError';
  }
}

export class InvalidDateError extends DaylogError {
  constructor(
    public readonly value: string,
    reason: string,
  ) {
    super(`Invalid date "${value}": ${reason}`, 'invalid_date');
    this.name = 'InvalidDateError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
