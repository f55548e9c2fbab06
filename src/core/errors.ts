/**
 * Error taxonomy for the trading loop.
 *
 * Transient collaborator failures (timeouts, exhausted retries) are recoverable
 * and map to a stage fallback. Invariant violations indicate a capital-safety
 * bug and must never be swallowed.
 */

export class CollaboratorTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'CollaboratorTimeoutError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(`${operation} failed after ${attempts} attempt(s): ${describeError(lastError)}`);
    this.name = 'RetryExhaustedError';
  }
}

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export class IllegalTransitionError extends InvariantViolationError {
  constructor(
    public readonly from: string,
    public readonly event: string
  ) {
    super(`Illegal transition: event "${event}" is not allowed in state ${from}`);
    this.name = 'IllegalTransitionError';
  }
}

export class ReservationConflictError extends InvariantViolationError {
  constructor(
    public readonly assetPair: string,
    public readonly existingReservationId: string
  ) {
    super(`Exposure already held for ${assetPair} by reservation ${existingReservationId}`);
    this.name = 'ReservationConflictError';
  }
}

export class ReservationStateError extends InvariantViolationError {
  constructor(
    public readonly reservationId: string,
    detail: string
  ) {
    super(`Reservation ${reservationId}: ${detail}`);
    this.name = 'ReservationStateError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isInvariantViolation(error: unknown): error is InvariantViolationError {
  return error instanceof InvariantViolationError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
