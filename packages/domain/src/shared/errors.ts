// ---------------------------------------------------------------------------
// Domain error taxonomy.
//
// Every error raised by the engine extends DomainError and carries a stable
// `code` that the API layer maps to an HTTP status. "No unit available" is
// deliberately absent: it is a steady-state outcome, reported as an event.
// ---------------------------------------------------------------------------

export type DomainErrorCode = 'VALIDATION_ERROR' | 'CAPACITY_EXCEEDED' | 'ILLEGAL_STATE'

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Invalid constructor arguments (blank id, non-positive capacity, ...). */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR' as const

  constructor(
    message: string,
    /** Individual rule violations, in the order they were checked. */
    readonly issues: readonly string[] = [message],
  ) {
    super(message)
  }
}

/** A load request above the unit's maximum payload. */
export class CapacityExceededError extends DomainError {
  readonly code = 'CAPACITY_EXCEEDED' as const

  constructor(
    readonly unitId: string,
    readonly capacity: number,
    readonly amount: number,
  ) {
    super(`Load of ${amount} exceeds capacity ${capacity} of unit ${unitId}`)
  }
}

/** An operation invoked on an entity whose current state does not allow it. */
export class IllegalStateError extends DomainError {
  readonly code = 'ILLEGAL_STATE' as const
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError
}
