// ---------------------------------------------------------------------------
// Error → HTTP response mapping shared by every handler.
//
//   ValidationError        → 400 VALIDATION_ERROR
//   CapacityExceededError  → 422 CAPACITY_EXCEEDED
//   IllegalStateError      → 422 ILLEGAL_STATE
//   SimulationLimitError   → 409 LIMIT_REACHED
//   anything else          → 500 INTERNAL_ERROR (logged)
// ---------------------------------------------------------------------------

import type { Context } from 'hono'
import { isDomainError, ValidationError } from '@fleetline/domain'

/** Raised when the store already holds the configured maximum of simulations. */
export class SimulationLimitError extends Error {
  readonly code = 'LIMIT_REACHED' as const

  constructor(readonly limit: number) {
    super(`Simulation limit of ${limit} reached`)
    this.name = 'SimulationLimitError'
  }
}

export function errorResponse(c: Context, err: unknown): Response {
  if (err instanceof ValidationError) {
    return c.json({ error: err.message, code: err.code, issues: err.issues }, 400)
  }
  if (isDomainError(err)) {
    return c.json({ error: err.message, code: err.code }, 422)
  }
  if (err instanceof SimulationLimitError) {
    return c.json({ error: err.message, code: err.code }, 409)
  }
  console.error('Unhandled error while serving', c.req.method, c.req.path, err)
  return c.json({ error: 'Internal server error', code: 'INTERNAL_ERROR' }, 500)
}
