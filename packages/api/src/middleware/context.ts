// ---------------------------------------------------------------------------
// Context middleware
//
// Places the simulation store and runtime config in the Hono context so that
// handlers never reach for module-level instances. Tests build an app around
// a fresh store per case.
// ---------------------------------------------------------------------------

import type { MiddlewareHandler } from 'hono'
import type { AppEnv } from '../types'
import type { AppConfig } from '../config'
import type { SimulationStore } from '../store'

export function contextMiddleware(store: SimulationStore, config: AppConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set('store', store)
    c.set('config', config)
    await next()
  }
}
