// ---------------------------------------------------------------------------
// Hono application types
// ---------------------------------------------------------------------------

import type { AppConfig } from './config'
import type { SimulationStore } from './store'

/**
 * Variables injected into Hono context by the context middleware.
 * Every handler mounted under /api/v1/* can rely on these being present.
 */
export type AppVariables = {
  /** Holds every simulation served by this app instance. */
  store: SimulationStore
  config: AppConfig
}

/** Hono environment type used when constructing the app and all sub-routers. */
export type AppEnv = { Variables: AppVariables }
