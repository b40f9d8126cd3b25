import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { logger } from 'hono/logger'
import type { AppEnv } from './types'
import type { AppConfig } from './config'
import { config } from './config'
import type { SimulationStore } from './store'
import { store } from './store'
import { contextMiddleware } from './middleware/context'
import { simulationsHandler } from './handlers/simulations'
import { fleetHandler } from './handlers/fleet'

export interface AppOptions {
  store: SimulationStore
  config: AppConfig
}

export function createApp(options: AppOptions): Hono<AppEnv> {
  const app = new Hono<AppEnv>()

  // -------------------------------------------------------------------------
  // Global middleware (applies to all routes including /health)
  // -------------------------------------------------------------------------
  app.use('*', logger())
  app.use('*', cors())

  app.get('/health', (c) => {
    return c.json({ status: 'ok' as const, timestamp: new Date().toISOString() })
  })

  // -------------------------------------------------------------------------
  // API: every route under /api/v1 sees the store and config in context
  // -------------------------------------------------------------------------
  const v1 = new Hono<AppEnv>()
  v1.use('*', contextMiddleware(options.store, options.config))

  v1.route('/simulations', simulationsHandler)
  // Fleet routes are nested under /simulations (e.g. /simulations/:id/units)
  v1.route('/simulations', fleetHandler)

  app.route('/api/v1', v1)

  // -------------------------------------------------------------------------
  // 404 fallback
  // -------------------------------------------------------------------------
  app.notFound((c) => c.json({ error: 'Not found', code: 'NOT_FOUND' }, 404))

  return app
}

export const app = createApp({ store, config })
