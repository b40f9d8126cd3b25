// ---------------------------------------------------------------------------
// Runtime configuration
//
// Environment variables (all optional):
//   FLEETLINE_MAX_CYCLES_PER_REQUEST cap on `count` for POST .../cycles (default: 50)
//   FLEETLINE_EVENT_LOG_LIMIT        events kept per simulation (default: 1000)
//   FLEETLINE_MAX_SIMULATIONS        simulations held in memory at once (default: 100)
//   NODE_ENV                         development | test | production
// ---------------------------------------------------------------------------

import { z } from 'zod'

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  FLEETLINE_MAX_CYCLES_PER_REQUEST: z.coerce.number().int().min(1).max(1000).default(50),
  FLEETLINE_EVENT_LOG_LIMIT: z.coerce.number().int().min(1).default(1000),
  FLEETLINE_MAX_SIMULATIONS: z.coerce.number().int().min(1).default(100),
})

export interface AppConfig {
  readonly nodeEnv: 'development' | 'test' | 'production'
  readonly maxCyclesPerRequest: number
  readonly eventLogLimit: number
  readonly maxSimulations: number
}

/**
 * Parses configuration from an environment map.
 *
 * @throws {Error} listing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const r = EnvSchema.safeParse(env)
  if (!r.success) {
    const issues = r.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid configuration: ${issues}`)
  }
  return Object.freeze({
    nodeEnv: r.data.NODE_ENV,
    maxCyclesPerRequest: r.data.FLEETLINE_MAX_CYCLES_PER_REQUEST,
    eventLogLimit: r.data.FLEETLINE_EVENT_LOG_LIMIT,
    maxSimulations: r.data.FLEETLINE_MAX_SIMULATIONS,
  })
}

export const config: AppConfig = loadConfig()
