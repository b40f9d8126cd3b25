// ---------------------------------------------------------------------------
// Fleet handler: units and missions inside a simulation
//
// Routes are nested under /simulations (e.g. /simulations/:id/units).
// Schemas only check shape; the domain rejects blank ids, non-positive
// capacity and the like with a ValidationError.
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { errorResponse } from '../lib/errors'
import {
  addMission,
  addUnit,
  setUnitAutonomy,
  simulationExists,
  toggleUnitMedium,
} from '../repositories'

export const UnitBody = z.object({
  variant: z.enum(['GROUND', 'AIR', 'WATER', 'AMPHIBIOUS']),
  id: z.string(),
  capacity: z.number(),
  location: z.string(),
})

export const MissionBody = z.object({
  kind: z.enum(['URGENT_DELIVERY', 'RESCUE']),
  id: z.string(),
  origin: z.string(),
  destination: z.string(),
  payload: z.number(),
})

const AutonomyBody = z.object({
  enabled: z.boolean(),
})

export const fleetHandler = new Hono<AppEnv>()

fleetHandler.post(
  '/:id/units',
  validator('json', (value, c) => {
    const r = UnitBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  (c) => {
    try {
      const data = addUnit(c.get('store'), c.req.param('id'), c.req.valid('json'))
      if (!data) return c.json({ error: 'Simulation not found', code: 'NOT_FOUND' }, 404)
      return c.json({ data }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

fleetHandler.post(
  '/:id/missions',
  validator('json', (value, c) => {
    const r = MissionBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  (c) => {
    try {
      const data = addMission(c.get('store'), c.req.param('id'), c.req.valid('json'))
      if (!data) return c.json({ error: 'Simulation not found', code: 'NOT_FOUND' }, 404)
      return c.json({ data }, 201)
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

fleetHandler.put(
  '/:id/units/:unitId/autonomy',
  validator('json', (value, c) => {
    const r = AutonomyBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  (c) => {
    const store = c.get('store')
    const id = c.req.param('id')
    if (!simulationExists(store, id)) {
      return c.json({ error: 'Simulation not found', code: 'NOT_FOUND' }, 404)
    }
    try {
      const data = setUnitAutonomy(store, id, c.req.param('unitId'), c.req.valid('json').enabled)
      if (!data) return c.json({ error: 'Unit not found', code: 'NOT_FOUND' }, 404)
      return c.json({ data })
    } catch (err) {
      return errorResponse(c, err)
    }
  },
)

fleetHandler.post('/:id/units/:unitId/medium', (c) => {
  const store = c.get('store')
  const id = c.req.param('id')
  if (!simulationExists(store, id)) {
    return c.json({ error: 'Simulation not found', code: 'NOT_FOUND' }, 404)
  }
  try {
    const data = toggleUnitMedium(store, id, c.req.param('unitId'))
    if (!data) return c.json({ error: 'Unit not found', code: 'NOT_FOUND' }, 404)
    return c.json({ data })
  } catch (err) {
    return errorResponse(c, err)
  }
})
